import { MalformedTimestampError } from './errors';

/**
 * Horodatage Jira analysé : instant absolu + décalage d'origine conservé.
 */
export interface JiraTimestamp {
  instant: Date;
  /** Décalage horaire d'origine, en minutes (+0100 => 60). */
  offsetMinutes: number;
  /** Secondes depuis l'epoch, millisecondes en partie décimale. */
  epochSeconds: number;
}

// ex: 2023-01-15T10:20:30.123+0100
const JIRA_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{3})([+-])(\d{2})(\d{2})$/;

/**
 * Ramène la partie fractionnaire à exactement 3 chiffres (tronquée ou complétée par des 0).
 * Le format renvoyé par Jira n'est pas homogène d'une réponse à l'autre.
 */
export function normalizeFraction(ts: string): string {
  return ts.replace(/\.(\d+)/, (_, fraction: string) => '.' + fraction.slice(0, 3).padEnd(3, '0'));
}

/**
 * Convertit un horodatage Jira (`YYYY-MM-DDTHH:MM:SS.fff±HHMM`) en instant absolu.
 * Retourne null pour une valeur vide ou absente.
 *
 * @throws MalformedTimestampError si la chaîne normalisée ne correspond pas au format attendu
 */
export function parseJiraTimestamp(ts: string | null | undefined): JiraTimestamp | null {
  if (!ts) return null;

  const match = JIRA_TIMESTAMP.exec(normalizeFraction(ts));
  if (!match) {
    throw new MalformedTimestampError(ts);
  }
  const [year, month, day, hour, minute, second, millis] = match.slice(1, 8).map(Number);
  const sign = match[8] === '-' ? -1 : 1;
  const offsetMinutes = sign * (Number(match[9]) * 60 + Number(match[10]));

  const wallClock = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  // Date.UTC accepte les débordements (31 février...) : on vérifie l'aller-retour
  const check = new Date(wallClock);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day || check.getUTCHours() !== hour || check.getUTCMinutes() !== minute || check.getUTCSeconds() !== second || Math.abs(offsetMinutes) > 18 * 60) {
    throw new MalformedTimestampError(ts);
  }

  const instant = new Date(wallClock - offsetMinutes * 60_000);
  return {
    instant,
    offsetMinutes,
    epochSeconds: instant.getTime() / 1000,
  };
}

/** Raccourci : secondes epoch, ou null si la valeur est absente. */
export function jiraTimestampToEpoch(ts: string | null | undefined): number | null {
  return parseJiraTimestamp(ts)?.epochSeconds ?? null;
}
