/**
 * Taxonomie des erreurs de l'extracteur.
 * Chaque erreur porte un discriminant `kind` pour pouvoir être traitée comme une donnée.
 */
export type ExtractionErrorKind =
  | 'InvalidArgument'
  | 'Configuration'
  | 'JiraHttp'
  | 'TransientServer'
  | 'JiraConnection'
  | 'RetrievalFailed'
  | 'UserLookupFailed'
  | 'MalformedTimestamp';

export abstract class ExtractionError extends Error {
  public abstract readonly kind: ExtractionErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Argument invalide (JQL vide, client absent...). Aucun appel réseau n'est tenté. */
export class InvalidArgumentError extends ExtractionError {
  public readonly kind = 'InvalidArgument' as const;
}

/** Configuration absente ou invalide (fichier, stanza, variable d'environnement). */
export class ConfigurationError extends ExtractionError {
  public readonly kind = 'Configuration' as const;
}

/** Réponse HTTP non 2xx renvoyée par Jira. */
export class JiraHttpError extends ExtractionError {
  public readonly kind: ExtractionErrorKind = 'JiraHttp';

  constructor(
    public readonly status: number,
    public readonly url: string,
    public readonly responseText: string,
  ) {
    super(`HTTP ${status} for ${url}${responseText ? ` - ${responseText}` : ''}`);
  }

  /** Fabrique : 500 / 503 donnent une TransientServerError. */
  public static fromStatus(status: number, url: string, responseText: string): JiraHttpError {
    return RETRYABLE_STATUS_CODES.has(status) ? new TransientServerError(status, url, responseText) : new JiraHttpError(status, url, responseText);
  }
}

/** 500 - internal server error, 503 - service unavailable */
export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([500, 503]);

/** Surcharge ou indisponibilité du serveur : rejouable. */
export class TransientServerError extends JiraHttpError {
  public readonly kind: ExtractionErrorKind = 'TransientServer';
}

export class JiraConnectionError extends ExtractionError {
  public readonly kind = 'JiraConnection' as const;
}

export interface RetrievalContext {
  jql: string;
  startAt: number;
  total: number | null;
  lastIssueKey: string | null;
  attempts: number;
}

/**
 * Échec définitif d'une traversée paginée.
 * Porte le contexte nécessaire au diagnostic (requête, offset, total, dernière issue).
 */
export class RetrievalFailedError extends ExtractionError {
  public readonly kind = 'RetrievalFailed' as const;

  constructor(
    public readonly context: RetrievalContext,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(
      `Issue search failed - jql='${context.jql}', total=${context.total ?? 'unknown'}, startAt=${context.startAt}, lastReturnedIssue=${context.lastIssueKey ?? 'none'}, attempts=${context.attempts} - ${reason}`,
      options,
    );
  }
}

export class UserLookupFailedError extends ExtractionError {
  public readonly kind = 'UserLookupFailed' as const;

  constructor(
    public readonly username: string,
    options?: { cause?: unknown },
  ) {
    super(`User '${username}' not found in Jira`, options);
  }
}

export class MalformedTimestampError extends ExtractionError {
  public readonly kind = 'MalformedTimestamp' as const;

  constructor(public readonly value: string) {
    super(`Malformed Jira timestamp: '${value}'`);
  }
}

/**
 * Résultat d'un appel distant, sous forme de variante étiquetée.
 * La boucle de retry décide sur `kind`, pas sur la classe de l'exception.
 */
export type FetchOutcome<T> =
  | { kind: 'success'; value: T; attempts: number }
  | { kind: 'retryable'; error: unknown; attempts: number }
  | { kind: 'fatal'; error: unknown; attempts: number };

/** Classe une erreur levée par un appel distant. */
export function classifyFailure(error: unknown): 'retryable' | 'fatal' {
  if (error instanceof JiraHttpError && RETRYABLE_STATUS_CODES.has(error.status)) {
    return 'retryable';
  }
  return 'fatal';
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
