import * as fsp from 'fs/promises';
import * as fs from 'fs';
import { createHmac, randomUUID } from 'crypto';
import * as path from 'path';
import { stableStringify } from './stableStringify';

/**
 * Structure d’un événement d’audit.
 */
export interface AuditEvent {
  timestamp: string; // ISO 8601 UTC
  actor: string; // identifiant du service ou de l’utilisateur
  event: string; // type d’action (p.ex. "EXTRACTION_RUN_START")
  resource?: string; // cible (instance Jira, fichier de config...)
  status?: string; // "STARTED" | "INFO" | "SUCCESS" | "FAILURE"
  details?: Record<string, unknown>;
  hmac?: string; // HMAC-SHA256 (champ canonique)
}

/**
 * Interface d’un transport d’audit (fichier, syslog, DB…).
 */
export interface AuditTransport {
  /**
   * Envoie une entrée d’audit. Ne doit jamais rejeter (erreurs internes capturées).
   */
  log(event: AuditEvent): Promise<void>;
}

/**
 * Transport de base : écrit en JSONL dans un fichier append-only.
 */
export class FileAuditTransport implements AuditTransport {
  private filePath: string;

  constructor(filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.filePath = filePath;
  }

  async log(event: AuditEvent): Promise<void> {
    try {
      await fsp.appendFile(this.filePath, JSON.stringify(event) + '\n', 'utf-8');
    } catch (err) {
      console.error('AuditTransport(File) error:', err);
    }
  }
}

export interface AuditSettings {
  AUDIT_ENABLED: boolean;
  AUDIT_LOG_FILE: string;
  AUDIT_HMAC_KEY?: string;
}

export type AuditEventInput = Omit<AuditEvent, 'timestamp' | 'hmac'>;

/**
 * Service d’audit : horodate, signe (HMAC optionnel) et diffuse les événements.
 * Sans transport, les appels sont des no-op.
 */
export class AuditService {
  constructor(
    private readonly transports: AuditTransport[] = [],
    private readonly hmacKey?: string,
  ) {}

  /**
   * Construit le service à partir de la configuration d'exécution.
   * Aucun transport si AUDIT_ENABLED est faux.
   */
  public static fromSettings(settings: AuditSettings): AuditService {
    if (!settings.AUDIT_ENABLED) return new AuditService();
    return new AuditService([new FileAuditTransport(settings.AUDIT_LOG_FILE)], settings.AUDIT_HMAC_KEY);
  }

  public get enabled(): boolean {
    return this.transports.length > 0;
  }

  /**
   * Enregistre un événement d’audit.
   */
  public async log(event: AuditEventInput): Promise<void> {
    if (!this.enabled) return;
    const entry: AuditEvent = {
      timestamp: new Date().toISOString(),
      ...event,
    };

    // Signature déterministe si une clé est fournie (le champ hmac n'est pas signé)
    if (this.hmacKey) {
      entry.hmac = createHmac('sha256', this.hmacKey).update(stableStringify(entry)).digest('hex');
    }

    await Promise.all(this.transports.map((t) => t.log(entry).catch((err: unknown) => console.error('AuditService transport error:', err))));
  }

  /**
   * Démarre une exécution (run) et retourne un run_id corrélable.
   * Journalise EXTRACTION_RUN_START.
   */
  public async beginRun(info: { actor: string; resource?: string; params?: Record<string, unknown> }): Promise<{ runId: string }> {
    const runId = randomUUID();
    await this.log({
      actor: info.actor,
      event: 'EXTRACTION_RUN_START',
      resource: info.resource,
      status: 'STARTED',
      details: { params: info.params, run_id: runId },
    });
    return { runId };
  }

  /** Journalise une étape intermédiaire liée à un run (EXTRACTION_STEP). */
  public async logStep(runId: string, step: string, message?: string, details?: Record<string, unknown>): Promise<void> {
    await this.log({
      actor: 'system',
      event: 'EXTRACTION_STEP',
      status: 'INFO',
      details: { step, message, run_id: runId, ...(details ?? {}) },
    });
  }

  /** Termine un run (EXTRACTION_RUN_END) avec statut final. */
  public async endRun(runId: string, status: 'SUCCESS' | 'FAILURE', error?: unknown, details?: Record<string, unknown>): Promise<void> {
    await this.log({
      actor: 'system',
      event: 'EXTRACTION_RUN_END',
      status,
      details: {
        run_id: runId,
        ...(details ?? {}),
        error: error instanceof Error ? { name: error.name, message: error.message, stack: error.stack } : (error ?? null),
      },
    });
  }
}
