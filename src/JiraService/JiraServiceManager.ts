import { AuditService } from '../core/utils/AuditService';
import type { Logger } from '../core/utils/Logger';
import { DEFAULT_RETRY_POLICY, PaginatedIssueSequence, RetryPolicy, Sleep } from './IssueSearch';
import type { JiraComment, JiraIssue } from './jiraApiInterfaces/JiraModels';
import type { TrackerClient } from './TrackerClient';

export interface JiraServiceManagerDeps {
  client: TrackerClient;
  logger: Logger;
  audit?: AuditService;
  retryPolicy?: RetryPolicy;
  /** Attente entre deux tentatives (injectable pour les tests). */
  sleep?: Sleep;
}

/**
 * Base commune des managers : client Jira, journalisation et audit.
 */
export default abstract class JiraServiceManager {
  protected readonly client: TrackerClient;
  protected readonly logger: Logger;
  protected readonly audit: AuditService;
  private readonly sequence: PaginatedIssueSequence;

  protected constructor(deps: JiraServiceManagerDeps) {
    this.client = deps.client;
    this.logger = deps.logger;
    this.audit = deps.audit ?? new AuditService();
    this.sequence = new PaginatedIssueSequence(deps.logger, deps.retryPolicy ?? DEFAULT_RETRY_POLICY, deps.sleep);
  }

  // ---------- Accès API Jira ----------

  /**
   * Issues d'une requête JQL, toutes pages confondues, avec retry sur 500 / 503.
   */
  public issues(jql: string, fields?: string[], expand?: string, batchSize?: number, signal?: AbortSignal): AsyncIterable<JiraIssue> {
    return this.sequence.issues(this.client, jql, fields, expand, batchSize, signal);
  }

  /**
   * Commentaires d'une issue (un seul appel).
   */
  public async comments(issueKey: string, signal?: AbortSignal): Promise<JiraComment[]> {
    return this.client.getComments(issueKey, signal);
  }
}
