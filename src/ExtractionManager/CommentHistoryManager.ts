import type { RuntimeConfig } from '../config/config';
import type { ExtractionStanza } from '../config/ExtractionConfigService';
import { AuditService } from '../core/utils/AuditService';
import type { Logger } from '../core/utils/Logger';
import { CommentRecordBuilder, MarkupConverter } from '../CommentExport/CommentRecordBuilder';
import { convertJiraMarkup } from '../CommentExport/jiraMarkup';
import type { RecordSink } from '../CommentExport/RecordWriter';
import { UserReferenceCache, UserReferenceResolver } from '../CommentExport/UserReferenceResolver';
import { DEFAULT_BATCH_SIZE } from '../JiraService/IssueSearch';
import { JiraRestClient } from '../JiraService/JiraRestClient';
import JiraServiceManager, { JiraServiceManagerDeps } from '../JiraService/JiraServiceManager';

// Champs Jira nécessaires aux enregistrements
export const ISSUE_FIELDS = ['summary', 'issuetype', 'priority', 'reporter', 'assignee', 'created'];

const ACTOR = 'CommentHistoryManager';

export interface ExtractionSummary {
  runId: string;
  issues: number;
  records: number;
  elapsedMs: number;
}

export interface CommentHistoryManagerDeps extends JiraServiceManagerDeps {
  batchSize?: number;
  convert?: MarkupConverter;
}

export default class CommentHistoryManager extends JiraServiceManager {
  private readonly batchSize: number;
  private readonly convert: MarkupConverter;

  constructor(deps: CommentHistoryManagerDeps) {
    super(deps);
    this.batchSize = deps.batchSize ?? DEFAULT_BATCH_SIZE;
    this.convert = deps.convert ?? convertJiraMarkup;
  }

  /**
   * Fabrique : client REST connecté et audit selon la configuration.
   * @throws ConfigurationError | JiraConnectionError
   */
  public static async fromConfig(runtime: RuntimeConfig, stanza: ExtractionStanza, logger: Logger): Promise<CommentHistoryManager> {
    const client = await JiraRestClient.create({
      server: stanza.jira_server,
      token: stanza.jira_token,
      clientCert: stanza.client_crt,
      clientKey: stanza.client_key,
      timeoutMs: runtime.JIRA_REQUEST_TIMEOUT_MS,
    });
    await client.connect(logger);

    return new CommentHistoryManager({
      client,
      logger,
      audit: AuditService.fromSettings(runtime),
      retryPolicy: { attempts: runtime.JIRA_RETRY_ATTEMPTS, baseDelaySeconds: runtime.JIRA_RETRY_BASE_DELAY_S },
      batchSize: runtime.JIRA_BATCH_SIZE,
    });
  }

  /**
   * Exporte un enregistrement par commentaire des issues de la requête.
   * Chaque enregistrement est remis au sink dès sa production.
   * Toute erreur systémique interrompt l'exécution : pas de succès partiel.
   * `signal` interrompt aussi les appels Jira et les attentes de retry en cours.
   */
  public async process(jql: string, sink: RecordSink, signal?: AbortSignal): Promise<ExtractionSummary> {
    const startedAt = Date.now();

    // === Audit de cette exécution ===
    const { runId } = await this.audit.beginRun({ actor: ACTOR, params: { jql, batchSize: this.batchSize } });

    let issues = 0;
    let records = 0;
    try {
      this.logger.info(`Searching for issues on source jira instance through JQL:\n\t${jql}`);
      const cache = new UserReferenceCache();
      const builder = new CommentRecordBuilder(new UserReferenceResolver(this.client, this.logger), cache, this.convert);

      for await (const issue of this.issues(jql, ISSUE_FIELDS, undefined, this.batchSize, signal)) {
        signal?.throwIfAborted();
        issues++;
        this.logger.info(`Processing issue ${issues}: ${issue.key}`);

        const comments = await this.comments(issue.key, signal);
        let count = 0;
        for await (const record of builder.buildRecords(issue, comments, signal)) {
          signal?.throwIfAborted();
          await sink.write(record);
          count++;
        }
        records += count;
        this.logger.debug(`    Issue ${issues} ${issue.key} has ${count} comments`);
      }

      const message = `Exported ${records} comments from ${issues} issues`;
      await this.audit.logStep(runId, 'FETCH_DONE', message, { cachedUsers: cache.size });

      await this.audit.endRun(runId, 'SUCCESS', undefined, { issues, records });
      return { runId, issues, records, elapsedMs: Date.now() - startedAt };
    } catch (err) {
      await this.audit.endRun(runId, 'FAILURE', err, { issues, records });
      throw err;
    }
  }
}
