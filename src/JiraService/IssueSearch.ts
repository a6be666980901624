import { setTimeout as delay } from 'timers/promises';
import type { Logger } from '../core/utils/Logger';
import { classifyFailure, describeError, FetchOutcome, InvalidArgumentError, RetrievalFailedError } from '../core/utils/errors';
import type { JiraIssue, SearchPage } from './jiraApiInterfaces/JiraModels';
import type { SearchIssuesQueryParams } from './jiraApiInterfaces/QueryParams';
import { isTrackerClient, TrackerClient } from './TrackerClient';

export interface RetryPolicy {
  /** Nombre total d'appels autorisés (premier appel compris). */
  attempts: number;
  /** Attente avant le retry n : n * baseDelaySeconds. */
  baseDelaySeconds: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { attempts: 5, baseDelaySeconds: 45 };
export const DEFAULT_BATCH_SIZE = 100;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

// Une interruption pendant l'attente remonte la raison de l'abandon, pas l'AbortError du timer
const defaultSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    signal?.throwIfAborted();
    throw err;
  }
};

/**
 * Un appel search borné, rejoué sur erreur serveur transitoire (500 / 503)
 * avec une attente linéaire. Aucun état conservé entre deux appels.
 */
export class RetryingPageFetcher {
  constructor(
    private readonly client: TrackerClient,
    private readonly logger: Logger,
    private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  /**
   * Retourne le résultat final : succès, budget épuisé (`retryable`) ou échec non rejouable (`fatal`).
   * Dans les deux derniers cas, `error` est la dernière erreur reçue, non modifiée.
   * Un `signal` interrompu rejette avec sa raison, y compris pendant l'attente entre deux essais.
   */
  public async fetch(
    jql: string,
    fields: string[] | undefined,
    expand: string | undefined,
    maxResults: number,
    startAt: number,
    signal?: AbortSignal,
  ): Promise<FetchOutcome<SearchPage>> {
    if (!Number.isInteger(maxResults) || maxResults <= 0) {
      throw new InvalidArgumentError(`maxResults doit être un entier > 0 (reçu ${maxResults})`);
    }
    if (!Number.isInteger(startAt) || startAt < 0) {
      throw new InvalidArgumentError(`startAt doit être un entier >= 0 (reçu ${startAt})`);
    }

    const params: SearchIssuesQueryParams = { jql, fields, expand, maxResults, startAt };
    let attempt = 0;
    while (true) {
      attempt++;
      signal?.throwIfAborted();
      const outcome = await this.attempt(params, attempt, signal);
      if (outcome.kind !== 'retryable' || attempt >= this.policy.attempts) {
        return outcome;
      }
      const waitSeconds = attempt * this.policy.baseDelaySeconds;
      this.logger.warn(`Issue search failed at startAt=${startAt} (${describeError(outcome.error)}), retry ${attempt}/${this.policy.attempts - 1} in ${waitSeconds}s`);
      await this.sleep(waitSeconds * 1000, signal);
    }
  }

  private async attempt(params: SearchIssuesQueryParams, attempts: number, signal?: AbortSignal): Promise<FetchOutcome<SearchPage>> {
    try {
      const value = await this.client.searchIssues(params, signal);
      return { kind: 'success', value, attempts };
    } catch (error) {
      signal?.throwIfAborted();
      return { kind: classifyFailure(error), error, attempts };
    }
  }
}

/**
 * Séquence paresseuse des issues d'une requête JQL, toutes pages confondues.
 * L'offset avance du nombre d'issues réellement renvoyées (la dernière page peut être courte).
 */
export class PaginatedIssueSequence {
  constructor(
    private readonly logger: Logger,
    private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  /**
   * Les préconditions sont vérifiées à l'appel, avant toute requête.
   * @throws InvalidArgumentError client ou JQL invalide
   */
  public issues(
    client: TrackerClient | null | undefined,
    jql: string,
    fields?: string[],
    expand?: string,
    batchSize: number = DEFAULT_BATCH_SIZE,
    signal?: AbortSignal,
  ): AsyncIterable<JiraIssue> {
    if (!isTrackerClient(client)) {
      throw new InvalidArgumentError('Invalid jira client');
    }
    if (typeof jql !== 'string' || jql.trim() === '') {
      throw new InvalidArgumentError('Invalid JQL');
    }
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new InvalidArgumentError(`Invalid batch size: ${batchSize}`);
    }
    const fetcher = new RetryingPageFetcher(client, this.logger, this.policy, this.sleep);
    return this.traverse(fetcher, jql, fields, expand, batchSize, signal);
  }

  private async *traverse(
    fetcher: RetryingPageFetcher,
    jql: string,
    fields: string[] | undefined,
    expand: string | undefined,
    batchSize: number,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<JiraIssue> {
    let startAt = 0;
    let total: number | null = null;
    let lastIssueKey: string | null = null;

    while (total === null || startAt < total) {
      const outcome = await fetcher.fetch(jql, fields, expand, batchSize, startAt, signal);
      if (outcome.kind !== 'success') {
        throw new RetrievalFailedError({ jql, startAt, total, lastIssueKey, attempts: outcome.attempts }, describeError(outcome.error), { cause: outcome.error });
      }

      const page = outcome.value;
      total = page.total;
      if (page.issues.length === 0 && startAt < total) {
        throw new RetrievalFailedError({ jql, startAt, total, lastIssueKey, attempts: outcome.attempts }, 'empty page returned before reaching the reported total');
      }
      startAt += page.issues.length;
      this.logger.debug(`Fetched ${page.issues.length} issues (${startAt}/${total})`);

      for (const issue of page.issues) {
        lastIssueKey = issue.key;
        yield issue;
      }
    }
  }
}
