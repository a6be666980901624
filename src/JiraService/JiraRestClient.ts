import { promises as fs } from 'fs';
import { Agent, Dispatcher, fetch } from 'undici';
import { z } from 'zod';
import type { Logger } from '../core/utils/Logger';
import { ConfigurationError, describeError, JiraConnectionError, JiraHttpError } from '../core/utils/errors';
import { CommentListSchema, JiraComment, JiraUser, JiraUserSchema, SearchPage, SearchResultSchema } from './jiraApiInterfaces/JiraModels';
import type { SearchIssuesQueryParams } from './jiraApiInterfaces/QueryParams';
import type { TrackerClient } from './TrackerClient';

export interface JiraRestClientOptions {
  /** URL de base de l'instance, ex: https://jira.example.com */
  server: string;
  /** Personal access token (Bearer). */
  token: string;
  /** Certificat client TLS (PEM) et sa clé. */
  clientCert?: string;
  clientKey?: string;
  /** Délai maximal par appel, en millisecondes. */
  timeoutMs?: number;
  /** Dispatcher undici (agent mTLS, MockAgent en test). */
  dispatcher?: Dispatcher;
}

type QueryValue = string | number | undefined;

const API_PATH = 'rest/api/2';

/**
 * Client REST Jira (API v2) : recherche JQL, commentaires, utilisateurs.
 */
export class JiraRestClient implements TrackerClient {
  private constructor(
    private readonly baseUrl: URL,
    private readonly token: string,
    private readonly dispatcher: Dispatcher | undefined,
    private readonly timeoutMs: number | undefined,
  ) {}

  /**
   * Fabrique : lit le certificat client s'il est configuré.
   * @throws ConfigurationError fichier de certificat ou de clé introuvable
   */
  public static async create(options: JiraRestClientOptions): Promise<JiraRestClient> {
    let dispatcher = options.dispatcher;
    if (!dispatcher && options.clientCert && options.clientKey) {
      const cert = await JiraRestClient.readPem(options.clientCert, 'client certificate');
      const key = await JiraRestClient.readPem(options.clientKey, 'client key');
      dispatcher = new Agent({ connect: { cert, key } });
    }
    const base = options.server.endsWith('/') ? options.server : options.server + '/';
    return new JiraRestClient(new URL(base), options.token, dispatcher, options.timeoutMs);
  }

  private static async readPem(filePath: string, label: string): Promise<string> {
    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      throw new ConfigurationError(`${label} file not found: ${filePath}`, { cause: err });
    }
  }

  /**
   * Vérifie la connexion et journalise l'utilisateur connecté.
   * @throws JiraConnectionError
   */
  public async connect(logger: Logger): Promise<JiraUser> {
    const server = this.baseUrl.toString();
    logger.info(`Connecting to Jira on "${server}" with token "${this.token.slice(0, 4)}..."`);
    try {
      const me = await this.myself();
      logger.info(`Jira connected as user "${me.name}" to "${server}"`);
      return me;
    } catch (err) {
      const status = err instanceof JiraHttpError ? `${err.status} ` : '';
      throw new JiraConnectionError(`Connection to '${server}' failed: ${status}${describeError(err)}`, { cause: err });
    }
  }

  public async myself(): Promise<JiraUser> {
    return this.get('myself', {}, JiraUserSchema);
  }

  public async searchIssues(params: SearchIssuesQueryParams, signal?: AbortSignal): Promise<SearchPage> {
    return this.get(
      'search',
      {
        jql: params.jql,
        fields: params.fields?.join(','),
        expand: params.expand,
        maxResults: params.maxResults,
        startAt: params.startAt,
      },
      SearchResultSchema,
      signal,
    );
  }

  public async getComments(issueKey: string, signal?: AbortSignal): Promise<JiraComment[]> {
    const page = await this.get(`issue/${encodeURIComponent(issueKey)}/comment`, {}, CommentListSchema, signal);
    return page.comments;
  }

  public async getUser(username: string, signal?: AbortSignal): Promise<JiraUser> {
    return this.get('user', { username }, JiraUserSchema, signal);
  }

  /**
   * GET authentifié + validation du JSON reçu.
   * Le signal de l'appelant et le délai maximal interrompent tous deux la requête.
   * @throws JiraHttpError (TransientServerError pour 500 / 503)
   */
  private async get<S extends z.ZodTypeAny>(resource: string, query: Record<string, QueryValue>, schema: S, signal?: AbortSignal): Promise<z.output<S>> {
    const url = new URL(`${API_PATH}/${resource}`, this.baseUrl);
    Object.entries(query).forEach(([key, value]) => {
      if (value !== undefined) url.searchParams.append(key, String(value));
    });

    const response = await fetch(url, {
      method: 'GET',
      headers: {
        Accept: 'application/json',
        Authorization: `Bearer ${this.token}`,
      },
      dispatcher: this.dispatcher,
      signal: this.requestSignal(signal),
    });

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw JiraHttpError.fromStatus(response.status, url.toString(), text.slice(0, 500));
    }
    const payload: unknown = await response.json();
    return schema.parse(payload);
  }

  private requestSignal(signal: AbortSignal | undefined): AbortSignal | undefined {
    const signals: AbortSignal[] = [];
    if (signal) signals.push(signal);
    if (this.timeoutMs) signals.push(AbortSignal.timeout(this.timeoutMs));
    return signals.length > 1 ? AbortSignal.any(signals) : signals[0];
  }
}
