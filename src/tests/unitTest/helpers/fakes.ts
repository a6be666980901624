import type { AuditEvent, AuditTransport } from '../../../core/utils/AuditService';
import type { Logger, LogLevel } from '../../../core/utils/Logger';
import type { Sleep } from '../../../JiraService/IssueSearch';
import type { JiraComment, JiraIssue, JiraUser, SearchPage } from '../../../JiraService/jiraApiInterfaces/JiraModels';
import type { SearchIssuesQueryParams } from '../../../JiraService/jiraApiInterfaces/QueryParams';
import type { TrackerClient } from '../../../JiraService/TrackerClient';

/** Logger en mémoire : les lignes sont inspectées par les tests. */
export class MemoryLogger implements Logger {
  public readonly lines: Array<{ level: LogLevel; message: string }> = [];

  public debug(message: string): void {
    this.lines.push({ level: 'debug', message });
  }

  public info(message: string): void {
    this.lines.push({ level: 'info', message });
  }

  public warn(message: string): void {
    this.lines.push({ level: 'warn', message });
  }

  public error(message: string): void {
    this.lines.push({ level: 'error', message });
  }

  public messages(level: LogLevel): string[] {
    return this.lines.filter((l) => l.level === level).map((l) => l.message);
  }
}

export class MemoryAuditTransport implements AuditTransport {
  public readonly events: AuditEvent[] = [];

  async log(event: AuditEvent): Promise<void> {
    this.events.push(event);
  }
}

export function makeIssues(count: number, prefix = 'PRJ'): JiraIssue[] {
  return Array.from({ length: count }, (_, i) => ({ key: `${prefix}-${i + 1}`, fields: {} }));
}

export function makeUser(name: string, emailAddress?: string): JiraUser {
  return { name, displayName: name.charAt(0).toUpperCase() + name.slice(1), emailAddress };
}

/**
 * Faux client Jira : sert `issues` page par page.
 * `failures[n]` (si défini) est levé au n-ième appel search au lieu de répondre.
 * `maxPageSize` plafonne les pages comme le fait le serveur, quel que soit `maxResults`.
 */
export class FakeTrackerClient implements TrackerClient {
  public readonly searchCalls: SearchIssuesQueryParams[] = [];
  public readonly commentCalls: string[] = [];
  public readonly userCalls: string[] = [];

  constructor(
    private readonly issues: JiraIssue[],
    private readonly comments: Record<string, JiraComment[]> = {},
    private readonly users: Record<string, JiraUser> = {},
    private readonly failures: unknown[] = [],
    private readonly maxPageSize: number = Infinity,
  ) {}

  async searchIssues(params: SearchIssuesQueryParams, signal?: AbortSignal): Promise<SearchPage> {
    signal?.throwIfAborted();
    const call = this.searchCalls.length;
    this.searchCalls.push(params);
    const failure = this.failures[call];
    if (failure !== undefined) throw failure;
    const pageSize = Math.min(params.maxResults, this.maxPageSize);
    return {
      startAt: params.startAt,
      maxResults: pageSize,
      total: this.issues.length,
      issues: this.issues.slice(params.startAt, params.startAt + pageSize),
    };
  }

  async getComments(issueKey: string, signal?: AbortSignal): Promise<JiraComment[]> {
    signal?.throwIfAborted();
    this.commentCalls.push(issueKey);
    return this.comments[issueKey] ?? [];
  }

  async getUser(username: string, signal?: AbortSignal): Promise<JiraUser> {
    signal?.throwIfAborted();
    this.userCalls.push(username);
    const user = this.users[username];
    if (!user) throw new Error(`404 ${username}`);
    return user;
  }
}

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) out.push(item);
  return out;
}

export const noSleep: Sleep = async () => undefined;
