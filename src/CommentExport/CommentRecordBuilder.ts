import { jiraTimestampToEpoch, parseJiraTimestamp } from '../core/utils/jiraTimestamp';
import type { JiraComment, JiraIssue } from '../JiraService/jiraApiInterfaces/JiraModels';
import { convertJiraMarkup } from './jiraMarkup';
import { UserReferenceCache, UserReferenceResolver } from './UserReferenceResolver';

export interface TicketRecord {
  key: string;
  title: string | null;
  issuetype: string | null;
  reporter: string | null;
  assignee: string | null;
  priority: string | null;
  created: string | null;
  created_epoch: number | null;
}

/** Un enregistrement de sortie par commentaire. */
export interface CommentRecord {
  ticket: TicketRecord;
  comment: string;
  author: string | null;
  author_email: string | null;
  seq: number;
  created: string;
  updated: string | null;
  created_epoch: number | null;
  updated_epoch: number | null;
  referenced_users: string[];
  /** Heures écoulées depuis le commentaire précédent de la même issue (1 décimale). */
  delta_created_h?: number;
}

export type MarkupConverter = (markup: string) => string;

/**
 * Arrondi à une décimale de la valeur binaire exacte, égalités au pair.
 * Seuls les multiples impairs de 0.25 tombent exactement à mi-chemin.
 */
export function roundHalfEven1(value: number): number {
  if (Number.isInteger(value * 4) && !Number.isInteger(value * 2)) {
    const lower = Math.floor(value * 10);
    return (lower % 2 === 0 ? lower : lower + 1) / 10;
  }
  return Number(value.toFixed(1));
}

export function toTicketRecord(issue: JiraIssue): TicketRecord {
  const f = issue.fields;
  return {
    key: issue.key,
    title: f.summary ?? null,
    issuetype: f.issuetype?.name ?? null,
    reporter: f.reporter?.name ?? null,
    assignee: f.assignee?.name ?? null,
    priority: f.priority?.name ?? null,
    created: f.created ?? null,
    created_epoch: jiraTimestampToEpoch(f.created),
  };
}

/**
 * Transforme les commentaires d'une issue en enregistrements plats, un par un.
 */
export class CommentRecordBuilder {
  constructor(
    private readonly resolver: UserReferenceResolver,
    private readonly cache: UserReferenceCache,
    private readonly convert: MarkupConverter = convertJiraMarkup,
  ) {}

  /**
   * Le delta se calcule par rapport au commentaire qui précède immédiatement,
   * dans l'ordre fourni par Jira ; le premier commentaire n'en a pas.
   */
  public async *buildRecords(issue: JiraIssue, comments: Iterable<JiraComment>, signal?: AbortSignal): AsyncGenerator<CommentRecord> {
    const ticket = toTicketRecord(issue);
    let previousCreated: Date | null = null;
    let seq = 0;

    for (const comment of comments) {
      const created = parseJiraTimestamp(comment.created);
      const updated = parseJiraTimestamp(comment.updated);
      const users = await this.resolver.resolveReferences(comment.body, this.cache, signal);

      const record: CommentRecord = {
        ticket: { ...ticket },
        comment: this.convert(comment.body),
        author: comment.author?.displayName ?? null,
        author_email: comment.author?.emailAddress ?? null,
        seq,
        created: comment.created,
        updated: comment.updated ?? null,
        created_epoch: created?.epochSeconds ?? null,
        updated_epoch: updated?.epochSeconds ?? null,
        referenced_users: users.flatMap((u) => (u.emailAddress ? [u.emailAddress] : [])),
      };

      if (previousCreated && created) {
        record.delta_created_h = roundHalfEven1((created.instant.getTime() - previousCreated.getTime()) / 3_600_000);
      }
      previousCreated = created?.instant ?? null;
      seq++;

      yield record;
    }
  }
}
