import type { JiraComment, JiraUser, SearchPage } from './jiraApiInterfaces/JiraModels';
import type { SearchIssuesQueryParams } from './jiraApiInterfaces/QueryParams';

/**
 * Les trois opérations distantes dont dépend l'extracteur.
 * Indépendant du transport : REST en production, faux client en test.
 * Le `signal` optionnel interrompt l'appel en cours.
 */
export interface TrackerClient {
  /** Recherche paginée : une page par appel. */
  searchIssues(params: SearchIssuesQueryParams, signal?: AbortSignal): Promise<SearchPage>;
  /** Commentaires d'une issue, dans l'ordre chronologique renvoyé par Jira. */
  getComments(issueKey: string, signal?: AbortSignal): Promise<JiraComment[]>;
  /** Résolution d'un utilisateur à partir de son nom (jeton de mention). */
  getUser(username: string, signal?: AbortSignal): Promise<JiraUser>;
}

export function isTrackerClient(value: unknown): value is TrackerClient {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'searchIssues' in value &&
    typeof value.searchIssues === 'function' &&
    'getComments' in value &&
    typeof value.getComments === 'function' &&
    'getUser' in value &&
    typeof value.getUser === 'function'
  );
}
