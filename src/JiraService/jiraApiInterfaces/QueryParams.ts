/**
 * Paramètres de requête pour l'endpoint search (JQL).
 */
export interface SearchIssuesQueryParams {
  jql: string;
  fields?: string[];
  expand?: string;
  maxResults: number;
  startAt: number;
}
