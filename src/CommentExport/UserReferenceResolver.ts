import type { Logger } from '../core/utils/Logger';
import { UserLookupFailedError } from '../core/utils/errors';
import type { JiraUser } from '../JiraService/jiraApiInterfaces/JiraModels';
import type { TrackerClient } from '../JiraService/TrackerClient';

// [~username]
const USER_MENTION = /\[~([^\]]+)\]/g;

/**
 * Cache des utilisateurs résolus, propre à une exécution.
 * Ne contient que des résolutions réussies ; jamais évincé.
 */
export class UserReferenceCache {
  private readonly users = new Map<string, JiraUser>();

  public get(token: string): JiraUser | undefined {
    return this.users.get(token);
  }

  public set(token: string, user: JiraUser): void {
    this.users.set(token, user);
  }

  public get size(): number {
    return this.users.size;
  }
}

/** Jetons de mention distincts, dans l'ordre de première apparition. */
export function extractMentionTokens(text: string): string[] {
  const tokens = new Set<string>();
  for (const match of text.matchAll(USER_MENTION)) {
    tokens.add(match[1]);
  }
  return [...tokens];
}

/**
 * Résout les utilisateurs mentionnés dans un texte libre.
 */
export class UserReferenceResolver {
  constructor(
    private readonly client: Pick<TrackerClient, 'getUser'>,
    private readonly logger: Logger,
  ) {}

  /**
   * Un utilisateur introuvable est journalisé puis ignoré : une mention cassée
   * n'interrompt pas la production des enregistrements. Une interruption, elle, remonte.
   */
  public async resolveReferences(text: string, cache: UserReferenceCache, signal?: AbortSignal): Promise<JiraUser[]> {
    const resolved: JiraUser[] = [];
    for (const token of extractMentionTokens(text)) {
      const cached = cache.get(token);
      if (cached) {
        resolved.push(cached);
        continue;
      }
      try {
        const user = await this.client.getUser(token, signal);
        cache.set(token, user);
        resolved.push(user);
      } catch (err) {
        signal?.throwIfAborted();
        const failure = new UserLookupFailedError(token, { cause: err });
        this.logger.warn(failure.message);
      }
    }
    return resolved;
  }
}
