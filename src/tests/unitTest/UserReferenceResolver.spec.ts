import { extractMentionTokens, UserReferenceCache, UserReferenceResolver } from '../../CommentExport/UserReferenceResolver';
import { FakeTrackerClient, makeUser, MemoryLogger } from './helpers/fakes';

describe('extractMentionTokens', () => {
  it('retourne les mentions distinctes dans l’ordre de première apparition', () => {
    expect(extractMentionTokens('see [~alice] and [~alice] and [~bob]')).toEqual(['alice', 'bob']);
  });

  it('ignore le texte sans mention', () => {
    expect(extractMentionTokens('no mention here, [alice] is a link')).toEqual([]);
    expect(extractMentionTokens('')).toEqual([]);
  });
});

describe('UserReferenceResolver', () => {
  const users = {
    alice: makeUser('alice', 'alice@example.com'),
    bob: makeUser('bob', 'bob@example.com'),
  };

  it('une seule résolution par utilisateur distinct d’un même texte', async () => {
    const client = new FakeTrackerClient([], {}, users);
    const resolver = new UserReferenceResolver(client, new MemoryLogger());

    const resolved = await resolver.resolveReferences('see [~alice] and [~alice] and [~bob]', new UserReferenceCache());

    expect(client.userCalls).toEqual(['alice', 'bob']);
    expect(resolved.map((u) => u.emailAddress)).toEqual(['alice@example.com', 'bob@example.com']);
  });

  it('réutilise le cache partagé entre deux textes', async () => {
    const client = new FakeTrackerClient([], {}, users);
    const resolver = new UserReferenceResolver(client, new MemoryLogger());
    const cache = new UserReferenceCache();

    await resolver.resolveReferences('ping [~alice]', cache);
    const second = await resolver.resolveReferences('again [~alice] with [~bob]', cache);

    expect(client.userCalls).toEqual(['alice', 'bob']);
    expect(second.map((u) => u.name)).toEqual(['alice', 'bob']);
    expect(cache.size).toBe(2);
  });

  it('journalise et ignore un utilisateur introuvable', async () => {
    const client = new FakeTrackerClient([], {}, users);
    const logger = new MemoryLogger();
    const resolver = new UserReferenceResolver(client, logger);
    const cache = new UserReferenceCache();

    const resolved = await resolver.resolveReferences('[~ghost] and [~alice]', cache);

    expect(resolved.map((u) => u.name)).toEqual(['alice']);
    expect(logger.messages('warn')).toEqual(["User 'ghost' not found in Jira"]);
    expect(cache.get('ghost')).toBeUndefined();
    expect(cache.size).toBe(1);
  });

  it("retente un utilisateur introuvable lors d'une mention ultérieure", async () => {
    const client = new FakeTrackerClient([], {}, users);
    const resolver = new UserReferenceResolver(client, new MemoryLogger());
    const cache = new UserReferenceCache();

    await resolver.resolveReferences('[~ghost]', cache);
    await resolver.resolveReferences('[~ghost]', cache);

    expect(client.userCalls).toEqual(['ghost', 'ghost']);
  });

  it("remonte l'interruption au lieu d'ignorer la mention", async () => {
    const client = new FakeTrackerClient([], {}, users);
    const controller = new AbortController();
    const interrupted = new Error('Interrupted');
    jest.spyOn(client, 'getUser').mockImplementation(async () => {
      controller.abort(interrupted);
      throw new Error('socket hang up');
    });
    const logger = new MemoryLogger();
    const resolver = new UserReferenceResolver(client, logger);

    await expect(resolver.resolveReferences('[~alice]', new UserReferenceCache(), controller.signal)).rejects.toBe(interrupted);
    expect(logger.messages('warn')).toEqual([]);
  });
});
