import type { LoggerLike } from '../logging/logger-like.js';

/** The slice of a logged-in client the roster check reads. */
export type RosterClient = {
  user: { id: string; tag: string };
  guilds: { cache: { has(guildId: string): boolean } };
  destroy(): Promise<void>;
};

export type RosterMember<C extends RosterClient> = {
  sourceUserId: string;
  client: C;
};

/**
 * Keep the dedicated clients that logged in and can see the backup guild.
 * The rest are logged out; their users route to the default identity.
 */
export async function admitDedicated<C extends RosterClient>(
  sourceUserIds: readonly string[],
  results: readonly PromiseSettledResult<C>[],
  backupGuildId: string,
  log: LoggerLike,
): Promise<RosterMember<C>[]> {
  const admitted: RosterMember<C>[] = [];
  for (const [i, result] of results.entries()) {
    const sourceUserId = sourceUserIds[i];
    if (sourceUserId === undefined) continue;
    if (result.status === 'rejected') {
      log.warn({ err: result.reason, sourceUserId }, 'swarm:dedicated identity failed to log in; routing to default');
      continue;
    }
    const client = result.value;
    if (!client.guilds.cache.has(backupGuildId)) {
      log.warn({ sourceUserId, botUserId: client.user.id }, 'swarm:dedicated identity is not in the backup guild; routing to default');
      try {
        await client.destroy();
      } catch (err) {
        log.warn({ err, sourceUserId }, 'swarm:failed to log out dedicated identity');
      }
      continue;
    }
    admitted.push({ sourceUserId, client });
    log.info({ sourceUserId, botUserId: client.user.id, tag: client.user.tag }, 'swarm:dedicated identity ready');
  }
  return admitted;
}
