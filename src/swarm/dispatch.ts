export type IncomingMeta = {
  guildId: string | null;
  channelId: string;
  authorId: string;
  system: boolean;
};

export type DispatchContext = {
  sourceGuildId: string;
  consoleChannelId?: string;
  isMonitored: (channelId: string) => boolean;
  swarmUserIds: ReadonlySet<string>;
};

export type DispatchTarget = 'console' | 'mirror' | 'ignore';

/** Decide what a gateway message is for. Swarm-authored and system messages are never mirrored. */
export function classifyIncoming(meta: IncomingMeta, ctx: DispatchContext): DispatchTarget {
  if (meta.system || meta.guildId === null) return 'ignore';
  if (ctx.consoleChannelId && meta.channelId === ctx.consoleChannelId) return 'console';
  if (meta.guildId !== ctx.sourceGuildId) return 'ignore';
  if (!ctx.isMonitored(meta.channelId)) return 'ignore';
  if (ctx.swarmUserIds.has(meta.authorId)) return 'ignore';
  return 'mirror';
}
