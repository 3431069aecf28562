import { EmbedType } from 'discord.js';
import type { APIEmbed } from 'discord.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type { IdentityRouter } from '../swarm/router.js';
import type { RoleMappingRef } from '../swarm/role-mapping.js';
import type { BackupGuild, PlaceholderEmoji, ProxyIdentity, SentMessage, SourceMessage } from '../swarm/types.js';
import { splitDiscord } from '../discord/output-utils.js';
import { transformContent } from './content-transform.js';
import { replicateReactions } from './reactions.js';

export type CounterSink = {
  check(message: SourceMessage, channelId: string): void;
};

export type ReplicatorDeps = {
  router: IdentityRouter;
  channels: Pick<BackupGuild, 'ensureTextChannel'>;
  placeholder: PlaceholderEmoji;
  roles: RoleMappingRef;
  timezoneOffsetHours: number;
  counters?: CounterSink;
  log?: LoggerLike;
};

export type ReplicateOpts = {
  /** Historical import: stamps the original time and sends silently. */
  batch: boolean;
};

export type ReplicationResult = {
  sender: ProxyIdentity;
  sent: SentMessage;
  backupChannelId: string;
};

/** Link previews are regenerated by the platform from the URLs in the text. */
function isForwardableEmbed(embed: APIEmbed): boolean {
  return embed.type === undefined || embed.type === EmbedType.Rich;
}

/**
 * The single replication path shared by live traffic and batch imports:
 * route, rewrite, send, clone reactions, tally.
 */
export class Replicator {
  private readonly deps: ReplicatorDeps;

  constructor(deps: ReplicatorDeps) {
    this.deps = deps;
  }

  async replicate(message: SourceMessage, opts: ReplicateOpts): Promise<ReplicationResult | null> {
    const { router, channels, roles, log } = this.deps;
    if (router.swarmUserIds().has(message.author.id)) {
      log?.debug?.({ messageId: message.id }, 'mirror:skipping message authored by the swarm');
      return null;
    }
    const embeds = message.embeds.filter(isForwardableEmbed);
    const files = message.attachments;
    if (!message.content.trim() && embeds.length === 0 && files.length === 0) {
      log?.debug?.({ messageId: message.id, channelId: message.channelId }, 'mirror:nothing to send');
      return null;
    }
    const sender = router.route(message.author.id);

    const content = transformContent(
      {
        text: message.content,
        batch: opts.batch,
        createdAt: message.createdAt,
        author: message.author,
        viaDefault: sender.isDefault,
      },
      {
        proxyUserIds: router.proxyUserIds(),
        resolveRole: (id) => roles.current.resolve(id),
        timezoneOffsetHours: this.deps.timezoneOffsetHours,
      },
    );

    const backupChannelId = await channels.ensureTextChannel(message.channelName);

    // Embeds and files ride on the last chunk, which anchors reactions.
    const chunks = content ? splitDiscord(content) : [''];
    let sent: SentMessage | null = null;
    for (let i = 0; i < chunks.length; i++) {
      const last = i === chunks.length - 1;
      sent = await sender.send(message.channelName, {
        content: chunks[i] ?? '',
        embeds: last ? embeds : [],
        files: last ? files : [],
        silent: opts.batch,
      });
    }
    if (!sent) return null;

    log?.debug?.(
      { messageId: message.id, backupMessageId: sent.id, identity: sender.key, batch: opts.batch },
      'mirror:replicated',
    );

    if (message.reactions.length > 0) {
      await replicateReactions(
        message,
        { sender, sent, channelName: message.channelName },
        { router, placeholder: this.deps.placeholder, log },
      );
    }

    this.deps.counters?.check(message, backupChannelId);
    return { sender, sent, backupChannelId };
  }
}
