import { ChannelType } from 'discord.js';
import type { Guild, Message, MessageReaction, TextChannel } from 'discord.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type {
  SourceChannel,
  SourceGuild,
  SourceMessage,
  SourceProfile,
  SourceReaction,
  SourceRole,
} from '../swarm/types.js';
import { UNKNOWN_MEMBER, UNKNOWN_MESSAGE, UNKNOWN_USER, isUnknownEntity } from './discord-errors.js';

const PAGE_SIZE = 100;

async function fetchReactionUsers(reaction: MessageReaction): Promise<string[]> {
  const ids: string[] = [];
  let after: string | undefined;
  for (;;) {
    const page = await reaction.users.fetch({ limit: PAGE_SIZE, after });
    for (const user of page.values()) ids.push(user.id);
    const last = [...page.keys()].at(-1);
    if (page.size < PAGE_SIZE || !last) break;
    after = last;
  }
  return ids;
}

/** Snapshot a source message, reactors included. */
export async function toSourceMessage(message: Message<true>): Promise<SourceMessage> {
  const reactions: SourceReaction[] = [];
  for (const reaction of message.reactions.cache.values()) {
    const { id, name, animated } = reaction.emoji;
    if (!name) continue;
    reactions.push({
      emoji: { id: id ?? null, name, animated: Boolean(animated) },
      userIds: await fetchReactionUsers(reaction),
    });
  }

  return {
    id: message.id,
    channelId: message.channelId,
    channelName: message.channel.name,
    content: message.content,
    author: {
      id: message.author.id,
      username: message.author.username,
      displayName: message.member?.displayName ?? message.author.displayName,
      bot: message.author.bot,
    },
    createdAt: message.createdAt,
    attachments: [...message.attachments.values()].map((a) => ({ url: a.url, name: a.name })),
    embeds: message.embeds.map((e) => e.toJSON()),
    reactions,
  };
}

function compareSnowflakes(a: string, b: string): number {
  const x = BigInt(a);
  const y = BigInt(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

/** Read side of the monitored guild, via the default identity's client. */
export class DiscordSourceGuild implements SourceGuild {
  readonly channels: readonly SourceChannel[];
  private readonly guild: Guild;
  private readonly textChannels: ReadonlyMap<string, TextChannel>;

  private constructor(guild: Guild, textChannels: TextChannel[]) {
    this.guild = guild;
    this.textChannels = new Map(textChannels.map((c) => [c.id, c]));
    this.channels = textChannels.map((c) => ({ id: c.id, name: c.name }));
  }

  /** Resolve the monitored channels. IDs that are not text channels of the guild are logged and skipped. */
  static async open(guild: Guild, channelIds: readonly string[], log?: LoggerLike): Promise<DiscordSourceGuild> {
    const found: TextChannel[] = [];
    for (const id of channelIds) {
      const channel = guild.channels.cache.get(id) ?? await guild.channels.fetch(id).catch(() => null);
      if (channel?.type === ChannelType.GuildText) {
        found.push(channel);
      } else {
        log?.warn({ channelId: id, guildId: guild.id }, 'swarm:monitored channel not found or not a text channel');
      }
    }
    return new DiscordSourceGuild(guild, found);
  }

  isMonitored(channelId: string): boolean {
    return this.textChannels.has(channelId);
  }

  async fetchMessage(channelId: string, messageId: string): Promise<SourceMessage | null> {
    const channel = this.textChannels.get(channelId);
    if (!channel) return null;
    try {
      return await toSourceMessage(await channel.messages.fetch(messageId));
    } catch (err) {
      if (isUnknownEntity(err, UNKNOWN_MESSAGE)) return null;
      throw err;
    }
  }

  async *historyAfter(channelId: string, afterId: string): AsyncIterable<SourceMessage> {
    const channel = this.textChannels.get(channelId);
    if (!channel) return;
    let cursor = afterId;
    for (;;) {
      const page = await channel.messages.fetch({ after: cursor, limit: PAGE_SIZE });
      const ordered = [...page.values()].sort((a, b) => compareSnowflakes(a.id, b.id));
      for (const message of ordered) {
        if (message.system) continue;
        yield await toSourceMessage(message);
      }
      const newest = ordered.at(-1);
      if (page.size < PAGE_SIZE || !newest) return;
      cursor = newest.id;
    }
  }

  listRoles(): SourceRole[] {
    return [...this.guild.roles.cache.values()].map((r) => ({
      id: r.id,
      name: r.name,
      color: r.color,
      managed: r.managed,
    }));
  }

  async fetchProfile(userId: string): Promise<SourceProfile | null> {
    try {
      const member = await this.guild.members.fetch(userId);
      return {
        userId,
        username: member.user.username,
        nickname: member.nickname,
        avatarUrl: member.user.displayAvatarURL({ extension: 'png', size: 512 }),
        colorRoleName: member.roles.color?.name ?? null,
      };
    } catch (err) {
      if (isUnknownEntity(err, UNKNOWN_MEMBER, UNKNOWN_USER)) return null;
      throw err;
    }
  }
}
