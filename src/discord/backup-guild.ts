import { ChannelType, MessageType, ThreadAutoArchiveDuration } from 'discord.js';
import type { Guild, GuildEmoji, TextChannel, ThreadChannel } from 'discord.js';
import type { LoggerLike } from '../logging/logger-like.js';
import { emojiReactKey } from '../mirror/reactions.js';
import type { BackupGuild, BackupRole, PlaceholderEmoji, ThreadSummary } from '../swarm/types.js';

/** Stand-in reaction when the backup guild has no placeholder emoji. */
export const UNICODE_PLACEHOLDER: PlaceholderEmoji = { reactKey: '❔', label: '❔' };

const ANNOUNCEMENT_SCAN_LIMIT = 20;

/** Administrative view of the backup guild, driven by the default identity's client. */
export class DiscordBackupGuild implements BackupGuild {
  private readonly guild: Guild;
  private readonly log?: LoggerLike;
  private readonly creatingChannels = new Map<string, Promise<string>>();

  constructor(guild: Guild, log?: LoggerLike) {
    this.guild = guild;
    this.log = log;
  }

  async ensureTextChannel(name: string): Promise<string> {
    const cached = this.findTextChannel(name);
    if (cached) return cached.id;

    const inFlight = this.creatingChannels.get(name);
    if (inFlight) return inFlight;

    const creating = this.createTextChannel(name).finally(() => this.creatingChannels.delete(name));
    this.creatingChannels.set(name, creating);
    return creating;
  }

  listRoles(): BackupRole[] {
    return [...this.guild.roles.cache.values()].map((r) => ({ id: r.id, name: r.name, color: r.color }));
  }

  async createRole(name: string, color: number): Promise<BackupRole> {
    const role = await this.guild.roles.create({ name, color, reason: 'Role sync from source guild' });
    return { id: role.id, name: role.name, color: role.color };
  }

  async addMemberRole(userId: string, roleId: string): Promise<void> {
    const member = await this.guild.members.fetch(userId);
    if (member.roles.cache.has(roleId)) return;
    await member.roles.add(roleId, 'Role colour sync from source guild');
  }

  async ensurePlaceholderEmoji(name: string, image?: string): Promise<PlaceholderEmoji> {
    let emoji = this.findEmoji(name);
    if (!emoji) {
      await this.guild.emojis.fetch();
      emoji = this.findEmoji(name);
    }
    if (!emoji && image) {
      emoji = await this.guild.emojis.create({ attachment: image, name });
      this.log?.info({ name, emojiId: emoji.id }, 'swarm:placeholder emoji created');
    }
    if (!emoji) {
      this.log?.warn({ name }, 'swarm:placeholder emoji missing; using a Unicode stand-in');
      return UNICODE_PLACEHOLDER;
    }
    return {
      reactKey: emojiReactKey({ id: emoji.id, name, animated: Boolean(emoji.animated) }),
      label: `:${name}:`,
    };
  }

  async listThreads(channelIds: readonly string[]): Promise<ThreadSummary[]> {
    const out = new Map<string, ThreadSummary>();
    const add = (t: ThreadChannel) => out.set(t.id, { id: t.id, name: t.name, parentId: t.parentId });

    const active = await this.guild.channels.fetchActiveThreads();
    for (const thread of active.threads.values()) add(thread);

    for (const channelId of channelIds) {
      const channel = await this.textChannel(channelId);
      const archived = await channel.threads.fetchArchived({ fetchAll: true });
      for (const thread of archived.threads.values()) add(thread);
    }
    return [...out.values()];
  }

  async createThread(channelId: string, name: string): Promise<string> {
    const channel = await this.textChannel(channelId);
    const thread = await channel.threads.create({
      name,
      autoArchiveDuration: ThreadAutoArchiveDuration.OneWeek,
    });
    return thread.id;
  }

  async deleteThreadAnnouncement(channelId: string, threadId: string): Promise<void> {
    const channel = await this.textChannel(channelId);
    const recent = await channel.messages.fetch({ limit: ANNOUNCEMENT_SCAN_LIMIT });
    const announcement = recent.find(
      (m) => m.type === MessageType.ThreadCreated && m.reference?.channelId === threadId,
    );
    if (announcement) await announcement.delete();
  }

  async fetchThreadName(threadId: string): Promise<string> {
    const thread = await this.thread(threadId, true);
    return thread.name;
  }

  async renameThread(threadId: string, name: string): Promise<void> {
    const thread = await this.thread(threadId, false);
    await thread.edit({ name, archived: false });
  }

  private findTextChannel(name: string): TextChannel | undefined {
    return this.guild.channels.cache.find(
      (ch): ch is TextChannel => ch.type === ChannelType.GuildText && ch.name === name,
    );
  }

  private findEmoji(name: string): GuildEmoji | undefined {
    return this.guild.emojis.cache.find((e) => e.name === name);
  }

  private async createTextChannel(name: string): Promise<string> {
    await this.guild.channels.fetch();
    const existing = this.findTextChannel(name);
    if (existing) return existing.id;
    const created = await this.guild.channels.create({ name, type: ChannelType.GuildText });
    this.log?.info({ name, channelId: created.id }, 'swarm:backup channel created');
    return created.id;
  }

  private async textChannel(channelId: string): Promise<TextChannel> {
    const channel = this.guild.channels.cache.get(channelId) ?? await this.guild.channels.fetch(channelId);
    if (!channel || channel.type !== ChannelType.GuildText) {
      throw new Error(`Unknown Channel: ${channelId} is not a text channel in the backup guild`);
    }
    return channel;
  }

  /** `force` bypasses the cache so counter reads see the current name. */
  private async thread(threadId: string, force: boolean): Promise<ThreadChannel> {
    const channel = await this.guild.client.channels.fetch(threadId, { force });
    if (!channel || !channel.isThread()) {
      throw new Error(`Unknown Channel: ${threadId} is not a thread`);
    }
    return channel;
  }
}
