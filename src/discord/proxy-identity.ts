import { ChannelType, MessageFlags } from 'discord.js';
import type { Client, Guild, GuildTextBasedChannel, MessageCreateOptions, TextChannel } from 'discord.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type { OutboundMessage, ProxyIdentity, SentMessage, SourceProfile } from '../swarm/types.js';
import { NO_MENTIONS } from './allowed-mentions.js';

export type DiscordProxyIdentityOpts = {
  /** Source user ID, or DEFAULT_IDENTITY_KEY. */
  key: string;
  isDefault: boolean;
  client: Client<true>;
  backupGuildId: string;
  log?: LoggerLike;
};

/** One logged-in bot acting in the backup guild. Every identity resolves channels through its own client. */
export class DiscordProxyIdentity implements ProxyIdentity {
  readonly key: string;
  readonly isDefault: boolean;
  readonly userId: string;
  private readonly client: Client<true>;
  private readonly backupGuildId: string;
  private readonly log?: LoggerLike;

  constructor(opts: DiscordProxyIdentityOpts) {
    this.key = opts.key;
    this.isDefault = opts.isDefault;
    this.client = opts.client;
    this.userId = opts.client.user.id;
    this.backupGuildId = opts.backupGuildId;
    this.log = opts.log;
  }

  mention(): string {
    return `<@${this.userId}>`;
  }

  async send(channelName: string, message: OutboundMessage): Promise<SentMessage> {
    const channel = await this.textChannelByName(channelName);
    const options: MessageCreateOptions = {
      content: message.content || undefined,
      embeds: message.embeds,
      files: message.files.map((f) => ({ attachment: f.url, name: f.name })),
      allowedMentions: NO_MENTIONS,
    };
    if (message.silent) options.flags = MessageFlags.SuppressNotifications;
    const sent = await channel.send(options);
    return { id: sent.id, channelId: sent.channelId, content: sent.content };
  }

  async edit(sent: SentMessage, content: string): Promise<void> {
    const channel = await this.channelById(sent.channelId);
    await channel.messages.edit(sent.id, { content, allowedMentions: NO_MENTIONS });
  }

  async react(sent: SentMessage, emoji: string): Promise<void> {
    const channel = await this.channelById(sent.channelId);
    await channel.messages.react(sent.id, emoji);
  }

  /** Copy the source user's name, avatar and nickname. Failures propagate to the caller. */
  async syncProfile(profile: SourceProfile): Promise<void> {
    const user = this.client.user;
    if (user.username !== profile.username) {
      await user.setUsername(profile.username);
    }
    if (profile.avatarUrl) {
      await user.setAvatar(profile.avatarUrl);
    }

    const guild = await this.guild();
    const me = guild.members.me ?? await guild.members.fetchMe();
    if (me.nickname !== profile.nickname) {
      await me.setNickname(profile.nickname, 'Profile sync from source guild');
    }
    this.log?.debug?.({ identity: this.key, username: profile.username }, 'swarm:identity profile updated');
  }

  private async guild(): Promise<Guild> {
    return this.client.guilds.cache.get(this.backupGuildId) ?? this.client.guilds.fetch(this.backupGuildId);
  }

  private async textChannelByName(name: string): Promise<TextChannel> {
    const guild = await this.guild();
    const find = () => guild.channels.cache.find(
      (ch): ch is TextChannel => ch.type === ChannelType.GuildText && ch.name === name,
    );
    let channel = find();
    if (!channel) {
      await guild.channels.fetch();
      channel = find();
    }
    if (!channel) {
      throw new Error(`Unknown Channel: #${name} is not visible to identity ${this.key}`);
    }
    return channel;
  }

  private async channelById(channelId: string): Promise<GuildTextBasedChannel> {
    const channel = this.client.channels.cache.get(channelId) ?? await this.client.channels.fetch(channelId);
    if (!channel || !channel.isTextBased() || channel.isDMBased()) {
      throw new Error(`Unknown Channel: ${channelId} is not a guild text channel`);
    }
    return channel;
  }
}
