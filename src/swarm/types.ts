import type { APIEmbed } from 'discord.js';

/** Roster key of the default (master) identity. Dedicated identities use the source user ID. */
export const DEFAULT_IDENTITY_KEY = 'default';

// ---------------------------------------------------------------------------
// Source-side snapshots
// ---------------------------------------------------------------------------

export type SourceAuthor = {
  id: string;
  username: string;
  displayName: string;
  bot: boolean;
};

export type SourceAttachment = {
  url: string;
  name: string;
};

export type ReactionEmoji = {
  /** Null for Unicode emoji. */
  id: string | null;
  name: string;
  animated: boolean;
};

export type SourceReaction = {
  emoji: ReactionEmoji;
  /** Users who applied the reaction, in the order the platform lists them. */
  userIds: string[];
};

export type SourceMessage = {
  id: string;
  channelId: string;
  channelName: string;
  content: string;
  author: SourceAuthor;
  createdAt: Date;
  attachments: SourceAttachment[];
  embeds: APIEmbed[];
  reactions: SourceReaction[];
};

export type SourceRole = {
  id: string;
  name: string;
  color: number;
  managed: boolean;
};

export type SourceProfile = {
  userId: string;
  username: string;
  /** Guild nickname, or null when the member has none. */
  nickname: string | null;
  avatarUrl: string | null;
  /** Highest role that carries a colour, if any. */
  colorRoleName: string | null;
};

export type SourceChannel = {
  id: string;
  name: string;
};

/** Read-only view of the monitored community. */
export interface SourceGuild {
  /** Monitored channels, in configuration order. */
  readonly channels: readonly SourceChannel[];
  fetchMessage(channelId: string, messageId: string): Promise<SourceMessage | null>;
  /** Messages strictly after `afterId`, oldest first, until the newest. */
  historyAfter(channelId: string, afterId: string): AsyncIterable<SourceMessage>;
  listRoles(): SourceRole[];
  fetchProfile(userId: string): Promise<SourceProfile | null>;
}

// ---------------------------------------------------------------------------
// Backup-side
// ---------------------------------------------------------------------------

export type OutboundMessage = {
  content: string;
  embeds: APIEmbed[];
  files: SourceAttachment[];
  /** Send without triggering push notifications. */
  silent: boolean;
};

export type SentMessage = {
  id: string;
  channelId: string;
  content: string;
};

export type BackupRole = {
  id: string;
  name: string;
  color: number;
};

export type PlaceholderEmoji = {
  /** Value passed to the react call (`name:id` for guild emoji, the character for Unicode). */
  reactKey: string;
  label: string;
};

/**
 * One network identity of the swarm. Every identity exposes the same
 * capability set; the default identity is distinguished only by `isDefault`.
 */
export interface ProxyIdentity {
  /** Source user ID this identity stands in for, or DEFAULT_IDENTITY_KEY. */
  readonly key: string;
  readonly isDefault: boolean;
  /** The identity's own platform user ID. */
  readonly userId: string;
  mention(): string;
  send(channelName: string, message: OutboundMessage): Promise<SentMessage>;
  edit(sent: SentMessage, content: string): Promise<void>;
  react(sent: SentMessage, emoji: string): Promise<void>;
  syncProfile(profile: SourceProfile): Promise<void>;
}

export type ThreadSummary = {
  id: string;
  name: string;
  parentId: string | null;
};

/** Administrative operations on the backup community, performed by the default identity. */
export interface BackupGuild {
  ensureTextChannel(name: string): Promise<string>;
  listRoles(): BackupRole[];
  createRole(name: string, color: number): Promise<BackupRole>;
  addMemberRole(userId: string, roleId: string): Promise<void>;
  ensurePlaceholderEmoji(name: string, image?: string): Promise<PlaceholderEmoji>;
  /** Threads (active and archived) under the given channels. */
  listThreads(channelIds: readonly string[]): Promise<ThreadSummary[]>;
  createThread(channelId: string, name: string): Promise<string>;
  /** Remove the "started a thread" system message the platform posts in the parent channel. */
  deleteThreadAnnouncement(channelId: string, threadId: string): Promise<void>;
  fetchThreadName(threadId: string): Promise<string>;
  renameThread(threadId: string, name: string): Promise<void>;
}
