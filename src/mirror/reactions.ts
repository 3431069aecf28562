import type { LoggerLike } from '../logging/logger-like.js';
import type { IdentityRouter } from '../swarm/router.js';
import type { PlaceholderEmoji, ProxyIdentity, ReactionEmoji, SentMessage, SourceMessage } from '../swarm/types.js';
import { DISCORD_MESSAGE_LIMIT } from '../discord/output-utils.js';

export type ReactionReplicationDeps = {
  router: IdentityRouter;
  placeholder: PlaceholderEmoji;
  log?: LoggerLike;
};

/** The already-sent backup message reactions are attached to. */
export type ReactionAnchor = {
  sender: ProxyIdentity;
  sent: SentMessage;
  channelName: string;
};

export type UnknownReactionEntry = {
  label: string;
  /** Mentions of dedicated identities that reacted with the placeholder instead. */
  fallbacks: string[];
  /** Default-identity reaction events, deduplicated per emoji. */
  anonymous: number;
};

export type ReactionReplicationResult = {
  entries: UnknownReactionEntry[];
  footnote: string | null;
};

/** Value handed to the platform's react call. */
export function emojiReactKey(emoji: ReactionEmoji): string {
  if (!emoji.id) return emoji.name;
  return `${emoji.animated ? 'a:' : ''}${emoji.name}:${emoji.id}`;
}

/** Human-readable label; custom emoji cannot render outside their guild. */
export function emojiLabel(emoji: ReactionEmoji): string {
  return emoji.id ? `:${emoji.name}:` : emoji.name;
}

export function buildReactionFootnote(entries: readonly UnknownReactionEntry[]): string | null {
  const lines: string[] = [];
  for (const entry of entries) {
    if (entry.fallbacks.length === 0 && entry.anonymous === 0) continue;
    const parts = [...entry.fallbacks];
    if (entry.anonymous > 0) parts.push(`+${entry.anonymous} unknown`);
    lines.push(`${entry.label} ${parts.join(' ')}`);
  }
  if (lines.length === 0) return null;
  return ['**Unknown Reactions**', ...lines].join('\n');
}

/**
 * Clone the source message's reactions onto the backup message, one identity
 * per reacting user, sequentially. Emoji an identity cannot use are replaced
 * by the placeholder. Ends with a single footnote edit when anything had to
 * fall back or was applied by the default identity.
 */
export async function replicateReactions(
  source: SourceMessage,
  anchor: ReactionAnchor,
  deps: ReactionReplicationDeps,
): Promise<ReactionReplicationResult> {
  const { router, placeholder, log } = deps;
  const attempted = new Set<string>();
  const placeholderApplied = new Set<string>();
  const tally = new Map<string, UnknownReactionEntry>();

  const entryFor = (key: string, emoji: ReactionEmoji): UnknownReactionEntry => {
    let entry = tally.get(key);
    if (!entry) {
      entry = { label: emojiLabel(emoji), fallbacks: [], anonymous: 0 };
      tally.set(key, entry);
    }
    return entry;
  };

  for (const reaction of source.reactions) {
    const key = emojiReactKey(reaction.emoji);
    for (const userId of reaction.userIds) {
      const identity = router.route(userId);
      const pair = `${identity.key}|${key}`;
      if (attempted.has(pair)) continue;
      attempted.add(pair);

      try {
        await identity.react(anchor.sent, key);
        if (identity.isDefault) entryFor(key, reaction.emoji).anonymous += 1;
        continue;
      } catch (err) {
        log?.debug?.({ err, emoji: key, identity: identity.key, messageId: source.id }, 'reactions:emoji rejected, using placeholder');
      }

      if (!placeholderApplied.has(identity.key)) {
        placeholderApplied.add(identity.key);
        try {
          await identity.react(anchor.sent, placeholder.reactKey);
        } catch (err) {
          log?.warn({ err, identity: identity.key, messageId: source.id }, 'reactions:placeholder rejected');
        }
      }

      const entry = entryFor(key, reaction.emoji);
      if (identity.isDefault) {
        entry.anonymous += 1;
      } else {
        entry.fallbacks.push(identity.mention());
      }
    }
  }

  const entries = [...tally.values()];
  const footnote = buildReactionFootnote(entries);
  if (footnote) {
    try {
      await appendFootnote(anchor, footnote);
    } catch (err) {
      log?.warn({ err, messageId: source.id, backupMessageId: anchor.sent.id }, 'reactions:footnote not posted');
    }
  }
  return { entries, footnote };
}

async function appendFootnote(anchor: ReactionAnchor, footnote: string): Promise<void> {
  const { sender, sent, channelName } = anchor;
  const combined = sent.content ? `${sent.content}\n\n${footnote}` : footnote;
  if (combined.length <= DISCORD_MESSAGE_LIMIT) {
    await sender.edit(sent, combined);
    return;
  }
  await sender.send(channelName, { content: footnote, embeds: [], files: [], silent: true });
}
