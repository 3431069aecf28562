import type { SourceAuthor } from '../swarm/types.js';

const USER_MENTION_RE = /<@!?(\d+)>/g;
const ROLE_MENTION_RE = /<@&(\d+)>/g;
const BROADCAST_RE = /@(everyone|here)\b/g;
const ZERO_WIDTH_SPACE = '\u200b';

export type TransformContext = {
  /** Source user ID → user ID of that user's proxy identity. */
  proxyUserIds: ReadonlyMap<string, string>;
  /** Source role ID → backup role ID with the same name. */
  resolveRole: (sourceRoleId: string) => string | undefined;
  /** Hours added to UTC when stamping imported messages. */
  timezoneOffsetHours: number;
};

export type TransformInput = {
  text: string;
  batch: boolean;
  createdAt: Date;
  author: SourceAuthor;
  /** True when the message goes out through the default identity. */
  viaDefault: boolean;
};

/** Point user mentions of rostered users at their proxy identity; leave the rest untouched. */
export function substituteUserMentions(text: string, proxyUserIds: ReadonlyMap<string, string>): string {
  return text.replace(USER_MENTION_RE, (token, userId: string) => {
    const proxyId = proxyUserIds.get(userId);
    return proxyId ? `<@${proxyId}>` : token;
  });
}

export function substituteRoleMentions(text: string, resolveRole: TransformContext['resolveRole']): string {
  return text.replace(ROLE_MENTION_RE, (token, roleId: string) => {
    const backupId = resolveRole(roleId);
    return backupId ? `<@&${backupId}>` : token;
  });
}

/** Insert a zero-width space after the `@` of `@everyone` and `@here`. */
export function neuterBroadcastTags(text: string): string {
  return text.replace(BROADCAST_RE, (_tag, word: string) => `@${ZERO_WIDTH_SPACE}${word}`);
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** `MM/DD/YYYY hh:mmAM` of `date` shifted by `offsetHours` from UTC. */
export function formatImportTimestamp(date: Date, offsetHours: number): string {
  const shifted = new Date(date.getTime() + offsetHours * 3_600_000);
  const hours24 = shifted.getUTCHours();
  const suffix = hours24 >= 12 ? 'PM' : 'AM';
  const hours12 = hours24 % 12 || 12;
  return (
    `${pad2(shifted.getUTCMonth() + 1)}/${pad2(shifted.getUTCDate())}/${shifted.getUTCFullYear()} ` +
    `${pad2(hours12)}:${pad2(shifted.getUTCMinutes())}${suffix}`
  );
}

export function attributionLine(author: SourceAuthor): string {
  const name = author.displayName && author.displayName !== author.username
    ? `${author.displayName} (${author.username})`
    : author.username;
  return `-# sent by ${neuterBroadcastTags(name)}`;
}

/**
 * Rewrite source text for the backup guild. Steps run in order: user
 * mentions, role mentions, broadcast tags, import timestamp, attribution.
 * Reapplying the transform to its own output changes nothing.
 */
export function transformContent(input: TransformInput, ctx: TransformContext): string {
  let text = substituteUserMentions(input.text, ctx.proxyUserIds);
  text = substituteRoleMentions(text, ctx.resolveRole);
  text = neuterBroadcastTags(text);

  if (input.batch) {
    const stamp = `[${formatImportTimestamp(input.createdAt, ctx.timezoneOffsetHours)}]`;
    if (!text.startsWith(stamp)) {
      text = text ? `${stamp} ${text}` : stamp;
    }
  }

  if (input.viaDefault) {
    const line = attributionLine(input.author);
    if (!text.endsWith(line)) {
      text = text ? `${text}\n${line}` : line;
    }
  }

  return text;
}
