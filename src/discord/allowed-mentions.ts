import type { MessageMentionOptions } from 'discord.js';

/** Mirrored content must never ping anyone in the backup guild. */
export const NO_MENTIONS = { parse: [] } satisfies MessageMentionOptions;
