import { isSnowflake, parseOperatorIds, parseSnowflakeList } from './discord/allowlist.js';
import { flushTimeToCron } from './stats/flush-schedule.js';

export const DEFAULT_CONFIRM_TIMEOUT_MS = 60_000;
export const DEFAULT_PLACEHOLDER_EMOJI_NAME = 'unknown_reaction';
const MAX_TIMEZONE_OFFSET_HOURS = 14;

type ParseResult = {
  config: BackupSwarmConfig;
  credentials: SwarmCredentials;
  warnings: string[];
  infos: string[];
};

/** Bot tokens. Handed to the swarm once at start-up and not retained. */
export type SwarmCredentials = {
  defaultToken: string;
  /** Source user ID → token of the identity dedicated to that user. */
  dedicated: Map<string, string>;
};

export type BackupSwarmConfig = {
  sourceGuildId: string;
  sourceChannelIds: string[];
  backupGuildId: string;

  consoleChannelId?: string;
  operatorIds: Set<string>;
  confirmTimeoutMs: number;

  importTimezoneOffsetHours: number;

  statsEnabled: boolean;
  statsFlushTime: string;
  statsTimezone: string;

  placeholderEmojiName: string;
  placeholderEmojiImage?: string;

  profileAutoSync: boolean;
};

function parseBoolean(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: boolean,
): boolean {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  throw new Error(`${name} must be "0"/"1" or "true"/"false", got "${raw}"`);
}

function parseFiniteNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return n;
}

function parsePositiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const n = parseFiniteNumber(env, name, defaultValue);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${name} must be a positive integer, got "${n}"`);
  }
  return n;
}

function parseTrimmedString(
  env: NodeJS.ProcessEnv,
  name: string,
): string | undefined {
  const raw = env[name];
  if (raw == null) return undefined;
  const trimmed = raw.trim();
  return trimmed || undefined;
}

function parseRequiredSnowflake(env: NodeJS.ProcessEnv, name: string): string {
  const raw = parseTrimmedString(env, name);
  if (!raw) throw new Error(`Missing ${name}`);
  if (!isSnowflake(raw)) throw new Error(`${name} must be a snowflake ID, got "${raw}"`);
  return raw;
}

function parseOptionalSnowflake(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = parseTrimmedString(env, name);
  if (!raw) return undefined;
  if (!isSnowflake(raw)) throw new Error(`${name} must be a snowflake ID, got "${raw}"`);
  return raw;
}

function parseImagePath(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const val = parseTrimmedString(env, name);
  if (val && !val.startsWith('http://') && !val.startsWith('https://') && !val.startsWith('/')) {
    throw new Error(`${name} must be an absolute file path or URL`);
  }
  return val;
}

function parseTimezone(env: NodeJS.ProcessEnv, name: string): string {
  const raw = parseTrimmedString(env, name) ?? parseTrimmedString(env, 'DEFAULT_TIMEZONE');
  if (!raw) return Intl.DateTimeFormat().resolvedOptions().timeZone;
  try {
    Intl.DateTimeFormat(undefined, { timeZone: raw });
  } catch {
    throw new Error(`${name} must be a valid IANA timezone, got "${raw}"`);
  }
  return raw;
}

/** `SWARM_TOKENS` is a JSON object of `{ "<source user id>": "<bot token>" }`. */
function parseSwarmTokens(env: NodeJS.ProcessEnv): Map<string, string> {
  const raw = parseTrimmedString(env, 'SWARM_TOKENS');
  const out = new Map<string, string>();
  if (!raw) return out;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error('SWARM_TOKENS must be a JSON object of {"<user id>": "<token>"}');
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('SWARM_TOKENS must be a JSON object of {"<user id>": "<token>"}');
  }

  const entries: Array<[string, unknown]> = Object.entries(parsed);
  for (const [userId, token] of entries) {
    if (!isSnowflake(userId)) {
      throw new Error(`SWARM_TOKENS key "${userId}" is not a snowflake user ID`);
    }
    if (typeof token !== 'string' || !token.trim()) {
      throw new Error(`SWARM_TOKENS entry for ${userId} must be a non-empty token string`);
    }
    out.set(userId, token.trim());
  }
  return out;
}

export function parseConfig(env: NodeJS.ProcessEnv): ParseResult {
  const warnings: string[] = [];
  const infos: string[] = [];

  const defaultToken = parseTrimmedString(env, 'DISCORD_TOKEN');
  if (!defaultToken) {
    throw new Error('Missing DISCORD_TOKEN');
  }
  const dedicated = parseSwarmTokens(env);
  for (const [userId, token] of dedicated) {
    if (token === defaultToken) {
      throw new Error(`SWARM_TOKENS entry for ${userId} reuses DISCORD_TOKEN; each identity needs its own bot`);
    }
  }
  if (dedicated.size === 0) {
    infos.push('SWARM_TOKENS is empty: every message will be posted by the default identity');
  }

  const sourceGuildId = parseRequiredSnowflake(env, 'SOURCE_GUILD_ID');
  const backupGuildId = parseRequiredSnowflake(env, 'BACKUP_GUILD_ID');
  if (sourceGuildId === backupGuildId) {
    throw new Error('SOURCE_GUILD_ID and BACKUP_GUILD_ID must be different guilds');
  }

  const sourceChannelIdsRaw = env.SOURCE_CHANNEL_IDS;
  const sourceChannelIds = parseSnowflakeList(sourceChannelIdsRaw);
  if (sourceChannelIds.length === 0) {
    throw new Error('SOURCE_CHANNEL_IDS must list at least one channel ID');
  }

  const consoleChannelId = parseOptionalSnowflake(env, 'CONSOLE_CHANNEL_ID');
  if (!consoleChannelId) {
    warnings.push('CONSOLE_CHANNEL_ID is not set: operator console disabled');
  } else if (sourceChannelIds.includes(consoleChannelId)) {
    throw new Error('CONSOLE_CHANNEL_ID must not be one of SOURCE_CHANNEL_IDS');
  }

  const operatorIdsRaw = env.CONSOLE_OPERATOR_IDS;
  const operatorIds = parseOperatorIds(operatorIdsRaw);
  if (consoleChannelId && (operatorIdsRaw ?? '').trim().length > 0 && operatorIds.size === 0) {
    warnings.push('CONSOLE_OPERATOR_IDS was set but no valid IDs were parsed: console will answer nobody (fail closed)');
  } else if (consoleChannelId && operatorIds.size === 0) {
    warnings.push('CONSOLE_OPERATOR_IDS is empty: console will answer nobody (fail closed)');
  }

  const confirmTimeoutMs = parsePositiveInt(env, 'CONSOLE_CONFIRM_TIMEOUT_MS', DEFAULT_CONFIRM_TIMEOUT_MS);

  const importTimezoneOffsetHours = parseFiniteNumber(env, 'IMPORT_TIMEZONE_OFFSET_HOURS', 0);
  if (Math.abs(importTimezoneOffsetHours) > MAX_TIMEZONE_OFFSET_HOURS) {
    throw new Error(
      `IMPORT_TIMEZONE_OFFSET_HOURS must be between -${MAX_TIMEZONE_OFFSET_HOURS} and ${MAX_TIMEZONE_OFFSET_HOURS}, got "${importTimezoneOffsetHours}"`,
    );
  }

  const statsEnabled = parseBoolean(env, 'STATS_ENABLED', true);
  const statsFlushTime = parseTrimmedString(env, 'STATS_FLUSH_TIME') ?? '00:00';
  try {
    flushTimeToCron(statsFlushTime);
  } catch {
    throw new Error(`STATS_FLUSH_TIME must be HH:MM (24h), got "${statsFlushTime}"`);
  }
  const statsTimezone = parseTimezone(env, 'STATS_TIMEZONE');

  const placeholderEmojiName = parseTrimmedString(env, 'PLACEHOLDER_EMOJI_NAME') ?? DEFAULT_PLACEHOLDER_EMOJI_NAME;
  if (!/^\w{2,32}$/.test(placeholderEmojiName)) {
    throw new Error(`PLACEHOLDER_EMOJI_NAME must be 2-32 letters, digits or underscores, got "${placeholderEmojiName}"`);
  }
  const placeholderEmojiImage = parseImagePath(env, 'PLACEHOLDER_EMOJI_IMAGE');
  if (!placeholderEmojiImage) {
    infos.push('PLACEHOLDER_EMOJI_IMAGE is not set: an existing guild emoji is required, otherwise a Unicode placeholder is used');
  }

  const profileAutoSync = parseBoolean(env, 'PROFILE_AUTO_SYNC', false);
  if (profileAutoSync && dedicated.size === 0) {
    warnings.push('PROFILE_AUTO_SYNC is on but SWARM_TOKENS is empty: nothing to sync');
  }

  return {
    config: {
      sourceGuildId,
      sourceChannelIds,
      backupGuildId,
      consoleChannelId,
      operatorIds,
      confirmTimeoutMs,
      importTimezoneOffsetHours,
      statsEnabled,
      statsFlushTime,
      statsTimezone,
      placeholderEmojiName,
      placeholderEmojiImage,
      profileAutoSync,
    },
    credentials: { defaultToken, dedicated },
    warnings,
    infos,
  };
}
