const SNOWFLAKE_RE = /^\d+$/;

export function isSnowflake(value: string): boolean {
  return SNOWFLAKE_RE.test(value);
}

/** Parse a comma/space separated list of snowflakes, dropping anything non-numeric. */
export function parseSnowflakeList(raw: string | undefined): string[] {
  const out: string[] = [];
  for (const part of String(raw ?? '').split(/[,\s]+/g)) {
    const v = part.trim();
    if (!v) continue;
    if (isSnowflake(v) && !out.includes(v)) out.push(v);
  }
  return out;
}

export function parseOperatorIds(raw: string | undefined): Set<string> {
  return new Set(parseSnowflakeList(raw));
}

export function isAllowlisted(allow: ReadonlySet<string>, userId: string): boolean {
  // Fail closed: if allowlist is empty, respond to nobody.
  if (allow.size === 0) return false;
  return allow.has(userId);
}
