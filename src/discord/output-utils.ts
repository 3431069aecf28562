export const DISCORD_MESSAGE_LIMIT = 2000;

/**
 * Split text into chunks that fit a single Discord message, preferring line
 * boundaries. Lines longer than the limit are hard-wrapped.
 */
export function splitDiscord(text: string, limit = DISCORD_MESSAGE_LIMIT): string[] {
  const normalized = text.replace(/\r\n?/g, '\n');
  if (normalized.length <= limit) return [normalized];

  const chunks: string[] = [];
  let cur = '';

  const flush = () => {
    if (cur) chunks.push(cur);
    cur = '';
  };

  for (const line of normalized.split('\n')) {
    const nextLen = (cur ? cur.length + 1 : 0) + line.length;
    if (nextLen <= limit) {
      cur = cur ? `${cur}\n${line}` : line;
      continue;
    }
    flush();
    let rest = line;
    while (rest.length > limit) {
      chunks.push(rest.slice(0, limit));
      rest = rest.slice(limit);
    }
    cur = rest;
  }

  flush();
  return chunks.filter((c) => c.trim().length > 0);
}
