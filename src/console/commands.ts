export type ConsoleCommand =
  | { type: 'syncProfiles' }
  | { type: 'syncRoles' }
  | { type: 'getMessage'; messageId: string }
  | { type: 'manualImport'; messageId: string };

/** Text after `verb`, or null when the line is some other command. `""` when no argument was given. */
function argumentAfter(verb: string, normalized: string, lower: string): string | null {
  if (lower === verb) return '';
  if (!lower.startsWith(`${verb} `)) return null;
  return normalized.slice(verb.length + 1).trim();
}

/**
 * Parse one console line. Returns null for anything that is not a command.
 * The message ID is returned raw; the handler validates it.
 */
export function parseConsoleCommand(content: string): ConsoleCommand | null {
  const normalized = String(content ?? '').trim().replace(/\s+/g, ' ');
  const lower = normalized.toLowerCase();

  if (lower === 'sync profiles') return { type: 'syncProfiles' };
  if (lower === 'sync roles') return { type: 'syncRoles' };

  const getMessage = argumentAfter('get message', normalized, lower);
  if (getMessage !== null) return { type: 'getMessage', messageId: getMessage };
  const manualImport = argumentAfter('manual import', normalized, lower);
  if (manualImport !== null) return { type: 'manualImport', messageId: manualImport };
  return null;
}
