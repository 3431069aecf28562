export function messageContentIntentHint(): string {
  return (
    'Discord is delivering empty message content. Enable Message Content Intent in the Discord Developer Portal ' +
    '(Application -> Bot -> Privileged Gateway Intents), then restart the swarm.'
  );
}

function errorText(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err ?? '');
}

/** Turn an unexpected failure inside a console command into a line for the operator. */
export function mapDiscordErrorToOperatorMessage(err: unknown): string {
  const msg = errorText(err).trim();
  const lc = msg.toLowerCase();

  if (lc.includes('missing permissions') || lc.includes('missing access')) {
    return (
      'Discord denied this action due to missing permissions/access. ' +
      'Update the swarm role permissions in Server Settings -> Roles, then retry.'
    );
  }

  if (lc.includes('unknown emoji')) {
    return 'Discord rejected an emoji the backup guild cannot use.';
  }

  if (lc.includes('unknown channel') || lc.includes('unknown message')) {
    return 'Discord could not find the channel or message; it may have been deleted.';
  }

  if (lc.includes('maximum number of')) {
    return `Discord refused the request because a guild limit was reached: ${msg}`;
  }

  if (lc.includes('rate limit') || lc.includes('you are being rate limited')) {
    return 'Discord is rate limiting the swarm. Wait a minute and retry.';
  }

  if (lc.includes('timed out') || lc.includes('etimedout') || lc.includes('econnreset')) {
    return 'The request to Discord timed out. Retry the command.';
  }

  if (!msg) {
    return 'An unexpected error occurred with no additional detail.';
  }

  return `Command failed: ${msg}`;
}
