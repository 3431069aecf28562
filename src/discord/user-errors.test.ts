import { describe, expect, it } from 'vitest';
import { mapDiscordErrorToOperatorMessage, messageContentIntentHint } from './user-errors.js';

describe('mapDiscordErrorToOperatorMessage', () => {
  it('maps permission failures to role guidance', () => {
    const msg = mapDiscordErrorToOperatorMessage(new Error('Missing Permissions'));
    expect(msg).toContain('missing permissions/access');
  });

  it('maps unknown message errors', () => {
    expect(mapDiscordErrorToOperatorMessage(new Error('Unknown Message'))).toBe(
      'Discord could not find the channel or message; it may have been deleted.',
    );
  });

  it('keeps the detail of guild limit errors', () => {
    const msg = mapDiscordErrorToOperatorMessage(new Error('Maximum number of guild roles reached (250)'));
    expect(msg).toBe('Discord refused the request because a guild limit was reached: Maximum number of guild roles reached (250)');
  });

  it('accepts non-Error values', () => {
    expect(mapDiscordErrorToOperatorMessage('socket hang up')).toBe('Command failed: socket hang up');
  });

  it('falls back to a generic message when there is no detail', () => {
    expect(mapDiscordErrorToOperatorMessage(new Error(''))).toBe('An unexpected error occurred with no additional detail.');
    expect(mapDiscordErrorToOperatorMessage(undefined)).toBe('An unexpected error occurred with no additional detail.');
  });
});

describe('messageContentIntentHint', () => {
  it('points at the privileged intent setting', () => {
    expect(messageContentIntentHint()).toContain('Message Content Intent');
  });
});
