import { describe, expect, it } from 'vitest';
import { classifyIncoming } from './dispatch.js';
import type { DispatchContext, IncomingMeta } from './dispatch.js';

const ctx: DispatchContext = {
  sourceGuildId: 'g-src',
  consoleChannelId: 'console',
  isMonitored: (id) => id === 'general',
  swarmUserIds: new Set(['bot-master', 'bot-alice']),
};

function meta(overrides: Partial<IncomingMeta> = {}): IncomingMeta {
  return { guildId: 'g-src', channelId: 'general', authorId: 'u-1', system: false, ...overrides };
}

describe('classifyIncoming', () => {
  it('mirrors user messages in monitored channels', () => {
    expect(classifyIncoming(meta(), ctx)).toBe('mirror');
  });

  it('never mirrors messages written by swarm identities', () => {
    expect(classifyIncoming(meta({ authorId: 'bot-alice' }), ctx)).toBe('ignore');
  });

  it('sends console channel traffic to the console, whichever guild it lives in', () => {
    expect(classifyIncoming(meta({ guildId: 'g-backup', channelId: 'console' }), ctx)).toBe('console');
  });

  it('ignores unmonitored channels, other guilds, DMs and system messages', () => {
    expect(classifyIncoming(meta({ channelId: 'random' }), ctx)).toBe('ignore');
    expect(classifyIncoming(meta({ guildId: 'g-backup' }), ctx)).toBe('ignore');
    expect(classifyIncoming(meta({ guildId: null }), ctx)).toBe('ignore');
    expect(classifyIncoming(meta({ system: true }), ctx)).toBe('ignore');
  });

  it('treats every channel as non-console when the console is disabled', () => {
    expect(classifyIncoming(meta({ channelId: 'console' }), { ...ctx, consoleChannelId: undefined })).toBe('ignore');
  });
});
