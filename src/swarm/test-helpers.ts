import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { ProxyIdentity, SourceMessage } from './types.js';
import { DEFAULT_IDENTITY_KEY } from './types.js';

export type FakeIdentity = ProxyIdentity & {
  send: Mock<ProxyIdentity['send']>;
  edit: Mock<ProxyIdentity['edit']>;
  react: Mock<ProxyIdentity['react']>;
  syncProfile: Mock<ProxyIdentity['syncProfile']>;
};

/** In-process identity: records every call; sends succeed with sequential IDs. */
export function fakeIdentity(key: string, userId: string): FakeIdentity {
  let seq = 0;
  return {
    key,
    isDefault: key === DEFAULT_IDENTITY_KEY,
    userId,
    mention: () => `<@${userId}>`,
    send: vi.fn<ProxyIdentity['send']>(async (_channelName, message) => {
      seq += 1;
      return { id: `${userId}-sent-${seq}`, channelId: 'backup-chan', content: message.content };
    }),
    edit: vi.fn<ProxyIdentity['edit']>(async () => {}),
    react: vi.fn<ProxyIdentity['react']>(async () => {}),
    syncProfile: vi.fn<ProxyIdentity['syncProfile']>(async () => {}),
  };
}

export function sourceMessage(overrides: Partial<SourceMessage> = {}): SourceMessage {
  return {
    id: '1000',
    channelId: 'src-chan',
    channelName: 'general',
    content: 'hello',
    author: { id: 'u-unmapped', username: 'sam', displayName: 'Sam', bot: false },
    createdAt: new Date(Date.UTC(2024, 0, 2, 15, 4)),
    attachments: [],
    embeds: [],
    reactions: [],
    ...overrides,
  };
}
