import { describe, expect, it, vi } from 'vitest';
import { IdentityRouter } from '../swarm/router.js';
import { fakeIdentity, sourceMessage } from '../swarm/test-helpers.js';
import { DEFAULT_IDENTITY_KEY } from '../swarm/types.js';
import type { ReactionEmoji, SentMessage } from '../swarm/types.js';
import { buildReactionFootnote, emojiLabel, emojiReactKey, replicateReactions } from './reactions.js';

const BLOB: ReactionEmoji = { id: '77', name: 'blob', animated: false };
const PARTY: ReactionEmoji = { id: '78', name: 'party', animated: true };
const THUMBS: ReactionEmoji = { id: null, name: '👍', animated: false };
const placeholder = { reactKey: 'unknown_reaction:99', label: ':unknown_reaction:' };

function rejectCustom() {
  return async (_sent: SentMessage, emoji: string) => {
    if (emoji !== placeholder.reactKey && /:\d+$/.test(emoji)) throw new Error('Unknown Emoji');
  };
}

function setup() {
  const master = fakeIdentity(DEFAULT_IDENTITY_KEY, 'bot-master');
  const alice = fakeIdentity('u-alice', 'bot-alice');
  const bob = fakeIdentity('u-bob', 'bot-bob');
  const router = new IdentityRouter(master, [alice, bob]);
  const sent: SentMessage = { id: 'b1', channelId: 'backup-chan', content: 'hello' };
  const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  return { master, alice, bob, router, sent, log };
}

describe('emoji helpers', () => {
  it('builds react keys for unicode, custom and animated emoji', () => {
    expect(emojiReactKey(THUMBS)).toBe('👍');
    expect(emojiReactKey(BLOB)).toBe('blob:77');
    expect(emojiReactKey(PARTY)).toBe('a:party:78');
  });

  it('labels custom emoji by name', () => {
    expect(emojiLabel(BLOB)).toBe(':blob:');
    expect(emojiLabel(THUMBS)).toBe('👍');
  });
});

describe('buildReactionFootnote', () => {
  it('skips emoji with no fallback events', () => {
    expect(buildReactionFootnote([{ label: ':blob:', fallbacks: [], anonymous: 0 }])).toBeNull();
  });

  it('lists fallbacks before the anonymous count', () => {
    expect(buildReactionFootnote([
      { label: ':blob:', fallbacks: ['<@bot-alice>'], anonymous: 1 },
      { label: '👍', fallbacks: [], anonymous: 0 },
    ])).toBe('**Unknown Reactions**\n:blob: <@bot-alice> +1 unknown');
  });

  it('separates the emoji from its reactors with a single space', () => {
    expect(buildReactionFootnote([
      { label: '👍', fallbacks: [], anonymous: 2 },
      { label: ':blob:', fallbacks: ['<@bot-alice>', '<@bot-bob>'], anonymous: 0 },
    ])).toBe('**Unknown Reactions**\n👍 +2 unknown\n:blob: <@bot-alice> <@bot-bob>');
  });
});

describe('replicateReactions', () => {
  it('deduplicates an unknown emoji from two unmapped users into one placeholder reaction', async () => {
    const { master, router, sent } = setup();
    master.react.mockImplementation(rejectCustom());
    const source = sourceMessage({ reactions: [{ emoji: BLOB, userIds: ['u-1', 'u-2'] }] });

    const result = await replicateReactions(source, { sender: master, sent, channelName: 'general' }, { router, placeholder });

    expect(master.react.mock.calls.map((c) => c[1])).toEqual(['blob:77', 'unknown_reaction:99']);
    expect(result.entries).toEqual([{ label: ':blob:', fallbacks: [], anonymous: 1 }]);
    expect(result.footnote).toBe('**Unknown Reactions**\n:blob: +1 unknown');
    expect(master.edit).toHaveBeenCalledWith(sent, 'hello\n\n**Unknown Reactions**\n:blob: +1 unknown');
  });

  it('records dedicated identities that had to fall back', async () => {
    const { master, alice, bob, router, sent } = setup();
    alice.react.mockImplementation(rejectCustom());
    bob.react.mockImplementation(rejectCustom());
    const source = sourceMessage({ reactions: [{ emoji: BLOB, userIds: ['u-alice', 'u-bob', 'u-alice'] }] });

    const result = await replicateReactions(source, { sender: master, sent, channelName: 'general' }, { router, placeholder });

    expect(alice.react).toHaveBeenCalledTimes(2);
    expect(bob.react).toHaveBeenCalledTimes(2);
    expect(result.footnote).toBe('**Unknown Reactions**\n:blob: <@bot-alice> <@bot-bob>');
  });

  it('applies the placeholder once per identity across several unknown emoji', async () => {
    const { master, alice, router, sent } = setup();
    alice.react.mockImplementation(rejectCustom());
    const source = sourceMessage({
      reactions: [
        { emoji: BLOB, userIds: ['u-alice'] },
        { emoji: PARTY, userIds: ['u-alice'] },
      ],
    });

    const result = await replicateReactions(source, { sender: alice, sent, channelName: 'general' }, { router, placeholder });

    expect(alice.react.mock.calls.map((c) => c[1])).toEqual(['blob:77', 'unknown_reaction:99', 'a:party:78']);
    expect(result.footnote).toBe('**Unknown Reactions**\n:blob: <@bot-alice>\n:party: <@bot-alice>');
    expect(master.react).not.toHaveBeenCalled();
  });

  it('adds no footnote when dedicated identities react successfully', async () => {
    const { master, alice, router, sent } = setup();
    const source = sourceMessage({ reactions: [{ emoji: THUMBS, userIds: ['u-alice'] }] });

    const result = await replicateReactions(source, { sender: master, sent, channelName: 'general' }, { router, placeholder });

    expect(alice.react).toHaveBeenCalledWith(sent, '👍');
    expect(result.footnote).toBeNull();
    expect(master.edit).not.toHaveBeenCalled();
  });

  it('counts successful default-identity reactions as unknown reactors', async () => {
    const { master, router, sent } = setup();
    const source = sourceMessage({ reactions: [{ emoji: THUMBS, userIds: ['u-1', 'u-2', 'u-3'] }] });

    const result = await replicateReactions(source, { sender: master, sent, channelName: 'general' }, { router, placeholder });

    expect(master.react).toHaveBeenCalledTimes(1);
    expect(result.footnote).toBe('**Unknown Reactions**\n👍 +1 unknown');
  });

  it('keeps tallying when the placeholder itself is rejected', async () => {
    const { master, alice, router, sent, log } = setup();
    alice.react.mockRejectedValue(new Error('Missing Permissions'));
    const source = sourceMessage({ reactions: [{ emoji: BLOB, userIds: ['u-alice'] }] });

    const result = await replicateReactions(source, { sender: master, sent, channelName: 'general' }, { router, placeholder, log });

    expect(log.warn).toHaveBeenCalledWith(expect.objectContaining({ identity: 'u-alice' }), 'reactions:placeholder rejected');
    expect(result.footnote).toBe('**Unknown Reactions**\n:blob: <@bot-alice>');
  });

  it('logs a failed footnote edit instead of throwing', async () => {
    const { master, router, sent, log } = setup();
    master.react.mockImplementation(rejectCustom());
    master.edit.mockRejectedValue(new Error('Unknown Message'));
    const source = sourceMessage({ reactions: [{ emoji: BLOB, userIds: ['u-1'] }] });

    const result = await replicateReactions(source, { sender: master, sent, channelName: 'general' }, { router, placeholder, log });

    expect(result.footnote).toBe('**Unknown Reactions**\n:blob: +1 unknown');
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ messageId: '1000', backupMessageId: 'b1' }),
      'reactions:footnote not posted',
    );
  });

  it('posts the footnote separately when the edit would overflow', async () => {
    const { master, router } = setup();
    master.react.mockImplementation(rejectCustom());
    const sent: SentMessage = { id: 'b1', channelId: 'backup-chan', content: 'x'.repeat(1990) };
    const source = sourceMessage({ reactions: [{ emoji: BLOB, userIds: ['u-1'] }] });

    await replicateReactions(source, { sender: master, sent, channelName: 'general' }, { router, placeholder });

    expect(master.edit).not.toHaveBeenCalled();
    expect(master.send).toHaveBeenCalledWith('general', {
      content: '**Unknown Reactions**\n:blob: +1 unknown',
      embeds: [],
      files: [],
      silent: true,
    });
  });
});
