import { describe, expect, it } from 'vitest';
import {
  attributionLine,
  formatImportTimestamp,
  neuterBroadcastTags,
  substituteRoleMentions,
  substituteUserMentions,
  transformContent,
} from './content-transform.js';
import type { TransformContext, TransformInput } from './content-transform.js';

const ZWSP = '\u200b';

const roles = new Map([['222', '800']]);
const ctx: TransformContext = {
  proxyUserIds: new Map([['111', '900']]),
  resolveRole: (id) => roles.get(id),
  timezoneOffsetHours: 0,
};

function input(overrides: Partial<TransformInput> = {}): TransformInput {
  return {
    text: 'hello',
    batch: false,
    createdAt: new Date(Date.UTC(2024, 0, 2, 15, 4)),
    author: { id: '555', username: 'sam', displayName: 'Sam', bot: false },
    viaDefault: false,
    ...overrides,
  };
}

describe('substituteUserMentions', () => {
  it('rewrites mentions of rostered users, including nickname form', () => {
    expect(substituteUserMentions('hi <@111> and <@!111> and <@333>', ctx.proxyUserIds))
      .toBe('hi <@900> and <@900> and <@333>');
  });
});

describe('substituteRoleMentions', () => {
  it('rewrites roles that exist in the backup guild and leaves others', () => {
    expect(substituteRoleMentions('ping <@&222> <@&444>', ctx.resolveRole)).toBe('ping <@&800> <@&444>');
  });
});

describe('neuterBroadcastTags', () => {
  it('inserts a zero-width space into both broadcast tags', () => {
    expect(neuterBroadcastTags('hey @everyone and @here')).toBe(`hey @${ZWSP}everyone and @${ZWSP}here`);
  });

  it('does not touch already neutered tags', () => {
    const once = neuterBroadcastTags('@everyone');
    expect(neuterBroadcastTags(once)).toBe(once);
  });
});

describe('formatImportTimestamp', () => {
  it('formats afternoon times in 12-hour form', () => {
    expect(formatImportTimestamp(new Date(Date.UTC(2024, 0, 2, 15, 4)), 0)).toBe('01/02/2024 03:04PM');
  });

  it('shows midnight as 12AM', () => {
    expect(formatImportTimestamp(new Date(Date.UTC(2024, 5, 15, 0, 5)), 0)).toBe('06/15/2024 12:05AM');
  });

  it('applies negative offsets across a year boundary', () => {
    expect(formatImportTimestamp(new Date(Date.UTC(2024, 0, 1, 2, 30)), -5)).toBe('12/31/2023 09:30PM');
  });

  it('applies fractional offsets', () => {
    expect(formatImportTimestamp(new Date(Date.UTC(2024, 0, 2, 15, 4)), 5.5)).toBe('01/02/2024 08:34PM');
  });
});

describe('attributionLine', () => {
  it('names display name and username', () => {
    expect(attributionLine({ id: '1', username: 'sam', displayName: 'Sam', bot: false })).toBe('-# sent by Sam (sam)');
  });

  it('collapses identical display name and username', () => {
    expect(attributionLine({ id: '1', username: 'sam', displayName: 'sam', bot: false })).toBe('-# sent by sam');
  });
});

describe('transformContent', () => {
  it('leaves live messages from dedicated identities unannotated', () => {
    expect(transformContent(input({ text: '<@111> look' }), ctx)).toBe('<@900> look');
  });

  it('stamps imports and attributes default-identity messages', () => {
    const out = transformContent(input({ text: 'hello @here', batch: true, viaDefault: true }), ctx);
    expect(out).toBe(`[01/02/2024 03:04PM] hello @${ZWSP}here\n-# sent by Sam (sam)`);
  });

  it('is idempotent on its own output', () => {
    const first = transformContent(
      input({ text: '<@111> <@&222> @everyone', batch: true, viaDefault: true }),
      ctx,
    );
    const second = transformContent(input({ text: first, batch: true, viaDefault: true }), ctx);
    expect(second).toBe(first);
  });

  it('leaves malformed mention syntax as literal text', () => {
    expect(transformContent(input({ text: '<@abc> <@&> <@123' }), ctx)).toBe('<@abc> <@&> <@123');
  });

  it('produces annotation-only content for empty text', () => {
    expect(transformContent(input({ text: '', viaDefault: true }), ctx)).toBe('-# sent by Sam (sam)');
    expect(transformContent(input({ text: '', batch: true }), ctx)).toBe('[01/02/2024 03:04PM]');
  });
});
