import { describe, expect, it } from 'vitest';
import { IdentityRouter } from './router.js';
import { fakeIdentity } from './test-helpers.js';
import { DEFAULT_IDENTITY_KEY } from './types.js';

function makeRouter() {
  const master = fakeIdentity(DEFAULT_IDENTITY_KEY, 'bot-master');
  const alice = fakeIdentity('u-alice', 'bot-alice');
  const bob = fakeIdentity('u-bob', 'bot-bob');
  return { master, alice, bob, router: new IdentityRouter(master, [alice, bob]) };
}

describe('IdentityRouter', () => {
  it('routes rostered users to their dedicated identity', () => {
    const { router, alice, bob } = makeRouter();
    expect(router.route('u-alice')).toBe(alice);
    expect(router.route('u-bob')).toBe(bob);
  });

  it('routes every other user to the default identity', () => {
    const { router, master } = makeRouter();
    expect(router.route('u-nobody')).toBe(master);
    expect(router.route('')).toBe(master);
  });

  it('is deterministic and side-effect free', () => {
    const { router, alice } = makeRouter();
    const first = router.route('u-alice');
    const second = router.route('u-alice');
    expect(first).toBe(second);
    expect(alice.send).not.toHaveBeenCalled();
  });

  it('ignores a default identity passed among the dedicated ones', () => {
    const master = fakeIdentity(DEFAULT_IDENTITY_KEY, 'bot-master');
    const router = new IdentityRouter(master, [master]);
    expect(router.listDedicated()).toEqual([]);
  });

  it('rejects a non-default identity as the fallback', () => {
    const alice = fakeIdentity('u-alice', 'bot-alice');
    expect(() => new IdentityRouter(alice, [])).toThrow('is not the default identity');
  });

  it('exposes proxy user IDs and the swarm user ID set', () => {
    const { router } = makeRouter();
    expect([...router.proxyUserIds()]).toEqual([
      ['u-alice', 'bot-alice'],
      ['u-bob', 'bot-bob'],
    ]);
    expect(router.swarmUserIds()).toEqual(new Set(['bot-master', 'bot-alice', 'bot-bob']));
  });
});
