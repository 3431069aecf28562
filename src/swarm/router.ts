import type { ProxyIdentity } from './types.js';

/**
 * Maps source users to the identity that acts on their behalf. Built once
 * from the identities that came online; never mutated afterwards.
 */
export class IdentityRouter {
  readonly defaultIdentity: ProxyIdentity;
  private readonly dedicated: ReadonlyMap<string, ProxyIdentity>;

  constructor(defaultIdentity: ProxyIdentity, dedicated: Iterable<ProxyIdentity>) {
    if (!defaultIdentity.isDefault) {
      throw new Error(`IdentityRouter: identity "${defaultIdentity.key}" is not the default identity`);
    }
    this.defaultIdentity = defaultIdentity;
    const map = new Map<string, ProxyIdentity>();
    for (const identity of dedicated) {
      if (identity.isDefault) continue;
      map.set(identity.key, identity);
    }
    this.dedicated = map;
  }

  /** Dedicated identity for the user, or the default identity. */
  route(sourceUserId: string): ProxyIdentity {
    return this.dedicated.get(sourceUserId) ?? this.defaultIdentity;
  }

  hasDedicated(sourceUserId: string): boolean {
    return this.dedicated.has(sourceUserId);
  }

  listDedicated(): ProxyIdentity[] {
    return [...this.dedicated.values()];
  }

  /** Source user ID → the proxy identity's own user ID, for mention rewriting. */
  proxyUserIds(): ReadonlyMap<string, string> {
    const out = new Map<string, string>();
    for (const [sourceUserId, identity] of this.dedicated) {
      out.set(sourceUserId, identity.userId);
    }
    return out;
  }

  /** Platform user IDs of every identity in the swarm, default included. */
  swarmUserIds(): Set<string> {
    const ids = new Set<string>([this.defaultIdentity.userId]);
    for (const identity of this.dedicated.values()) ids.add(identity.userId);
    return ids;
  }
}
