import type { BackupRole, SourceRole } from './types.js';

/**
 * Source role ID → backup role ID, joined on role name (IDs differ across
 * guilds). An immutable snapshot; rebuild it after roles change.
 */
export class RoleMapping {
  private readonly bySourceId: ReadonlyMap<string, string>;

  private constructor(bySourceId: ReadonlyMap<string, string>) {
    this.bySourceId = bySourceId;
  }

  static build(sourceRoles: readonly SourceRole[], backupRoles: readonly BackupRole[]): RoleMapping {
    const backupByName = new Map<string, string>();
    for (const role of backupRoles) {
      if (!backupByName.has(role.name)) backupByName.set(role.name, role.id);
    }
    const out = new Map<string, string>();
    for (const role of sourceRoles) {
      const backupId = backupByName.get(role.name);
      if (backupId) out.set(role.id, backupId);
    }
    return new RoleMapping(out);
  }

  static empty(): RoleMapping {
    return new RoleMapping(new Map());
  }

  resolve(sourceRoleId: string): string | undefined {
    return this.bySourceId.get(sourceRoleId);
  }

  get size(): number {
    return this.bySourceId.size;
  }
}

/** Swapped wholesale when roles are re-synced; readers dereference `.current` per use. */
export type RoleMappingRef = { current: RoleMapping };
