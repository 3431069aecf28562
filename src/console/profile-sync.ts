import type { LoggerLike } from '../logging/logger-like.js';
import { RoleMapping } from '../swarm/role-mapping.js';
import type { RoleMappingRef } from '../swarm/role-mapping.js';
import type { IdentityRouter } from '../swarm/router.js';
import type { BackupGuild, BackupRole, ProxyIdentity, SourceGuild } from '../swarm/types.js';

export type SyncSummary = {
  synced: number;
  failed: number;
  /** Identities whose source user could not be found. */
  missing: number;
};

export type RoleSyncSummary = {
  created: string[];
  colored: number;
  failed: number;
};

/** Copy one source user's avatar, name and nickname onto its identity. Returns false when the user is gone. */
export async function syncIdentityProfile(
  identity: ProxyIdentity,
  source: Pick<SourceGuild, 'fetchProfile'>,
  log?: LoggerLike,
): Promise<boolean> {
  const profile = await source.fetchProfile(identity.key);
  if (!profile) {
    log?.warn({ identity: identity.key }, 'console:source user not found for profile sync');
    return false;
  }
  await identity.syncProfile(profile);
  log?.info({ identity: identity.key, username: profile.username }, 'console:profile synced');
  return true;
}

export async function syncProfiles(
  router: Pick<IdentityRouter, 'listDedicated'>,
  source: Pick<SourceGuild, 'fetchProfile'>,
  log?: LoggerLike,
): Promise<SyncSummary> {
  const summary: SyncSummary = { synced: 0, failed: 0, missing: 0 };
  for (const identity of router.listDedicated()) {
    try {
      if (await syncIdentityProfile(identity, source, log)) summary.synced += 1;
      else summary.missing += 1;
    } catch (err) {
      summary.failed += 1;
      log?.warn({ err, identity: identity.key }, 'console:profile sync failed');
    }
  }
  return summary;
}

export type RoleSyncDeps = {
  router: Pick<IdentityRouter, 'listDedicated'>;
  source: Pick<SourceGuild, 'listRoles' | 'fetchProfile'>;
  backup: Pick<BackupGuild, 'listRoles' | 'createRole' | 'addMemberRole'>;
  roles: RoleMappingRef;
  log?: LoggerLike;
};

const EVERYONE_ROLE = '@everyone';

/**
 * Create every source role missing (by name) from the backup guild, rebuild
 * the role mapping, then give each dedicated identity the backup role that
 * colours its source user's name.
 */
export async function syncRoles(deps: RoleSyncDeps): Promise<RoleSyncSummary> {
  const { router, source, backup, roles, log } = deps;
  const sourceRoles = source.listRoles();
  const backupRoles: BackupRole[] = [...backup.listRoles()];
  const backupNames = new Set(backupRoles.map((r) => r.name));
  const summary: RoleSyncSummary = { created: [], colored: 0, failed: 0 };

  for (const role of sourceRoles) {
    if (role.managed || role.name === EVERYONE_ROLE || backupNames.has(role.name)) continue;
    const created = await backup.createRole(role.name, role.color);
    backupRoles.push(created);
    backupNames.add(created.name);
    summary.created.push(created.name);
    log?.info({ name: created.name, color: created.color }, 'console:role created');
  }

  roles.current = RoleMapping.build(sourceRoles, backupRoles);

  for (const identity of router.listDedicated()) {
    try {
      const profile = await source.fetchProfile(identity.key);
      if (!profile?.colorRoleName) continue;
      const target = backupRoles.find((r) => r.name === profile.colorRoleName);
      if (!target) continue;
      await backup.addMemberRole(identity.userId, target.id);
      summary.colored += 1;
    } catch (err) {
      summary.failed += 1;
      log?.warn({ err, identity: identity.key }, 'console:role colour sync failed');
    }
  }

  return summary;
}
