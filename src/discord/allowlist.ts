import type { PermissionLists } from '../config.js';

export type Requester = {
  userId: string;
  /** Empty in DMs. */
  roleIds: readonly string[];
  /** The channel, its thread parent and its category, where present. */
  channelIds: readonly string[];
  isDm: boolean;
};

export type AccessDecision =
  | { allowed: true }
  | { allowed: false; reason: 'blocked-user' | 'blocked-role' | 'blocked-channel' | 'dms-disabled' | 'not-allowlisted' };

function hasAny(ids: readonly string[], set: Set<string>): boolean {
  return ids.some((id) => set.has(id));
}

export function isAdmin(userId: string, permissions: PermissionLists): boolean {
  return permissions.adminIds.has(userId);
}

/**
 * First decisive rule wins: blocked user, blocked role, blocked channel,
 * then the allow-lists. Admin status does not lift a block.
 */
export function evaluateAccess(
  requester: Requester,
  permissions: PermissionLists,
  opts: { allowDms: boolean },
): AccessDecision {
  if (permissions.blockedUserIds.has(requester.userId)) return { allowed: false, reason: 'blocked-user' };
  if (hasAny(requester.roleIds, permissions.blockedRoleIds)) return { allowed: false, reason: 'blocked-role' };
  if (hasAny(requester.channelIds, permissions.blockedChannelIds)) return { allowed: false, reason: 'blocked-channel' };

  if (requester.isDm) {
    if (!opts.allowDms && !isAdmin(requester.userId, permissions)) return { allowed: false, reason: 'dms-disabled' };
    // Roles and channels do not exist in DMs; only the user list applies.
    if (permissions.allowedUserIds.size === 0 || permissions.allowedUserIds.has(requester.userId)) {
      return { allowed: true };
    }
    return { allowed: false, reason: 'not-allowlisted' };
  }

  const anyAllowList =
    permissions.allowedUserIds.size > 0 ||
    permissions.allowedRoleIds.size > 0 ||
    permissions.allowedChannelIds.size > 0;
  if (!anyAllowList) return { allowed: true };

  const matches =
    permissions.allowedUserIds.has(requester.userId) ||
    hasAny(requester.roleIds, permissions.allowedRoleIds) ||
    hasAny(requester.channelIds, permissions.allowedChannelIds);
  return matches ? { allowed: true } : { allowed: false, reason: 'not-allowlisted' };
}

export function isAllowed(requester: Requester, permissions: PermissionLists, opts: { allowDms: boolean }): boolean {
  return evaluateAccess(requester, permissions, opts).allowed;
}
