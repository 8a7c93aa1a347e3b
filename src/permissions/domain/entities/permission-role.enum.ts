export enum PermissionRole {
  READ = 'READ',
  EDIT = 'EDIT',
  ADMIN = 'ADMIN',
}

const ROLE_RANK: Record<PermissionRole, number> = {
  [PermissionRole.READ]: 1,
  [PermissionRole.EDIT]: 2,
  [PermissionRole.ADMIN]: 3,
};

/**
 * ADMIN > EDIT > READ; a role satisfies every role at or below it.
 */
export function roleSatisfies(
  role: PermissionRole | null,
  minimum: PermissionRole,
): boolean {
  return role !== null && ROLE_RANK[role] >= ROLE_RANK[minimum];
}
