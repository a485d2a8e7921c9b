export const Permissions = {
  // Core agent operations
  AGENT_READ: 'AGENT_READ',
  AGENT_WRITE: 'AGENT_WRITE',
  AGENT_EXECUTE: 'AGENT_EXECUTE',
  AGENT_DELETE: 'AGENT_DELETE',
  AGENT_ADMIN: 'AGENT_ADMIN',

  // Services
  SERVICE_READ: 'SERVICE_READ',
  SERVICE_WRITE: 'SERVICE_WRITE',
  SERVICE_INTEGRATION: 'SERVICE_INTEGRATION',

  // Configuration and secrets
  CONFIG_MANAGE: 'CONFIG_MANAGE',
  SECRETS_MANAGE: 'SECRETS_MANAGE',

  // Audit
  AUDIT_READ: 'AUDIT_READ',
  AUDIT_MANAGE: 'AUDIT_MANAGE',

  // Specialised
  SECURITY_VALIDATE: 'SECURITY_VALIDATE',
  PERFORMANCE_TEST: 'PERFORMANCE_TEST',
  DOMAIN_ACCESS: 'DOMAIN_ACCESS',
  DATASTORE_ACCESS: 'DATASTORE_ACCESS',
  QUALITY_ASSESS: 'QUALITY_ASSESS',
  TESTING_GUIDE: 'TESTING_GUIDE',
  COLLABORATION_PROCESS: 'COLLABORATION_PROCESS',
  SERVICE_MAP: 'SERVICE_MAP',
  FALLBACK_SELECT: 'FALLBACK_SELECT',
} as const;

export type Permission = typeof Permissions[keyof typeof Permissions];

export const Roles = {
  ADMIN: 'ADMIN',
  ARCHITECT: 'ARCHITECT',
  DEVELOPER: 'DEVELOPER',
  OPERATOR: 'OPERATOR',
  TESTER: 'TESTER',
  SECURITY: 'SECURITY',
  CONFIG_MANAGER: 'CONFIG_MANAGER',
  SERVICE: 'SERVICE',
  USER: 'USER',
} as const;

export type Role = typeof Roles[keyof typeof Roles];

const PERMISSION_NAMES: readonly Permission[] = Object.values(Permissions);
const ROLE_NAMES: readonly Role[] = Object.values(Roles);

export function isPermission(value: string): value is Permission {
  return PERMISSION_NAMES.some((name) => name === value);
}

export function isRole(value: string): value is Role {
  return ROLE_NAMES.some((name) => name === value);
}

/**
 * Keep known role names (case-insensitive), dropping blanks and unknowns.
 */
export function toRoles(names: readonly string[] | undefined): Role[] {
  const roles: Role[] = [];
  for (const name of names ?? []) {
    const upper = name.trim().toUpperCase();
    if (isRole(upper) && !roles.includes(upper)) roles.push(upper);
  }
  return roles;
}

export function toPermissions(names: readonly string[] | undefined): Permission[] {
  const permissions: Permission[] = [];
  for (const name of names ?? []) {
    const upper = name.trim().toUpperCase();
    if (isPermission(upper) && !permissions.includes(upper)) permissions.push(upper);
  }
  return permissions;
}
