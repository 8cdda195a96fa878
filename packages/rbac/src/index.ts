export { PERMISSION_DOMAINS } from './domains.js';
export type { PermissionDomain, ActionOf, PermissionKey } from './domains.js';

export { ROLE_REGISTRY, ROLE_KEYS, ROLES_LIST, roleDisplayName, isRoleKey } from './roles.js';
export type { RoleKey, RoleConfig, RoleGrant } from './roles.js';

export { buildPermissionSet, can, isPermissionKey } from './rbac.js';
export { normaliseRoleKeys } from './access.js';
