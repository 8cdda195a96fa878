import { PERMISSION_DOMAINS, type PermissionDomain, type ActionOf, type PermissionKey } from './domains.js';
import { ROLE_REGISTRY, isRoleKey, type RoleKey, type RoleGrant } from './roles.js';

function isPermissionDomain(value: string): value is PermissionDomain {
  return Object.prototype.hasOwnProperty.call(PERMISSION_DOMAINS, value);
}

export function isPermissionKey(value: string): value is PermissionKey {
  const [domain, action, ...rest] = value.split('.');
  if (rest.length > 0 || action === undefined || !isPermissionDomain(domain)) return false;
  const actions: readonly string[] = PERMISSION_DOMAINS[domain].actions;
  return actions.includes(action);
}

function expandDomainGrant(domain: PermissionDomain, grant: ReadonlyArray<string>): PermissionKey[] {
  const actions: readonly string[] = PERMISSION_DOMAINS[domain].actions;
  const selected = grant.includes('*') ? actions : actions.filter((a) => grant.includes(a));
  return selected.map((a) => `${domain}.${a}`).filter(isPermissionKey);
}

function expandGrants(grants: RoleGrant | undefined): Set<PermissionKey> {
  const keys = new Set<PermissionKey>();
  if (!grants) return keys;
  for (const domain of Object.keys(grants)) {
    if (!isPermissionDomain(domain)) continue;
    for (const key of expandDomainGrant(domain, grants[domain] ?? [])) keys.add(key);
  }
  return keys;
}

function expandRole(roleKey: RoleKey, seen: Set<RoleKey> = new Set()): Set<PermissionKey> {
  if (seen.has(roleKey)) return new Set<PermissionKey>();
  seen.add(roleKey);
  const cfg = ROLE_REGISTRY[roleKey];
  const base = expandGrants(cfg.grants);
  const parents: readonly string[] = 'inherits' in cfg ? cfg.inherits : [];
  for (const rk of parents) {
    if (!isRoleKey(rk)) continue;
    for (const k of expandRole(rk, seen)) base.add(k);
  }
  return base;
}

export function buildPermissionSet(roles: ReadonlyArray<RoleKey>): Set<PermissionKey> {
  const acc = new Set<PermissionKey>();
  for (const rk of roles) {
    if (!isRoleKey(rk)) continue;
    for (const key of expandRole(rk)) acc.add(key);
  }
  return acc;
}

export function can<D extends PermissionDomain>(perms: ReadonlySet<PermissionKey>, domain: D, action: ActionOf<D>): boolean;
export function can(perms: ReadonlySet<PermissionKey>, key: PermissionKey): boolean;
export function can(perms: ReadonlySet<PermissionKey>, a: string, b?: string): boolean {
  const key = b === undefined ? a : `${a}.${b}`;
  return isPermissionKey(key) && perms.has(key);
}

export type { PermissionKey, PermissionDomain, ActionOf } from './domains.js';
export type { RoleKey, RoleConfig, RoleGrant } from './roles.js';
