import type { ActionOf, PermissionDomain } from './domains.js';

// '*' — все действия домена
export type RoleGrant = Partial<{
  [D in PermissionDomain]: ReadonlyArray<ActionOf<D> | '*'>
}>;

export type RoleConfig = {
  key: RoleKey;
  name: string;
  description?: string;
  order?: number;
  inherits?: RoleKey[];
  grants: RoleGrant;
};

export const ROLE_REGISTRY = {
  admin: {
    key: 'admin',
    name: 'Administrator',
    grants: { tests: ['*'], stats: ['*'], users: ['*'] },
    order: 0,
  },
  instructor: {
    key: 'instructor',
    name: 'Instructor',
    description: 'Проверяет текстовые ответы и видит сдачи своих учеников',
    inherits: ['student'],
    grants: { tests: ['review'], stats: ['read_any'], users: ['read'] },
    order: 10,
  },
  student: {
    key: 'student',
    name: 'Student',
    grants: { tests: ['take'], stats: ['write'] },
    order: 20,
  },
} as const satisfies Record<string, Omit<RoleConfig, 'key' | 'inherits'> & { key: string; inherits?: readonly string[] }>;

export type RoleKey = keyof typeof ROLE_REGISTRY;

export const ROLE_KEYS: ReadonlyArray<RoleKey> = Object.keys(ROLE_REGISTRY).filter(isRoleKey);

export const ROLES_LIST: ReadonlyArray<RoleConfig> = Object.values(ROLE_REGISTRY)
  .map((role): RoleConfig => ({
    key: role.key,
    name: role.name,
    order: role.order,
    inherits: 'inherits' in role ? [...role.inherits] : undefined,
    grants: role.grants,
  }))
  .sort((a, b) => (a.order ?? 999) - (b.order ?? 999));

// Перегрузка: можно передавать и raw string (вернём key как есть, если не найдём)
export function roleDisplayName(key: RoleKey): string;
export function roleDisplayName(key: string): string;
export function roleDisplayName(key: string): string {
  return isRoleKey(key) ? ROLE_REGISTRY[key].name : key;
}

export function isRoleKey(value: string): value is RoleKey {
  return Object.prototype.hasOwnProperty.call(ROLE_REGISTRY, value);
}
