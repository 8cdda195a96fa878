export const PERMISSION_DOMAINS = {
  tests: { actions: ['take', 'review', 'manage'] as const },
  stats: { actions: ['write', 'read_any'] as const },
  users: { actions: ['read'] as const },
} as const;

export type PermissionDomain = keyof typeof PERMISSION_DOMAINS;
export type ActionOf<D extends PermissionDomain> =
  typeof PERMISSION_DOMAINS[D]['actions'][number];

type PermissionKeyByDomain = {
  [D in PermissionDomain]:
    `${D}.${typeof PERMISSION_DOMAINS[D]['actions'][number]}`
}[PermissionDomain];

export type PermissionKey = PermissionKeyByDomain;
