import { buildPermissionSet, can, type ActionOf, type PermissionDomain } from '@aerotest/rbac'

import type { NextFunction, Request, Response } from 'express'

import { ERROR_MESSAGES } from '../../lib/constants.js'
import { ApiError } from '../../lib/errors.js'

/**
 * Пропускает запрос, только если у пользователя есть право domain.action
 *
 * @example
 * router.put('/:id', requirePerm('tests', 'manage'), handler)
 */
export function requirePerm<D extends PermissionDomain>(domain: D, action: ActionOf<D>) {
	return (req: Request, _res: Response, next: NextFunction) => {
		const user = req.authUser
		if (!user) return next(ApiError.unauthorized(ERROR_MESSAGES.UNAUTHORIZED))

		const perms = buildPermissionSet(user.roles)
		if (!can(perms, domain, action)) return next(ApiError.forbidden(ERROR_MESSAGES.FORBIDDEN))

		next()
	}
}
