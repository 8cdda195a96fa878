/**
 * Middleware для валидации параметров URL
 */
import type { Request, Response, NextFunction } from 'express'

import { ERROR_MESSAGES } from '../lib/constants.js'
import { ApiError } from '../lib/errors.js'
import { TestIdSchema, UserIdSchema } from '../schemas/tests.js'

/**
 * Проверяет, что параметр является id теста (буквы, цифры, _ и -)
 *
 * @example
 * router.get('/:id', validateTestId('id'), handler)
 */
export function validateTestId(paramName = 'id') {
	return (req: Request, _res: Response, next: NextFunction) => {
		if (!TestIdSchema.safeParse(req.params[paramName]).success) {
			return next(ApiError.badRequest(`${ERROR_MESSAGES.INVALID_TEST_ID}: ${paramName}`))
		}
		next()
	}
}

export function validateUserId(paramName = 'userId') {
	return (req: Request, _res: Response, next: NextFunction) => {
		if (!UserIdSchema.safeParse(req.params[paramName]).success) {
			return next(ApiError.badRequest(`${ERROR_MESSAGES.INVALID_USER_ID}: ${paramName}`))
		}
		next()
	}
}
