import { normaliseRoleKeys, type RoleKey } from '@aerotest/rbac'

import { eq } from 'drizzle-orm'
import { NextFunction, Request, Response } from 'express'
import jwt from 'jsonwebtoken'
import { z } from 'zod'

import { AUTH_CONFIG } from '../../config/auth.js'
import { db } from '../../db/index.js'
import { userRoles, users } from '../../db/schema.js'
import { ERROR_MESSAGES } from '../../lib/constants.js'
import { ApiError } from '../../lib/errors.js'
import { logger } from '../../lib/logger.js'

export type SessionUser = {
	id: string
	roles: RoleKey[]
	login?: string | null
	preferredLanguage?: string | null
}

declare module 'express-serve-static-core' {
	interface Request {
		authUser?: SessionUser | null
	}
}

const { sessionCookieName: COOKIE, jwtSecret: JWT_SECRET, acceptBearer } = AUTH_CONFIG

const log = logger.child({ module: 'session' })

// роли в токене могут быть произвольными строками
const JwtPayloadSchema = z.object({
	sub: z.string().uuid(),
	roles: z.array(z.string()).optional(),
})

function readCookie(req: Request, name: string): string | null {
	const raw = req.headers.cookie
	if (!raw) return null
	const found = raw
		.split(';')
		.map((p) => p.trim())
		.find((p) => p.startsWith(name + '='))
	if (!found) return null
	try {
		return decodeURIComponent(found.split('=').slice(1).join('='))
	} catch {
		return null
	}
}

function readBearer(req: Request): string | null {
	const header = req.headers.authorization
	if (!header) return null
	const [scheme, token] = header.split(' ')
	return scheme?.toLowerCase() === 'bearer' && token ? token : null
}

/** Проверяет подпись и форму токена; null для любого невалидного токена */
function verifyToken(token: string): z.infer<typeof JwtPayloadSchema> | null {
	let decoded: string | jwt.JwtPayload
	try {
		decoded = jwt.verify(token, JWT_SECRET)
	} catch (e) {
		log.debug({ err: e }, 'Rejected session token')
		return null
	}
	const parsed = JwtPayloadSchema.safeParse(decoded)
	return parsed.success ? parsed.data : null
}

export function sessionOptional() {
	return async (req: Request, _res: Response, next: NextFunction) => {
		const token = readCookie(req, COOKIE) ?? (acceptBearer ? readBearer(req) : null)
		const payload = token ? verifyToken(token) : null
		if (!payload) {
			req.authUser = null
			return next()
		}

		try {
			const u = await db.query.users.findFirst({ where: eq(users.id, payload.sub) })
			if (!u || !u.isActive) {
				req.authUser = null
				return next()
			}

			// Роли из БД -> нормализуем в RoleKey[]
			const rs = await db.select({ role: userRoles.roleKey }).from(userRoles).where(eq(userRoles.userId, u.id))
			const dbRoles = normaliseRoleKeys(rs.map((r) => r.role))
			const jwtRoles = payload.roles ? normaliseRoleKeys(payload.roles) : []
			const roles = Array.from(new Set<RoleKey>([...dbRoles, ...jwtRoles]))

			req.authUser = { id: u.id, roles, login: u.login, preferredLanguage: u.preferredLanguage }
			next()
		} catch (e) {
			next(e)
		}
	}
}

export function sessionRequired() {
	return (req: Request, _res: Response, next: NextFunction) => {
		if (!req.authUser) return next(ApiError.unauthorized(ERROR_MESSAGES.UNAUTHORIZED))
		next()
	}
}

/** Пользователь запроса после sessionRequired() */
export function getAuthUser(req: Request): SessionUser {
	if (!req.authUser) throw ApiError.unauthorized(ERROR_MESSAGES.UNAUTHORIZED)
	return req.authUser
}
