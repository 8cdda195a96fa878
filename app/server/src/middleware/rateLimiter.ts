/**
 * In-memory rate limiter
 * Ограничивает частоту отправок теста одним пользователем
 */
import type { Request, Response, NextFunction } from 'express'

import { ERROR_MESSAGES } from '../lib/constants.js'
import { ApiError } from '../lib/errors.js'

interface RateLimitEntry {
	count: number
	resetAt: number
}

export type RateLimitStore = Map<string, RateLimitEntry>

export type RateLimitDecision = {
	allowed: boolean
	remaining: number
	resetAt: number
}

const store: RateLimitStore = new Map()

// Интервал очистки - удаляем истёкшие записи каждые 5 минут
const CLEANUP_INTERVAL_MS = 5 * 60 * 1000

export function pruneExpired(target: RateLimitStore, now: number): void {
	for (const [key, entry] of target.entries()) {
		if (entry.resetAt <= now) {
			target.delete(key)
		}
	}
}

// Таймер не должен держать процесс (тесты, graceful shutdown)
setInterval(() => pruneExpired(store, Date.now()), CLEANUP_INTERVAL_MS).unref()

/**
 * Учитывает запрос в окне ключа.
 * Окно фиксированное: начинается с первого запроса и живёт windowMs.
 */
export function hitRateLimit(
	target: RateLimitStore,
	key: string,
	now: number,
	limits: { maxAttempts: number; windowMs: number }
): RateLimitDecision {
	const entry = target.get(key)

	if (!entry || entry.resetAt <= now) {
		const resetAt = now + limits.windowMs
		target.set(key, { count: 1, resetAt })
		return { allowed: true, remaining: limits.maxAttempts - 1, resetAt }
	}

	if (entry.count >= limits.maxAttempts) {
		return { allowed: false, remaining: 0, resetAt: entry.resetAt }
	}

	entry.count++
	return { allowed: true, remaining: limits.maxAttempts - entry.count, resetAt: entry.resetAt }
}

/**
 * Извлекает IP клиента из запроса
 * Обрабатывает заголовок X-Forwarded-For для проксированных запросов
 */
function getClientIp(req: Request): string {
	const forwarded = req.headers['x-forwarded-for']
	if (typeof forwarded === 'string') {
		return forwarded.split(',')[0].trim()
	}
	return req.socket.remoteAddress || 'unknown'
}

export interface RateLimiterOptions {
	/**
	 * Максимальное количество запросов в окне
	 * @default 5
	 */
	maxAttempts?: number

	/**
	 * Временное окно в миллисекундах
	 * @default 60000 (1 минута)
	 */
	windowMs?: number

	/**
	 * Опциональный префикс ключа для namespace
	 */
	keyPrefix?: string

	/**
	 * Ключ запроса. По умолчанию id пользователя, для анонимов IP
	 */
	keyBy?: (req: Request) => string
}

const defaultKey = (req: Request) => req.authUser?.id ?? getClientIp(req)

/**
 * Создаёт middleware для ограничения частоты запросов
 *
 * @example
 * router.post('/:id/submit', rateLimiter({ maxAttempts: 10, keyPrefix: 'submit' }), handler)
 */
export function rateLimiter(options: RateLimiterOptions = {}) {
	const { maxAttempts = 5, windowMs = 60 * 1000, keyPrefix = '', keyBy = defaultKey } = options

	return (req: Request, res: Response, next: NextFunction) => {
		const base = keyBy(req)
		const key = keyPrefix ? `${keyPrefix}:${base}` : base
		const now = Date.now()
		const decision = hitRateLimit(store, key, now, { maxAttempts, windowMs })

		res.setHeader('X-RateLimit-Limit', String(maxAttempts))
		res.setHeader('X-RateLimit-Remaining', String(decision.remaining))
		res.setHeader('X-RateLimit-Reset', String(Math.ceil(decision.resetAt / 1000)))

		if (!decision.allowed) {
			res.setHeader('Retry-After', String(Math.ceil((decision.resetAt - now) / 1000)))
			return next(ApiError.tooManyRequests(ERROR_MESSAGES.TOO_MANY_REQUESTS))
		}

		next()
	}
}
