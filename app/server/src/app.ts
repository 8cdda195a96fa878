/**
 * Express приложение без запуска сервера (запуск в src/index.ts).
 */
import crypto from 'node:crypto'

import cors from 'cors'
import express from 'express'
import type { ErrorRequestHandler } from 'express'
import helmet from 'helmet'

import './config/env.js'
import { pgPool } from './db/index.js'
import { ApiError, isApiError } from './lib/errors.js'
import { logger, pinoHttpMiddleware } from './lib/logger.js'
import { sessionOptional } from './middleware/auth/session.js'
import apiRouter from './routes/index.js'
import { storageService } from './services/tests/index.js'

const app = express()

// --- Безопасность/заголовки
app.use(
	helmet({
		contentSecurityPolicy: false,
		crossOriginResourcePolicy: { policy: 'cross-origin' },
	})
)

// --- Логирование с request id
app.use(pinoHttpMiddleware)

// --- CORS
const allowlist = (process.env.ALLOWED_ORIGIN ?? '')
	.split(',')
	.map((s) => s.trim())
	.filter(Boolean)

const isDev = process.env.NODE_ENV !== 'production'

app.use(
	cors({
		origin: (origin, cb) => {
			// Запросы без Origin (curl, server-to-server) — позволяем
			if (!origin) return cb(null, true)

			// В development: если allowlist пустой — разрешаем localhost и любые origin для удобства
			if (isDev) {
				if (allowlist.length === 0) return cb(null, true)
				if (allowlist.includes(origin)) return cb(null, true)
				if (origin.startsWith('http://localhost:')) return cb(null, true)
				return cb(new Error('Not allowed by CORS'))
			}

			// В production: требуем явного ALLOWED_ORIGIN; пустой allowlist — ошибка конфигурации
			if (!isDev) {
				if (allowlist.length === 0) return cb(new Error('CORS not configured: ALLOWED_ORIGIN is empty'))
				if (allowlist.includes(origin)) return cb(null, true)
				return cb(new Error('Not allowed by CORS'))
			}

			return cb(new Error('Not allowed by CORS'))
		},
		credentials: true,
	})
)

// --- Парсинг JSON тел
app.use(express.json({ limit: '1mb' }))

// --- Сессия из JWT (опционально, чтобы req.authUser был доступен в роутерах)
app.use(sessionOptional())

// --- Healthchecks
app.get('/healthz', (_req, res) => res.json({ ok: true, storage: storageService.isConfigured() }))
app.get('/healthz/db', async (_req, res) => {
	try {
		await pgPool.query('select 1')
		res.json({ ok: true })
	} catch (err) {
		logger.warn({ err }, 'Database healthcheck failed')
		res.status(503).json({ ok: false })
	}
})

// --- API
app.use('/api', apiRouter)
app.use('/api', (_req, _res, next) => next(ApiError.notFound()))

function statusOf(err: unknown): number | null {
	if (typeof err !== 'object' || err === null || !('status' in err)) return null
	return typeof err.status === 'number' ? err.status : null
}

const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
	const requestId = req.id ? String(req.id) : crypto.randomUUID()
	const isProd = process.env.NODE_ENV === 'production'

	// Логируем ошибку с контекстом
	req.log.error(
		{
			err,
			requestId,
			method: req.method,
			path: req.path,
			isOperational: isApiError(err) ? err.isOperational : false,
		},
		'Request error'
	)

	// Определяем статус-код, сообщение и код для клиента
	let status: number
	let message: string
	let code: string | undefined
	const expressStatus = statusOf(err)

	if (isApiError(err)) {
		status = err.statusCode
		message = err.message
		code = err.code
	} else if (expressStatus !== null) {
		// body-parser и прочие middleware express выставляют status
		status = expressStatus
		message = err instanceof Error ? err.message : 'Internal Server Error'
	} else {
		status = 500
		message = !isProd && err instanceof Error ? err.message : 'Internal Server Error'
	}

	if (res.headersSent) return

	res.status(status).json({
		error: message,
		...(code && { code }),
		...(!isProd && { requestId }),
	})
}
app.use(errorHandler)

export default app
