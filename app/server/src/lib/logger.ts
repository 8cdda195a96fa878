import crypto from 'node:crypto'
import type { IncomingMessage, ServerResponse } from 'node:http'

import pino from 'pino'
import { pinoHttp } from 'pino-http'

import { DEFAULTS } from './constants.js'

const level = process.env.LOG_LEVEL ?? DEFAULTS.LOG_LEVEL

export const logger = pino({ level })

/** id из X-Request-Id клиента или новый; возвращается клиенту тем же заголовком */
export function assignRequestId(req: IncomingMessage, res: ServerResponse): string {
	const incoming = req.headers['x-request-id']
	const id = typeof incoming === 'string' && incoming ? incoming : crypto.randomUUID()
	res.setHeader('X-Request-Id', id)
	return id
}

export const pinoHttpMiddleware = pinoHttp({
	logger,
	autoLogging: false,
	genReqId: assignRequestId,
	customLogLevel: (_req, res, err) => {
		if (res.statusCode >= 500 || err) return 'error'
		if (res.statusCode >= 400) return 'warn'
		return 'info'
	},
})

export default logger
