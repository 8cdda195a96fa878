/**
 * Унифицированная загрузка .env для монорепы.
 * Приоритет: app/server/.env  → cwd/.env → app/.env → repo/.env
 * Берётся первый существующий файл (override: true поверх окружения процесса).
 * Можно включить отладочный вывод: DEBUG_ENV=1
 */
import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

import { config as dotenv } from 'dotenv'

import { DEFAULTS } from '../lib/constants.js'
import { logger } from '../lib/logger.js'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

// Корень пакета сервера (…/app/server)
const serverRoot = path.resolve(__dirname, '../../')

const candidates = [
	path.join(serverRoot, '.env'),
	path.resolve(process.cwd(), '.env'),
	path.resolve(serverRoot, '../.env'),
	path.resolve(serverRoot, '../../.env'),
]

let loadedFrom: string | null = null
for (const p of candidates) {
	if (fs.existsSync(p)) {
		dotenv({ path: p, override: true })
		loadedFrom = p
		break
	}
}

// Безопасное представление DSN (без пароля)
export function safeDsn(raw: string | undefined): string {
	if (!raw) return 'undefined'
	try {
		const u = new URL(raw)
		if (u.password) u.password = '***'
		return u.toString()
	} catch {
		return 'invalid'
	}
}

if (process.env.DEBUG_ENV === '1') {
	logger.debug({ loadedFrom, databaseUrl: safeDsn(process.env.DATABASE_URL) }, '[env] loaded')
}

// Валидация обязательных переменных окружения в production
if (process.env.NODE_ENV === 'production') {
	const missing: string[] = []
	if (!process.env.DATABASE_URL) missing.push('DATABASE_URL')
	if (!process.env.AUTH_JWT_SECRET || process.env.AUTH_JWT_SECRET === DEFAULTS.JWT_SECRET)
		missing.push('AUTH_JWT_SECRET')
	if (!process.env.SUPABASE_URL || !process.env.SUPABASE_SERVICE_KEY) missing.push('SUPABASE_URL/SUPABASE_SERVICE_KEY')

	if (missing.length > 0) {
		logger.fatal({ missing }, '[env] Missing required env vars for production')
		throw new Error(`Missing required env vars for production: ${missing.join(', ')}`)
	}
}

export const ENV_LOADED_FROM = loadedFrom
