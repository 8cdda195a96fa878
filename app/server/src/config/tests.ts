/**
 * Настройки подсистемы тестов
 */
import { DEFAULTS } from '../lib/constants.js'

function readNumber(name: string, fallback: number): number {
	const raw = process.env[name]
	if (raw === undefined || raw.trim() === '') return fallback
	const value = Number(raw)
	return Number.isFinite(value) && value >= 0 ? value : fallback
}

export const TESTS_CONFIG = {
	/** Префикс в bucket, под которым лежат папки тестов */
	storagePrefix: process.env.TESTS_STORAGE_PREFIX || 'tests',

	/** Сколько живёт загруженный контент теста в кэше */
	contentCacheTtlMs: readNumber('TESTS_CONTENT_CACHE_TTL_MS', DEFAULTS.CONTENT_CACHE_TTL_MS),

	/** Сколько живёт снимок статистики пользователя в кэше */
	statsCacheTtlMs: readNumber('TESTS_STATS_CACHE_TTL_MS', DEFAULTS.STATS_CACHE_TTL_MS),

	/** Язык, если ни запрос, ни профиль его не задают */
	defaultLanguage: process.env.TESTS_DEFAULT_LANGUAGE || DEFAULTS.LANGUAGE,

	submitRateLimitPerMinute: readNumber('TESTS_SUBMIT_RATE_LIMIT', DEFAULTS.SUBMIT_RATE_LIMIT_PER_MINUTE),
} as const
