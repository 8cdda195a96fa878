/**
 * Константы приложения
 * Централизованное хранение магических строк, значений по умолчанию и конфигурации
 */

export const HTTP_STATUS = {
	OK: 200,
	CREATED: 201,
	NO_CONTENT: 204,
	BAD_REQUEST: 400,
	UNAUTHORIZED: 401,
	FORBIDDEN: 403,
	NOT_FOUND: 404,
	CONFLICT: 409,
	UNPROCESSABLE_ENTITY: 422,
	TOO_MANY_REQUESTS: 429,
	INTERNAL_SERVER_ERROR: 500,
	BAD_GATEWAY: 502,
	SERVICE_UNAVAILABLE: 503,
} as const

export const ERROR_MESSAGES = {
	// Auth
	UNAUTHORIZED: 'Unauthorized',
	FORBIDDEN: 'Forbidden',
	TOO_MANY_REQUESTS: 'Too many requests. Please try again later.',

	// Validation
	BAD_REQUEST: 'Bad request',
	INVALID_TEST_ID: 'Invalid test id format',
	INVALID_USER_ID: 'Invalid user id format',

	// Resources
	NOT_FOUND: 'Not found',
	TEST_NOT_FOUND: 'Test not found',
	SUBMISSION_NOT_FOUND: 'Submission not found',

	// Content
	CONTENT_NOT_FOUND: 'Test content not found',
	CONTENT_INVALID: 'Test content is invalid',
	CONTENT_UNAVAILABLE: 'Test content is temporarily unavailable',

	// Submissions
	SUBMISSION_IN_PROGRESS: 'Another submission for this test is still being processed',
	SUBMISSION_CONFLICT: 'Submission was modified concurrently',
	SUBMISSION_NOT_SAVED: 'Submission could not be saved; this attempt may not count',
	RETRY_NOT_AVAILABLE: 'Retry is not available yet',
	TEST_ALREADY_PASSED: 'Test is already passed',
	TEST_LOCKED: 'Test is locked',

	// Storage
	STORAGE_NOT_CONFIGURED: 'Storage not configured',
} as const

export const DEFAULTS = {
	SESSION_MAX_AGE_DAYS: 30,
	JWT_SECRET: 'dev-secret-change-me',
	LOG_LEVEL: 'info',
	PORT: 4000,
	PASS_THRESHOLD: 80,
	RETRY_DELAY_DAYS: 10,
	LANGUAGE: 'en',
	CONTENT_CACHE_TTL_MS: 5 * 60 * 1000,
	STATS_CACHE_TTL_MS: 30 * 1000,
	SUBMIT_RATE_LIMIT_PER_MINUTE: 10,
} as const

/** Зарезервированный id вопроса-дисклеймера в JSON контента теста */
export const DISCLAIMER_QUESTION_ID = 'disclaimer'

export const MS_PER_DAY = 24 * 60 * 60 * 1000
