/**
 * Централизованная обработка ошибок API
 * Предоставляет типизированные классы ошибок с консистентными HTTP статус-кодами
 */
import { ERROR_MESSAGES, HTTP_STATUS } from './constants.js'

export class ApiError extends Error {
	public readonly statusCode: number
	public readonly isOperational: boolean
	/** Машиночитаемый код для клиента (UI сам решает, какой текст показать) */
	public readonly code?: string

	constructor(statusCode: number, message: string, isOperational = true, options?: { code?: string; cause?: unknown }) {
		super(message, options?.cause === undefined ? undefined : { cause: options.cause })
		this.statusCode = statusCode
		this.isOperational = isOperational
		this.code = options?.code
		this.name = 'ApiError'

		// Сохраняем правильный stack trace (доступно только в V8)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target)
		}
	}

	static badRequest(message = 'Bad request'): ApiError {
		return new ApiError(HTTP_STATUS.BAD_REQUEST, message)
	}

	static unauthorized(message = 'Unauthorized'): ApiError {
		return new ApiError(HTTP_STATUS.UNAUTHORIZED, message)
	}

	static forbidden(message = 'Forbidden'): ApiError {
		return new ApiError(HTTP_STATUS.FORBIDDEN, message)
	}

	static notFound(message = 'Not found'): ApiError {
		return new ApiError(HTTP_STATUS.NOT_FOUND, message)
	}

	static conflict(message = 'Conflict'): ApiError {
		return new ApiError(HTTP_STATUS.CONFLICT, message)
	}

	static tooManyRequests(message = 'Too many requests'): ApiError {
		return new ApiError(HTTP_STATUS.TOO_MANY_REQUESTS, message)
	}

	static internal(message = 'Internal server error'): ApiError {
		return new ApiError(HTTP_STATUS.INTERNAL_SERVER_ERROR, message, false)
	}
}

export type ContentLoadFailure = 'not_found' | 'invalid' | 'unavailable'

const CONTENT_FAILURE_STATUS: Record<ContentLoadFailure, number> = {
	not_found: HTTP_STATUS.NOT_FOUND,
	invalid: HTTP_STATUS.UNPROCESSABLE_ENTITY,
	unavailable: HTTP_STATUS.BAD_GATEWAY,
}

const CONTENT_FAILURE_MESSAGE: Record<ContentLoadFailure, string> = {
	not_found: ERROR_MESSAGES.CONTENT_NOT_FOUND,
	invalid: ERROR_MESSAGES.CONTENT_INVALID,
	unavailable: ERROR_MESSAGES.CONTENT_UNAVAILABLE,
}

/** Контент теста недоступен. Не фатально: UI предлагает повторить загрузку */
export class ContentLoadError extends ApiError {
	public readonly testId: string
	public readonly reason: ContentLoadFailure

	constructor(testId: string, reason: ContentLoadFailure, cause?: unknown) {
		super(CONTENT_FAILURE_STATUS[reason], CONTENT_FAILURE_MESSAGE[reason], true, {
			code: `content_${reason}`,
			cause,
		})
		this.name = 'ContentLoadError'
		this.testId = testId
		this.reason = reason
	}
}

/** Попытку не удалось сохранить, клиент должен узнать, что она может не засчитаться */
export class PersistenceError extends ApiError {
	constructor(message: string = ERROR_MESSAGES.SUBMISSION_NOT_SAVED, cause?: unknown) {
		super(HTTP_STATUS.SERVICE_UNAVAILABLE, message, false, { code: 'persistence_failed', cause })
		this.name = 'PersistenceError'
	}
}

/** Сдача была изменена параллельно (версия в хранилище ушла вперёд) */
export class SubmissionConflictError extends ApiError {
	constructor(public readonly userId: string, public readonly testId: string) {
		super(HTTP_STATUS.CONFLICT, ERROR_MESSAGES.SUBMISSION_CONFLICT, true, { code: 'submission_conflict' })
		this.name = 'SubmissionConflictError'
	}
}

export class SubmissionInProgressError extends ApiError {
	constructor(public readonly userId: string, public readonly testId: string) {
		super(HTTP_STATUS.CONFLICT, ERROR_MESSAGES.SUBMISSION_IN_PROGRESS, true, { code: 'submission_in_progress' })
		this.name = 'SubmissionInProgressError'
	}
}

export class RetryNotAvailableError extends ApiError {
	constructor(
		public readonly retryAvailableAt: Date,
		public readonly daysUntilRetry: number
	) {
		super(HTTP_STATUS.CONFLICT, ERROR_MESSAGES.RETRY_NOT_AVAILABLE, true, { code: 'retry_not_available' })
		this.name = 'RetryNotAvailableError'
	}
}

export class TestAlreadyPassedError extends ApiError {
	constructor(public readonly testId: string) {
		super(HTTP_STATUS.CONFLICT, ERROR_MESSAGES.TEST_ALREADY_PASSED, true, { code: 'test_already_passed' })
		this.name = 'TestAlreadyPassedError'
	}
}

/**
 * Type guard для проверки, является ли ошибка ApiError
 */
export function isApiError(error: unknown): error is ApiError {
	return error instanceof ApiError
}
