/**
 * Storage Service для работы с Supabase Storage
 * Здесь лежат JSON-файлы контента тестов: <prefix>/<folder>/<file>.json
 */
import { createClient, SupabaseClient } from '@supabase/supabase-js'

import { ERROR_MESSAGES } from '../../lib/constants.js'
import { logger } from '../../lib/logger.js'

const log = logger.child({ module: 'storage' })

export type StorageSettings = {
	url?: string
	serviceKey?: string
	bucket: string
}

export function storageSettingsFromEnv(): StorageSettings {
	return {
		url: process.env.SUPABASE_URL,
		serviceKey: process.env.SUPABASE_SERVICE_KEY,
		bucket: process.env.SUPABASE_STORAGE_BUCKET || 'main',
	}
}

/** Ошибка доступа к хранилищу (сеть, права, 5xx). Отсутствие файла ошибкой не считается */
export class StorageUnavailableError extends Error {
	constructor(
		message: string,
		public readonly path: string,
		options?: { cause?: unknown }
	) {
		super(message, options)
		this.name = 'StorageUnavailableError'
	}
}

/** Чтение файлов; null — файла нет */
export interface StorageReader {
	readFile(path: string): Promise<string | null>
}

function errorStatus(error: unknown): number | null {
	if (!error || typeof error !== 'object') return null
	if ('status' in error && typeof error.status === 'number') return error.status
	if ('statusCode' in error) {
		const code = Number(error.statusCode)
		if (Number.isFinite(code)) return code
	}
	if ('originalError' in error) return errorStatus(error.originalError)
	return null
}

function isNotFound(error: unknown): boolean {
	const status = errorStatus(error)
	if (status === 404) return true
	// Supabase отвечает 400 "Object not found" на скачивание несуществующего файла
	return error instanceof Error && /not found/i.test(error.message)
}

export class StorageService implements StorageReader {
	private client: SupabaseClient | null = null
	private configWarningShown = false

	constructor(private readonly settings: StorageSettings = storageSettingsFromEnv()) {}

	/**
	 * Проверяет, настроен ли Storage
	 */
	isConfigured(): boolean {
		return Boolean(this.settings.url && this.settings.serviceKey)
	}

	private getClient(): SupabaseClient {
		const { url, serviceKey } = this.settings
		if (!url || !serviceKey) {
			if (!this.configWarningShown) {
				log.warn('SUPABASE_URL and SUPABASE_SERVICE_KEY not set, test content cannot be loaded')
				this.configWarningShown = true
			}
			throw new StorageUnavailableError(ERROR_MESSAGES.STORAGE_NOT_CONFIGURED, '')
		}
		if (!this.client) {
			this.client = createClient(url, serviceKey)
		}
		return this.client
	}

	/**
	 * Выполняет асинхронную функцию с логикой повторных попыток и экспоненциальной задержкой
	 * @param retries Количество попыток повтора (по умолчанию: 3)
	 * @param baseDelayMs Базовая задержка в миллисекундах (по умолчанию: 500)
	 * @param shouldRetry Ошибки, на которых повтор бессмысленен, пробрасываются сразу
	 */
	async withRetry<T>(
		fn: () => Promise<T>,
		retries = 3,
		baseDelayMs = 500,
		shouldRetry: (error: unknown) => boolean = () => true
	): Promise<T> {
		let lastError: unknown

		for (let attempt = 0; attempt <= retries; attempt++) {
			try {
				return await fn()
			} catch (e) {
				lastError = e
				if (attempt >= retries || !shouldRetry(e)) break
				const delay = baseDelayMs * Math.pow(2, attempt)
				log.warn({ attempt: attempt + 1, delay }, 'Попытка не удалась, повтор')
				await new Promise((resolve) => setTimeout(resolve, delay))
			}
		}

		throw lastError
	}

	/**
	 * Читает текстовый файл из Storage
	 * @param path Путь к файлу (относительно bucket)
	 * @returns Содержимое файла или null, если файла нет
	 */
	async readFile(path: string): Promise<string | null> {
		const client = this.getClient()
		const bucket = this.settings.bucket

		try {
			return await this.withRetry(
				async () => {
					const { data, error } = await client.storage.from(bucket).download(path)
					if (error) throw error
					return await data.text()
				},
				2,
				300,
				(e) => !isNotFound(e)
			)
		} catch (e) {
			if (isNotFound(e)) return null
			log.error({ err: e, path, bucket }, 'Error reading file')
			throw new StorageUnavailableError(`Storage error reading ${path}`, path, { cause: e })
		}
	}
}
