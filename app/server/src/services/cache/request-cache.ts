/**
 * Дедупликация запросов к внешним источникам по ключу (операция, ключ).
 * Каждый коллаборатор держит свой экземпляр под свой тип значения.
 * Параллельные вызовы получают один и тот же промис, успешный результат живёт ttlMs,
 * ошибки не кэшируются.
 */

type Entry<T> = {
	promise: Promise<T>
	/** Момент устаревания; null — запрос ещё выполняется */
	expiresAt: number | null
}

export type RequestCacheOptions = {
	ttlMs: number
	/** Отмена ожидания для конкретного вызывающего; общий запрос продолжается */
	signal?: AbortSignal
}

function abortReason(signal: AbortSignal): unknown {
	return signal.reason ?? new DOMException('The operation was aborted', 'AbortError')
}

function withSignal<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
	if (!signal) return promise
	if (signal.aborted) return Promise.reject(abortReason(signal))

	return new Promise<T>((resolve, reject) => {
		const onAbort = () => reject(abortReason(signal))
		signal.addEventListener('abort', onAbort, { once: true })
		void promise.then(
			(value) => {
				signal.removeEventListener('abort', onAbort)
				resolve(value)
			},
			(error: unknown) => {
				signal.removeEventListener('abort', onAbort)
				reject(error)
			}
		)
	})
}

export class RequestCache<T> {
	private readonly entries = new Map<string, Entry<T>>()

	constructor(private readonly now: () => number = Date.now) {}

	private static key(operation: string, key: string): string {
		return `${operation}\u0000${key}`
	}

	/** Удаляет устаревшие записи; выполняющиеся запросы не трогает */
	private pruneExpired(now: number): void {
		for (const [cacheKey, entry] of this.entries) {
			if (entry.expiresAt !== null && entry.expiresAt <= now) this.entries.delete(cacheKey)
		}
	}

	get(operation: string, key: string, loader: () => Promise<T>, options: RequestCacheOptions): Promise<T> {
		const cacheKey = RequestCache.key(operation, key)
		this.pruneExpired(this.now())
		const existing = this.entries.get(cacheKey)

		if (existing) {
			return withSignal(existing.promise, options.signal)
		}

		const entry: Entry<T> = { promise: loader(), expiresAt: null }
		this.entries.set(cacheKey, entry)

		void entry.promise.then(
			() => {
				if (this.entries.get(cacheKey) === entry) entry.expiresAt = this.now() + options.ttlMs
			},
			() => {
				if (this.entries.get(cacheKey) === entry) this.entries.delete(cacheKey)
			}
		)

		return withSignal(entry.promise, options.signal)
	}

	/** Сбрасывает один ключ или все ключи операции */
	invalidate(operation: string, key?: string): void {
		if (key !== undefined) {
			this.entries.delete(RequestCache.key(operation, key))
			return
		}
		const prefix = `${operation}\u0000`
		for (const cacheKey of [...this.entries.keys()]) {
			if (cacheKey.startsWith(prefix)) this.entries.delete(cacheKey)
		}
	}

	clear(): void {
		this.entries.clear()
	}

	get size(): number {
		return this.entries.size
	}
}
