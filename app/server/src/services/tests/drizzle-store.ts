/**
 * Реализации портов движка поверх PostgreSQL (drizzle-orm)
 */
import { and, asc, eq } from 'drizzle-orm'

import { TESTS_CONFIG } from '../../config/tests.js'
import type { Database } from '../../db/index.js'
import { tests, testSubmissions, userStats, type StoredAttempt } from '../../db/schema.js'
import { PersistenceError, SubmissionConflictError, isApiError } from '../../lib/errors.js'
import { logger } from '../../lib/logger.js'
import type { TestMetadata } from '../../lib/tests/content.js'
import type { Attempt, TestSubmission } from '../../lib/tests/submissions.js'
import {
	DashboardStatsSchema,
	flattenDashboardStats,
	freezeStats,
	type DashboardStats,
	type StatsSnapshot,
} from '../../lib/tests/triggers.js'
import { RequestCache } from '../cache/request-cache.js'
import type { StatsProvider, SubmissionStore, TestCatalog } from './ports.js'

const log = logger.child({ module: 'drizzle-store' })

// =============================================================================
// Сдачи
// =============================================================================

type SubmissionRow = typeof testSubmissions.$inferSelect

function toStoredAttempt(attempt: Attempt): StoredAttempt {
	return { ...attempt, timestamp: attempt.timestamp.toISOString() }
}

function fromStoredAttempt(attempt: StoredAttempt): Attempt {
	return { ...attempt, timestamp: new Date(attempt.timestamp) }
}

function toSubmission(row: SubmissionRow): TestSubmission {
	return {
		userId: row.userId,
		testId: row.testId,
		answers: row.answers,
		attempts: row.attempts.map(fromStoredAttempt),
		passed: row.passed,
		scorePercent: row.scorePercent,
		reviewedOnce: row.reviewedOnce,
		status: row.status,
		retryAvailableAt: row.retryAvailableAt,
		questionFeedback: row.questionFeedback,
		acknowledgedAt: row.acknowledgedAt,
		reviewedBy: row.reviewedBy,
		version: row.version,
	}
}

export class DrizzleSubmissionStore implements SubmissionStore {
	constructor(private readonly db: Database) {}

	async getSubmission(userId: string, testId: string): Promise<TestSubmission | null> {
		const row = await this.db.query.testSubmissions.findFirst({
			where: and(eq(testSubmissions.userId, userId), eq(testSubmissions.testId, testId)),
		})
		return row ? toSubmission(row) : null
	}

	/**
	 * Compare-and-set по version: version 0 — вставка (если строка уже есть, это гонка),
	 * иначе обновление строки с той же версией.
	 */
	async saveSubmission(userId: string, testId: string, submission: TestSubmission): Promise<TestSubmission> {
		const values = {
			answers: submission.answers,
			attempts: submission.attempts.map(toStoredAttempt),
			passed: submission.passed,
			scorePercent: submission.scorePercent,
			reviewedOnce: submission.reviewedOnce,
			status: submission.status,
			retryAvailableAt: submission.retryAvailableAt,
			questionFeedback: submission.questionFeedback,
			acknowledgedAt: submission.acknowledgedAt,
			reviewedBy: submission.reviewedBy,
			version: submission.version + 1,
			updatedAt: new Date(),
		}

		let rows: SubmissionRow[]
		try {
			if (submission.version === 0) {
				rows = await this.db
					.insert(testSubmissions)
					.values({ userId, testId, ...values })
					.onConflictDoNothing({ target: [testSubmissions.userId, testSubmissions.testId] })
					.returning()
			} else {
				rows = await this.db
					.update(testSubmissions)
					.set(values)
					.where(
						and(
							eq(testSubmissions.userId, userId),
							eq(testSubmissions.testId, testId),
							eq(testSubmissions.version, submission.version)
						)
					)
					.returning()
			}
		} catch (e) {
			if (isApiError(e)) throw e
			log.error({ err: e, userId, testId }, 'Failed to write submission')
			throw new PersistenceError(undefined, e)
		}

		const saved = rows.at(0)
		if (!saved) {
			log.warn({ userId, testId, expectedVersion: submission.version }, 'Submission version conflict')
			throw new SubmissionConflictError(userId, testId)
		}
		return toSubmission(saved)
	}

	async listSubmissions(userId: string): Promise<TestSubmission[]> {
		const rows = await this.db.select().from(testSubmissions).where(eq(testSubmissions.userId, userId))
		return rows.map(toSubmission)
	}

	async listSubmissionsForTest(testId: string): Promise<TestSubmission[]> {
		const rows = await this.db
			.select()
			.from(testSubmissions)
			.where(eq(testSubmissions.testId, testId))
			.orderBy(asc(testSubmissions.updatedAt))
		return rows.map(toSubmission)
	}
}

// =============================================================================
// Статистика
// =============================================================================

const STATS_OPERATION = 'user-stats'

export class DrizzleStatsProvider implements StatsProvider {
	constructor(
		private readonly db: Database,
		private readonly cache = new RequestCache<StatsSnapshot>(),
		private readonly ttlMs: number = TESTS_CONFIG.statsCacheTtlMs
	) {}

	getStats(userId: string): Promise<StatsSnapshot> {
		return this.cache.get(STATS_OPERATION, userId, () => this.loadStats(userId), { ttlMs: this.ttlMs })
	}

	private async loadStats(userId: string): Promise<StatsSnapshot> {
		const row = await this.db.query.userStats.findFirst({ where: eq(userStats.userId, userId) })
		if (!row) return freezeStats({})

		const parsed = DashboardStatsSchema.safeParse(row.stats)
		if (!parsed.success) {
			// Повреждённый документ: триггеры просто не выполнятся
			log.warn({ userId, issues: parsed.error.issues }, 'Stored stats failed validation')
			return freezeStats({})
		}
		return flattenDashboardStats(parsed.data)
	}

	async saveStats(userId: string, stats: DashboardStats): Promise<StatsSnapshot> {
		const updatedAt = new Date()
		await this.db
			.insert(userStats)
			.values({ userId, stats, updatedAt })
			.onConflictDoUpdate({ target: userStats.userId, set: { stats, updatedAt } })
		this.cache.invalidate(STATS_OPERATION, userId)
		return flattenDashboardStats(stats)
	}
}

// =============================================================================
// Каталог
// =============================================================================

type TestRow = typeof tests.$inferSelect

function toMetadata(row: TestRow): TestMetadata {
	return {
		id: row.id,
		folder: row.folder,
		contentFile: row.contentFile,
		names: row.names,
		passThreshold: row.passThreshold,
		retryDelayDays: row.retryDelayDays,
		triggers: row.triggers,
	}
}

export class DrizzleTestCatalog implements TestCatalog {
	constructor(private readonly db: Database) {}

	async listAvailableTests(): Promise<TestMetadata[]> {
		const rows = await this.db
			.select()
			.from(tests)
			.where(eq(tests.isPublished, true))
			.orderBy(asc(tests.sortOrder), asc(tests.id))
		return rows.map(toMetadata)
	}

	async getTest(id: string): Promise<TestMetadata | null> {
		const row = await this.db.query.tests.findFirst({ where: eq(tests.id, id) })
		return row ? toMetadata(row) : null
	}

	async upsertTest(test: TestMetadata, options: { sortOrder?: number; isPublished?: boolean } = {}): Promise<TestMetadata> {
		const values = {
			folder: test.folder,
			contentFile: test.contentFile,
			names: test.names,
			passThreshold: test.passThreshold,
			retryDelayDays: test.retryDelayDays,
			triggers: test.triggers,
			updatedAt: new Date(),
			...(options.sortOrder !== undefined && { sortOrder: options.sortOrder }),
			...(options.isPublished !== undefined && { isPublished: options.isPublished }),
		}

		const [row] = await this.db
			.insert(tests)
			.values({ id: test.id, ...values })
			.onConflictDoUpdate({ target: tests.id, set: values })
			.returning()
		return toMetadata(row)
	}
}
