import { relations } from 'drizzle-orm'
import {
	pgTable,
	uuid,
	text,
	timestamp,
	integer,
	primaryKey,
	uniqueIndex,
	boolean,
	index,
	real,
	jsonb,
} from 'drizzle-orm/pg-core'

import type { QuestionFeedback } from '../lib/tests/grading.js'
import type { AnswerMap } from '../lib/tests/question-model.js'
import type { SubmissionStatus } from '../lib/tests/submissions.js'
import type { DashboardStats } from '../lib/tests/triggers.js'

/** Попытка в том виде, как она хранится в jsonb (даты — ISO строки) */
export type StoredAttempt = {
	timestamp: string
	scorePercent: number
	passed: boolean | null
	answers: AnswerMap
	correct: number
	total: number
	language: string | null
}

/** Триггер в jsonb каталога */
export type StoredTrigger = {
	type: string
	stat?: string
	category?: string
	operator: string
	value: number
}

/** Пользователи (учётные записи создаёт внешний auth-бэкенд) */
export const users = pgTable(
	'users',
	{
		id: uuid('id').primaryKey().defaultRandom(),
		login: text('login'),
		name: text('name'),
		email: text('email'),
		preferredLanguage: text('preferred_language'),
		isActive: boolean('is_active').notNull().default(true),
		createdAt: timestamp('created_at').notNull().defaultNow(),
	},
	(t) => ({
		loginUniq: uniqueIndex('users_login_uniq').on(t.login),
	})
)

/** Связка пользователь—роль ('student' | 'instructor' | 'admin') */
export const userRoles = pgTable(
	'user_roles',
	{
		userId: uuid('user_id')
			.notNull()
			.references(() => users.id, { onDelete: 'cascade' }),
		roleKey: text('role_key').notNull(),
	},
	(t) => ({
		pk: primaryKey({ columns: [t.userId, t.roleKey] }),
	})
)

// =============================================================================
// ТЕСТЫ
// =============================================================================

/** Каталог тестов. Контент (вопросы) лежит в Storage: <prefix>/<folder>/<content_file> */
export const tests = pgTable(
	'tests',
	{
		id: text('id').primaryKey(),
		folder: text('folder').notNull().default(''),
		contentFile: text('content_file').notNull(),
		names: jsonb('names').$type<Record<string, string>>().notNull().default({}),
		passThreshold: real('pass_threshold').notNull().default(80),
		retryDelayDays: integer('retry_delay_days').notNull().default(10),
		triggers: jsonb('triggers').$type<StoredTrigger[]>().notNull().default([]),
		isPublished: boolean('is_published').notNull().default(true),
		sortOrder: integer('sort_order').notNull().default(0),
		createdAt: timestamp('created_at').notNull().defaultNow(),
		updatedAt: timestamp('updated_at').notNull().defaultNow(),
	},
	(t) => ({
		orderIdx: index('tests_sort_order_idx').on(t.sortOrder),
	})
)

/** Сдачи: одна строка на пару (пользователь, тест), попытки внутри jsonb */
export const testSubmissions = pgTable(
	'test_submissions',
	{
		id: uuid('id').primaryKey().defaultRandom(),
		userId: uuid('user_id')
			.notNull()
			.references(() => users.id, { onDelete: 'cascade' }),
		testId: text('test_id')
			.notNull()
			.references(() => tests.id, { onDelete: 'cascade' }),
		answers: jsonb('answers').$type<AnswerMap>().notNull().default({}),
		attempts: jsonb('attempts').$type<StoredAttempt[]>().notNull().default([]),
		passed: boolean('passed'),
		scorePercent: real('score_percent'),
		reviewedOnce: boolean('reviewed_once').notNull().default(false),
		status: text('status').$type<SubmissionStatus>().notNull().default('in_progress'),
		retryAvailableAt: timestamp('retry_available_at'),
		questionFeedback: jsonb('question_feedback').$type<QuestionFeedback>().notNull().default({}),
		acknowledgedAt: timestamp('acknowledged_at'),
		reviewedBy: uuid('reviewed_by').references(() => users.id, { onDelete: 'set null' }),
		// Оптимистичная блокировка: запись проходит только при совпадении версии
		version: integer('version').notNull().default(1),
		createdAt: timestamp('created_at').notNull().defaultNow(),
		updatedAt: timestamp('updated_at').notNull().defaultNow(),
	},
	(t) => ({
		userTestUniq: uniqueIndex('test_submissions_user_test_uniq').on(t.userId, t.testId),
		testIdx: index('test_submissions_test_idx').on(t.testId),
	})
)

/** Последний загруженный снимок статистики дашборда пользователя */
export const userStats = pgTable('user_stats', {
	userId: uuid('user_id')
		.primaryKey()
		.references(() => users.id, { onDelete: 'cascade' }),
	stats: jsonb('stats').$type<DashboardStats>().notNull(),
	updatedAt: timestamp('updated_at').notNull().defaultNow(),
})

export const usersRelations = relations(users, ({ many, one }) => ({
	roles: many(userRoles),
	submissions: many(testSubmissions),
	stats: one(userStats),
}))

export const userRolesRelations = relations(userRoles, ({ one }) => ({
	user: one(users, { fields: [userRoles.userId], references: [users.id] }),
}))

export const testsRelations = relations(tests, ({ many }) => ({
	submissions: many(testSubmissions),
}))

export const testSubmissionsRelations = relations(testSubmissions, ({ one }) => ({
	user: one(users, { fields: [testSubmissions.userId], references: [users.id] }),
	test: one(tests, { fields: [testSubmissions.testId], references: [tests.id] }),
}))

export const userStatsRelations = relations(userStats, ({ one }) => ({
	user: one(users, { fields: [userStats.userId], references: [users.id] }),
}))
