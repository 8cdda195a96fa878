/**
 * Zod-схемы для эндпоинтов тестов
 */

import { z } from 'zod'

import { TRIGGER_OPERATORS, TRIGGER_TYPES } from '../lib/tests/triggers.js'

export const TestIdSchema = z
	.string()
	.min(1)
	.max(100)
	.regex(/^[A-Za-z0-9_-]+$/)

export const UserIdSchema = z.string().uuid()

export const LanguageSchema = z
	.string()
	.regex(/^[a-z]{2}(-[A-Za-z]{2})?$/)
	.transform((value) => value.slice(0, 2))

export const LanguageQuerySchema = z.object({
	lang: LanguageSchema.optional(),
})

/** Ответ на один вопрос: строка, boolean, набор строк или отображение left → right */
export const RawAnswerSchema = z.union([
	z.string().max(5000),
	z.boolean(),
	z.array(z.string().max(1000)).max(100),
	z.record(z.string(), z.string().max(1000)),
])

export const SubmitAnswersSchema = z.object({
	answers: z.record(z.string().min(1).max(100), RawAnswerSchema.nullable()),
	language: LanguageSchema.optional(),
})

export type SubmitAnswersInput = z.infer<typeof SubmitAnswersSchema>

/** Для редактирования каталога триггеры проверяются строго (в отличие от чтения) */
export const TriggerInputSchema = z
	.object({
		type: z.enum(TRIGGER_TYPES),
		stat: z.string().min(1).optional(),
		category: z.string().min(1).optional(),
		operator: z.enum(TRIGGER_OPERATORS),
		value: z.number().finite(),
	})
	.superRefine((value, ctx) => {
		if (value.type === 'stat' && !value.stat) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['stat'], message: 'Для type=stat укажите stat' })
		}
		if (value.type === 'category_percent' && !value.category) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['category'],
				message: 'Для type=category_percent укажите category',
			})
		}
	})

export const SaveTestSchema = z.object({
	folder: z.string().max(200).default(''),
	contentFile: z
		.string()
		.min(1)
		.max(200)
		.regex(/^[^/\\]+\.json$/, 'Ожидается имя JSON-файла без пути'),
	names: z
		.record(LanguageSchema, z.string().min(1).max(200))
		.refine((names) => Object.keys(names).length > 0, 'Нужно хотя бы одно название'),
	passThreshold: z.number().min(0).max(100).default(80),
	retryDelayDays: z.number().int().min(0).max(365).default(10),
	triggers: z.array(TriggerInputSchema).max(20).default([]),
	sortOrder: z.number().int().min(0).optional(),
	isPublished: z.boolean().optional(),
})

export type SaveTestInput = z.infer<typeof SaveTestSchema>

export const QuestionFeedbackSchema = z
	.record(
		z.string().min(1).max(100),
		z.object({
			verdict: z.boolean().nullable().default(null),
			comment: z.string().max(2000).optional(),
		})
	)
	.refine((feedback) => Object.keys(feedback).length > 0, 'Пустой отзыв')

export const FeedbackBodySchema = z.object({
	feedback: QuestionFeedbackSchema,
})
