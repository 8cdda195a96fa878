import assert from 'node:assert/strict'
import { describe, it } from 'node:test'

import { parseTestContent } from './content.js'
import { gradeTest } from './grading.js'

function booleanQuestions(count: number) {
	return Array.from({ length: count }, (_, i) => ({ id: `b${i}`, type: 'boolean', text: `Q${i}`, correctAnswer: true }))
}

describe('gradeTest', () => {
	it('7 из 10 при пороге 70 — сдано', () => {
		const content = parseTestContent({ en: booleanQuestions(10) })
		const answers = Object.fromEntries(booleanQuestions(10).map((q, i) => [q.id, i < 7]))
		const result = gradeTest({ passThreshold: 70 }, content, answers)
		assert.equal(result.scorePercent, 70)
		assert.equal(result.correct, 7)
		assert.equal(result.total, 10)
		assert.equal(result.passed, true)
	})

	it('не округляет процент', () => {
		const content = parseTestContent({ en: booleanQuestions(3) })
		const result = gradeTest({ passThreshold: 80 }, content, { b0: true, b1: false, b2: false })
		assert.equal(result.scorePercent, 100 / 3)
		assert.equal(result.passed, false)
	})

	it('свободные ответы не входят в total и не считаются ошибками', () => {
		const content = parseTestContent({
			en: [
				{ id: 'q1', type: 'boolean', correctAnswer: true },
				{ id: 'q2', type: 'short_answer', text: 'Describe a spiral dive' },
			],
		})
		const result = gradeTest({ passThreshold: 80 }, content, { q1: true, q2: 'nose down' })
		assert.equal(result.total, 1)
		assert.equal(result.correct, 1)
		assert.equal(result.manual, 1)
		assert.equal(result.scorePercent, 100)
		assert.deepEqual(
			result.perQuestion.map((v) => [v.questionId, v.correct, v.source]),
			[
				['q1', true, 'auto'],
				['q2', null, 'pending'],
			]
		)
	})

	it('без автоматически проверяемых вопросов даёт 100 без деления на ноль', () => {
		const content = parseTestContent({ en: [{ id: 'q1', type: 'text' }] })
		const result = gradeTest({ passThreshold: 80 }, content, {})
		assert.equal(result.scorePercent, 100)
		assert.equal(result.total, 0)
		assert.equal(result.passed, true)
	})

	it('отсутствующий или неверный по форме ответ считается неверным', () => {
		const content = parseTestContent({
			en: [
				{ id: 'm', type: 'matching', options: ['L'], matching_pairs: ['R'], correctAnswer: [{ left: 'L', right: 'R' }] },
				{ id: 's', type: 'single', options: ['A', 'B'], correctAnswer: 1 },
			],
		})
		const result = gradeTest({ passThreshold: 50 }, content, { m: 'R' })
		assert.equal(result.correct, 0)
		assert.equal(result.total, 2)
		assert.equal(result.passed, false)
	})

	it('оценивает по списку выбранного языка с откатом на en', () => {
		const content = parseTestContent({
			en: [{ id: 'q1', type: 'single', options: ['Yes', 'No'], correctAnswer: 0 }],
			de: [{ id: 'q1', type: 'single', options: ['Ja', 'Nein'], correctAnswer: 0 }],
		})
		assert.equal(gradeTest({ passThreshold: 80 }, content, { q1: 'Ja' }, { language: 'de' }).passed, true)
		const fallback = gradeTest({ passThreshold: 80 }, content, { q1: 'Ja' }, { language: 'fr' })
		assert.equal(fallback.language, 'en')
		assert.equal(fallback.passed, false)
	})

	it('решение инструктора заменяет автоматический вердикт', () => {
		const content = parseTestContent({ en: [{ id: 'q1', type: 'text' }, { id: 'q2', type: 'boolean', correctAnswer: true }] })
		const result = gradeTest({ passThreshold: 100 }, content, { q1: 'answer', q2: true }, {
			feedback: { q1: { verdict: false, comment: 'Incomplete' } },
		})
		assert.equal(result.total, 2)
		assert.equal(result.correct, 1)
		assert.equal(result.manual, 0)
		assert.equal(result.perQuestion[0].source, 'instructor')
	})

	it('повторный вызов даёт тот же результат', () => {
		const content = parseTestContent({ en: booleanQuestions(4) })
		const answers = { b0: true, b1: false }
		assert.deepEqual(gradeTest({ passThreshold: 50 }, content, answers), gradeTest({ passThreshold: 50 }, content, answers))
	})
})
