/**
 * Статистика полётов, по которой открываются тесты
 */
import { Router } from 'express'

import { ERROR_MESSAGES } from '../../lib/constants.js'
import { DashboardStatsSchema } from '../../lib/tests/triggers.js'
import { requirePerm } from '../../middleware/auth/requirePerm.js'
import { getAuthUser, sessionRequired } from '../../middleware/auth/session.js'
import { validateUserId } from '../../middleware/validateParams.js'
import { testEngine } from '../../services/tests/index.js'

const router = Router()

router.use(sessionRequired())

// GET /api/stats/me - свой плоский снимок статистики
router.get('/me', requirePerm('stats', 'write'), async (req, res, next) => {
	try {
		const user = getAuthUser(req)
		const stats = await testEngine.getStats(user.id)
		res.json({ stats })
	} catch (e) {
		next(e)
	}
})

// PUT /api/stats/me - клиент выгружает статистику дашборда
router.put('/me', requirePerm('stats', 'write'), async (req, res, next) => {
	try {
		const parsed = DashboardStatsSchema.safeParse(req.body)
		if (!parsed.success) {
			return res.status(400).json({ error: ERROR_MESSAGES.BAD_REQUEST, details: parsed.error.flatten() })
		}

		const user = getAuthUser(req)
		const stats = await testEngine.saveStats(user.id, parsed.data)
		res.json({ stats })
	} catch (e) {
		next(e)
	}
})

// GET /api/stats/:userId - статистика ученика (инструктор)
router.get('/:userId', validateUserId('userId'), requirePerm('stats', 'read_any'), async (req, res, next) => {
	try {
		const stats = await testEngine.getStats(req.params.userId)
		res.json({ stats })
	} catch (e) {
		next(e)
	}
})

export default router
