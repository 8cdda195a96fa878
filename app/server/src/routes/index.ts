/**
 * Корневой роутер API.
 */
import { Router } from 'express'

import statsRouter from './stats/index.js'
import testsRouter from './tests/index.js'
import publicTestsRouter from './tests/public.js'

const router = Router()

router.use('/tests/public', publicTestsRouter)
router.use('/tests', testsRouter)
router.use('/stats', statsRouter)

export default router
