import '../config/env.js'

import { drizzle } from 'drizzle-orm/node-postgres'
import pg from 'pg'

import { logger } from '../lib/logger.js'
import * as schema from './schema.js'

export const pgPool = new pg.Pool({
	connectionString: process.env.DATABASE_URL,
	max: Number(process.env.PG_POOL_MAX) || 10,
})

pgPool.on('error', (err) => {
	logger.error({ err }, '[db] Idle client error')
})

export const db = drizzle(pgPool, { schema })

export type Database = typeof db
