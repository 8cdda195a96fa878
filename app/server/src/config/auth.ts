/**
 * Конфигурация аутентификации
 * Токены выпускает внешний auth-бэкенд, сервер только проверяет подпись
 */
import { DEFAULTS } from '../lib/constants.js'

const jwtSecret = process.env.AUTH_JWT_SECRET || DEFAULTS.JWT_SECRET

// Fail-fast in production if secret is missing or left as default
if (process.env.NODE_ENV === 'production') {
	if (!process.env.AUTH_JWT_SECRET || jwtSecret === DEFAULTS.JWT_SECRET) {
		throw new Error('AUTH_JWT_SECRET must be set to a non-default value in production')
	}
}

export const AUTH_CONFIG = {
	/**
	 * Секрет для проверки подписи JWT токенов
	 */
	jwtSecret,

	/**
	 * Имя cookie для сессии
	 */
	sessionCookieName: process.env.SESSION_COOKIE_NAME || 'aerotest_session',

	/**
	 * Токен также принимается из заголовка Authorization: Bearer (мобильный клиент)
	 */
	acceptBearer: process.env.AUTH_ACCEPT_BEARER !== '0',
} as const
