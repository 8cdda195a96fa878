import { isRoleKey, type RoleKey } from './roles.js';

function toStringArray(source: unknown): string[] {
	if (Array.isArray(source)) {
		return source
			.map((value) => (typeof value === 'string' ? value.trim() : ''))
			.filter((value) => value.length > 0);
	}
	if (typeof source === 'string' && source.trim()) {
		return [source.trim()];
	}
	return [];
}

/**
 * Приводит роли из JWT/БД к известным RoleKey: регистр, пробелы, дубли и
 * неизвестные значения отбрасываются.
 */
export function normaliseRoleKeys(source: unknown): RoleKey[] {
	const collected = toStringArray(source).map((value) => value.toLowerCase());
	const result: RoleKey[] = [];
	for (const value of collected) {
		if (isRoleKey(value) && !result.includes(value)) {
			result.push(value);
		}
	}
	return result;
}
