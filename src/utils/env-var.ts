type Env = Record<string, string | undefined>;

function isBlank(value: string | undefined): value is undefined {
	return value === undefined || value.trim() === '';
}

/**
 * Gets an environment variable for a key.
 * If a default value is provided, it will be returned if the environment variable is nullish or empty.
 * If no default value is provided and the environment variable is nullish or empty, an error will be thrown.
 * @param key The environment variable key.
 * @param defaultValue Optional default value.
 * @param env The environment to read from, process.env unless given.
 */
export function envVar(key: string, defaultValue?: string, env: Env = process.env): string {
	const value = env[key];
	if (isBlank(value)) {
		if (defaultValue !== undefined) return defaultValue;
		throw new Error(`The environment variable ${key} is required and was not found.`);
	}
	return value;
}

const TRUE_VALUES = new Set(['true', '1', 'yes']);
const FALSE_VALUES = new Set(['false', '0', 'no']);

/**
 * Reads a boolean flag. Returns the raw string when it is not a recognised boolean so the
 * caller's schema validation can report it.
 */
export function envFlag(key: string, defaultValue: boolean, env: Env = process.env): boolean | string {
	const value = env[key];
	if (isBlank(value)) return defaultValue;
	const normalized = value.trim().toLowerCase();
	if (TRUE_VALUES.has(normalized)) return true;
	if (FALSE_VALUES.has(normalized)) return false;
	return value;
}

/**
 * Reads a numeric variable. Returns the raw string when it does not parse as a number.
 */
export function envNumber(key: string, defaultValue: number, env: Env = process.env): number | string {
	const value = env[key];
	if (isBlank(value)) return defaultValue;
	const parsed = Number(value.trim());
	return Number.isFinite(parsed) ? parsed : value;
}
