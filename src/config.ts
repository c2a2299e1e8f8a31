import { DEFAULT_DIFFICULTY, MAX_DIFFICULTY } from './blockchain';

interface Config {
	httpPort: number;
	difficulty: number;
	maxNonceAttempts: number;
}

/**
 * Parses a whole non-negative integer, falling back when the value is missing, has any
 * other characters, or lies outside [min, max].
 */
const parseInteger = (
	value: string | undefined,
	fallback: number,
	{ min = 0, max = Number.MAX_SAFE_INTEGER }: { min?: number; max?: number } = {}
): number => {
	if (!value || !/^\d+$/.test(value)) return fallback;

	const parsed = parseInt(value, 10);
	return parsed < min || parsed > max ? fallback : parsed;
};

/**
 * Reads the node settings from environment variables.
 *
 * - HTTP_PORT: port of the HTTP API (3000)
 * - DIFFICULTY: leading hex zeros required in a block hash (4)
 * - MAX_NONCE_ATTEMPTS: hashes tried per block before mining is aborted (unbounded)
 */
const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
	return {
		httpPort: parseInteger(env.HTTP_PORT, 3000, { max: 65535 }),
		difficulty: parseInteger(env.DIFFICULTY, DEFAULT_DIFFICULTY, { max: MAX_DIFFICULTY }),
		maxNonceAttempts: parseInteger(env.MAX_NONCE_ATTEMPTS, Infinity, { min: 1 }),
	};
};

export type { Config };
export { loadConfig };
