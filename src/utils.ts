/**
 * JSON.stringify replacer that re-emits every plain object with its keys in sorted order.
 * Arrays are left alone so their element order still counts.
 */
const sortKeys = (_key: string, value: unknown): unknown => {
	if (value === null || typeof value !== 'object' || Array.isArray(value)) return value;

	return Object.fromEntries(
		Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
	);
};

/**
 * Serializes a value to JSON with object keys sorted at every depth.
 *
 * Two values holding the same fields always produce the same string, whatever order
 * their keys were inserted in.
 *
 * @param value The value to serialize.
 *
 * @returns The canonical JSON string.
 */
const canonicalStringify = (value: unknown): string => {
	return JSON.stringify(value, sortKeys);
};

/**
 * Checks if a hex digest starts with the required number of zero characters.
 *
 * @param hash The hex digest to check.
 * @param difficulty Number of leading '0' characters required.
 *
 * @returns Whether the digest meets the difficulty.
 */
const hasLeadingZeros = (hash: string, difficulty: number): boolean => {
	const requiredPrefix: string = '0'.repeat(difficulty);

	return hash.startsWith(requiredPrefix);
};

export { canonicalStringify, hasLeadingZeros };
