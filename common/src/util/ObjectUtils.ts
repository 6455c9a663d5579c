/**
 * A function for memoizing the creation of an object.
 *
 * @param F the function to create the object that will be memoized with.
 */
export function memoized<T>(F: () => T): () => T {
	const m = F();
	return () => m;
}

/**
 * Determines if a value is a plain, non-array object.
 * @param value the value to check.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Determines if a value is a plain object with at least one own key.
 * @param value the value to check.
 */
export function isNonEmptyObject(value: unknown): value is Record<string, unknown> {
	return isPlainObject(value) && Object.keys(value).length > 0;
}
