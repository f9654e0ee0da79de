/**
 * Assertion utilities for contract checks.
 *
 * Provides typed assertion helpers that throw errors when conditions are not met,
 * used for position bounds checking, counter underflow and null/undefined guards.
 *
 * @module
 */

/**
 * Assert that a value is neither null nor undefined.
 *
 * @param message - Optional error message if assertion fails.
 *
 * @example
 * ```ts
 * const handle = handles[position]
 * assertValue(handle, `No handle at position ${position}`)
 * // TypeScript now knows handle is non-nullable
 * ```
 */
export function assertValue<T>(
	value?: T,
	message?: string,
): asserts value is NonNullable<T> {
	if (value === undefined || value === null) {
		throw Error(message ?? "Value is undefined or null")
	}
}

/**
 * Assert that a condition holds. Used for preconditions whose violation is a
 * programming error in the caller.
 *
 * @example
 * ```ts
 * assert(pending > 0, `Relation at position ${position} has no pending members`)
 * ```
 */
export function assert(
	condition: boolean,
	message?: string,
): asserts condition {
	if (!condition) throw Error(message ?? "Assertion failed")
}
