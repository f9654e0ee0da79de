/**
 * Throttling utilities for rate-limiting function calls.
 *
 * Used to limit progress updates while streaming entities through a
 * relations manager.
 *
 * @module
 */

/**
 * Create a throttled version of a function that only executes at most
 * once per `timeFrame` milliseconds.
 *
 * @param func - The function to throttle.
 * @param timeFrame - Minimum time between calls in milliseconds.
 *
 * @example
 * ```ts
 * const logThrottled = throttle((msg) => console.log(msg), 1000)
 * // Only logs at most once per second
 * for (let i = 0; i < 1000; i++) logThrottled(`Progress: ${i}`)
 * ```
 */
export function throttle<T extends unknown[]>(
	func: (...args: T) => void,
	timeFrame: number,
) {
	let lastTime = Number.NEGATIVE_INFINITY
	return (...args: T) => {
		const now = Date.now()
		if (now - lastTime >= timeFrame) {
			func(...args)
			lastTime = now
		}
	}
}
