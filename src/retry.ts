/**
 * Fixed-delay retry coordinator
 *
 * Attempts run strictly one after another; the delay between them is constant.
 */

import { SkipSignal, TooManyRetriesError, describeError } from "./errors.js"
import { log } from "./logger.js"

export interface RetryOptions {
	/** Total number of attempts, 1 means no retry */
	maxAttempts: number
	/** Pause between attempts */
	delaySeconds: number
	/** Called after a failed attempt that will be retried */
	onRetry?: ((error: unknown, attempt: number) => void) | undefined
	sleep?: ((ms: number) => Promise<void>) | undefined
}

/**
 * Invoke `action` until it returns, up to `maxAttempts` times.
 *
 * A SkipSignal is rethrown as-is. Any other error is retried; once the
 * attempts run out a TooManyRetriesError carrying the last error is thrown.
 */
export async function retry<T>(
	action: (attempt: number) => Promise<T>,
	options: RetryOptions,
): Promise<T> {
	const maxAttempts = Math.max(1, Math.floor(options.maxAttempts))
	const delayMs = Math.max(0, options.delaySeconds) * 1000
	const wait = options.sleep ?? sleep

	let lastError: unknown
	for (let attempt = 1; attempt <= maxAttempts; attempt++) {
		try {
			return await action(attempt)
		} catch (err) {
			if (err instanceof SkipSignal) {
				throw err
			}
			lastError = err
			log.retry.debug(
				{ attempt, maxAttempts, error: describeError(err) },
				"attempt failed",
			)
			if (attempt < maxAttempts) {
				options.onRetry?.(err, attempt)
				await wait(delayMs)
			}
		}
	}

	throw new TooManyRetriesError(maxAttempts, lastError)
}

export function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms))
}
