/**
 * Error taxonomy for the download engine
 *
 * Transport, timeout and file-access failures are retried by the caller.
 * Retry exhaustion surfaces as TooManyRetriesError. SkipSignal is not a
 * failure: it ends one unit of work without retrying it.
 */

import type { SkipReason } from "./types.js"

/**
 * Base class for every error raised by shelfsync itself
 */
export class ShelfsyncError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = "ShelfsyncError"
	}
}

/**
 * Network failure or an HTTP response the engine cannot use
 */
export class TransportError extends ShelfsyncError {
	readonly url: string
	readonly status: number | undefined

	constructor(
		message: string,
		url: string,
		options?: ErrorOptions & { status?: number },
	) {
		super(message, options)
		this.name = "TransportError"
		this.url = url
		this.status = options?.status
	}
}

/** No headers or no body bytes arrived within the idle timeout */
export class TimeoutError extends TransportError {
	readonly idleTimeoutSeconds: number

	constructor(url: string, idleTimeoutSeconds: number, options?: ErrorOptions) {
		super(`No data received for ${idleTimeoutSeconds}s`, url, options)
		this.name = "TimeoutError"
		this.idleTimeoutSeconds = idleTimeoutSeconds
	}
}

/** A file or directory on disk could not be read or written */
export class FileAccessError extends ShelfsyncError {
	readonly path: string

	constructor(message: string, path: string, options?: ErrorOptions) {
		super(message, options)
		this.name = "FileAccessError"
		this.path = path
	}
}

/**
 * The digest of a fully received file differs from the declared one.
 * Reported as a warning; the file is kept.
 */
export class HashMismatchError extends ShelfsyncError {
	readonly path: string
	readonly expected: string
	readonly actual: string

	constructor(path: string, expected: string, actual: string) {
		super(`Hash mismatch for ${path}: expected ${expected}, got ${actual}`)
		this.name = "HashMismatchError"
		this.path = path
		this.expected = expected
		this.actual = actual
	}
}

/** Every attempt of a retried action failed; `cause` is the last failure */
export class TooManyRetriesError extends ShelfsyncError {
	readonly attempts: number

	constructor(attempts: number, lastError: unknown) {
		super(
			`Giving up after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${describeError(lastError)}`,
			{ cause: lastError },
		)
		this.name = "TooManyRetriesError"
		this.attempts = attempts
	}
}

/**
 * Ends the current unit of work as skipped. The retry coordinator rethrows
 * it untouched instead of retrying.
 */
export class SkipSignal extends ShelfsyncError {
	readonly reason: SkipReason

	constructor(reason: SkipReason, message: string) {
		super(message)
		this.name = "SkipSignal"
		this.reason = reason
	}
}

/** The catalog file is unreadable or does not match the expected shape */
export class CatalogError extends ShelfsyncError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = "CatalogError"
	}
}

/** A configuration value or command-line option is invalid */
export class ConfigError extends ShelfsyncError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = "ConfigError"
	}
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
