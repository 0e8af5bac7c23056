/**
 * Centralized logging with pino
 *
 * Design: Dual-output architecture
 * - Pino handles structured JSON logging for debugging/files
 * - UI module (ui.ts) handles user-facing CLI output
 *
 * Log levels:
 * - fatal: System crash
 * - error: Operation failed
 * - warn: Recoverable issue
 * - info: Key milestones (shown with -v)
 * - debug: Detailed operation info (-vv)
 * - trace: Very detailed debugging
 */

import { existsSync, mkdirSync } from "node:fs"
import { dirname } from "node:path"
import pino from "pino"

/**
 * Console level: LOG_LEVEL and DEBUG win, otherwise only warnings reach the
 * terminal unless -v asks for more.
 */
export function resolveConsoleLevel(
	verbosity: number,
	env: NodeJS.ProcessEnv = process.env,
): string {
	const explicit = env["LOG_LEVEL"] || (env["DEBUG"] ? "debug" : undefined)
	if (explicit) return explicit
	if (verbosity >= 2) return "debug"
	if (verbosity >= 1) return "info"
	return "warn"
}

// Use pino-pretty for development, raw JSON for production/CI
const isDev = process.stdout.isTTY && !process.env["CI"]

export interface ConfigureLoggingOptions {
	/** When set, logs go to this file instead of the console (keeps progress bars clean) */
	logFilePath?: string | undefined
	/** Number of -v flags; raises the console level */
	verbosity?: number | undefined
}

let currentLogFilePath: string | null = null
let level = resolveConsoleLevel(0)

function ensureDirExists(path: string): void {
	const dir = dirname(path)
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true })
	}
}

function createConsoleLogger() {
	return isDev
		? pino({
				level,
				transport: {
					target: "pino-pretty",
					options: {
						colorize: true,
						translateTime: "HH:MM:ss",
						ignore: "pid,hostname",
						messageFormat: "{module}: {msg}",
						destination: 2,
					},
				},
			})
		: pino(
				{
					level,
					base: { pid: undefined, hostname: undefined },
				},
				pino.destination(2),
			)
}

function createFileLogger(path: string) {
	ensureDirExists(path)
	// process.exitCode is set right after a halted run; sync writes keep the tail of the log.
	const destination = pino.destination({ dest: path, sync: true })
	const fileLevel =
		process.env["LOG_LEVEL_FILE"] ??
		// If the user didn't explicitly set a level, make log files useful by default.
		(process.env["LOG_LEVEL"] || "debug")
	return pino(
		{
			level: fileLevel,
			base: { pid: undefined, hostname: undefined },
		},
		destination,
	)
}

/**
 * Root logger instance
 * In most cases, use createLogger() to get a module-specific child logger
 */
export let logger = createConsoleLogger()

/** Configure logging. With a log file, pino output is redirected there. */
export function configureLogging(options: ConfigureLoggingOptions): {
	logFilePath: string | null
	level: string
} {
	const nextPath = options.logFilePath ?? null
	const nextLevel = resolveConsoleLevel(options.verbosity ?? 0)
	if (nextPath === currentLogFilePath && nextLevel === level) {
		return { logFilePath: currentLogFilePath, level }
	}

	currentLogFilePath = nextPath
	level = nextLevel
	logger = nextPath ? createFileLogger(nextPath) : createConsoleLogger()
	return { logFilePath: currentLogFilePath, level }
}

/**
 * Create a child logger for a specific module
 * @example
 * const log = createLogger("transfer")
 * log.debug({ url, startOffset }, "requesting range")
 */
export function createLogger(module: string) {
	return logger.child({ module })
}

/**
 * Flush pending log writes (call before process exit)
 */
export function flushLogs(): Promise<void> {
	return new Promise((resolve, reject) => {
		logger.flush(err => (err ? reject(err) : resolve()))
	})
}

// Pre-created loggers for common modules (getters so they follow reconfiguration)
export const log = {
	get download() {
		return createLogger("download")
	},
	get transfer() {
		return createLogger("transfer")
	},
	get retry() {
		return createLogger("retry")
	},
	get catalog() {
		return createLogger("catalog")
	},
	get config() {
		return createLogger("config")
	},
	get cli() {
		return createLogger("cli")
	},
} as const
