/**
 * Configuration management with Zod validation
 */

import { existsSync, readFileSync } from "node:fs"
import { homedir } from "node:os"
import { join } from "node:path"
import { z } from "zod"
import { describeError } from "./errors.js"
import { log } from "./logger.js"

const ConfigSchema = z.object({
	downloadDirectory: z.string().min(1).optional(),
	catalogPath: z.string().min(1).optional(),
	token: z.string().min(1).optional(),
	tokenFile: z.string().min(1).optional(),
	retryCount: z.number().int().min(1).max(20).default(3),
	retryDelay: z.number().min(0).default(1),
	idleTimeout: z.number().positive().default(3),
})

export type Config = z.infer<typeof ConfigSchema>

const DEFAULT_CONFIG: Config = {
	retryCount: 3,
	retryDelay: 1,
	idleTimeout: 3,
}

/** Directory used when neither the environment nor the config names one */
export const DEFAULT_DIRECTORY_NAME = "Game-Downloads"

export function defaultConfigPaths(): string[] {
	return [
		join(process.cwd(), ".shelfsyncrc"),
		join(process.cwd(), ".shelfsyncrc.json"),
		join(homedir(), ".shelfsyncrc"),
		join(homedir(), ".shelfsyncrc.json"),
	]
}

/**
 * Load configuration from .shelfsyncrc (JSON format)
 * Checks current directory first, then home directory
 */
export function loadConfig(paths: string[] = defaultConfigPaths()): Config {
	for (const path of paths) {
		if (existsSync(path)) {
			try {
				const raw = readFileSync(path, "utf-8")
				const parsed: unknown = JSON.parse(raw)
				return applyEnvironment(ConfigSchema.parse(parsed))
			} catch (err) {
				// Continue to next path if invalid
				log.config.warn(
					{ path, error: describeError(err) },
					"ignoring invalid config file",
				)
			}
		}
	}

	return applyEnvironment(DEFAULT_CONFIG)
}

function applyEnvironment(config: Config): Config {
	const directory = process.env["DOWNLOAD_DIRECTORY"]
	const token = process.env["SHELFSYNC_TOKEN"]
	return {
		...config,
		...(directory ? { downloadDirectory: directory } : {}),
		...(token ? { token } : {}),
	}
}

/**
 * Base directory for downloads when none is given on the command line
 */
export function defaultDownloadDirectory(
	config: Config,
	cwd: string = process.cwd(),
): string {
	return config.downloadDirectory ?? join(cwd, DEFAULT_DIRECTORY_NAME)
}

export { DEFAULT_CONFIG }
