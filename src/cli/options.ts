/**
 * Validation of parsed command-line options
 *
 * Commander hands back loosely typed values (numbers as strings, optional
 * flags missing); these schemas turn them into typed options once per run.
 */

import { z } from "zod"
import { ConfigError } from "../errors.js"

const DownloadCommandSchema = z.object({
	catalog: z.string().min(1).optional(),
	verify: z.boolean().default(true),
	os: z.string().optional(),
	language: z.string().optional(),
	languageFallbackEnglish: z.boolean().default(false),
	excludeGameWithLanguage: z.string().optional(),
	retry: z.coerce.number().int().min(1, "must be at least 1"),
	retryDelay: z.coerce.number().min(0),
	idleTimeout: z.coerce.number().positive(),
	skipErrors: z.boolean().default(false),
	dryRun: z.boolean().default(false),
	createMd5: z.boolean().default(false),
	tokenFile: z.string().min(1).optional(),
	logFile: z.string().min(1).optional(),
	verbose: z.number().int().min(0).default(0),
	quiet: z.boolean().default(false),
})

export type DownloadCommandOptions = z.infer<typeof DownloadCommandSchema>

const LanguagesCommandSchema = z.object({
	catalog: z.string().min(1).optional(),
})

export type LanguagesCommandOptions = z.infer<typeof LanguagesCommandSchema>

function toConfigError(error: z.ZodError): ConfigError {
	const details = error.issues
		.map(issue => `--${toFlag(issue.path.join("."))}: ${issue.message}`)
		.join("; ")
	return new ConfigError(`Invalid options: ${details}`)
}

/** camelCase option key back to its kebab-case flag */
function toFlag(key: string): string {
	return key.replace(/[A-Z]/g, letter => `-${letter.toLowerCase()}`)
}

export function parseDownloadOptions(raw: unknown): DownloadCommandOptions {
	const result = DownloadCommandSchema.safeParse(raw)
	if (!result.success) throw toConfigError(result.error)
	return result.data
}

export function parseLanguagesOptions(raw: unknown): LanguagesCommandOptions {
	const result = LanguagesCommandSchema.safeParse(raw)
	if (!result.success) throw toConfigError(result.error)
	return result.data
}
