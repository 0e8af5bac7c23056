/**
 * Download filtering: OS, language with English fallback, excluded language
 *
 * Order matters:
 * 1. Per game, the language fallback narrows the working set of downloads
 * 2. Per game, the excluded language vetoes the whole game
 * 3. Per file, the OS filter and then the language filter reject downloads
 *
 * Filters only narrow what is iterated; the catalog entries are never touched.
 */

import { z } from "zod"
import { ConfigError } from "./errors.js"
import {
	ENGLISH,
	PLATFORMS,
	type DownloadDescriptor,
	type DownloadFilter,
	type GameEntry,
	type SkipReason,
} from "./types.js"

// ─────────────────────────────────────────────────────────────────────────────
// Filter Resolution
// ─────────────────────────────────────────────────────────────────────────────

const FilterInputSchema = z.object({
	os: z
		.string()
		.trim()
		.toLowerCase()
		.pipe(z.enum(PLATFORMS))
		.optional(),
	language: z.string().trim().min(1).optional(),
	englishFallback: z.boolean().default(false),
	excludeLanguage: z.string().trim().min(1).optional(),
})

export type FilterInput = z.input<typeof FilterInputSchema>

/**
 * Validate raw filter options once per run
 * @throws ConfigError for an unknown operating system or empty language
 */
export function resolveDownloadFilter(input: FilterInput): DownloadFilter {
	const result = FilterInputSchema.safeParse(input)
	if (!result.success) {
		const issue = result.error.issues[0]
		const field = issue?.path.join(".") ?? "filter"
		throw new ConfigError(
			field === "os"
				? `Unknown operating system "${input.os ?? ""}", allowed values: ${PLATFORMS.join(", ")}`
				: `Invalid ${field}: ${issue?.message ?? "invalid value"}`,
		)
	}
	const { os, language, englishFallback, excludeLanguage } = result.data
	return {
		operatingSystem: os ?? null,
		language: language ?? null,
		englishFallback,
		excludeLanguage: excludeLanguage ?? null,
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Per-Game Decisions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Two-pass language fallback: the requested language if the game has any
 * download in it, English otherwise. Without fallback every download stays.
 */
export function resolveGameDownloads(
	game: GameEntry,
	filter: DownloadFilter,
): readonly DownloadDescriptor[] {
	const { language, englishFallback } = filter
	if (!englishFallback || language === null) {
		return game.downloads
	}

	const requested = game.downloads.filter(d => d.language === language)
	if (requested.length > 0) {
		return requested
	}
	return game.downloads.filter(d => d.language === ENGLISH)
}

/**
 * True when any download of the working set is in the excluded language
 */
export function isGameExcluded(
	downloads: readonly DownloadDescriptor[],
	filter: DownloadFilter,
): boolean {
	const { excludeLanguage } = filter
	if (excludeLanguage === null) return false
	return downloads.some(d => d.language === excludeLanguage)
}

// ─────────────────────────────────────────────────────────────────────────────
// Per-File Decisions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Reason a single download is filtered out, or null when it passes
 */
export function rejectDownload(
	descriptor: DownloadDescriptor,
	filter: DownloadFilter,
): Extract<SkipReason, "os-filter" | "language-filter"> | null {
	if (
		filter.operatingSystem !== null &&
		descriptor.platform !== filter.operatingSystem
	) {
		return "os-filter"
	}

	if (
		filter.language !== null &&
		descriptor.language !== filter.language &&
		(!filter.englishFallback || descriptor.language !== ENGLISH)
	) {
		return "language-filter"
	}

	return null
}

// ─────────────────────────────────────────────────────────────────────────────
// Game Plan
// ─────────────────────────────────────────────────────────────────────────────

export interface PlannedDownload {
	descriptor: DownloadDescriptor
	/** Null when the download should be processed */
	rejection: Extract<SkipReason, "os-filter" | "language-filter"> | null
}

export type GamePlan =
	| { excluded: true; game: GameEntry }
	| { excluded: false; game: GameEntry; downloads: PlannedDownload[] }

/**
 * Evaluate every filter for one game before any of its files is touched
 */
export function planGame(game: GameEntry, filter: DownloadFilter): GamePlan {
	const working = resolveGameDownloads(game, filter)
	if (isGameExcluded(working, filter)) {
		return { excluded: true, game }
	}
	return {
		excluded: false,
		game,
		downloads: working.map(descriptor => ({
			descriptor,
			rejection: rejectDownload(descriptor, filter),
		})),
	}
}

/**
 * Downloads of a game that survive every filter, in catalog order
 */
export function selectDownloads(
	game: GameEntry,
	filter: DownloadFilter,
): DownloadDescriptor[] {
	const plan = planGame(game, filter)
	if (plan.excluded) return []
	return plan.downloads
		.filter(p => p.rejection === null)
		.map(p => p.descriptor)
}

/**
 * One-line description of the active filter for the startup banner
 */
export function describeFilter(filter: DownloadFilter): string | undefined {
	const parts: string[] = []
	if (filter.operatingSystem) parts.push(`os=${filter.operatingSystem}`)
	if (filter.language) {
		parts.push(
			`language=${filter.language}${filter.englishFallback ? ` (fallback ${ENGLISH})` : ""}`,
		)
	}
	if (filter.excludeLanguage) parts.push(`exclude=${filter.excludeLanguage}`)
	return parts.length > 0 ? parts.join(", ") : undefined
}
