/**
 * Shared type definitions for shelfsync
 */

// ─────────────────────────────────────────────────────────────────────────────
// Platforms & Languages
// ─────────────────────────────────────────────────────────────────────────────

export const PLATFORMS = ["windows", "mac", "linux"] as const

export type Platform = (typeof PLATFORMS)[number]

/** Store-local name of the language used for the English fallback */
export const ENGLISH = "English"

// ─────────────────────────────────────────────────────────────────────────────
// Catalog Entries
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Metadata for one downloadable file of a game (installer, patch, ...).
 * Immutable once read from the catalog.
 */
export interface DownloadDescriptor {
	/** Human-readable name shown in progress and log lines */
	readonly name: string
	/** Store-local language name ("English", "český", ...) */
	readonly language: string
	readonly platform: Platform
	readonly url: string
	/** Declared size in bytes, 0 when unknown */
	readonly size: number
	/** Lowercase hex MD5 digest, null when the store does not publish one */
	readonly md5: string | null
}

export interface GameEntry {
	readonly id: number
	readonly title: string
	readonly downloads: readonly DownloadDescriptor[]
}

/**
 * A lazily consumed sequence of games, either read from a local file or
 * produced by a fetch pipeline.
 */
export type CatalogSource = Iterable<GameEntry> | AsyncIterable<GameEntry>

// ─────────────────────────────────────────────────────────────────────────────
// Filtering
// ─────────────────────────────────────────────────────────────────────────────

/** Resolved once per run; never re-parsed per file */
export interface DownloadFilter {
	readonly operatingSystem: Platform | null
	readonly language: string | null
	/** Take English downloads when a game has none in `language` */
	readonly englishFallback: boolean
	/** Skip every game that offers a download in this language */
	readonly excludeLanguage: string | null
}

export const NO_FILTER: DownloadFilter = {
	operatingSystem: null,
	language: null,
	englishFallback: false,
	excludeLanguage: null,
}

// ─────────────────────────────────────────────────────────────────────────────
// Outcomes
// ─────────────────────────────────────────────────────────────────────────────

export type SkipReason =
	| "os-filter"
	| "language-filter"
	| "exists-valid"
	| "exists-unverified"
	| "cannot-resume"
	| "range-not-satisfiable"
