/**
 * Core types for the download engine
 *
 * These types define the event-based interface between the download
 * generator and whatever renders its progress (CLI, tests).
 */

import type { HashMismatchError, TooManyRetriesError } from "../errors.js"
import type { Transport } from "../transfer.js"
import type {
	DownloadDescriptor,
	DownloadFilter,
	GameEntry,
	SkipReason,
} from "../types.js"

// ─────────────────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────────────────

export interface DownloaderOptions {
	/** Absolute base directory; games land in sanitized-title subdirectories */
	targetDir: string
	filter: DownloadFilter
	transport: Transport
	/** Attempts per file, 1 disables retrying */
	retryCount: number
	/** Seconds between attempts */
	retryDelay: number
	/** Seconds without data before a transfer fails */
	idleTimeout: number
	/** Report files that exhausted their retries and carry on */
	skipErrors: boolean
	dryRun: boolean
	/** Write the declared MD5 next to each file as `<file>.md5` */
	createChecksums: boolean
	/** Hash existing and downloaded files; required for resuming */
	verify: boolean
	/** Replaces the retry pause, mainly for tests */
	sleep?: ((ms: number) => Promise<void>) | undefined
}

// ─────────────────────────────────────────────────────────────────────────────
// Outcomes
// ─────────────────────────────────────────────────────────────────────────────

export type FileOutcome =
	| {
			status: "completed"
			targetPath: string
			/** Bytes received in this run; the declared size for a dry run */
			bytesDownloaded: number
			resumed: boolean
			dryRun: boolean
			hashMismatch: boolean
	  }
	| { status: "skipped"; reason: SkipReason; message: string }
	| { status: "failed"; error: TooManyRetriesError }

export interface DownloadSummary {
	games: number
	excludedGames: number
	completed: number
	skipped: number
	failed: number
	hashMismatches: number
	bytesDownloaded: number
	failures: Array<{ game: string; file: string; error: string }>
}

// ─────────────────────────────────────────────────────────────────────────────
// Download Events
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Events emitted by the download generator
 */
export type DownloadEvent =
	| GameStartEvent
	| GameExcludedEvent
	| DownloadSkipEvent
	| DownloadStartEvent
	| DownloadProgressEvent
	| DownloadRetryEvent
	| HashMismatchEvent
	| ChecksumWrittenEvent
	| DownloadCompleteEvent
	| DownloadErrorEvent

interface FileEventBase {
	/** Stable id of one (game, download) pair within a run */
	id: string
	game: GameEntry
	descriptor: DownloadDescriptor
}

/** Emitted before the files of a game are processed */
export interface GameStartEvent {
	type: "game"
	game: GameEntry
	/** Downloads left after the language fallback */
	downloads: number
}

/** Emitted when a game offers the excluded language; none of its files are processed */
export interface GameExcludedEvent {
	type: "game-excluded"
	game: GameEntry
	language: string
}

/** Emitted when a file is filtered out or needs no transfer */
export interface DownloadSkipEvent extends FileEventBase {
	type: "skip"
	reason: SkipReason
	message: string
}

/** Emitted when a transfer (or a simulated one) begins */
export interface DownloadStartEvent extends FileEventBase {
	type: "start"
	targetPath: string
	/** Byte offset of a resumed transfer, null for a fresh one */
	startOffset: number | null
	attempt: number
}

/** Emitted as bytes arrive */
export interface DownloadProgressEvent {
	type: "progress"
	id: string
	current: number
	/** 0 while the size is unknown */
	total: number
}

/** Emitted after a failed attempt, before the retry delay */
export interface DownloadRetryEvent extends FileEventBase {
	type: "retry"
	attempt: number
	maxAttempts: number
	error: string
}

/** Emitted when a received file does not match its declared MD5; the file is kept */
export interface HashMismatchEvent extends FileEventBase {
	type: "hash-mismatch"
	error: HashMismatchError
}

/** Emitted when a `.md5` sidecar file was created */
export interface ChecksumWrittenEvent extends FileEventBase {
	type: "checksum"
	path: string
}

/** Emitted when a file finished transferring */
export interface DownloadCompleteEvent extends FileEventBase {
	type: "complete"
	targetPath: string
	bytesDownloaded: number
	resumed: boolean
	dryRun: boolean
}

/** Emitted for a file that exhausted its retries when errors are skipped */
export interface DownloadErrorEvent extends FileEventBase {
	type: "error"
	error: TooManyRetriesError
}
