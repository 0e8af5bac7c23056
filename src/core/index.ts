/**
 * Core module exports
 *
 * The download engine is an async generator; callers consume its events to
 * render progress.
 */

// Download engine
export { downloadLibrary, emptySummary } from "./downloader.js"
export { EventChannel } from "./channel.js"

// Shared types
export type {
	DownloadEvent,
	DownloaderOptions,
	DownloadSummary,
	FileOutcome,
} from "./types.js"
