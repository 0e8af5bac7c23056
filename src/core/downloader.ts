/**
 * Core Download Engine
 *
 * Walks the catalog one game and one file at a time and yields events that
 * a UI can render without any direct coupling.
 *
 * Per file:
 * - OS and language filters (English fallback and language exclusion are
 *   resolved per game beforehand)
 * - Existing files are hashed: valid ones are skipped, partial ones resumed
 * - Transfers are retried with a fixed delay; the running MD5 covers the
 *   resumed prefix as well as the new bytes
 * - A final hash mismatch is reported, never deleted
 */

import { createHash, type Hash } from "node:crypto"
import { mkdir, open, stat, writeFile, type FileHandle } from "node:fs/promises"

import {
	FileAccessError,
	HashMismatchError,
	SkipSignal,
	TooManyRetriesError,
	TransportError,
	describeError,
} from "../errors.js"
import { planGame } from "../filters.js"
import { hashPrefix, peekDigest, type HashedPrefix } from "../hash.js"
import { log } from "../logger.js"
import { checksumPath, claimTargetPath, gameDirectory } from "../paths.js"
import { retry } from "../retry.js"
import type {
	CatalogSource,
	DownloadDescriptor,
	GameEntry,
	SkipReason,
} from "../types.js"
import { EventChannel } from "./channel.js"
import type {
	DownloadEvent,
	DownloaderOptions,
	DownloadSummary,
	FileOutcome,
} from "./types.js"

// ─────────────────────────────────────────────────────────────────────────────
// Session State
// ─────────────────────────────────────────────────────────────────────────────

interface TransferSession {
	id: string
	game: GameEntry
	descriptor: DownloadDescriptor
	targetDir: string
	targetPath: string
	/** Set once an attempt of this run has opened the target for writing */
	createdThisRun: boolean
}

type Disposition =
	| { kind: "fresh" }
	| { kind: "resume"; prefix: HashedPrefix }
	| {
			kind: "skip"
			reason: Extract<
				SkipReason,
				"exists-valid" | "exists-unverified" | "cannot-resume"
			>
			message: string
	  }

type Emit = (event: DownloadEvent) => void

const SKIP_MESSAGES: Record<
	Extract<SkipReason, "os-filter" | "language-filter">,
	string
> = {
	"os-filter": "Skipping because of OS filter",
	"language-filter": "Skipping because of language filter",
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err
}

async function fileExists(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isFile()
	} catch (err) {
		if (isErrnoException(err) && err.code === "ENOENT") return false
		throw new FileAccessError(
			`Cannot inspect ${path}: ${describeError(err)}`,
			path,
			{ cause: err },
		)
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Existing File Disposition
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Decide what to do with whatever already sits at the target path.
 * Evaluated again on every attempt, since a failed attempt leaves a partial file.
 */
async function inspectTarget(
	session: TransferSession,
	verify: boolean,
): Promise<Disposition> {
	const { descriptor, targetPath } = session

	if (!(await fileExists(targetPath))) {
		return { kind: "fresh" }
	}

	if (!verify) {
		// A partial written by an earlier attempt of this run is ours to restart
		if (session.createdThisRun) {
			return { kind: "fresh" }
		}
		return {
			kind: "skip",
			reason: "exists-unverified",
			message:
				"Skipping because it exists (--no-verify specified, not checking content)",
		}
	}

	if (!descriptor.md5) {
		log.download.debug(
			{ targetPath },
			"no checksum published, downloading again",
		)
		return { kind: "fresh" }
	}

	const prefix = await hashPrefix(targetPath)
	if (peekDigest(prefix.hash) === descriptor.md5) {
		return {
			kind: "skip",
			reason: "exists-valid",
			message: "Skipping because it exists and is valid",
		}
	}

	if (descriptor.size > 0 && prefix.size >= descriptor.size) {
		return {
			kind: "skip",
			reason: "cannot-resume",
			message: `Skipping because the existing file (${prefix.size} bytes) fails verification and cannot be resumed; delete it to download again`,
		}
	}

	if (prefix.size === 0) {
		return { kind: "fresh" }
	}

	return { kind: "resume", prefix }
}

// ─────────────────────────────────────────────────────────────────────────────
// Sidecar Checksum
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Write the declared hash to `<file>.md5` unless it already exists.
 * Creates the game directory even during a dry run.
 */
async function writeChecksum(
	session: TransferSession,
	options: DownloaderOptions,
	emit: Emit,
): Promise<void> {
	const { descriptor } = session
	if (!options.createChecksums || !descriptor.md5) return

	const path = checksumPath(session.targetPath)
	try {
		await mkdir(session.targetDir, { recursive: true })
		await writeFile(path, descriptor.md5, { flag: "wx" })
	} catch (err) {
		if (isErrnoException(err) && err.code === "EEXIST") return
		throw new FileAccessError(
			`Cannot create checksum file ${path}: ${describeError(err)}`,
			path,
			{ cause: err },
		)
	}

	emit({
		type: "checksum",
		id: session.id,
		game: session.game,
		descriptor,
		path,
	})
}

// ─────────────────────────────────────────────────────────────────────────────
// Single Attempt
// ─────────────────────────────────────────────────────────────────────────────

async function attemptDownload(
	session: TransferSession,
	attempt: number,
	options: DownloaderOptions,
	emit: Emit,
): Promise<FileOutcome> {
	const { id, game, descriptor, targetPath } = session

	const disposition = await inspectTarget(session, options.verify)
	if (disposition.kind === "skip") {
		if (disposition.reason !== "cannot-resume") {
			await writeChecksum(session, options, emit)
		}
		return {
			status: "skipped",
			reason: disposition.reason,
			message: disposition.message,
		}
	}

	const startOffset =
		disposition.kind === "resume" ? disposition.prefix.size : null
	emit({ type: "start", id, game, descriptor, targetPath, startOffset, attempt })

	if (options.dryRun) {
		// Pretend the whole file arrived; no network, no content file
		emit({
			type: "progress",
			id,
			current: descriptor.size,
			total: descriptor.size,
		})
		await writeChecksum(session, options, emit)
		return {
			status: "completed",
			targetPath,
			bytesDownloaded: descriptor.size,
			resumed: false,
			dryRun: true,
			hashMismatch: false,
		}
	}

	const response = await options.transport.download(
		descriptor,
		(current, total) => emit({ type: "progress", id, current, total }),
		startOffset,
		options.idleTimeout,
	)

	// A server that ignores the range sends the whole file: start over
	const resumed = disposition.kind === "resume" && response.resumed
	if (disposition.kind === "resume" && !resumed) {
		log.download.info(
			{ targetPath, startOffset },
			"server ignored range request, restarting file",
		)
	}

	let hash: Hash
	let written: number
	if (disposition.kind === "resume" && resumed) {
		hash = disposition.prefix.hash
		written = disposition.prefix.size
	} else {
		hash = createHash("md5")
		written = 0
	}
	const initial = written

	let handle: FileHandle
	try {
		await mkdir(session.targetDir, { recursive: true })
		handle = await open(targetPath, resumed ? "a" : "w")
	} catch (err) {
		response.cancel()
		throw new FileAccessError(
			`Cannot open ${targetPath} for writing: ${describeError(err)}`,
			targetPath,
			{ cause: err },
		)
	}
	session.createdThisRun = true

	try {
		for await (const chunk of response.chunks) {
			if (descriptor.size > 0 && written + chunk.length > descriptor.size) {
				throw new TransportError(
					`Received more than the declared ${descriptor.size} bytes`,
					descriptor.url,
				)
			}
			await handle.write(chunk)
			hash.update(chunk)
			written += chunk.length
		}
	} finally {
		await handle.close()
	}

	if (descriptor.size > 0 && written < descriptor.size) {
		throw new TransportError(
			`Connection closed after ${written} of ${descriptor.size} bytes`,
			descriptor.url,
		)
	}

	let hashMismatch = false
	if (options.verify && descriptor.md5) {
		const actual = hash.digest("hex")
		if (actual !== descriptor.md5) {
			hashMismatch = true
			emit({
				type: "hash-mismatch",
				id,
				game,
				descriptor,
				error: new HashMismatchError(targetPath, descriptor.md5, actual),
			})
		}
	}

	await writeChecksum(session, options, emit)

	return {
		status: "completed",
		targetPath,
		bytesDownloaded: written - initial,
		resumed,
		dryRun: false,
		hashMismatch,
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Single File
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Run every attempt for one file and fold the result into a FileOutcome.
 * Only errors outside the retry contract escape.
 */
async function runDownload(
	session: TransferSession,
	options: DownloaderOptions,
	emit: Emit,
): Promise<FileOutcome> {
	const { id, game, descriptor } = session
	try {
		return await retry(
			attempt => attemptDownload(session, attempt, options, emit),
			{
				maxAttempts: options.retryCount,
				delaySeconds: options.retryDelay,
				sleep: options.sleep,
				onRetry: (error, attempt) => {
					log.download.debug(
						{ targetPath: session.targetPath, attempt, error: describeError(error) },
						"download attempt failed",
					)
					emit({
						type: "retry",
						id,
						game,
						descriptor,
						attempt,
						maxAttempts: options.retryCount,
						error: describeError(error),
					})
				},
			},
		)
	} catch (err) {
		if (err instanceof SkipSignal) {
			return { status: "skipped", reason: err.reason, message: err.message }
		}
		if (err instanceof TooManyRetriesError) {
			return { status: "failed", error: err }
		}
		throw err
	}
}

async function* processDownload(
	session: TransferSession,
	options: DownloaderOptions,
): AsyncGenerator<DownloadEvent, FileOutcome> {
	const channel = new EventChannel<DownloadEvent>()
	const work = runDownload(session, options, event => channel.push(event))
	return yield* channel.drain(work)
}

// ─────────────────────────────────────────────────────────────────────────────
// Download Generator
// ─────────────────────────────────────────────────────────────────────────────

export function emptySummary(): DownloadSummary {
	return {
		games: 0,
		excludedGames: 0,
		completed: 0,
		skipped: 0,
		failed: 0,
		hashMismatches: 0,
		bytesDownloaded: 0,
		failures: [],
	}
}

/**
 * Async generator that yields download events and returns a summary.
 *
 * Without `skipErrors` the first file that exhausts its retries throws
 * TooManyRetriesError out of the generator and nothing further runs.
 *
 * Usage:
 * ```ts
 * for await (const event of downloadLibrary(readCatalog(path), options)) {
 *   switch (event.type) {
 *     case 'start': showBar(event); break;
 *     case 'progress': updateBar(event); break;
 *     case 'complete': markComplete(event); break;
 *   }
 * }
 * ```
 */
export async function* downloadLibrary(
	catalog: CatalogSource,
	options: DownloaderOptions,
): AsyncGenerator<DownloadEvent, DownloadSummary> {
	const summary = emptySummary()
	// Two files of a run never share a target, even when their URLs end alike
	const claimed = new Set<string>()

	for await (const game of catalog) {
		summary.games++

		const plan = planGame(game, options.filter)
		if (plan.excluded) {
			summary.excludedGames++
			yield {
				type: "game-excluded",
				game,
				language: options.filter.excludeLanguage ?? "",
			}
			continue
		}

		yield { type: "game", game, downloads: plan.downloads.length }

		for (const [index, planned] of plan.downloads.entries()) {
			const { descriptor, rejection } = planned
			const id = `${game.id}:${index}`

			if (rejection !== null) {
				summary.skipped++
				yield {
					type: "skip",
					id,
					game,
					descriptor,
					reason: rejection,
					message: SKIP_MESSAGES[rejection],
				}
				continue
			}

			const targetDir = gameDirectory(options.targetDir, game)
			const session: TransferSession = {
				id,
				game,
				descriptor,
				targetDir,
				targetPath: claimTargetPath(targetDir, descriptor, claimed),
				createdThisRun: false,
			}

			const outcome = yield* processDownload(session, options)

			switch (outcome.status) {
				case "completed":
					summary.completed++
					summary.bytesDownloaded += outcome.bytesDownloaded
					if (outcome.hashMismatch) summary.hashMismatches++
					yield {
						type: "complete",
						id,
						game,
						descriptor,
						targetPath: outcome.targetPath,
						bytesDownloaded: outcome.bytesDownloaded,
						resumed: outcome.resumed,
						dryRun: outcome.dryRun,
					}
					break
				case "skipped":
					summary.skipped++
					yield {
						type: "skip",
						id,
						game,
						descriptor,
						reason: outcome.reason,
						message: outcome.message,
					}
					break
				case "failed":
					summary.failed++
					summary.failures.push({
						game: game.title,
						file: descriptor.name,
						error: outcome.error.message,
					})
					log.download.error(
						{ targetPath: session.targetPath, error: outcome.error.message },
						"download failed",
					)
					if (!options.skipErrors) {
						throw outcome.error
					}
					yield { type: "error", id, game, descriptor, error: outcome.error }
					break
			}
		}
	}

	return summary
}

// Re-export helper types
export type { DownloadEvent, DownloaderOptions, DownloadSummary } from "./types.js"
