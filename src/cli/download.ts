/**
 * Plain-text runner for the download command
 *
 * Consumes the download generator and renders its events with the ui
 * helpers and a per-file progress bar.
 */

import { join } from "node:path"
import { readCatalog } from "../catalog.js"
import type { Config } from "../config.js"
import { downloadLibrary } from "../core/downloader.js"
import type { DownloadEvent, DownloadSummary } from "../core/types.js"
import { createTokenProvider } from "../credentials.js"
import { TooManyRetriesError, describeError } from "../errors.js"
import { describeFilter, resolveDownloadFilter } from "../filters.js"
import { configureLogging, log } from "../logger.js"
import { resolveBaseDirectory } from "../paths.js"
import {
	createTransferProgress,
	formatBytes,
	type TransferProgress,
} from "../progress.js"
import { HttpTransport } from "../transfer.js"
import { ENGLISH, type DownloadDescriptor } from "../types.js"
import { ui } from "../ui.js"
import type { DownloadCommandOptions } from "./options.js"

export const VERSION = "1.0.0"

export function describeDownload(descriptor: DownloadDescriptor): string {
	return `${descriptor.name} (${descriptor.platform}, ${descriptor.language})`
}

export function resolveCatalogPath(
	option: string | undefined,
	config: Config,
	cwd: string = process.cwd(),
): string {
	return resolveBaseDirectory(
		option ?? config.catalogPath ?? join(cwd, "catalog.json"),
		cwd,
	)
}

function renderEvent(
	event: DownloadEvent,
	progress: TransferProgress,
	options: { verbose: boolean; rawBytes: boolean },
): void {
	const { verbose, rawBytes } = options

	switch (event.type) {
		case "game": {
			ui.debug(`${event.game.title}: ${event.downloads} file(s) to consider`, verbose)
			break
		}
		case "game-excluded": {
			ui.debug(
				`${event.game.title}: Skipping because it is available in ${event.language}`,
				verbose,
			)
			break
		}
		case "skip": {
			progress.stop()
			const line = `${describeDownload(event.descriptor)}: ${event.message}`
			if (
				event.reason === "cannot-resume" ||
				event.reason === "range-not-satisfiable"
			) {
				ui.warn(line)
			} else {
				ui.debug(line, verbose)
			}
			break
		}
		case "start": {
			progress.start(describeDownload(event.descriptor))
			if (event.startOffset !== null) {
				ui.debug(
					`${describeDownload(event.descriptor)}: resuming at ${formatBytes(event.startOffset, rawBytes)}`,
					verbose,
				)
			}
			break
		}
		case "progress": {
			progress.update(event.current, event.total)
			break
		}
		case "retry": {
			progress.stop()
			ui.warn(
				`${describeDownload(event.descriptor)}: attempt ${event.attempt}/${event.maxAttempts} failed (${event.error}), retrying`,
			)
			break
		}
		case "hash-mismatch": {
			ui.warn(`${describeDownload(event.descriptor)} failed hash check`)
			break
		}
		case "checksum": {
			ui.debug(`${describeDownload(event.descriptor)}: wrote ${event.path}`, verbose)
			break
		}
		case "complete": {
			progress.finish()
			break
		}
		case "error": {
			progress.stop()
			ui.note(`${event.descriptor.name} couldn't be downloaded`)
			ui.debug(event.error.message, verbose)
			break
		}
	}
}

function printSummary(
	summary: DownloadSummary,
	options: { dryRun: boolean; rawBytes: boolean },
): void {
	ui.header("Summary")
	ui.info(
		`${summary.games} game(s), ${summary.completed} file(s) ${options.dryRun ? "would be downloaded" : "downloaded"} (${formatBytes(summary.bytesDownloaded, options.rawBytes)}), ${summary.skipped} skipped`,
	)
	if (summary.excludedGames > 0) {
		ui.info(`${summary.excludedGames} game(s) excluded by language`)
	}
	if (summary.hashMismatches > 0) {
		ui.warn(`${summary.hashMismatches} file(s) failed the hash check and were kept`)
	}
	if (summary.failures.length > 0) {
		console.log()
		ui.failureSection(
			"Downloads Failed",
			summary.failures.map(f => `${f.game}: ${f.file} - ${f.error}`),
		)
	}
	ui.finalStatus(summary.failed === 0 && summary.hashMismatches === 0)
}

/**
 * Run the download command; resolves to the process exit code
 */
export async function runDownloadCommand(
	directory: string,
	options: DownloadCommandOptions,
	config: Config,
): Promise<number> {
	configureLogging({
		logFilePath: options.logFile,
		verbosity: options.quiet ? 0 : options.verbose,
	})

	const filter = resolveDownloadFilter({
		os: options.os,
		language: options.language,
		englishFallback: options.languageFallbackEnglish,
		excludeLanguage: options.excludeGameWithLanguage,
	})

	if (
		filter.language !== null &&
		filter.language !== ENGLISH &&
		!filter.englishFallback
	) {
		ui.warn(
			`Stores often ship several languages inside the ${ENGLISH} version. Those files will be skipped. Specify --language-fallback-english to include ${ENGLISH} versions when your language's version doesn't exist.`,
		)
	}

	const targetDir = resolveBaseDirectory(directory)
	const catalogPath = resolveCatalogPath(options.catalog, config)
	const verbose = options.verbose >= 1 && !options.quiet
	const rawBytes = options.verbose >= 2

	if (!options.quiet) {
		ui.banner(VERSION, targetDir, catalogPath, describeFilter(filter))
		if (options.dryRun) ui.dryRunBanner()
	}
	if (!options.verify) {
		ui.debug("Verification disabled: existing files are kept as-is and never resumed", verbose)
	}

	const transport = new HttpTransport({
		tokenProvider: createTokenProvider({
			token: config.token,
			tokenFile: options.tokenFile ?? config.tokenFile,
		}),
	})
	const progress = createTransferProgress({ quiet: options.quiet, rawBytes })

	log.cli.debug(
		{ targetDir, catalogPath, filter, dryRun: options.dryRun },
		"download started",
	)

	const events = downloadLibrary(readCatalog(catalogPath), {
		targetDir,
		filter,
		transport,
		retryCount: options.retry,
		retryDelay: options.retryDelay,
		idleTimeout: options.idleTimeout,
		skipErrors: options.skipErrors,
		dryRun: options.dryRun,
		createChecksums: options.createMd5,
		verify: options.verify,
	})

	let summary: DownloadSummary
	try {
		let step = await events.next()
		while (!step.done) {
			renderEvent(step.value, progress, { verbose, rawBytes })
			step = await events.next()
		}
		summary = step.value
	} catch (err) {
		progress.stop()
		if (err instanceof TooManyRetriesError) {
			ui.error(`Download halted: ${err.message}`)
			ui.info("Use --skip-errors to carry on with the next file instead.")
			log.cli.debug({ error: describeError(err) }, "download halted")
			return 1
		}
		throw err
	}

	log.cli.debug({ summary }, "download finished")
	if (!options.quiet) {
		printSummary(summary, { dryRun: options.dryRun, rawBytes })
		if (options.dryRun) {
			ui.info("Dry run complete. Run without --dry-run to actually download.")
		}
	}

	return summary.failed > 0 ? 1 : 0
}
