#!/usr/bin/env node
/**
 * shelfsync CLI - mirror a personal game library to disk
 * Resumable, MD5-verified downloads with OS and language filters
 */

import { Command } from "commander"
import { listLanguages, readCatalog } from "../catalog.js"
import { defaultDownloadDirectory, loadConfig } from "../config.js"
import {
	CatalogError,
	ConfigError,
	FileAccessError,
	describeError,
} from "../errors.js"
import { flushLogs, log } from "../logger.js"
import { PLATFORMS } from "../types.js"
import { ui } from "../ui.js"
import { VERSION, resolveCatalogPath, runDownloadCommand } from "./download.js"
import { parseDownloadOptions, parseLanguagesOptions } from "./options.js"

async function exitWithCode(code: number): Promise<void> {
	if (code === 0) return
	try {
		await flushLogs()
	} catch (err) {
		console.error(`Could not flush logs: ${describeError(err)}`)
	}
	process.exitCode = code
}

/** Errors caused by user input are printed without a stack */
function isUserError(err: unknown): boolean {
	return (
		err instanceof ConfigError ||
		err instanceof CatalogError ||
		err instanceof FileAccessError
	)
}

async function handleFailure(err: unknown): Promise<void> {
	ui.error(describeError(err))
	if (!isUserError(err)) {
		log.cli.error({ err }, "unexpected failure")
	}
	await exitWithCode(1)
}

function increaseVerbosity(_value: string, previous: number): number {
	return previous + 1
}

const config = loadConfig()
const program = new Command()

program
	.name("shelfsync")
	.description("Download and verify the games of a personal library")
	.version(VERSION)

// ─────────────────────────────────────────────────────────────────────────────
// download
// ─────────────────────────────────────────────────────────────────────────────

program
	.command("download")
	.description("Download every game of the catalog that passes the filters")
	.argument(
		"[directory]",
		"Base directory, one subdirectory per game",
		defaultDownloadDirectory(config),
	)
	.option("--catalog <path>", "Library catalog (JSON or JSON Lines)")
	.option("--token-file <path>", "File holding the bearer token")
	.option(
		"-o, --os <os>",
		`Only download files for this operating system (${PLATFORMS.join(", ")})`,
	)
	.option(
		"-l, --language <language>",
		"Only download files in this language, as the store names it",
	)
	.option(
		"--language-fallback-english",
		"Download English files when a game has none in the chosen language",
	)
	.option(
		"--exclude-game-with-language <language>",
		"Skip games that offer this language",
	)
	.option("--no-verify", "Do not hash files; existing files are never resumed")
	.option("--create-md5", "Write the declared MD5 next to each file")
	.option(
		"--retry <count>",
		"Attempts per file before giving up",
		String(config.retryCount),
	)
	.option(
		"--retry-delay <seconds>",
		"Pause between attempts",
		String(config.retryDelay),
	)
	.option(
		"--idle-timeout <seconds>",
		"Fail a transfer after this long without data",
		String(config.idleTimeout),
	)
	.option("--skip-errors", "Carry on with the next file when one fails")
	.option("-n, --dry-run", "Show what would be downloaded")
	.option("--log-file <path>", "Write logs to a file instead of the console")
	.option(
		"-v, --verbose",
		"Show skipped files (twice: raw byte counts)",
		increaseVerbosity,
		0,
	)
	.option("-q, --quiet", "Only print warnings and errors")
	.action(async (directory: string, _options: unknown, command: Command) => {
		try {
			const options = parseDownloadOptions(command.opts())
			const exitCode = await runDownloadCommand(directory, options, config)
			await exitWithCode(exitCode)
		} catch (err) {
			await handleFailure(err)
		}
	})

// ─────────────────────────────────────────────────────────────────────────────
// languages
// ─────────────────────────────────────────────────────────────────────────────

program
	.command("languages")
	.description("List the languages found in the catalog")
	.option("--catalog <path>", "Library catalog (JSON or JSON Lines)")
	.action(async (_options: unknown, command: Command) => {
		try {
			const options = parseLanguagesOptions(command.opts())
			const languages = await listLanguages(
				readCatalog(resolveCatalogPath(options.catalog, config)),
			)
			if (languages.length === 0) {
				ui.info("The catalog has no downloads")
				return
			}
			ui.header("Languages")
			for (const { language, files } of languages) {
				console.log(`  ${language} (${files} file${files === 1 ? "" : "s"})`)
			}
		} catch (err) {
			await handleFailure(err)
		}
	})

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

await program.parseAsync()
