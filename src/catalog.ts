/**
 * Catalog source: owned games and their download descriptors
 *
 * Reads a JSON array (or `{ "games": [...] }`) or a JSON Lines file with one
 * game per line. JSON Lines files are parsed lazily so downloads can start
 * before the whole catalog has been read.
 */

import { once } from "node:events"
import { createReadStream } from "node:fs"
import { readFile } from "node:fs/promises"
import { extname } from "node:path"
import { createInterface } from "node:readline"
import { z } from "zod"
import { CatalogError, describeError } from "./errors.js"
import { log } from "./logger.js"
import {
	PLATFORMS,
	type CatalogSource,
	type DownloadDescriptor,
	type GameEntry,
} from "./types.js"

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

const DownloadDescriptorSchema = z.object({
	name: z.string().min(1),
	language: z.string().min(1),
	platform: z.enum(PLATFORMS),
	url: z.string().url(),
	size: z.number().int().nonnegative().default(0),
	md5: z
		.string()
		.regex(/^[a-fA-F0-9]{32}$/, "must be a 32-character hex MD5 digest")
		.nullish(),
})

const GameEntrySchema = z.object({
	id: z.number().int(),
	title: z.string().min(1),
	downloads: z.array(DownloadDescriptorSchema).default([]),
})

const CatalogFileSchema = z.union([
	z.array(z.unknown()),
	z.object({ games: z.array(z.unknown()) }),
])

const JSON_LINES_EXTENSIONS = new Set([".jsonl", ".ndjson"])

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
		.join("; ")
}

/**
 * Validate one raw catalog record
 * @param where position used in error messages ("line 3", "entry 0")
 */
export function parseGameEntry(raw: unknown, where: string): GameEntry {
	const result = GameEntrySchema.safeParse(raw)
	if (!result.success) {
		throw new CatalogError(
			`Invalid game at ${where}: ${formatIssues(result.error)}`,
		)
	}
	const { id, title, downloads } = result.data
	return {
		id,
		title,
		downloads: downloads.map(
			(d): DownloadDescriptor => ({
				name: d.name,
				language: d.language,
				platform: d.platform,
				url: d.url,
				size: d.size,
				md5: d.md5 ? d.md5.toLowerCase() : null,
			}),
		),
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Readers
// ─────────────────────────────────────────────────────────────────────────────

async function* readJsonLines(path: string): AsyncGenerator<GameEntry> {
	const input = createReadStream(path, { encoding: "utf-8" })
	try {
		// readline does not surface open failures to its iterator
		await once(input, "open")
	} catch (err) {
		throw new CatalogError(`Cannot read catalog ${path}: ${describeError(err)}`, {
			cause: err,
		})
	}
	const lines = createInterface({ input, crlfDelay: Infinity })

	let lineNumber = 0
	try {
		for await (const line of lines) {
			lineNumber++
			if (!line.trim()) continue

			let raw: unknown
			try {
				raw = JSON.parse(line)
			} catch (err) {
				throw new CatalogError(
					`Invalid JSON at line ${lineNumber} of ${path}: ${describeError(err)}`,
					{ cause: err },
				)
			}
			yield parseGameEntry(raw, `line ${lineNumber}`)
		}
	} catch (err) {
		if (err instanceof CatalogError) throw err
		throw new CatalogError(`Cannot read catalog ${path}: ${describeError(err)}`, {
			cause: err,
		})
	} finally {
		lines.close()
	}
}

async function* readJsonDocument(path: string): AsyncGenerator<GameEntry> {
	let raw: unknown
	try {
		raw = JSON.parse(await readFile(path, "utf-8"))
	} catch (err) {
		throw new CatalogError(`Cannot read catalog ${path}: ${describeError(err)}`, {
			cause: err,
		})
	}

	const document = CatalogFileSchema.safeParse(raw)
	if (!document.success) {
		throw new CatalogError(
			`Catalog ${path} must be an array of games or an object with a "games" array`,
		)
	}

	const entries = Array.isArray(document.data)
		? document.data
		: document.data.games
	log.catalog.debug({ path, games: entries.length }, "catalog loaded")

	for (const [index, entry] of entries.entries()) {
		yield parseGameEntry(entry, `entry ${index}`)
	}
}

/**
 * Lazily yield the games of a catalog file
 * @throws CatalogError when the file is unreadable or a record is invalid
 */
export function readCatalog(path: string): AsyncGenerator<GameEntry> {
	return JSON_LINES_EXTENSIONS.has(extname(path).toLowerCase())
		? readJsonLines(path)
		: readJsonDocument(path)
}

// ─────────────────────────────────────────────────────────────────────────────
// Languages
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Count downloads per store-local language name, sorted by name
 */
export async function listLanguages(
	catalog: CatalogSource,
): Promise<Array<{ language: string; files: number }>> {
	const counts = new Map<string, number>()
	for await (const game of catalog) {
		for (const download of game.downloads) {
			counts.set(download.language, (counts.get(download.language) ?? 0) + 1)
		}
	}
	return [...counts.entries()]
		.map(([language, files]) => ({ language, files }))
		.sort((a, b) => a.language.localeCompare(b.language))
}
