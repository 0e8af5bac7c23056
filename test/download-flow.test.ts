/**
 * End-to-end download flow: catalog file -> HTTP transport -> disk
 *
 * Runs the real transfer engine against an in-process HTTP server.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from "vitest"
import { createHash } from "node:crypto"
import { existsSync } from "node:fs"
import { mkdir, readFile, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { Agent } from "undici"
import { readCatalog } from "../src/catalog.js"
import { downloadLibrary } from "../src/core/downloader.js"
import type { DownloadEvent, DownloaderOptions } from "../src/core/types.js"
import { createTokenProvider } from "../src/credentials.js"
import { TooManyRetriesError } from "../src/errors.js"
import { resolveDownloadFilter } from "../src/filters.js"
import { HttpTransport } from "../src/transfer.js"
import {
	serveRanges,
	startServer,
	withTempDir,
	type TestServer,
} from "./helpers/index.js"

const INSTALLER = Buffer.from("installer-bytes-".repeat(64))
const PATCH = Buffer.from("patch-bytes")

function md5(data: Buffer): string {
	return createHash("md5").update(data).digest("hex")
}

describe("download flow", () => {
	let server: TestServer
	let agent: Agent
	let failing = false

	beforeAll(async () => {
		server = await startServer((req, res) => {
			if (req.headers.authorization !== "Bearer test-secret") {
				res.writeHead(401)
				res.end()
				return
			}
			if (failing) {
				res.writeHead(500)
				res.end()
				return
			}
			if (req.url === "/files/setup_rogue.exe") return serveRanges(req, res, INSTALLER)
			if (req.url === "/files/patch_rogue.exe") return serveRanges(req, res, PATCH)
			if (req.url === "/files/setup_rogue_fr.exe") return serveRanges(req, res, INSTALLER)
			res.writeHead(404)
			res.end()
		})
		agent = new Agent({ keepAliveTimeout: 10 })
	})

	afterAll(async () => {
		await server.close()
		await agent.close()
	})

	beforeEach(() => {
		server.requests.length = 0
		failing = false
	})

	async function writeCatalog(dir: string): Promise<string> {
		const games = [
			{
				id: 10,
				title: "Rogue Legacy: Deluxe",
				downloads: [
					{
						name: "Rogue Legacy",
						language: "English",
						platform: "linux",
						url: `${server.url}/files/setup_rogue.exe`,
						size: INSTALLER.length,
						md5: md5(INSTALLER),
					},
					{
						name: "Rogue Legacy Patch",
						language: "English",
						platform: "linux",
						url: `${server.url}/files/patch_rogue.exe`,
						size: PATCH.length,
						md5: md5(PATCH),
					},
					{
						name: "Rogue Legacy (French)",
						language: "French",
						platform: "linux",
						url: `${server.url}/files/setup_rogue_fr.exe`,
						size: INSTALLER.length,
						md5: md5(INSTALLER),
					},
				],
			},
		]
		const path = join(dir, "catalog.jsonl")
		await writeFile(path, games.map(g => JSON.stringify(g)).join("\n"))
		return path
	}

	function options(targetDir: string, overrides: Partial<DownloaderOptions> = {}): DownloaderOptions {
		return {
			targetDir,
			filter: resolveDownloadFilter({ os: "linux", language: "English" }),
			transport: new HttpTransport({
				dispatcher: agent,
				tokenProvider: createTokenProvider({ token: "test-secret" }),
			}),
			retryCount: 3,
			retryDelay: 0,
			idleTimeout: 3,
			skipErrors: false,
			dryRun: false,
			createChecksums: true,
			verify: true,
			...overrides,
		}
	}

	async function collect(
		generator: AsyncGenerator<DownloadEvent, unknown>,
	): Promise<DownloadEvent[]> {
		const events: DownloadEvent[] = []
		for await (const event of generator) events.push(event)
		return events
	}

	it("downloads, resumes and verifies the filtered files", async () => {
		await withTempDir(async dir => {
			const catalogPath = await writeCatalog(dir)
			const gameDir = join(dir, "library", "Rogue_Legacy_Deluxe")
			await mkdir(gameDir, { recursive: true })
			await writeFile(join(gameDir, "setup_rogue.exe"), INSTALLER.subarray(0, 100))

			const events = await collect(
				downloadLibrary(readCatalog(catalogPath), options(join(dir, "library"))),
			)

			expect(await readFile(join(gameDir, "setup_rogue.exe"))).toEqual(INSTALLER)
			expect(await readFile(join(gameDir, "patch_rogue.exe"))).toEqual(PATCH)
			expect(existsSync(join(gameDir, "setup_rogue_fr.exe"))).toBe(false)
			expect(await readFile(join(gameDir, "setup_rogue.exe.md5"), "utf-8")).toBe(
				md5(INSTALLER),
			)
			expect(server.requests.map(r => [r.url, r.headers.range])).toEqual([
				["/files/setup_rogue.exe", "bytes=100-"],
				["/files/patch_rogue.exe", undefined],
			])
			expect(events.filter(e => e.type === "hash-mismatch")).toEqual([])
			expect(
				events.flatMap(e => (e.type === "skip" ? [e.reason] : [])),
			).toEqual(["language-filter"])
		})
	})

	it("makes no request on a second run", async () => {
		await withTempDir(async dir => {
			const catalogPath = await writeCatalog(dir)
			const target = join(dir, "library")

			await collect(downloadLibrary(readCatalog(catalogPath), options(target)))
			const firstRun = server.requests.length
			const events = await collect(
				downloadLibrary(readCatalog(catalogPath), options(target)),
			)

			expect(firstRun).toBe(2)
			expect(server.requests).toHaveLength(2)
			expect(
				events.flatMap(e => (e.type === "skip" ? [e.reason] : [])),
			).toEqual(["exists-valid", "exists-valid", "language-filter"])
		})
	})

	it("stays offline in a dry run", async () => {
		await withTempDir(async dir => {
			const catalogPath = await writeCatalog(dir)
			const gameDir = join(dir, "library", "Rogue_Legacy_Deluxe")

			await collect(
				downloadLibrary(
					readCatalog(catalogPath),
					options(join(dir, "library"), { dryRun: true }),
				),
			)

			expect(server.requests).toEqual([])
			expect(existsSync(join(gameDir, "setup_rogue.exe"))).toBe(false)
			expect(await readFile(join(gameDir, "patch_rogue.exe.md5"), "utf-8")).toBe(
				md5(PATCH),
			)
		})
	})

	it("halts after the retries of a failing file run out", async () => {
		await withTempDir(async dir => {
			failing = true
			const catalogPath = await writeCatalog(dir)

			const error = await collect(
				downloadLibrary(
					readCatalog(catalogPath),
					options(join(dir, "library"), { retryCount: 2 }),
				),
			).catch((err: unknown) => err)

			expect(error).toBeInstanceOf(TooManyRetriesError)
			expect(error).toMatchObject({
				message: "Giving up after 2 attempts: HTTP 500",
			})
			expect(server.requests.map(r => r.url)).toEqual([
				"/files/setup_rogue.exe",
				"/files/setup_rogue.exe",
			])
		})
	})
})
