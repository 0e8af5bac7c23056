/**
 * Unit tests for file hashing
 *
 * MD5 digests decide whether a file is skipped, resumed or flagged, so they
 * are checked against known values.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest"
import { mkdtempSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { FileAccessError } from "../../src/errors.js"
import { hashFile, hashPrefix, peekDigest } from "../../src/hash.js"

const HELLO_MD5 = "5d41402abc4b2a76b9719d911017c592"
const EMPTY_MD5 = "d41d8cd98f00b204e9800998ecf8427e"

describe("hashFile", () => {
	let tempDir: string

	beforeAll(() => {
		tempDir = mkdtempSync(join(tmpdir(), "shelfsync-hash-"))
		writeFileSync(join(tempDir, "hello.bin"), "hello")
		writeFileSync(join(tempDir, "empty.bin"), "")
	})

	afterAll(() => {
		rmSync(tempDir, { recursive: true, force: true })
	})

	it("computes the MD5 of known content", async () => {
		expect(await hashFile(join(tempDir, "hello.bin"))).toBe(HELLO_MD5)
	})

	it("computes the MD5 of an empty file", async () => {
		expect(await hashFile(join(tempDir, "empty.bin"))).toBe(EMPTY_MD5)
	})

	it("returns lowercase hexadecimal", async () => {
		expect(await hashFile(join(tempDir, "hello.bin"))).toMatch(/^[a-f0-9]{32}$/)
	})

	it("wraps read failures in FileAccessError", async () => {
		const missing = join(tempDir, "missing.bin")
		const error = await hashFile(missing).catch((err: unknown) => err)
		expect(error).toBeInstanceOf(FileAccessError)
		expect(error).toMatchObject({ path: missing })
	})
})

describe("hashPrefix", () => {
	let tempDir: string

	beforeAll(() => {
		tempDir = mkdtempSync(join(tmpdir(), "shelfsync-prefix-"))
		writeFileSync(join(tempDir, "partial.bin"), "hel")
	})

	afterAll(() => {
		rmSync(tempDir, { recursive: true, force: true })
	})

	it("reports the number of bytes hashed", async () => {
		const { size } = await hashPrefix(join(tempDir, "partial.bin"))
		expect(size).toBe(3)
	})

	it("returns a context that can be extended with the remaining bytes", async () => {
		const { hash } = await hashPrefix(join(tempDir, "partial.bin"))
		hash.update(Buffer.from("lo"))
		expect(hash.digest("hex")).toBe(HELLO_MD5)
	})
})

describe("peekDigest", () => {
	it("does not finalize the context", async () => {
		const dir = mkdtempSync(join(tmpdir(), "shelfsync-peek-"))
		try {
			writeFileSync(join(dir, "partial.bin"), "hel")
			const { hash } = await hashPrefix(join(dir, "partial.bin"))
			expect(peekDigest(hash)).not.toBe(HELLO_MD5)
			hash.update("lo")
			expect(peekDigest(hash)).toBe(HELLO_MD5)
			expect(hash.digest("hex")).toBe(HELLO_MD5)
		} finally {
			rmSync(dir, { recursive: true, force: true })
		}
	})
})
