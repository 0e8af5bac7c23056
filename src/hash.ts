/**
 * File hashing utilities
 * MD5 digests for verifying downloads against the store's published checksums
 */

import { createReadStream } from "node:fs"
import { createHash, type Hash } from "node:crypto"
import { FileAccessError, describeError } from "./errors.js"

export interface HashedPrefix {
	/** Live MD5 context holding every byte of the file; can be extended */
	hash: Hash
	size: number
}

/**
 * Stream a file into a fresh MD5 context.
 * Uses streaming so installers of several GB never sit in memory.
 */
export async function hashPrefix(filePath: string): Promise<HashedPrefix> {
	const hash = createHash("md5")
	let size = 0

	try {
		const stream = createReadStream(filePath, { highWaterMark: 1024 * 1024 })
		for await (const chunk of stream) {
			const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)
			hash.update(buffer)
			size += buffer.length
		}
	} catch (err) {
		throw new FileAccessError(
			`Cannot read ${filePath}: ${describeError(err)}`,
			filePath,
			{ cause: err },
		)
	}

	return { hash, size }
}

/**
 * Calculate the MD5 hex digest of a file
 */
export async function hashFile(filePath: string): Promise<string> {
	const { hash } = await hashPrefix(filePath)
	return hash.digest("hex")
}

/**
 * Hex digest of a context without finalizing it, so more bytes can follow
 */
export function peekDigest(hash: Hash): string {
	return hash.copy().digest("hex")
}
