/**
 * Bearer token providers for authenticated downloads
 *
 * Obtaining and refreshing tokens happens elsewhere. A token file is re-read on
 * every request so an external refresher can rotate it during a long run.
 */

import { readFile } from "node:fs/promises"
import { z } from "zod"
import { FileAccessError, describeError } from "./errors.js"

export interface TokenProvider {
	/** Current bearer token, or null to send requests unauthenticated */
	getToken(): Promise<string | null>
}

export interface TokenProviderOptions {
	token?: string | undefined
	tokenFile?: string | undefined
}

const TokenFileSchema = z.object({
	access_token: z.string().min(1),
})

export const anonymous: TokenProvider = {
	getToken: () => Promise.resolve(null),
}

/**
 * Parse the contents of a token file: raw token text or JSON with an
 * `access_token` field.
 */
export function parseTokenFile(contents: string): string | null {
	const trimmed = contents.trim()
	if (!trimmed) return null
	if (!trimmed.startsWith("{")) return trimmed

	let parsed: unknown
	try {
		parsed = JSON.parse(trimmed)
	} catch {
		return null
	}
	const result = TokenFileSchema.safeParse(parsed)
	return result.success ? result.data.access_token : null
}

export function createTokenProvider(
	options: TokenProviderOptions,
): TokenProvider {
	const { token, tokenFile } = options
	if (token) {
		return { getToken: () => Promise.resolve(token) }
	}
	if (tokenFile) {
		return {
			async getToken() {
				let contents: string
				try {
					contents = await readFile(tokenFile, "utf-8")
				} catch (err) {
					throw new FileAccessError(
						`Cannot read token file ${tokenFile}: ${describeError(err)}`,
						tokenFile,
						{ cause: err },
					)
				}
				return parseTokenFile(contents)
			},
		}
	}
	return anonymous
}
