/**
 * Transfer engine: one resumable HTTP download as a lazy stream of chunks
 *
 * - Range header support for resuming partial files
 * - Streams the body chunk by chunk (no memory buffering)
 * - Idle timeout on headers and between body chunks
 * - Pure transport: never touches the disk, never hashes
 */

import { Agent, errors, request, type Dispatcher } from "undici"
import { anonymous, type TokenProvider } from "./credentials.js"
import {
	SkipSignal,
	TimeoutError,
	TransportError,
	describeError,
} from "./errors.js"
import { log } from "./logger.js"
import type { DownloadDescriptor } from "./types.js"

const USER_AGENT = "shelfsync/1.0.0 (+library mirror)"

const MAX_REDIRECTIONS = 5

/** Shared keep-alive agent for all downloads in a run */
export const HTTP_AGENT = new Agent({
	keepAliveTimeout: 30_000,
	connections: 4,
})

/**
 * @param current bytes of the file available so far, resume offset included
 * @param total full file size, 0 while unknown
 */
export type ProgressCallback = (current: number, total: number) => void

export interface TransferResponse {
	/** True when the server honoured the range request (206) */
	resumed: boolean
	/** Byte offset the first chunk starts at */
	offset: number
	/** Full file size, 0 when the server did not say */
	totalBytes: number
	/** Single-pass body stream */
	chunks: AsyncIterable<Buffer>
	/** Release the connection when the chunks will not be consumed to the end */
	cancel(): void
}

export interface Transport {
	download(
		descriptor: DownloadDescriptor,
		onProgress: ProgressCallback,
		startOffset: number | null,
		idleTimeoutSeconds: number,
	): Promise<TransferResponse>
}

export interface HttpTransportOptions {
	tokenProvider?: TokenProvider | undefined
	dispatcher?: Dispatcher | undefined
	userAgent?: string | undefined
}

interface ContentRange {
	start: number
	total: number
}

/**
 * Parse `Content-Range: bytes <start>-<end>/<total|*>`
 */
export function parseContentRange(
	value: string | undefined,
): ContentRange | null {
	if (!value) return null
	const match = value.match(/^bytes\s+(\d+)-(\d+)\/(\d+|\*)$/i)
	if (!match || !match[1] || !match[3]) return null
	return {
		start: parseInt(match[1], 10),
		total: match[3] === "*" ? 0 : parseInt(match[3], 10),
	}
}

function headerValue(
	headers: Record<string, string | string[] | undefined>,
	name: string,
): string | undefined {
	const value = headers[name]
	return Array.isArray(value) ? value[0] : value
}

function toTransportError(
	err: unknown,
	url: string,
	idleTimeoutSeconds: number,
): TransportError {
	if (err instanceof TransportError) return err
	if (
		err instanceof errors.HeadersTimeoutError ||
		err instanceof errors.BodyTimeoutError
	) {
		return new TimeoutError(url, idleTimeoutSeconds, { cause: err })
	}
	return new TransportError(describeError(err), url, { cause: err })
}

/**
 * Downloads over HTTP(S) with undici, attaching a bearer token when the
 * provider has one.
 */
export class HttpTransport implements Transport {
	private readonly tokenProvider: TokenProvider
	private readonly dispatcher: Dispatcher
	private readonly userAgent: string

	constructor(options: HttpTransportOptions = {}) {
		this.tokenProvider = options.tokenProvider ?? anonymous
		this.dispatcher = options.dispatcher ?? HTTP_AGENT
		this.userAgent = options.userAgent ?? USER_AGENT
	}

	async download(
		descriptor: DownloadDescriptor,
		onProgress: ProgressCallback,
		startOffset: number | null,
		idleTimeoutSeconds: number,
	): Promise<TransferResponse> {
		const { url } = descriptor
		const offset = startOffset !== null && startOffset > 0 ? startOffset : 0
		const timeoutMs = Math.round(idleTimeoutSeconds * 1000)

		const headers: Record<string, string> = {
			"user-agent": this.userAgent,
		}
		const token = await this.tokenProvider.getToken()
		if (token) {
			headers["authorization"] = `Bearer ${token}`
		}
		// Request remaining bytes if we have a partial file
		if (offset > 0) {
			headers["range"] = `bytes=${offset}-`
		}

		log.transfer.debug({ url, offset }, "requesting")

		let response: Dispatcher.ResponseData
		try {
			response = await request(url, {
				method: "GET",
				headers,
				dispatcher: this.dispatcher,
				maxRedirections: MAX_REDIRECTIONS,
				headersTimeout: timeoutMs,
				bodyTimeout: timeoutMs,
			})
		} catch (err) {
			throw toTransportError(err, url, idleTimeoutSeconds)
		}

		const { statusCode, body } = response

		if (statusCode === 416) {
			// Range not satisfiable - the partial file is not shorter than the remote one
			await body.dump()
			throw new SkipSignal(
				"range-not-satisfiable",
				`Server cannot resume ${descriptor.name} at byte ${offset}`,
			)
		}

		if (statusCode !== 200 && statusCode !== 206) {
			await body.dump()
			throw new TransportError(`HTTP ${statusCode}`, url, {
				status: statusCode,
			})
		}

		// Determine expected total size
		let totalBytes = 0
		const resumed = statusCode === 206
		if (resumed) {
			const range = parseContentRange(
				headerValue(response.headers, "content-range"),
			)
			if (!range || range.start !== offset) {
				await body.dump()
				throw new TransportError(
					`Server answered range request for byte ${offset} with ${range ? `byte ${range.start}` : "no usable Content-Range"}`,
					url,
					{ status: statusCode },
				)
			}
			totalBytes = range.total
		} else {
			const contentLength = headerValue(response.headers, "content-length")
			if (contentLength) {
				totalBytes = parseInt(contentLength, 10) || 0
			}
			if (offset > 0) {
				log.transfer.debug({ url, offset }, "server ignored range request")
			}
		}

		const start = resumed ? offset : 0
		return {
			resumed,
			offset: start,
			totalBytes,
			chunks: streamBody(body, {
				url,
				start,
				totalBytes,
				idleTimeoutSeconds,
				onProgress,
			}),
			cancel: () => {
				if (!body.destroyed) body.destroy()
			},
		}
	}
}

async function* streamBody(
	body: Dispatcher.ResponseData["body"],
	context: {
		url: string
		start: number
		totalBytes: number
		idleTimeoutSeconds: number
		onProgress: ProgressCallback
	},
): AsyncGenerator<Buffer> {
	const { url, totalBytes, idleTimeoutSeconds, onProgress } = context
	let current = context.start
	onProgress(current, totalBytes)

	try {
		for await (const chunk of body) {
			const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)
			current += buffer.length
			onProgress(current, totalBytes)
			yield buffer
		}
	} catch (err) {
		throw toTransportError(err, url, idleTimeoutSeconds)
	} finally {
		// Abandoned early by the consumer: release the connection
		if (!body.destroyed) {
			body.destroy()
		}
	}
}
