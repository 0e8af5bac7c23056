/**
 * Unit tests for the HTTP transfer engine
 *
 * Runs against an in-process HTTP server; nothing leaves the machine.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from "vitest"
import { Agent } from "undici"
import { createTokenProvider } from "../../src/credentials.js"
import {
	SkipSignal,
	TimeoutError,
	TransportError,
} from "../../src/errors.js"
import {
	HttpTransport,
	parseContentRange,
	type TransferResponse,
} from "../../src/transfer.js"
import {
	descriptor,
	serveRanges,
	startServer,
	type RequestHandler,
	type TestServer,
} from "../helpers/index.js"

const BODY = Buffer.from("0123456789abcdefghij")

async function readAll(response: TransferResponse): Promise<Buffer> {
	const parts: Buffer[] = []
	for await (const chunk of response.chunks) parts.push(chunk)
	return Buffer.concat(parts)
}

describe("parseContentRange", () => {
	it("parses a complete range", () => {
		expect(parseContentRange("bytes 4-19/20")).toEqual({ start: 4, total: 20 })
	})

	it("reports an unknown total as 0", () => {
		expect(parseContentRange("bytes 4-19/*")).toEqual({ start: 4, total: 0 })
	})

	it("rejects anything else", () => {
		expect(parseContentRange(undefined)).toBeNull()
		expect(parseContentRange("bytes */20")).toBeNull()
		expect(parseContentRange("items 0-1/2")).toBeNull()
	})
})

describe("HttpTransport", () => {
	let server: TestServer
	let agent: Agent
	let handler: RequestHandler
	let transport: HttpTransport

	beforeAll(async () => {
		server = await startServer((req, res) => handler(req, res))
		agent = new Agent({ keepAliveTimeout: 10 })
		transport = new HttpTransport({ dispatcher: agent })
	})

	afterAll(async () => {
		await server.close()
		await agent.close()
	})

	beforeEach(() => {
		server.requests.length = 0
		handler = (req, res) => serveRanges(req, res, BODY)
	})

	function file(path = "/file.bin") {
		return descriptor({ name: "file", url: `${server.url}${path}` })
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Fresh and resumed transfers
	// ─────────────────────────────────────────────────────────────────────────

	describe("fresh transfer", () => {
		it("streams the whole body and reports its size", async () => {
			const progress: Array<[number, number]> = []
			const response = await transport.download(
				file(),
				(current, total) => progress.push([current, total]),
				null,
				3,
			)

			expect(response).toMatchObject({ resumed: false, offset: 0, totalBytes: 20 })
			expect((await readAll(response)).toString()).toBe(BODY.toString())
			expect(progress[0]).toEqual([0, 20])
			expect(progress.at(-1)).toEqual([20, 20])
		})

		it("sends no Range header", async () => {
			await readAll(await transport.download(file(), () => {}, null, 3))
			expect(server.requests[0]?.headers.range).toBeUndefined()
		})

		it("treats an offset of 0 as a fresh transfer", async () => {
			await readAll(await transport.download(file(), () => {}, 0, 3))
			expect(server.requests[0]?.headers.range).toBeUndefined()
		})
	})

	describe("resumed transfer", () => {
		it("requests the bytes after the offset", async () => {
			const progress: Array<[number, number]> = []
			const response = await transport.download(
				file(),
				(current, total) => progress.push([current, total]),
				8,
				3,
			)

			expect(server.requests[0]?.headers.range).toBe("bytes=8-")
			expect(response).toMatchObject({ resumed: true, offset: 8, totalBytes: 20 })
			expect((await readAll(response)).toString()).toBe("89abcdefghij")
			expect(progress[0]).toEqual([8, 20])
			expect(progress.at(-1)).toEqual([20, 20])
		})

		it("starts over when the server ignores the range", async () => {
			handler = (_req, res) => {
				res.writeHead(200, { "content-length": BODY.length })
				res.end(BODY)
			}
			const response = await transport.download(file(), () => {}, 8, 3)

			expect(response).toMatchObject({ resumed: false, offset: 0, totalBytes: 20 })
			expect(await readAll(response)).toEqual(BODY)
		})

		it("skips when the range cannot be satisfied", async () => {
			const error = await transport
				.download(file(), () => {}, 20, 3)
				.catch((err: unknown) => err)

			expect(error).toBeInstanceOf(SkipSignal)
			expect(error).toMatchObject({ reason: "range-not-satisfiable" })
		})

		it("fails when the server answers for another offset", async () => {
			handler = (_req, res) => {
				res.writeHead(206, {
					"content-length": 10,
					"content-range": "bytes 10-19/20",
				})
				res.end(BODY.subarray(10))
			}

			await expect(
				transport.download(file(), () => {}, 8, 3),
			).rejects.toThrow("Server answered range request for byte 8 with byte 10")
		})
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Requests
	// ─────────────────────────────────────────────────────────────────────────

	describe("requests", () => {
		it("sends the bearer token from the provider", async () => {
			const authed = new HttpTransport({
				dispatcher: agent,
				tokenProvider: createTokenProvider({ token: "test-secret" }),
			})
			await readAll(await authed.download(file(), () => {}, null, 3))

			expect(server.requests[0]?.headers.authorization).toBe("Bearer test-secret")
		})

		it("sends no authorization header without a token", async () => {
			await readAll(await transport.download(file(), () => {}, null, 3))
			expect(server.requests[0]?.headers.authorization).toBeUndefined()
		})

		it("identifies itself with the user agent", async () => {
			const custom = new HttpTransport({ dispatcher: agent, userAgent: "test-agent" })
			await readAll(await custom.download(file(), () => {}, null, 3))
			expect(server.requests[0]?.headers["user-agent"]).toBe("test-agent")
		})

		it("follows redirects to the file", async () => {
			handler = (req, res) => {
				if (req.url === "/redirect") {
					res.writeHead(302, { location: "/file.bin" })
					res.end()
					return
				}
				serveRanges(req, res, BODY)
			}
			const response = await transport.download(file("/redirect"), () => {}, null, 3)

			expect(await readAll(response)).toEqual(BODY)
			expect(server.requests.map(r => r.url)).toEqual(["/redirect", "/file.bin"])
		})
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Failures
	// ─────────────────────────────────────────────────────────────────────────

	describe("failures", () => {
		it("reports HTTP errors with their status", async () => {
			handler = (_req, res) => {
				res.writeHead(503)
				res.end("busy")
			}
			const error = await transport
				.download(file(), () => {}, null, 3)
				.catch((err: unknown) => err)

			expect(error).toBeInstanceOf(TransportError)
			expect(error).toMatchObject({ message: "HTTP 503", status: 503 })
		})

		it("times out when no headers arrive", async () => {
			handler = () => {}
			const error = await transport
				.download(file(), () => {}, null, 0.2)
				.catch((err: unknown) => err)

			expect(error).toBeInstanceOf(TimeoutError)
			expect(error).toMatchObject({ message: "No data received for 0.2s" })
		})

		it("times out when the body stalls", async () => {
			handler = (_req, res) => {
				res.writeHead(200, { "content-length": BODY.length })
				res.write(BODY.subarray(0, 5))
			}
			const response = await transport.download(file(), () => {}, null, 0.2)

			await expect(readAll(response)).rejects.toBeInstanceOf(TimeoutError)
		})

		it("maps connection failures to TransportError", async () => {
			const closed = await startServer(() => {})
			const url = closed.url
			await closed.close()

			const error = await transport
				.download(descriptor({ url: `${url}/file.bin` }), () => {}, null, 3)
				.catch((err: unknown) => err)

			expect(error).toBeInstanceOf(TransportError)
			expect(error).not.toBeInstanceOf(TimeoutError)
		})
	})
})
