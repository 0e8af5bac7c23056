/**
 * Unit tests for command-line option validation
 */

import { describe, it, expect } from "vitest"
import { parseDownloadOptions } from "../../src/cli/options.js"
import { ConfigError } from "../../src/errors.js"

const commanderDefaults = {
	verify: true,
	retry: "3",
	retryDelay: "1",
	idleTimeout: "3",
	verbose: 0,
}

describe("parseDownloadOptions", () => {
	it("converts numeric strings and fills flag defaults", () => {
		expect(parseDownloadOptions(commanderDefaults)).toEqual({
			verify: true,
			retry: 3,
			retryDelay: 1,
			idleTimeout: 3,
			verbose: 0,
			languageFallbackEnglish: false,
			skipErrors: false,
			dryRun: false,
			createMd5: false,
			quiet: false,
		})
	})

	it("keeps the --no-verify flag", () => {
		expect(parseDownloadOptions({ ...commanderDefaults, verify: false }).verify).toBe(
			false,
		)
	})

	it("accepts fractional delays and timeouts", () => {
		const options = parseDownloadOptions({
			...commanderDefaults,
			retryDelay: "0.5",
			idleTimeout: "1.5",
		})
		expect([options.retryDelay, options.idleTimeout]).toEqual([0.5, 1.5])
	})

	it("rejects a retry count below one, naming the flag", () => {
		expect(() => parseDownloadOptions({ ...commanderDefaults, retry: "0" })).toThrow(
			ConfigError,
		)
		expect(() => parseDownloadOptions({ ...commanderDefaults, retry: "0" })).toThrow(
			"Invalid options: --retry: must be at least 1",
		)
	})

	it("rejects a non-numeric idle timeout", () => {
		expect(() =>
			parseDownloadOptions({ ...commanderDefaults, idleTimeout: "soon" }),
		).toThrow(/^Invalid options: --idle-timeout: /)
	})
})
