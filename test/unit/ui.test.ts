/**
 * Unit tests for summary output
 */

import { describe, it, expect, vi, afterEach } from "vitest"
import { ui } from "../../src/ui.js"

describe("ui.failureSection", () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	it("lists each failed item under a counted title", () => {
		const output = vi.spyOn(console, "log").mockImplementation(() => {})
		ui.failureSection("Downloads Failed", [
			"Witcher 3: witcher-en - HTTP 404",
			"Beta: beta - connection reset",
		])

		const lines = output.mock.calls.map(call => String(call[0]))
		expect(lines).toHaveLength(3)
		expect(lines[0]).toContain("Downloads Failed (2):")
		expect(lines.slice(1)).toEqual([
			"  ✗ Witcher 3: witcher-en - HTTP 404",
			"  ✗ Beta: beta - connection reset",
		])
	})

	it("prints nothing without failures", () => {
		const output = vi.spyOn(console, "log").mockImplementation(() => {})
		ui.failureSection("Downloads Failed", [])
		expect(output).not.toHaveBeenCalled()
	})
})
