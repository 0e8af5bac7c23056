import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["test/**/*.test.ts"],
		globals: false, // Explicit imports preferred
		environment: "node",
		testTimeout: 30000,
		setupFiles: ["test/helpers/setup.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json-summary", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/cli/index.ts", "src/logger.ts", "src/ui.ts"],
			thresholds: {
				// Data integrity: decide skip, resume or mismatch
				"src/hash.ts": { statements: 95, branches: 90 },
				"src/filters.ts": { statements: 90, branches: 80 },
				"src/paths.ts": { statements: 90 },
				// IO modules - reliability critical
				"src/core/downloader.ts": { statements: 85, branches: 70 },
				"src/transfer.ts": { statements: 80 },
				"src/retry.ts": { statements: 95 },
			},
		},
	},
})
