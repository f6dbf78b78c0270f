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
			exclude: ["src/cli/**", "src/logger.ts", "src/ui.ts"],
			thresholds: {
				// Critical modules - parsing and path construction
				"src/dat.ts": { statements: 85, branches: 60 },
				"src/storage.ts": { statements: 90, branches: 75 },
				"src/regions.ts": { statements: 90, branches: 75 },
				"src/playlist.ts": { statements: 85, branches: 70 },
			},
		},
	},
})
