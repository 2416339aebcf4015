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
			exclude: ["src/cli/**", "src/logger.ts", "src/ui.ts", "src/progress.ts"],
			thresholds: {
				"src/platforms.ts": { statements: 90, branches: 85 },
				"src/core/match.ts": { statements: 95, branches: 90 },
				"src/report.ts": { statements: 90 },
				"src/core/pipeline.ts": { statements: 85 },
			},
		},
	},
})
