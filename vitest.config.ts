import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["src/__tests__/**/*.test.ts"],
		testTimeout: 10000,
		hookTimeout: 10000,
		env: {
			// Keep session logs out of test output
			LOG_LEVEL: "silent",
		},
		coverage: {
			provider: "v8",
			reporter: ["text", "html", "json-summary"],
			include: ["src/**/*.ts"],
			exclude: ["src/__tests__/**", "src/index.ts", "src/cli.ts"],
			// Coverage thresholds enforced at 70%
			thresholds: {
				lines: 70,
				functions: 70,
				branches: 70,
				statements: 70,
			},
		},
	},
});
