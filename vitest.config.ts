import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["src/**/__tests__/**/*.spec.ts", "packages/*/src/**/__tests__/**/*.test.ts"],
		environment: "node",
		testTimeout: 20_000,
	},
})
