import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["test/**/*.test.ts"],
		coverage: {
			include: ["source/**/*.ts"],
			exclude: ["**/node_modules/**", "**/dist/**", "**/*.d.ts"],
		},
	},
})
