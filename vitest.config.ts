import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

export default defineConfig({
	resolve: {
		alias: {
			"@": fileURLToPath(new URL(".", import.meta.url)),
		},
	},
	test: {
		coverage: {
			exclude: ["**/node_modules/**", "**/dist/**", "**/*.test.ts", "tests/**"],
			include: ["src/**/*.ts"],
			provider: "v8",
			reporter: ["text", "json", "html"],
		},
		environment: "node",
		exclude: ["**/node_modules/**", "**/dist/**"],
		globals: false,
		include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
	},
})
