import { defineConfig } from "tsup"

export default defineConfig({
	clean: true,
	entry: { cli: "src/cli.ts" },
	format: ["esm"],
	platform: "node",
	sourcemap: true,
	target: "node20",
})
