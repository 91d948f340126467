import { defineConfig } from "vitest/config";

export default defineConfig({
	// Load decimal.js-light's CommonJS entry as Node does, not its ESM build.
	resolve: {
		alias: { "decimal.js-light": "decimal.js-light/decimal.js" },
	},
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		benchmark: {
			include: ["benches/**/*.bench.ts"],
		},
	},
});
