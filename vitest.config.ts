import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["tests/**/*.test.ts"],
		exclude: ["**/node_modules/**", "**/dist/**"],
		coverage: {
			exclude: [
				"**/node_modules/**",
				"**/dist/**",
				"**/tests/**",
				"vitest.config.ts",
			],
		},
	},
});
