import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		coverage: {
			exclude: ["**/index.ts", "src/types/**"],
			include: ["src/**/*.ts"],
			reporter: ["text"],
		},
		environment: "node",
		globals: true,
		restoreMocks: true,
	},
});
