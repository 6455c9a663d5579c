import { preact } from "@preact/preset-vite";
import { loadEnv } from "vite";
import { defineConfig } from "vitest/config";

// Load env from the frontend directory (where this config file lives)
const devEnv = loadEnv("development", new URL(".", import.meta.url).pathname);

export default defineConfig({
	base: "/",
	build: {
		minify: "esbuild",
		target: "es2022",
	},
	envPrefix: ["NODE_", "VITE_"],
	plugins: [preact()],
	server: {
		open: process.env.NODE_ENV === "development",
		host: devEnv.VITE_HOST ?? true,
		port: devEnv.VITE_PORT ? Number.parseInt(devEnv.VITE_PORT, 10) : 8034,
		proxy: {
			"/api/identity": devEnv.VITE_IDENTITY_PROXY_TARGET ?? "http://localhost:7034",
		},
	},
	test: {
		coverage: {
			exclude: ["**/*.d.ts", "**/index.ts"],
			include: ["src/**"],
			reporter: ["text"],
		},
		environment: "jsdom",
		globals: true,
		pool: "forks",
		restoreMocks: true,
		setupFiles: ["./src/util/Vitest.ts"],
	},
});
