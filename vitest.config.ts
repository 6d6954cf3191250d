import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const resolvePath = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
	test: {
		watch: false,
		fileParallelism: true,
		include: ["tests/**/*.test.ts"],
		exclude: ["node_modules"],
		testTimeout: 15_000,
	},
	resolve: {
		alias: {
			rawtap: resolvePath("./packages/core/src"),
			"@rawtap/protocol-tcp": resolvePath("./packages/protocol-tcp/src"),
		},
	},
});
