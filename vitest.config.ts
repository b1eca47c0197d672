import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packages = fileURLToPath(new URL("./packages/", import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@rowfeed/core": `${packages}core/src/index.ts`,
			"@rowfeed/connector-db": `${packages}connector-db/src/index.ts`,
			"@rowfeed/adapter": `${packages}adapter/src/index.ts`,
		},
	},
	test: {
		include: ["packages/*/src/**/__tests__/**/*.test.ts"],
		testTimeout: 10_000,
	},
});
