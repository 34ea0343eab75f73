import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packages = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "packages");

export default defineConfig({
	resolve: {
		alias: {
			"@loadstone/core": path.join(packages, "core/src/index.ts"),
			"@loadstone/parser": path.join(packages, "parser/src/index.ts"),
			"@loadstone/adapter": path.join(packages, "adapter/src/index.ts"),
			"@loadstone/ingest": path.join(packages, "ingest/src/index.ts"),
		},
	},
	test: {
		include: ["packages/*/src/**/__tests__/**/*.test.ts"],
		testTimeout: 30_000,
	},
});
