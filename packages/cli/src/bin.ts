#!/usr/bin/env tsx

import { runCli } from "./cli";
import { fatal, warn } from "./output";

const INTERRUPTED_EXIT_CODE = 130;

async function main(): Promise<void> {
	const controller = new AbortController();

	// First interrupt stops between sources; a second one exits at once
	process.on("SIGINT", () => {
		if (controller.signal.aborted) {
			process.exit(INTERRUPTED_EXIT_CODE);
		}
		warn("Interrupted; stopping after the current source. Press Ctrl+C again to exit now.");
		controller.abort();
	});

	const code = await runCli(process.argv, { env: process.env, signal: controller.signal });
	process.exit(code);
}

main().catch((err) => {
	fatal(String(err));
});
