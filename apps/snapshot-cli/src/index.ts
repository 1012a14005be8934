#!/usr/bin/env node

import { createLogger } from "@tickercast/core";
import { runSnapshotCli } from "./run";

const logger = createLogger("snapshot-cli");

runSnapshotCli(process.argv.slice(2)).catch((error) => {
	logger.error("cli_unhandled_error", {
		message: error instanceof Error ? error.message : String(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exitCode = 1;
});
