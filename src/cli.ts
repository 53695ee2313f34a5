#!/usr/bin/env node

/**
 * windgauge CLI
 *
 * Live wind power gauge for the terminal.
 *
 * Usage:
 *   windgauge [--base-url <url>] [--dataset <id>] [--page-size <n>]
 *
 * The API key is read from OPENDATA_API_KEY (or apiKey in .windgaugerc).
 */

import { createProgram, reportFatalError } from "./commands/dashboard.js";
import { cliLogger } from "./logger.js";

// Parse and run
createProgram()
	.parseAsync(process.argv)
	.catch((error: unknown) => {
		cliLogger.error({ err: error }, "Dashboard terminated with an error");
		reportFatalError(error);
		process.exitCode = 1;
	});
