/**
 * Dashboard command
 *
 * Builds the commander program for the `windgauge` CLI and the fatal error
 * report printed when a session ends with an error.
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import chalk from "chalk";
import { Command } from "commander";
import { type CliOptions, resolveSettings, type Settings } from "../config.js";
import { getErrorMessage } from "../errors.js";
import { cliLogger } from "../logger.js";
import { PowerDataClient } from "../power-data.js";
import { runPowerDashboard } from "../power-dashboard.js";
import type { TerminalWriter } from "../terminal.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

// Get version from package.json
function getVersion(): string {
	try {
		const pkgPath = join(__dirname, "..", "..", "package.json");
		const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
		if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
			return pkg.version;
		}
	} catch (error) {
		cliLogger.debug({ error: getErrorMessage(error) }, "Could not read package version");
	}
	return "0.1.0";
}

/**
 * Start a dashboard session on the real terminal
 */
export async function startDashboard(settings: Settings): Promise<void> {
	const source = new PowerDataClient(settings);
	await runPowerDashboard({ source, input: process.stdin, out: process.stdout });
}

export interface ProgramDeps {
	resolve?: (options: CliOptions) => Settings;
	run?: (settings: Settings) => Promise<void>;
}

/**
 * Create the CLI program
 */
export function createProgram(deps: ProgramDeps = {}): Command {
	const resolve = deps.resolve ?? ((options: CliOptions) => resolveSettings(options));
	const run = deps.run ?? startDashboard;

	const program = new Command();

	program
		.name("windgauge")
		.description("Live wind power gauge for the terminal. Press Esc or q to quit.")
		.version(getVersion())
		.option("--base-url <url>", "Open-data API root")
		.option("--dataset <id>", "Dataset id to chart")
		.option("--page-size <n>", "Historical query page size (1-20000)")
		.action(async (options: CliOptions) => {
			const settings = resolve(options);
			cliLogger.info(
				{ baseUrl: settings.baseUrl, datasetId: settings.datasetId, hasApiKey: settings.apiKey !== undefined },
				"Starting dashboard",
			);
			await run(settings);
		});

	return program;
}

/**
 * Print an unhandled error and its stack in red
 */
export function reportFatalError(error: unknown, err: TerminalWriter = process.stderr): void {
	err.write(`${chalk.red(`Unhandled error: ${getErrorMessage(error)}`)}\n`);
	if (error instanceof Error && error.stack) {
		err.write(`${chalk.red(error.stack)}\n`);
	}
}
