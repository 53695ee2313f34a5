/**
 * Power dashboard session
 *
 * Wires the pieces together for one run: compute the gauge scale, start the
 * exit key listener, tick until the user quits, and hand the terminal back.
 * Any fetch failure ends the session by propagating to the caller.
 */

import { DashboardLoop } from "./dashboard-loop.js";
import { createDashboardState } from "./dashboard-state.js";
import { type KeyInput, listenForExitKeys } from "./key-listener.js";
import { dashboardLogger } from "./logger.js";
import type { LatestReadingSource } from "./power-data.js";
import type { WaitFn } from "./retry-handler.js";
import { ANSI, type TerminalWriter } from "./terminal.js";

/**
 * Everything the session needs from the data client
 */
export interface PowerDataSource extends LatestReadingSource {
	getMaxPower(): Promise<number>;
}

export interface PowerDashboardOptions {
	source: PowerDataSource;
	input: KeyInput;
	out: TerminalWriter;
	now?: () => Date;
	wait?: WaitFn;
}

export async function runPowerDashboard(options: PowerDashboardOptions): Promise<void> {
	const { source, input, out } = options;
	const controller = new AbortController();
	let stopListening: (() => void) | null = null;

	out.write(ANSI.hideCursor);
	try {
		const maxPower = await source.getMaxPower();
		dashboardLogger.info({ maxPower }, "Dashboard starting");

		stopListening = listenForExitKeys({ input, out, onExit: () => controller.abort() });

		const loop = new DashboardLoop({
			source,
			state: createDashboardState(maxPower),
			out,
			signal: controller.signal,
			now: options.now,
			wait: options.wait,
		});
		await loop.run();
		dashboardLogger.info("Dashboard closed");
	} finally {
		stopListening?.();
		out.write(ANSI.showCursor);
	}
}
