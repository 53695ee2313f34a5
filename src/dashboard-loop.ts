/**
 * Dashboard Loop
 *
 * Drives the dashboard one tick per wall-clock second. A tick is a full redraw
 * (fetch the latest reading, redraw the whole table) when the countdown has run
 * out, and a time-row redraw otherwise. Ticks never overlap: the next one starts
 * only after the previous tick and its wait have finished.
 *
 * Each wait targets the next integral second as measured before the tick's
 * work began, so time spent fetching and drawing does not accumulate as drift.
 *
 * State machine:
 *
 *   running --(signal aborts)--> cancelling --(tick or wait finishes)--> stopped
 *
 * An aborted wait is a normal stop, not an error. Errors raised by a tick
 * (failed fetches, invariant violations) propagate out of run().
 */

import { TICK_INTERVAL_MS } from "./constants.js";
import { type DashboardState, recordReading } from "./dashboard-state.js";
import { dashboardLogger } from "./logger.js";
import type { LatestReadingSource } from "./power-data.js";
import { type WaitFn, waitUnlessAborted } from "./retry-handler.js";
import { renderFullTable, renderTimeRows } from "./table-renderer.js";
import type { TerminalWriter } from "./terminal.js";

export type LoopStatus = "running" | "cancelling" | "stopped";

/** What a tick ended up drawing */
export type TickKind = "full" | "partial" | "skipped";

export interface DashboardLoopOptions {
	source: LatestReadingSource;
	state: DashboardState;
	out: TerminalWriter;
	/** One-shot cancellation shared with the key listener */
	signal: AbortSignal;
	now?: () => Date;
	wait?: WaitFn;
}

/**
 * Milliseconds from `now` to the start of the next wall-clock second (1..1000)
 */
export function msUntilNextSecond(now: Date): number {
	return TICK_INTERVAL_MS - (now.getTime() % TICK_INTERVAL_MS);
}

export class DashboardLoop {
	private readonly source: LatestReadingSource;
	private readonly state: DashboardState;
	private readonly out: TerminalWriter;
	private readonly signal: AbortSignal;
	private readonly now: () => Date;
	private readonly wait: WaitFn;
	private currentStatus: LoopStatus = "running";

	constructor(options: DashboardLoopOptions) {
		this.source = options.source;
		this.state = options.state;
		this.out = options.out;
		this.signal = options.signal;
		this.now = options.now ?? (() => new Date());
		this.wait = options.wait ?? waitUnlessAborted;

		if (this.signal.aborted) {
			this.currentStatus = "cancelling";
		} else {
			this.signal.addEventListener("abort", this.onAbort, { once: true });
		}
	}

	get status(): LoopStatus {
		return this.currentStatus;
	}

	private readonly onAbort = (): void => {
		if (this.currentStatus === "running") {
			this.currentStatus = "cancelling";
			dashboardLogger.debug("Cancellation requested");
		}
	};

	/**
	 * Tick until cancelled. Resolves when the signal stops the loop; rejects
	 * with whatever a tick threw.
	 */
	async run(): Promise<void> {
		try {
			while (!this.signal.aborted) {
				const tickStart = this.now();
				const nextSecond = tickStart.getTime() + msUntilNextSecond(tickStart);

				await this.tick();

				const completed = await this.wait(Math.max(0, nextSecond - this.now().getTime()), this.signal);
				if (!completed) break;
			}
		} finally {
			this.signal.removeEventListener("abort", this.onAbort);
			this.currentStatus = "stopped";
			dashboardLogger.debug("Dashboard loop stopped");
		}
	}

	/**
	 * Run one tick: a full redraw when one is due, otherwise a time-row redraw
	 */
	async tick(): Promise<TickKind> {
		if (this.state.nextUpdateInMs <= 0) {
			const reading = await this.source.getLatestReading();
			recordReading(this.state, reading);

			// Cancelled while fetching: the screen has been cleared, leave it that way
			if (this.signal.aborted) return "skipped";

			const now = this.now();
			renderFullTable(this.out, this.state, now);
			renderTimeRows(this.out, this.state, now);

			dashboardLogger.debug(
				{ value: reading.value, observedAt: reading.observedAt, nextUpdateInMs: this.state.nextUpdateInMs },
				"Full redraw",
			);
			if (this.state.nextUpdateInMs <= 0) {
				dashboardLogger.debug("Latest reading is already past its refresh time");
			}
			return "full";
		}

		renderTimeRows(this.out, this.state, this.now());
		return "partial";
	}
}
