/**
 * Dashboard State
 *
 * The mutable values that let a time-only redraw line up with the last full
 * redraw. Owned by the tick loop alone; the key listener never sees it.
 */

import { DashboardStateError } from "./errors.js";
import type { Reading } from "./power-data.js";

/**
 * Cached geometry of the last full redraw
 */
export interface TableLayout {
	tableWidth: number;
	/** Position of the middle column border */
	columnSplit: number;
	/** Text width of the left column in split rows */
	leftColumnWidth: number;
	/** Text width of the right column in split rows */
	rightColumnWidth: number;
	splitRowSeparator: string;
}

export interface DashboardState {
	/** Gauge scale; only ever raised */
	maxPower: number;
	/** Time left until the next full redraw; <= 0 means one is due */
	nextUpdateInMs: number;
	/** Raw endTime of the last reading, null before the first full redraw */
	lastUpdateEnd: string | null;
	layout: TableLayout | null;
	lastReading: Reading | null;
}

export function createDashboardState(maxPower: number): DashboardState {
	return {
		maxPower,
		nextUpdateInMs: 0,
		lastUpdateEnd: null,
		layout: null,
		lastReading: null,
	};
}

/**
 * Fold a freshly fetched reading into the state, raising maxPower if exceeded
 */
export function recordReading(state: DashboardState, reading: Reading): void {
	state.maxPower = Math.max(state.maxPower, reading.value);
	state.lastUpdateEnd = reading.observedAt;
	state.lastReading = reading;
}

/**
 * Layout and last update end, or a DashboardStateError if no full redraw has run yet
 */
export function requireLayout(state: DashboardState): { layout: TableLayout; lastUpdateEnd: string } {
	if (state.layout === null || state.lastUpdateEnd === null) {
		throw new DashboardStateError("Time rows cannot be drawn before the first full redraw");
	}
	return { layout: state.layout, lastUpdateEnd: state.lastUpdateEnd };
}
