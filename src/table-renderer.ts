/**
 * Table Renderer
 *
 * Builds the fixed-width power table and writes it to the terminal in two ways:
 *
 * - renderFullTable(): clears the screen and draws the whole table from the last
 *   reading, recomputing geometry (the width follows the printed width of the
 *   gauge maximum) and caching it in the dashboard state.
 * - renderTimeRows(): rewrites only the clock and countdown rows in place, using
 *   the cached geometry.
 *
 * After either write the cursor is parked on the first time row, so the next
 * time-row redraw overwrites exactly those four rows.
 */

import {
	BAR_STEPS,
	FULL_TABLE_CURSOR_RESET,
	MIN_TABLE_WIDTH,
	REFRESH_INTERVAL_MS,
	TIME_ROW_COUNT,
} from "./constants.js";
import { type DashboardState, requireLayout, type TableLayout } from "./dashboard-state.js";
import { DashboardStateError } from "./errors.js";
import { ANSI, type TerminalWriter } from "./terminal.js";

/** Fixed characters of the bar row around the bar and max label: "| 0 |" + "| " + " |" */
const BAR_ROW_FRAME = 9;

const LABELS = {
	power: "Power",
	time: "Time",
	refresh: "Refresh",
	unit: "MW",
	exitHint: "Press <Esc> or",
	exitHintKeys: '"q" to quit',
} as const;

function pad2(value: number): string {
	return String(value).padStart(2, "0");
}

/**
 * Power values printed with at most one decimal
 */
export function formatPower(value: number): string {
	return String(Math.round(value * 10) / 10);
}

/**
 * Gauge cells to fill for `value` on a 0..maxPower scale, clamped to [0, 12]
 */
export function computeBarLength(value: number, maxPower: number): number {
	if (maxPower <= 0) return 0;
	const ratio = value / maxPower;
	if (!Number.isFinite(ratio)) return 0;
	return Math.min(BAR_STEPS, Math.max(0, Math.floor(ratio * BAR_STEPS)));
}

/**
 * Gauge bar: dashes ending in an "x" marker, padded with spaces to 12 cells
 */
export function renderBar(length: number): string {
	if (length <= 0) return " ".repeat(BAR_STEPS);
	return `${"-".repeat(length - 1)}x${" ".repeat(BAR_STEPS - length)}`;
}

export function createCenteredRow(width: number, text: string): string {
	const row = `|${" ".repeat(Math.max(0, Math.floor((width - 2 - text.length) / 2)))}${text}`;
	return `${row}${" ".repeat(Math.max(0, width - row.length - 1))}|`;
}

/**
 * Geometry for a table whose gauge maximum prints `maxLabelLength` characters wide
 */
export function buildTableLayout(maxLabelLength: number): TableLayout {
	const tableWidth = Math.max(BAR_STEPS + BAR_ROW_FRAME + maxLabelLength, MIN_TABLE_WIDTH);
	const columnSplit = Math.floor(tableWidth / 2);
	return {
		tableWidth,
		columnSplit,
		leftColumnWidth: columnSplit - 2,
		rightColumnWidth: tableWidth - (columnSplit + 3),
		splitRowSeparator: `|${"_".repeat(columnSplit - 1)}|${"_".repeat(tableWidth - (columnSplit + 2))}|`,
	};
}

export function formatSplitRow(layout: TableLayout, left: string, right: string): string {
	return `| ${left.padEnd(layout.leftColumnWidth)}| ${right.padEnd(layout.rightColumnWidth)}|`;
}

/** dd.MM.yyyy in UTC */
export function formatUtcDate(date: Date): string {
	return `${pad2(date.getUTCDate())}.${pad2(date.getUTCMonth() + 1)}.${date.getUTCFullYear()}`;
}

/** HH:MM:SS in UTC */
export function formatUtcTime(date: Date): string {
	return `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}`;
}

/**
 * Countdown as HH:MM.SS, truncated to whole seconds; anything overdue shows as zero
 */
export function formatCountdown(ms: number): string {
	const totalSeconds = ms > 0 ? Math.floor(ms / 1000) : 0;
	const hours = Math.floor(totalSeconds / 3600);
	const minutes = Math.floor((totalSeconds % 3600) / 60);
	const seconds = totalSeconds % 60;
	return `${pad2(hours)}:${pad2(minutes)}.${pad2(seconds)}`;
}

/**
 * Lines of the full table, with blank rows reserved for the time rows
 */
export function buildFullTable(
	value: number,
	maxPower: number,
	now: Date,
): { lines: string[]; layout: TableLayout } {
	const maxLabel = formatPower(maxPower);
	const layout = buildTableLayout(maxLabel.length);
	const width = layout.tableWidth;
	const labelWidth = width - BAR_STEPS - BAR_ROW_FRAME;

	const barRow = `| 0 |${renderBar(computeBarLength(value, maxPower))}| ${maxLabel.padEnd(labelWidth)} |`;
	const barRowSeparator = `|___|${"_".repeat(BAR_STEPS)}|${"_".repeat(labelWidth + 2)}|`;

	const line = "_".repeat(width - 2);
	const rowSeparator = `|${line}|`;

	const lines = [
		` ${line} `,
		createCenteredRow(width, `${formatUtcDate(now)} (UTC)`),
		rowSeparator,
		barRow,
		barRowSeparator,
		formatSplitRow(layout, LABELS.power, `${formatPower(value)} ${LABELS.unit}`),
		layout.splitRowSeparator,
		...Array.from({ length: TIME_ROW_COUNT }, () => ""),
		createCenteredRow(width, LABELS.exitHint),
		createCenteredRow(width, LABELS.exitHintKeys),
		rowSeparator,
	];

	return { lines, layout };
}

/**
 * Clear the screen and draw the whole table from the last recorded reading.
 *
 * @throws DashboardStateError when no reading has been recorded
 */
export function renderFullTable(out: TerminalWriter, state: DashboardState, now: Date): void {
	if (state.lastReading === null) {
		throw new DashboardStateError("A full redraw needs a recorded reading");
	}

	const { lines, layout } = buildFullTable(state.lastReading.value, state.maxPower, now);
	state.layout = layout;

	out.write(`${ANSI.clearScreen}${ANSI.home}${lines.join("\n")}\n${ANSI.cursorUp(FULL_TABLE_CURSOR_RESET)}`);
}

/**
 * Time left until the reading after the one ending at `lastUpdateEnd` is due
 */
export function computeNextUpdateIn(lastUpdateEnd: string, now: Date): number {
	return Date.parse(lastUpdateEnd) + REFRESH_INTERVAL_MS - now.getTime();
}

/**
 * Rewrite the clock and countdown rows, updating state.nextUpdateInMs.
 *
 * @throws DashboardStateError when no full redraw has run yet
 */
export function renderTimeRows(out: TerminalWriter, state: DashboardState, now: Date): void {
	const { layout, lastUpdateEnd } = requireLayout(state);

	state.nextUpdateInMs = computeNextUpdateIn(lastUpdateEnd, now);

	const rows = [
		formatSplitRow(layout, LABELS.time, formatUtcTime(now)),
		layout.splitRowSeparator,
		formatSplitRow(layout, LABELS.refresh, formatCountdown(state.nextUpdateInMs)),
		layout.splitRowSeparator,
	];

	out.write(`${rows.join("\n")}\n${ANSI.cursorUp(TIME_ROW_COUNT)}`);
}
