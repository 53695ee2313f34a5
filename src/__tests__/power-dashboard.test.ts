/**
 * Tests for power-dashboard.ts
 *
 * Runs a whole session against fake data, a fake key input and a wait that
 * presses "q" on the first tick.
 */

import { describe, expect, it, vi } from "vitest";
import { HistoricalDataNotFoundError } from "../errors.js";
import type { Reading } from "../power-data.js";
import { type PowerDataSource, runPowerDashboard } from "../power-dashboard.js";
import { createBufferWriter, createKeyInput, createMockReading } from "./helpers.js";

const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";
const CLEAR = "\x1b[2J\x1b[H";

function createSource(maxPower: Promise<number>) {
	const getMaxPower = vi.fn<() => Promise<number>>().mockReturnValue(maxPower);
	const getLatestReading = vi
		.fn<() => Promise<Reading>>()
		.mockResolvedValue(createMockReading({ value: 12.5, observedAt: "2024-01-01T00:00:00Z" }));
	const source: PowerDataSource = { getMaxPower, getLatestReading };
	return { source, getMaxPower, getLatestReading };
}

describe("runPowerDashboard", () => {
	it("should draw the gauge until an exit key is pressed", async () => {
		const { source, getLatestReading } = createSource(Promise.resolve(25));
		const input = createKeyInput();
		const out = createBufferWriter();
		const wait = vi.fn(async (_ms: number, signal: AbortSignal) => {
			input.emit("keypress", "q", { name: "q" });
			return !signal.aborted;
		});

		await runPowerDashboard({
			source,
			input,
			out,
			now: () => new Date("2024-01-01T00:00:30.000Z"),
			wait,
		});

		expect(getLatestReading).toHaveBeenCalledTimes(1);
		expect(wait).toHaveBeenCalledTimes(1);
		expect(out.chunks[0]).toBe(HIDE_CURSOR);
		expect(out.chunks[1]).toContain("| 0 |-----x      | 25 |");
		expect(out.chunks[2]).toContain("| Refresh  | 00:02.30 |");
		expect(out.chunks.slice(3)).toEqual([CLEAR, SHOW_CURSOR]);
		expect(input.isPaused()).toBe(true);
	});

	it("should propagate a startup failure and restore the cursor", async () => {
		const failure = new HistoricalDataNotFoundError("No historical data", "https://opendata.test");
		const { source, getMaxPower, getLatestReading } = createSource(Promise.resolve(0));
		getMaxPower.mockRejectedValue(failure);
		const out = createBufferWriter();

		await expect(runPowerDashboard({ source, input: createKeyInput(), out })).rejects.toBe(failure);

		expect(getLatestReading).not.toHaveBeenCalled();
		expect(out.chunks).toEqual([HIDE_CURSOR, SHOW_CURSOR]);
	});
});
