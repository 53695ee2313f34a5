/**
 * Test Helpers
 *
 * Shared fakes for the dashboard tests.
 */

import { PassThrough } from "node:stream";
import type { Reading } from "../power-data.js";
import type { TerminalWriter } from "../terminal.js";

/**
 * Terminal writer that keeps every chunk in memory
 */
export interface BufferWriter extends TerminalWriter {
	chunks: string[];
	text(): string;
}

export const createBufferWriter = (): BufferWriter => {
	const chunks: string[] = [];
	return {
		chunks,
		write(chunk: string) {
			chunks.push(chunk);
			return true;
		},
		text: () => chunks.join(""),
	};
};

/**
 * Create a Reading with sensible defaults
 */
export const createMockReading = (overrides: Partial<Reading> = {}): Reading => ({
	value: 12.5,
	observedAt: "2024-01-01T00:00:00Z",
	...overrides,
});

/**
 * Key input stream backed by a PassThrough, optionally posing as a TTY
 */
export const createKeyInput = (isTTY = false) => {
	const setRawMode = (_mode: boolean): void => {};
	return Object.assign(new PassThrough(), { isTTY, setRawMode });
};
