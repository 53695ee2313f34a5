/**
 * Terminal output helpers
 *
 * ANSI escape codes for screen management, and the minimal writer interface
 * the renderer and key listener write through (process.stdout in production,
 * an in-memory buffer in tests).
 */

/**
 * ANSI escape code helpers
 */
export const ANSI = {
	clearScreen: "\x1b[2J",
	moveTo: (row: number, col: number) => `\x1b[${row};${col}H`,
	home: "\x1b[H",
	/** Move to the start of the line `lines` rows up */
	cursorUp: (lines: number) => `\x1b[${lines}F`,
	clearLine: "\x1b[2K",
	hideCursor: "\x1b[?25l",
	showCursor: "\x1b[?25h",
} as const;

/**
 * Anything the dashboard can write to
 */
export interface TerminalWriter {
	write(chunk: string): unknown;
}

/**
 * Clear the whole screen and park the cursor top-left
 */
export function clearTerminal(out: TerminalWriter): void {
	out.write(ANSI.clearScreen + ANSI.home);
}
