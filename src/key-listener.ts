/**
 * Exit key listener
 *
 * Watches single keypresses and, on Escape, "q" or Ctrl+C, clears the screen
 * and fires the exit callback once. The callback is the only thing shared with
 * the tick loop (it aborts the loop's signal).
 *
 * Ctrl+C is included because raw mode turns it into a plain keypress instead
 * of SIGINT.
 */

import { emitKeypressEvents } from "node:readline";
import { inputLogger } from "./logger.js";
import { clearTerminal, type TerminalWriter } from "./terminal.js";

/**
 * Key descriptor emitted by readline's keypress events
 */
export interface KeypressKey {
	name?: string;
	ctrl?: boolean;
	meta?: boolean;
	shift?: boolean;
	sequence?: string;
}

/**
 * Input stream the listener reads from (process.stdin in production)
 */
export type KeyInput = NodeJS.ReadableStream & {
	isTTY?: boolean;
	setRawMode?: (mode: boolean) => unknown;
};

export interface ExitKeyListenerOptions {
	input: KeyInput;
	out: TerminalWriter;
	onExit: () => void;
}

export function isExitKey(key: KeypressKey | undefined): boolean {
	if (!key) return false;
	if (key.ctrl) return key.name === "c";
	return key.name === "escape" || key.name === "q";
}

/**
 * Start listening for exit keys.
 *
 * @returns a disposer that stops listening, leaves raw mode and pauses the input
 */
export function listenForExitKeys(options: ExitKeyListenerOptions): () => void {
	const { input, out, onExit } = options;

	emitKeypressEvents(input);
	const setRawMode = input.isTTY ? input.setRawMode?.bind(input) : undefined;
	setRawMode?.(true);

	let fired = false;
	const onKeypress = (_sequence: string | undefined, key: KeypressKey | undefined): void => {
		if (fired || !isExitKey(key)) return;
		fired = true;
		inputLogger.info({ key: key?.name }, "Exit key pressed");
		clearTerminal(out);
		onExit();
	};

	input.on("keypress", onKeypress);
	input.resume();

	return () => {
		input.removeListener("keypress", onKeypress);
		setRawMode?.(false);
		input.pause();
	};
}
