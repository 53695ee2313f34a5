/**
 * Tests for key-listener.ts
 */

import { describe, expect, it, vi } from "vitest";
import { isExitKey, listenForExitKeys } from "../key-listener.js";
import { createBufferWriter, createKeyInput } from "./helpers.js";

const CLEAR = "\x1b[2J\x1b[H";

describe("isExitKey", () => {
	it("should accept escape, q and ctrl+c", () => {
		expect(isExitKey({ name: "escape" })).toBe(true);
		expect(isExitKey({ name: "q" })).toBe(true);
		expect(isExitKey({ name: "c", ctrl: true })).toBe(true);
	});

	it("should reject other keys", () => {
		expect(isExitKey({ name: "a" })).toBe(false);
		expect(isExitKey({ name: "c" })).toBe(false);
		expect(isExitKey({ name: "q", ctrl: true })).toBe(false);
		expect(isExitKey({ name: "return" })).toBe(false);
		expect(isExitKey(undefined)).toBe(false);
	});
});

describe("listenForExitKeys", () => {
	it("should clear the screen and fire once on an exit key", () => {
		const input = createKeyInput();
		const out = createBufferWriter();
		const onExit = vi.fn();
		const stop = listenForExitKeys({ input, out, onExit });

		input.emit("keypress", "x", { name: "x" });
		expect(onExit).not.toHaveBeenCalled();

		input.emit("keypress", undefined, { name: "escape" });
		input.emit("keypress", "q", { name: "q" });

		expect(onExit).toHaveBeenCalledTimes(1);
		expect(out.chunks).toEqual([CLEAR]);
		stop();
	});

	it("should decode keypresses from raw input data", async () => {
		const input = createKeyInput();
		const out = createBufferWriter();
		const onExit = vi.fn();
		const stop = listenForExitKeys({ input, out, onExit });

		input.write("q");
		await new Promise((resolve) => setImmediate(resolve));

		expect(onExit).toHaveBeenCalledTimes(1);
		stop();
	});

	it("should toggle raw mode on a TTY", () => {
		const input = createKeyInput(true);
		const setRawMode = vi.spyOn(input, "setRawMode");
		const stop = listenForExitKeys({ input, out: createBufferWriter(), onExit: vi.fn() });

		expect(setRawMode).toHaveBeenLastCalledWith(true);
		stop();
		expect(setRawMode).toHaveBeenLastCalledWith(false);
		expect(setRawMode).toHaveBeenCalledTimes(2);
	});

	it("should leave raw mode alone when the input is not a TTY", () => {
		const input = createKeyInput(false);
		const setRawMode = vi.spyOn(input, "setRawMode");
		const stop = listenForExitKeys({ input, out: createBufferWriter(), onExit: vi.fn() });
		stop();

		expect(setRawMode).not.toHaveBeenCalled();
	});

	it("should stop listening after dispose", () => {
		const input = createKeyInput();
		const onExit = vi.fn();
		const stop = listenForExitKeys({ input, out: createBufferWriter(), onExit });

		stop();
		input.emit("keypress", "q", { name: "q" });

		expect(onExit).not.toHaveBeenCalled();
		expect(input.isPaused()).toBe(true);
	});
});
