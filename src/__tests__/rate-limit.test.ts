/**
 * Tests for rate-limit.ts
 */

import { describe, expect, it } from "vitest";
import { extractRetryAfter, isRateLimited } from "../rate-limit.js";

describe("isRateLimited", () => {
	it("should only match 429", () => {
		expect(isRateLimited(429)).toBe(true);
		expect(isRateLimited(503)).toBe(false);
		expect(isRateLimited(200)).toBe(false);
	});
});

describe("extractRetryAfter", () => {
	it("should extract retry-after seconds as milliseconds", () => {
		expect(extractRetryAfter({ "retry-after": "60" })).toBe(60000);
		expect(extractRetryAfter({ "Retry-After": "30" })).toBe(30000);
		expect(extractRetryAfter(new Headers({ "Retry-After": "5" }))).toBe(5000);
	});

	it("should return null for missing header", () => {
		expect(extractRetryAfter({})).toBeNull();
		expect(extractRetryAfter(new Headers())).toBeNull();
		expect(extractRetryAfter(undefined)).toBeNull();
	});

	it("should return null for invalid values", () => {
		expect(extractRetryAfter({ "retry-after": "invalid" })).toBeNull();
		expect(extractRetryAfter({ "retry-after": "" })).toBeNull();
		expect(extractRetryAfter({ "retry-after": "-5" })).toBeNull();
		expect(extractRetryAfter({ "retry-after": "1.5" })).toBeNull();
		expect(extractRetryAfter({ "retry-after": "Wed, 21 Oct 2026 07:28:00 GMT" })).toBeNull();
	});

	it("should handle zero and surrounding whitespace", () => {
		expect(extractRetryAfter({ "retry-after": "0" })).toBe(0);
		expect(extractRetryAfter({ "retry-after": " 2 " })).toBe(2000);
	});
});
