/**
 * Rate Limit Detection
 *
 * Recognises rate-limited responses and reads the server's retry hint.
 * Only the delta-seconds form of Retry-After is honoured; an HTTP-date or any
 * other value is treated as absent, and the caller falls through to normal
 * error handling.
 */

import { STATUS_TOO_MANY_REQUESTS } from "./constants.js";

/**
 * Check whether a status code means "slow down"
 */
export function isRateLimited(status: number): boolean {
	return status === STATUS_TOO_MANY_REQUESTS;
}

/**
 * Extract the Retry-After delay in milliseconds.
 *
 * @returns the delay, or null when the header is missing, blank, negative or not an integer
 */
export function extractRetryAfter(headers?: Headers | Record<string, string>): number | null {
	if (!headers) return null;

	const retryAfter =
		headers instanceof Headers ? headers.get("retry-after") : (headers["retry-after"] ?? headers["Retry-After"]);
	if (!retryAfter) return null;

	const trimmed = retryAfter.trim();
	if (!/^\d+$/.test(trimmed)) return null;

	return Number.parseInt(trimmed, 10) * 1000; // Convert to milliseconds
}
