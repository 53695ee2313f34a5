/**
 * HTTP Fetcher
 *
 * Single-request GET helper that transparently retries rate-limited responses.
 *
 * A 429 answer is retried at most `maxRetries` times, each time after waiting
 * exactly the number of seconds the server advertised in Retry-After. A 429
 * without a usable hint, a 429 past the cap, and every other non-success
 * status end the call with a TransportError. A success status with a blank
 * body ends it with an EmptyResponseError.
 *
 * Each call keeps its own attempt counter; nothing is shared between calls.
 */

import { API_KEY_HEADER, MAX_RATE_LIMIT_RETRIES } from "./constants.js";
import { EmptyResponseError, getErrorMessage, TransportError } from "./errors.js";
import { fetchLogger } from "./logger.js";
import { extractRetryAfter, isRateLimited } from "./rate-limit.js";
import { type SleepFn, sleep } from "./retry-handler.js";

export interface FetchTextOptions {
	/** Sent as the x-api-key header when non-empty */
	apiKey?: string;
	/** Rate-limit retries allowed for this call (default: 2) */
	maxRetries?: number;
	/** Fetch implementation (default: global fetch) */
	fetchImpl?: typeof fetch;
	/** Delay used between retries (default: real sleep) */
	sleep?: SleepFn;
}

/**
 * Per-call retry bookkeeping
 */
interface RetryContext {
	attempt: number;
	maxAttempts: number;
}

/** Signature of fetchText, for injection into the data accessors */
export type FetchTextFn = (url: string, options?: FetchTextOptions) => Promise<string>;

/**
 * GET `url` and return the response body as text.
 *
 * @throws TransportError on network failure or a non-success status
 * @throws EmptyResponseError on a success status with a blank body
 */
export async function fetchText(url: string, options: FetchTextOptions = {}): Promise<string> {
	const fetchImpl = options.fetchImpl ?? fetch;
	const delay = options.sleep ?? sleep;
	const retry: RetryContext = { attempt: 0, maxAttempts: options.maxRetries ?? MAX_RATE_LIMIT_RETRIES };

	const headers: Record<string, string> = {};
	if (options.apiKey) {
		headers[API_KEY_HEADER] = options.apiKey;
	}

	while (true) {
		let response: Response;
		try {
			response = await fetchImpl(url, { method: "GET", headers });
		} catch (error) {
			fetchLogger.warn({ url, error: getErrorMessage(error) }, "HTTP request failed");
			throw new TransportError(`GET ${url} failed: ${getErrorMessage(error)}`, url, null, retry.attempt + 1, {
				cause: error,
			});
		}

		if (isRateLimited(response.status) && retry.attempt < retry.maxAttempts) {
			const retryAfterMs = extractRetryAfter(response.headers);
			if (retryAfterMs !== null) {
				retry.attempt++;
				fetchLogger.info(
					{ url, retryAfterMs, attempt: retry.attempt, maxAttempts: retry.maxAttempts },
					"Rate limited, retrying after advertised delay",
				);
				// Release the connection before waiting
				await response.body?.cancel();
				await delay(retryAfterMs);
				continue;
			}
			fetchLogger.debug({ url }, "Rate limited without a usable Retry-After header");
		}

		if (!response.ok) {
			fetchLogger.warn({ url, status: response.status, attempts: retry.attempt + 1 }, "HTTP request failed");
			await response.body?.cancel();
			throw new TransportError(
				`GET ${url} failed with status ${response.status} ${response.statusText}`.trimEnd(),
				url,
				response.status,
				retry.attempt + 1,
			);
		}

		const body = await response.text();

		if (body.trim() === "") {
			fetchLogger.warn({ url }, "Response body is empty");
			throw new EmptyResponseError(`GET ${url} returned an empty body`, url);
		}

		fetchLogger.debug({ url, bytes: body.length, attempts: retry.attempt + 1 }, "HTTP request succeeded");
		return body;
	}
}
