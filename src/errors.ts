/**
 * Custom Error Classes
 *
 * Domain-specific error types with proper Error subclassing and context properties.
 * Every failure the dashboard can surface extends the base AppError class, so the
 * CLI boundary can report them uniformly.
 */

/**
 * Base application error class
 *
 * Uses Object.setPrototypeOf() to ensure instanceof checks work correctly
 * after TypeScript transpilation.
 *
 * @param message - Error message
 * @param code - Error code for categorization (e.g., 'TRANSPORT_ERROR')
 * @param options - Standard error options, used to chain an underlying `cause`
 */
export class AppError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "AppError";
		// Critical for instanceof checks in transpiled code
		Object.setPrototypeOf(this, AppError.prototype);
	}
}

/**
 * Transport-level failure
 *
 * Thrown when a request cannot be completed: the network call itself failed
 * (`status` is null and `cause` holds the underlying error), or the server
 * answered with a non-success status after any rate-limit retries were spent.
 *
 * @example
 * ```typescript
 * if (!response.ok) {
 *   throw new TransportError(`GET ${url} failed with status ${response.status}`, url, response.status, attempts);
 * }
 * ```
 */
export class TransportError extends AppError {
	constructor(
		message: string,
		public readonly url: string,
		public readonly status: number | null,
		public readonly attempts: number,
		options?: ErrorOptions,
	) {
		super(message, "TRANSPORT_ERROR", options);
		this.name = "TransportError";
		Object.setPrototypeOf(this, TransportError.prototype);
	}
}

/**
 * Empty response body
 *
 * The server answered with a success status but the body was blank. Kept apart
 * from TransportError: the exchange worked, the reply just carried nothing.
 */
export class EmptyResponseError extends AppError {
	constructor(
		message: string,
		public readonly url: string,
	) {
		super(message, "EMPTY_RESPONSE");
		this.name = "EmptyResponseError";
		Object.setPrototypeOf(this, EmptyResponseError.prototype);
	}
}

/**
 * Malformed response body
 *
 * Thrown when a body is not JSON or lacks the fields a query needs.
 *
 * @param issues - Human-readable descriptions of what was missing or mistyped
 */
export class MalformedResponseError extends AppError {
	constructor(
		message: string,
		public readonly url: string,
		public readonly issues: string[] = [],
		options?: ErrorOptions,
	) {
		super(message, "MALFORMED_RESPONSE", options);
		this.name = "MalformedResponseError";
		Object.setPrototypeOf(this, MalformedResponseError.prototype);
	}
}

/**
 * No historical observations
 *
 * The historical query succeeded and was well-formed, but reported no
 * observations. Without them there is no reference scale for the gauge.
 */
export class HistoricalDataNotFoundError extends AppError {
	constructor(
		message: string,
		public readonly url: string,
	) {
		super(message, "HISTORICAL_DATA_NOT_FOUND");
		this.name = "HistoricalDataNotFoundError";
		Object.setPrototypeOf(this, HistoricalDataNotFoundError.prototype);
	}
}

/**
 * Dashboard invariant violation
 *
 * Thrown when a render step runs against state it requires but that has not
 * been populated yet, e.g. a time-row redraw before the first full redraw.
 */
export class DashboardStateError extends AppError {
	constructor(message: string) {
		super(message, "DASHBOARD_STATE");
		this.name = "DashboardStateError";
		Object.setPrototypeOf(this, DashboardStateError.prototype);
	}
}

/**
 * Invalid configuration value
 *
 * @param option - The CLI flag or config key that was rejected
 */
export class ConfigError extends AppError {
	constructor(
		message: string,
		public readonly option: string,
	) {
		super(message, "CONFIG_ERROR");
		this.name = "ConfigError";
		Object.setPrototypeOf(this, ConfigError.prototype);
	}
}

/**
 * Extract a message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
	if (error instanceof Error) return error.message;
	if (typeof error === "string") return error;
	return String(error);
}
