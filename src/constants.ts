/**
 * Shared constants used across the codebase.
 *
 * Centralizes magic numbers so they can be tuned in one place
 * and carry semantic meaning at every call site.
 */

// ---------------------------------------------------------------------------
// Data source
// ---------------------------------------------------------------------------

/** Open-data API root */
export const DEFAULT_BASE_URL = "https://data.fingrid.fi/api";

/** Wind power generation, near real-time */
export const DEFAULT_DATASET_ID = 181;

/** Largest page the historical endpoint serves in one response */
export const MAX_PAGE_SIZE = 20_000;

/** Look-back window for the gauge's reference maximum */
export const HISTORY_LOOKBACK_MONTHS = 1;

/** Header carrying the API key */
export const API_KEY_HEADER = "x-api-key";

// ---------------------------------------------------------------------------
// HTTP retries
// ---------------------------------------------------------------------------

/** Rate-limited responses retried per request before giving up */
export const MAX_RATE_LIMIT_RETRIES = 2;

/** HTTP 429 Too Many Requests */
export const STATUS_TOO_MANY_REQUESTS = 429;

// ---------------------------------------------------------------------------
// Dashboard timing (milliseconds)
// ---------------------------------------------------------------------------

/** Time after a reading's window end when the next reading is due */
export const REFRESH_INTERVAL_MS = 3 * 60_000;

/** Redraw cadence for the clock and countdown rows */
export const TICK_INTERVAL_MS = 1_000;

// ---------------------------------------------------------------------------
// Table geometry (characters)
// ---------------------------------------------------------------------------

/** Cells in the gauge bar */
export const BAR_STEPS = 12;

/** Narrowest table, wide enough for the instruction rows */
export const MIN_TABLE_WIDTH = 23;

/** Rows reserved below the power row for time and countdown */
export const TIME_ROW_COUNT = 4;

/** Rows between the first reserved row and the end of the full table */
export const FULL_TABLE_CURSOR_RESET = 7;
