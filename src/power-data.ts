/**
 * Power Data Accessors
 *
 * Two read operations against the open-data API, both built on fetchText:
 * - getMaxPower(): the largest value over the last month, used as the gauge's scale
 * - getLatestReading(): the most recent value and the end of its observation window
 */

import {
	DEFAULT_BASE_URL,
	DEFAULT_DATASET_ID,
	HISTORY_LOOKBACK_MONTHS,
	MAX_PAGE_SIZE,
	MAX_RATE_LIMIT_RETRIES,
} from "./constants.js";
import { HistoricalDataNotFoundError, MalformedResponseError } from "./errors.js";
import { type FetchTextFn, fetchText } from "./http-fetcher.js";
import { dataLogger } from "./logger.js";
import { formatIssues, HistoricalResponseSchema, LatestReadingSchema, ObservationSchema } from "./schemas.js";

/**
 * A single power reading
 */
export interface Reading {
	readonly value: number;
	/** Observation window end, exactly as the API sent it */
	readonly observedAt: string;
}

/**
 * Anything that can supply the latest reading (the loop only needs this much)
 */
export interface LatestReadingSource {
	getLatestReading(): Promise<Reading>;
}

export interface PowerDataClientOptions {
	baseUrl?: string;
	datasetId?: number;
	/** Page size of the historical query, also the cap on scanned elements */
	pageSize?: number;
	apiKey?: string;
	fetchText?: FetchTextFn;
	now?: () => Date;
}

/**
 * Subtract calendar months, clamping the day to the target month's length
 * (31 March minus one month is 29 February in a leap year).
 */
export function subtractMonths(date: Date, months: number): Date {
	const result = new Date(date.getTime());
	const day = result.getUTCDate();
	result.setUTCDate(1);
	result.setUTCMonth(result.getUTCMonth() - months);
	const lastDay = new Date(Date.UTC(result.getUTCFullYear(), result.getUTCMonth() + 1, 0)).getUTCDate();
	result.setUTCDate(Math.min(day, lastDay));
	return result;
}

function datasetUrl(baseUrl: string, datasetId: number): string {
	return `${baseUrl.replace(/\/+$/, "")}/datasets/${datasetId}/data`;
}

/**
 * Historical window query for `[now - 1 month, now]`, oldest first
 */
export function buildHistoricalUrl(baseUrl: string, datasetId: number, pageSize: number, now: Date): string {
	const url = new URL(datasetUrl(baseUrl, datasetId));
	url.searchParams.set("startTime", subtractMonths(now, HISTORY_LOOKBACK_MONTHS).toISOString());
	url.searchParams.set("endTime", now.toISOString());
	url.searchParams.set("pageSize", String(pageSize));
	url.searchParams.set("sortOrder", "asc");
	return url.toString();
}

export function buildLatestUrl(baseUrl: string, datasetId: number): string {
	return `${datasetUrl(baseUrl, datasetId)}/latest`;
}

/**
 * Largest `value` among the first `count` entries of `data`.
 *
 * The provider's declared total can exceed what the page actually holds, so
 * indices past the end, null entries and entries without a finite numeric
 * value all count as 0 instead of failing the scan.
 */
export function scanMaxValue(data: readonly unknown[], count: number): number {
	let maxValue = 0;
	for (let i = 0; i < count; i++) {
		const parsed = ObservationSchema.safeParse(data[i]);
		const value = parsed.success ? parsed.data.value : 0;
		if (value > maxValue) {
			maxValue = value;
		}
	}
	return maxValue;
}

function parseJson(body: string, url: string): unknown {
	try {
		return JSON.parse(body);
	} catch (error) {
		throw new MalformedResponseError(`Response from ${url} is not valid JSON`, url, [], { cause: error });
	}
}

/**
 * Client for the wind power dataset
 */
export class PowerDataClient implements LatestReadingSource {
	private readonly baseUrl: string;
	private readonly datasetId: number;
	private readonly pageSize: number;
	private readonly apiKey: string | undefined;
	private readonly fetchText: FetchTextFn;
	private readonly now: () => Date;

	constructor(options: PowerDataClientOptions = {}) {
		this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
		this.datasetId = options.datasetId ?? DEFAULT_DATASET_ID;
		this.pageSize = options.pageSize ?? MAX_PAGE_SIZE;
		this.apiKey = options.apiKey;
		this.fetchText = options.fetchText ?? fetchText;
		this.now = options.now ?? (() => new Date());
	}

	/**
	 * Maximum value observed over the last month.
	 *
	 * @throws MalformedResponseError when the body is not JSON or lacks pagination.total or data
	 * @throws HistoricalDataNotFoundError when the total is 0 or the first element is absent
	 */
	async getMaxPower(): Promise<number> {
		const url = buildHistoricalUrl(this.baseUrl, this.datasetId, this.pageSize, this.now());
		const body = await this.fetchText(url, { apiKey: this.apiKey, maxRetries: MAX_RATE_LIMIT_RETRIES });

		const parsed = HistoricalResponseSchema.safeParse(parseJson(body, url));
		if (!parsed.success) {
			throw new MalformedResponseError(
				"Historical data response is missing pagination.total or data",
				url,
				formatIssues(parsed.error),
			);
		}

		const { pagination, data } = parsed.data;
		if (pagination.total <= 0 || data[0] === undefined || data[0] === null) {
			throw new HistoricalDataNotFoundError("No historical data found to determine the maximum power", url);
		}

		// Data spread over several pages: only the first page is used
		const count = Math.min(pagination.total, this.pageSize);
		if (pagination.total > data.length) {
			dataLogger.debug({ total: pagination.total, returned: data.length }, "Declared total exceeds returned data");
		}

		const maxPower = scanMaxValue(data, count);
		dataLogger.info({ maxPower, scanned: count }, "Historical maximum computed");
		return maxPower;
	}

	/**
	 * Latest reading and the end of its observation window.
	 *
	 * @throws MalformedResponseError when the body is not JSON or lacks endTime or value
	 */
	async getLatestReading(): Promise<Reading> {
		const url = buildLatestUrl(this.baseUrl, this.datasetId);
		const body = await this.fetchText(url, { apiKey: this.apiKey, maxRetries: MAX_RATE_LIMIT_RETRIES });

		const parsed = LatestReadingSchema.safeParse(parseJson(body, url));
		if (!parsed.success) {
			throw new MalformedResponseError(
				"Latest data response is missing endTime or value",
				url,
				formatIssues(parsed.error),
			);
		}

		const reading: Reading = { value: parsed.data.value, observedAt: parsed.data.endTime };
		dataLogger.debug({ ...reading }, "Latest reading fetched");
		return reading;
	}
}
