import { describe, expect, it } from "vitest";
import {
	AppError,
	DashboardStateError,
	EmptyResponseError,
	getErrorMessage,
	HistoricalDataNotFoundError,
	MalformedResponseError,
	TransportError,
} from "../errors.js";

describe("errors.ts", () => {
	it.each([
		[new TransportError("t", "https://opendata.test", 500, 1), "TransportError", "TRANSPORT_ERROR"],
		[new EmptyResponseError("e", "https://opendata.test"), "EmptyResponseError", "EMPTY_RESPONSE"],
		[new MalformedResponseError("m", "https://opendata.test"), "MalformedResponseError", "MALFORMED_RESPONSE"],
		[
			new HistoricalDataNotFoundError("h", "https://opendata.test"),
			"HistoricalDataNotFoundError",
			"HISTORICAL_DATA_NOT_FOUND",
		],
		[new DashboardStateError("d"), "DashboardStateError", "DASHBOARD_STATE"],
	])("should keep name, code and instanceof for %s", (error, name, code) => {
		expect(error).toBeInstanceOf(AppError);
		expect(error).toBeInstanceOf(Error);
		expect(error.name).toBe(name);
		expect(error.code).toBe(code);
	});

	it("should chain the cause of a transport failure", () => {
		const cause = new Error("ECONNREFUSED");
		const error = new TransportError("GET failed", "https://opendata.test", null, 1, { cause });

		expect(error.cause).toBe(cause);
		expect(error.status).toBeNull();
	});

	it("should extract messages from any thrown value", () => {
		expect(getErrorMessage(new Error("boom"))).toBe("boom");
		expect(getErrorMessage("plain")).toBe("plain");
		expect(getErrorMessage(42)).toBe("42");
	});
});
