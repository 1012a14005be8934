import { NoDataError, ProviderError, toIsoDate } from "@tickercast/core";
import { describe, expect, it } from "vitest";
import type { FetchLike, FetchResponseLike } from "./types";
import { YahooSeriesProvider } from "./yahooSeriesProvider";

const NY_OFFSET_SECONDS = -18_000;

const sessionOpen = (year: number, month: number, day: number): number =>
	Date.UTC(year, month - 1, day, 14, 30) / 1000;

const jsonResponse = (body: unknown, status = 200): FetchResponseLike => ({
	ok: status >= 200 && status < 300,
	status,
	statusText: status === 200 ? "OK" : "Error",
	json: async () => body,
	text: async () => JSON.stringify(body),
});

const chartBody = (
	timestamps: number[],
	close: (number | null)[],
	adjclose?: (number | null)[]
): unknown => ({
	chart: {
		result: [
			{
				meta: { symbol: "TEST", gmtoffset: NY_OFFSET_SECONDS },
				timestamp: timestamps,
				indicators: {
					quote: [{ close }],
					...(adjclose ? { adjclose: [{ adjclose }] } : {}),
				},
			},
		],
		error: null,
	},
});

const createFetch = (
	response: FetchResponseLike
): { fetchImpl: FetchLike; urls: string[] } => {
	const urls: string[] = [];
	const fetchImpl: FetchLike = async (url) => {
		urls.push(url);
		return response;
	};
	return { fetchImpl, urls };
};

const NOW = Date.UTC(2025, 5, 15);

describe("YahooSeriesProvider", () => {
	it("builds a daily chart request bounded by the period", () => {
		const provider = new YahooSeriesProvider({ now: () => NOW });
		const url = new URL(provider.buildUrl("GC=F", "6mo"));
		expect(url.pathname).toBe("/v8/finance/chart/GC%3DF");
		expect(url.searchParams.get("interval")).toBe("1d");
		expect(url.searchParams.get("period1")).toBe("1734220800");
		expect(url.searchParams.get("period2")).toBe("1749945600");
		expect(url.searchParams.get("range")).toBeNull();
	});

	it("requests the full range for the max period", () => {
		const provider = new YahooSeriesProvider({ now: () => NOW });
		const url = new URL(provider.buildUrl("AAPL", "max"));
		expect(url.searchParams.get("range")).toBe("max");
		expect(url.searchParams.get("period1")).toBeNull();
	});

	it("returns adjusted closes filed under the exchange trading day", async () => {
		const { fetchImpl, urls } = createFetch(
			jsonResponse(
				chartBody(
					[sessionOpen(2025, 1, 2), sessionOpen(2025, 1, 3), sessionOpen(2025, 1, 6)],
					[101, null, 103],
					[100.5, null, 102.5]
				)
			)
		);
		const provider = new YahooSeriesProvider({ fetchImpl, now: () => NOW });

		const series = await provider.fetch("AAPL", "6mo");

		expect(urls).toHaveLength(1);
		expect(series.map((p) => toIsoDate(p.timestamp))).toEqual([
			"2025-01-02",
			"2025-01-06",
		]);
		expect(series.map((p) => p.close)).toEqual([100.5, 102.5]);
	});

	it("drops rows missing an adjusted close instead of mixing in raw closes", async () => {
		const { fetchImpl } = createFetch(
			jsonResponse(
				chartBody(
					[sessionOpen(2025, 1, 2), sessionOpen(2025, 1, 3)],
					[200, 202],
					[100, null]
				)
			)
		);
		const provider = new YahooSeriesProvider({ fetchImpl, now: () => NOW });

		const series = await provider.fetch("AAPL", "6mo");

		expect(series).toEqual([{ timestamp: Date.UTC(2025, 0, 2), close: 100 }]);
	});

	it("falls back to raw closes when the adjusted column is absent", async () => {
		const { fetchImpl } = createFetch(
			jsonResponse(chartBody([sessionOpen(2025, 1, 2)], [101]))
		);
		const provider = new YahooSeriesProvider({ fetchImpl, now: () => NOW });

		const series = await provider.fetch("AAPL", "6mo");

		expect(series).toEqual([{ timestamp: Date.UTC(2025, 0, 2), close: 101 }]);
	});

	it("uses raw closes when adjustment is disabled", async () => {
		const { fetchImpl } = createFetch(
			jsonResponse(
				chartBody([sessionOpen(2025, 1, 2)], [101], [100.5])
			)
		);
		const provider = new YahooSeriesProvider({
			fetchImpl,
			adjusted: false,
			now: () => NOW,
		});

		const series = await provider.fetch("AAPL", "6mo");

		expect(series).toEqual([{ timestamp: Date.UTC(2025, 0, 2), close: 101 }]);
	});

	it("raises NoDataError when the chart has no rows", async () => {
		const { fetchImpl } = createFetch(
			jsonResponse({ chart: { result: [], error: null } })
		);
		const provider = new YahooSeriesProvider({ fetchImpl, now: () => NOW });

		await expect(provider.fetch("EMPTY", "6mo")).rejects.toBeInstanceOf(
			NoDataError
		);
	});

	it("raises NoDataError when every close is missing", async () => {
		const { fetchImpl } = createFetch(
			jsonResponse(chartBody([sessionOpen(2025, 1, 2)], [null]))
		);
		const provider = new YahooSeriesProvider({ fetchImpl, now: () => NOW });

		await expect(provider.fetch("HOLE", "6mo")).rejects.toThrow(
			"No data returned for HOLE: every row was missing a close"
		);
	});

	it("maps an unknown symbol to NoDataError", async () => {
		const { fetchImpl } = createFetch(
			jsonResponse(
				{ chart: { result: null, error: { code: "Not Found", description: "No data found" } } },
				404
			)
		);
		const provider = new YahooSeriesProvider({ fetchImpl, now: () => NOW });

		await expect(provider.fetch("NOPE", "6mo")).rejects.toBeInstanceOf(
			NoDataError
		);
	});

	it("raises ProviderError for chart errors and HTTP failures", async () => {
		const chartError = createFetch(
			jsonResponse({
				chart: {
					result: null,
					error: { code: "Bad Request", description: "Invalid input" },
				},
			})
		);
		const provider = new YahooSeriesProvider({
			fetchImpl: chartError.fetchImpl,
			now: () => NOW,
		});
		await expect(provider.fetch("AAPL", "6mo")).rejects.toThrow(
			"Yahoo Finance chart error: Bad Request - Invalid input"
		);

		const serverError = createFetch(jsonResponse({}, 500));
		const failing = new YahooSeriesProvider({
			fetchImpl: serverError.fetchImpl,
			now: () => NOW,
		});
		await expect(failing.fetch("AAPL", "6mo")).rejects.toBeInstanceOf(
			ProviderError
		);
	});

	it("wraps transport failures in ProviderError", async () => {
		const fetchImpl: FetchLike = async () => {
			throw new Error("socket hang up");
		};
		const provider = new YahooSeriesProvider({ fetchImpl, now: () => NOW });

		await expect(provider.fetch("AAPL", "6mo")).rejects.toThrow(
			"Yahoo Finance request failed: socket hang up"
		);
	});
});
