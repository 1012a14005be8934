import type { OHLCV } from "ccxt";
import { ConfigError, NoDataError, ProviderError } from "@tickercast/core";
import { describe, expect, it, vi } from "vitest";
import {
	CcxtSeriesProvider,
	createCcxtExchange,
	type OhlcvClient,
} from "./ccxtSeriesProvider";

const DAY = 86_400_000;
const START = Date.UTC(2025, 0, 1);
const NOW = Date.UTC(2025, 0, 11);

const buildRows = (count: number): OHLCV[] =>
	Array.from({ length: count }, (_, idx) => [
		START + idx * DAY,
		100 + idx,
		101 + idx,
		99 + idx,
		100 + idx,
		1_000,
	]);

class StaticOhlcvClient implements OhlcvClient {
	public calls: Array<{ since?: number; limit?: number }> = [];

	constructor(private readonly rows: OHLCV[]) {}

	async fetchOHLCV(
		_symbol: string,
		_timeframe?: string,
		since = 0,
		limit = 500
	): Promise<OHLCV[]> {
		this.calls.push({ since, limit });
		return this.rows
			.filter((row) => Number(row[0]) >= since)
			.slice(0, limit);
	}
}

describe("CcxtSeriesProvider", () => {
	it("pages daily candles from the start of the period", async () => {
		const client = new StaticOhlcvClient(buildRows(10));
		const provider = new CcxtSeriesProvider({
			client,
			exchangeId: "binance",
			batchSize: 2,
			now: () => NOW,
		});

		const series = await provider.fetch("BTC/USDT", "5d");

		expect(series.map((p) => p.close)).toEqual([105, 106, 107, 108, 109]);
		expect(series[0].timestamp).toBe(Date.UTC(2025, 0, 6));
		expect(client.calls.map((call) => call.since)).toEqual([
			Date.UTC(2025, 0, 6),
			Date.UTC(2025, 0, 8),
			Date.UTC(2025, 0, 10),
		]);
		expect(provider.name).toBe("ccxt:binance");
	});

	it("stops at the iteration cap and reports it", async () => {
		const client = new StaticOhlcvClient(buildRows(10));
		const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn() };
		const provider = new CcxtSeriesProvider({
			client,
			batchSize: 2,
			maxIterations: 1,
			now: () => NOW,
			logger,
		});

		const series = await provider.fetch("BTC/USDT", "5d");

		expect(series).toHaveLength(2);
		expect(logger.warn).toHaveBeenCalledWith(
			"ccxt_fetch_iterations_exceeded",
			expect.objectContaining({ ticker: "BTC/USDT", iterations: 1 })
		);
	});

	it("raises NoDataError when the exchange has no candles", async () => {
		const provider = new CcxtSeriesProvider({
			client: new StaticOhlcvClient([]),
			now: () => NOW,
		});

		await expect(provider.fetch("NEW/USDT", "5d")).rejects.toBeInstanceOf(
			NoDataError
		);
	});

	it("wraps exchange failures in ProviderError", async () => {
		const client: OhlcvClient = {
			fetchOHLCV: async () => {
				throw new Error("binance GET 451");
			},
		};
		const provider = new CcxtSeriesProvider({ client, now: () => NOW });

		const failure = provider.fetch("BTC/USDT", "5d");
		await expect(failure).rejects.toBeInstanceOf(ProviderError);
		await expect(failure).rejects.toThrow(
			"Exchange request failed: binance GET 451"
		);
	});

	it("rejects exchanges outside the supported set", () => {
		expect(() => createCcxtExchange("mtgox")).toThrow(ConfigError);
	});
});
