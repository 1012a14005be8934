import ccxt from "ccxt";
import type { Exchange, OHLCV } from "ccxt";
import {
	ConfigError,
	DAY_MS,
	NoDataError,
	ProviderError,
	periodStartTimestamp,
} from "@tickercast/core";
import type { PricePoint } from "@tickercast/core";
import { normalizeSeries } from "./normalizeSeries";
import type { SeriesProvider, SeriesProviderLogger } from "./types";
import { mapCcxtRowToPricePoint } from "./utils/ccxtMapper";

const DEFAULT_BATCH_SIZE = 500;
const DEFAULT_MAX_ITERATIONS = 100;

export const CCXT_EXCHANGE_IDS = [
	"binance",
	"kraken",
	"coinbase",
	"bitstamp",
] as const;
export type CcxtExchangeId = (typeof CCXT_EXCHANGE_IDS)[number];

/** The slice of a ccxt exchange this provider talks to. */
export interface OhlcvClient {
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]>;
}

export interface CcxtSeriesProviderOptions {
	client: OhlcvClient;
	exchangeId?: string;
	batchSize?: number;
	maxIterations?: number;
	now?: () => number;
	logger?: SeriesProviderLogger;
}

export const isCcxtExchangeId = (value: string): value is CcxtExchangeId =>
	CCXT_EXCHANGE_IDS.some((id) => id === value);

export const createCcxtExchange = (exchangeId: string): Exchange => {
	const id = exchangeId.toLowerCase();
	if (!isCcxtExchangeId(id)) {
		throw new ConfigError(
			`Unsupported exchange "${exchangeId}". Expected one of ${CCXT_EXCHANGE_IDS.join(", ")}`
		);
	}
	const options = { enableRateLimit: true };
	switch (id) {
		case "binance":
			return new ccxt.binance(options);
		case "kraken":
			return new ccxt.kraken(options);
		case "coinbase":
			return new ccxt.coinbase(options);
		case "bitstamp":
			return new ccxt.bitstamp(options);
	}
};

/**
 * Daily closes for exchange pairs such as "BTC/USDT", paged forward from the
 * start of the lookback period.
 */
export class CcxtSeriesProvider implements SeriesProvider {
	readonly name: string;
	private readonly batchSize: number;
	private readonly maxIterations: number;
	private readonly now: () => number;

	constructor(private readonly options: CcxtSeriesProviderOptions) {
		this.name = `ccxt:${options.exchangeId ?? "custom"}`;
		this.batchSize = Math.max(options.batchSize ?? DEFAULT_BATCH_SIZE, 1);
		this.maxIterations = Math.max(
			options.maxIterations ?? DEFAULT_MAX_ITERATIONS,
			1
		);
		this.now = options.now ?? Date.now;
	}

	async fetch(ticker: string, period: string): Promise<PricePoint[]> {
		const endTimestamp = this.now();
		let since = periodStartTimestamp(period, endTimestamp);
		const rows: PricePoint[] = [];
		const seenTimestamps = new Set<number>();
		let iterations = 0;
		let exhausted = false;

		while (since <= endTimestamp && iterations < this.maxIterations) {
			const batch = await this.fetchBatch(ticker, since);
			if (!batch.length) {
				exhausted = true;
				break;
			}

			let lastTimestamp = since;
			for (const row of batch) {
				const point = mapCcxtRowToPricePoint(row);
				if (point.timestamp > endTimestamp) {
					break;
				}
				if (!seenTimestamps.has(point.timestamp)) {
					seenTimestamps.add(point.timestamp);
					rows.push(point);
				}
				if (Number.isFinite(point.timestamp)) {
					lastTimestamp = Math.max(lastTimestamp, point.timestamp);
				}
			}

			since = Math.max(lastTimestamp + DAY_MS, since + DAY_MS);
			iterations += 1;
			if (batch.length < this.batchSize) {
				exhausted = true;
				break;
			}
		}

		if (!exhausted && iterations >= this.maxIterations) {
			this.options.logger?.warn("ccxt_fetch_iterations_exceeded", {
				ticker,
				period,
				iterations,
				maxIterations: this.maxIterations,
			});
		}

		const { points, dropped } = normalizeSeries(rows);
		if (!points.length) {
			throw new NoDataError(ticker);
		}
		this.options.logger?.debug("ccxt_series_loaded", {
			ticker,
			period,
			exchange: this.options.exchangeId ?? null,
			points: points.length,
			dropped,
			iterations,
		});
		return points;
	}

	private async fetchBatch(ticker: string, since: number): Promise<OHLCV[]> {
		try {
			return await this.options.client.fetchOHLCV(
				ticker,
				"1d",
				since,
				this.batchSize
			);
		} catch (error) {
			throw new ProviderError(
				ticker,
				`Exchange request failed: ${
					error instanceof Error ? error.message : String(error)
				}`,
				{ cause: error }
			);
		}
	}
}
