import {
	NoDataError,
	ProviderError,
	parsePeriod,
	periodStartTimestamp,
} from "@tickercast/core";
import type { PricePoint } from "@tickercast/core";
import { normalizeSeries } from "./normalizeSeries";
import type {
	FetchLike,
	FetchResponseLike,
	SeriesProvider,
	SeriesProviderLogger,
} from "./types";

const DEFAULT_BASE_URL = "https://query2.finance.yahoo.com";

// ---- Yahoo Finance chart response shape ----

interface YahooChartQuote {
	close: (number | null)[];
}

interface YahooChartResult {
	timestamp: number[];
	gmtoffset: number;
	quote: YahooChartQuote;
	adjclose?: (number | null)[];
}

export interface YahooSeriesProviderOptions {
	/** Use split/dividend adjusted closes when the response carries them. */
	adjusted?: boolean;
	baseUrl?: string;
	fetchImpl?: FetchLike;
	now?: () => number;
	logger?: SeriesProviderLogger;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const firstRecord = (value: unknown): Record<string, unknown> | undefined => {
	if (!Array.isArray(value)) {
		return undefined;
	}
	const [first] = value;
	return isRecord(first) ? first : undefined;
};

const readNumberColumn = (value: unknown): (number | null)[] | undefined =>
	Array.isArray(value)
		? value.map((entry) => (typeof entry === "number" ? entry : null))
		: undefined;

const readChartError = (chart: Record<string, unknown>): string | null => {
	const error = chart.error;
	if (!isRecord(error)) {
		return null;
	}
	const code = typeof error.code === "string" ? error.code : "UNKNOWN";
	const description =
		typeof error.description === "string" ? error.description : "";
	return `${code} - ${description}`.trim();
};

/**
 * Pull the first chart result out of a v8/finance/chart body.
 * Returns null when the body holds no usable series.
 */
export const readYahooChart = (
	ticker: string,
	body: unknown
): YahooChartResult | null => {
	const chart = isRecord(body) ? body.chart : undefined;
	if (!isRecord(chart)) {
		throw new ProviderError(ticker, "Yahoo Finance response has no chart");
	}
	const chartError = readChartError(chart);
	if (chartError) {
		throw new ProviderError(
			ticker,
			`Yahoo Finance chart error: ${chartError}`
		);
	}
	const result = firstRecord(chart.result);
	if (!result) {
		return null;
	}
	const timestamp = readNumberColumn(result.timestamp);
	const indicators = isRecord(result.indicators) ? result.indicators : {};
	const close = readNumberColumn(firstRecord(indicators.quote)?.close);
	if (!timestamp || !close || timestamp.length === 0) {
		return null;
	}
	const meta = isRecord(result.meta) ? result.meta : {};
	return {
		timestamp: timestamp.map((ts) => ts ?? Number.NaN),
		gmtoffset: typeof meta.gmtoffset === "number" ? meta.gmtoffset : 0,
		quote: { close },
		adjclose: readNumberColumn(firstRecord(indicators.adjclose)?.adjclose),
	};
};

/**
 * Daily closes from Yahoo Finance's v8/finance/chart endpoint.
 * Timestamps are shifted by the exchange offset before taking the date, so a
 * session is filed under its local trading day.
 */
export class YahooSeriesProvider implements SeriesProvider {
	readonly name = "yahoo";
	private readonly adjusted: boolean;
	private readonly baseUrl: string;
	private readonly fetchImpl: FetchLike;
	private readonly now: () => number;

	constructor(private readonly options: YahooSeriesProviderOptions = {}) {
		this.adjusted = options.adjusted ?? true;
		this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
		this.fetchImpl = options.fetchImpl ?? fetch;
		this.now = options.now ?? Date.now;
	}

	buildUrl(ticker: string, period: string): string {
		const url = new URL(
			`/v8/finance/chart/${encodeURIComponent(ticker)}`,
			this.baseUrl
		);
		url.searchParams.set("interval", "1d");
		if (parsePeriod(period).unit === "max") {
			url.searchParams.set("range", "max");
		} else {
			const now = this.now();
			const start = periodStartTimestamp(period, now);
			url.searchParams.set("period1", String(Math.floor(start / 1000)));
			url.searchParams.set("period2", String(Math.floor(now / 1000)));
		}
		url.searchParams.set("includePrePost", "false");
		url.searchParams.set("events", "div,splits");
		url.searchParams.set("includeAdjustedClose", String(this.adjusted));
		return url.toString();
	}

	async fetch(ticker: string, period: string): Promise<PricePoint[]> {
		const url = this.buildUrl(ticker, period);
		const body = await this.request(ticker, url);
		const chart = readYahooChart(ticker, body);
		if (!chart) {
			throw new NoDataError(ticker);
		}

		// a missing adjusted close drops the row rather than mixing price scales
		const closes =
			this.adjusted && chart.adjclose ? chart.adjclose : chart.quote.close;
		const raw: PricePoint[] = chart.timestamp.map((ts, idx) => ({
			timestamp: (ts + chart.gmtoffset) * 1000,
			close: closes[idx] ?? Number.NaN,
		}));
		const { points, dropped } = normalizeSeries(raw);
		if (!points.length) {
			throw new NoDataError(ticker, "every row was missing a close");
		}
		this.options.logger?.debug("yahoo_series_loaded", {
			ticker,
			period,
			points: points.length,
			dropped,
		});
		return points;
	}

	private async request(ticker: string, url: string): Promise<unknown> {
		let res: FetchResponseLike;
		try {
			res = await this.fetchImpl(url, {
				headers: { "User-Agent": "Mozilla/5.0", Accept: "application/json" },
			});
		} catch (error) {
			throw new ProviderError(
				ticker,
				`Yahoo Finance request failed: ${
					error instanceof Error ? error.message : String(error)
				}`,
				{ cause: error }
			);
		}

		if (res.status === 404) {
			throw new NoDataError(ticker, "symbol not found");
		}
		if (!res.ok) {
			const text = await res.text().catch(() => "");
			throw new ProviderError(
				ticker,
				`Yahoo Finance request failed: ${res.status} ${res.statusText} ${text.slice(0, 200)}`.trim()
			);
		}
		return res.json();
	}
}
