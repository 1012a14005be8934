export * from "./time";

/**
 * One daily observation. `timestamp` is 00:00 UTC of the calendar date.
 */
export interface PricePoint {
	timestamp: number;
	close: number;
}

export interface ForecastPoint {
	timestamp: number;
	yhat: number;
	yhatLower: number;
	yhatUpper: number;
}

export type Signal = "bullish" | "bearish" | "watch";

export interface HistoryEntry {
	readonly ds: string;
	readonly y: number;
}

/**
 * Derived metrics for one instrument. Percent fields are already multiplied
 * by 100; every number is rounded to two decimals except `history` closes.
 */
export interface InsightRecord {
	readonly ticker: string;
	readonly latestPrice: number;
	readonly forecast: readonly number[];
	readonly nextDayPrice: number;
	readonly nextDayPct: number;
	readonly pctChangeHorizon: number;
	readonly momentum5d: number;
	readonly annualizedVol: number;
	readonly signal: Signal;
	readonly history: readonly HistoryEntry[];
	readonly forecastDates: readonly string[];
}

export interface SnapshotDocument {
	generatedAt: string;
	tickers: readonly string[];
	snapshots: readonly InsightRecord[];
}
