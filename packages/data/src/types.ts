import type { ModuleLogger, PricePoint } from "@tickercast/core";

/**
 * Source of daily closing prices for one instrument.
 *
 * Implementations resolve with a non-empty series ordered by date ascending,
 * one point per calendar date, and reject with `NoDataError` when the source
 * has nothing usable for the ticker.
 */
export interface SeriesProvider {
	readonly name: string;
	fetch(ticker: string, period: string): Promise<PricePoint[]>;
}

export type SeriesProviderLogger = Pick<ModuleLogger, "debug" | "info" | "warn">;

export interface FetchResponseLike {
	ok: boolean;
	status: number;
	statusText: string;
	json(): Promise<unknown>;
	text(): Promise<string>;
}

export type FetchLike = (
	url: string,
	init?: { headers?: Record<string, string> }
) => Promise<FetchResponseLike>;
