import { toIsoDate } from "@tickercast/core";
import type {
	ForecastPoint,
	HistoryEntry,
	InsightRecord,
	PricePoint,
} from "@tickercast/core";
import { round2, roundPct } from "./round";
import { classifySignal } from "./signal";
import { annualizedVolatility, momentum, relativeChange } from "./stats";

export const DEFAULT_HISTORY_WINDOW = 60;

export interface DeriveInsightsOptions {
	/** Trailing observations attached to the record. */
	historyWindow?: number;
}

/**
 * Turn a price history and its forecast into the per-instrument record.
 *
 * The horizon block is the last `horizonDays` forecast entries by position;
 * a shorter forecast gives a shorter block and an empty block falls back to
 * the latest close. Percent changes against a zero close are reported as 0.
 */
export const deriveInsights = (
	ticker: string,
	history: readonly PricePoint[],
	forecast: readonly ForecastPoint[],
	horizonDays: number,
	options: DeriveInsightsOptions = {}
): InsightRecord => {
	if (!history.length) {
		throw new RangeError(`History for ${ticker} is empty`);
	}

	const closes = history.map((point) => point.close);
	const latestPrice = closes[closes.length - 1];

	const blockSize = Math.max(0, Math.floor(horizonDays));
	const futureBlock = blockSize > 0 ? forecast.slice(-blockSize) : [];
	const predicted = futureBlock.map((point) => point.yhat);

	const nextDayPrice = predicted.length ? predicted[0] : latestPrice;
	const horizonPrice = predicted.length
		? predicted[predicted.length - 1]
		: nextDayPrice;

	const nextDayPct = relativeChange(latestPrice, nextDayPrice);
	const pctChangeHorizon = relativeChange(latestPrice, horizonPrice);
	const momentum5d = momentum(closes);
	const annualizedVol = annualizedVolatility(closes);

	const window = Math.max(
		0,
		Math.floor(options.historyWindow ?? DEFAULT_HISTORY_WINDOW)
	);
	const tail = window > 0 ? history.slice(-window) : [];
	const historyEntries: HistoryEntry[] = tail.map((point) =>
		Object.freeze({ ds: toIsoDate(point.timestamp), y: point.close })
	);

	return Object.freeze({
		ticker,
		latestPrice: round2(latestPrice),
		forecast: Object.freeze(predicted.map(round2)),
		nextDayPrice: round2(nextDayPrice),
		nextDayPct: roundPct(nextDayPct),
		pctChangeHorizon: roundPct(pctChangeHorizon),
		momentum5d: roundPct(momentum5d),
		annualizedVol: roundPct(annualizedVol),
		signal: classifySignal(pctChangeHorizon, momentum5d),
		history: Object.freeze(historyEntries),
		forecastDates: Object.freeze(
			futureBlock.map((point) => toIsoDate(point.timestamp))
		),
	});
};
