import { DAY_MS, ForecastError } from "@tickercast/core";
import type { PricePoint } from "@tickercast/core";
import { BaseForecaster } from "./baseForecaster";
import type { BaseForecasterOptions } from "./baseForecaster";
import type { ModelFit } from "./types";

export interface LinearTrendOptions extends BaseForecasterOptions {
	/** Add a mean-residual-by-weekday term once two weeks of data exist. */
	weeklySeasonality?: boolean;
}

const MIN_SEASONAL_SPAN_DAYS = 14;

const weekday = (ts: number): number => new Date(ts).getUTCDay();

export const fitLine = (
	xs: readonly number[],
	ys: readonly number[]
): { slope: number; intercept: number } => {
	const n = xs.length;
	const meanX = xs.reduce((acc, x) => acc + x, 0) / n;
	const meanY = ys.reduce((acc, y) => acc + y, 0) / n;
	let sxy = 0;
	let sxx = 0;
	for (let i = 0; i < n; i += 1) {
		const dx = xs[i] - meanX;
		sxy += dx * (ys[i] - meanY);
		sxx += dx * dx;
	}
	if (sxx === 0) {
		throw new ForecastError("linear: observations share a single date");
	}
	const slope = sxy / sxx;
	return { slope, intercept: meanY - slope * meanX };
};

/**
 * Least-squares trend over calendar-day offsets, optionally with additive
 * weekly seasonality.
 */
export class LinearTrendForecaster extends BaseForecaster {
	readonly name = "linear";
	protected readonly minPoints = 2;
	private readonly weeklySeasonality: boolean;

	constructor(options: LinearTrendOptions = {}) {
		super(options);
		this.weeklySeasonality = options.weeklySeasonality ?? false;
	}

	protected fit(history: readonly PricePoint[], horizonDays: number): ModelFit {
		const origin = history[0].timestamp;
		const xs = history.map((point) => (point.timestamp - origin) / DAY_MS);
		const ys = history.map((point) => point.close);
		const { slope, intercept } = fitLine(xs, ys);
		const line = (x: number): number => intercept + slope * x;

		const span = xs[xs.length - 1];
		const effects = new Map<number, number>();
		if (this.weeklySeasonality && span >= MIN_SEASONAL_SPAN_DAYS) {
			const buckets = new Map<number, { sum: number; count: number }>();
			history.forEach((point, idx) => {
				const day = weekday(point.timestamp);
				const bucket = buckets.get(day) ?? { sum: 0, count: 0 };
				bucket.sum += ys[idx] - line(xs[idx]);
				bucket.count += 1;
				buckets.set(day, bucket);
			});
			for (const [day, bucket] of buckets) {
				effects.set(day, bucket.sum / bucket.count);
			}
		}
		const seasonal = (ts: number): number => effects.get(weekday(ts)) ?? 0;

		const fitted = history.map(
			(point, idx) => line(xs[idx]) + seasonal(point.timestamp)
		);
		const last = history[history.length - 1].timestamp;
		const future: number[] = [];
		for (let step = 1; step <= horizonDays; step += 1) {
			future.push(line(span + step) + seasonal(last + step * DAY_MS));
		}

		return { fitted, future, parameterCount: 2 + effects.size };
	}
}
