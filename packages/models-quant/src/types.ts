import type { ForecastPoint, PricePoint } from "@tickercast/core";

/**
 * Fits a daily close series and predicts it forward.
 *
 * The result covers every historical date (in-sample fit) followed by
 * `horizonDays` calendar days after the last observation, ordered by date.
 * Fitting failures reject with `ForecastError`.
 */
export interface Forecaster {
	readonly name: string;
	fitAndPredict(
		history: readonly PricePoint[],
		horizonDays: number
	): Promise<ForecastPoint[]>;
}

export interface ModelFit {
	/** In-sample predictions, one per historical point. */
	fitted: number[];
	/** Out-of-sample predictions, one per future day. */
	future: number[];
	/** Estimated parameters, used for the residual degrees of freedom. */
	parameterCount: number;
	/** Indices of `fitted` that are real predictions (warm-up excluded). */
	residualStart?: number;
}
