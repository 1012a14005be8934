import { ForecastError } from "@tickercast/core";
import type { PricePoint } from "@tickercast/core";
import { BaseForecaster } from "./baseForecaster";
import { leastSquares } from "./linalg";
import type { Matrix } from "./linalg";
import type { ModelFit } from "./types";

const LAGS = 4;

/** Intercept followed by the lag-1..lag-4 coefficients. */
export const fitAr4Coefficients = (values: readonly number[]): number[] => {
	const rows: Matrix = [];
	const targets: number[] = [];

	for (let i = LAGS; i < values.length; i += 1) {
		rows.push([1, values[i - 1], values[i - 2], values[i - 3], values[i - 4]]);
		targets.push(values[i]);
	}

	const coeffs = leastSquares(rows, targets);
	if (!coeffs) {
		throw new ForecastError("ar4: lagged design matrix is singular");
	}
	return coeffs;
};

export const predictAr4 = (coeffs: readonly number[], lags: readonly number[]): number => {
	const last = lags.length - 1;
	return (
		coeffs[0] +
		coeffs[1] * lags[last] +
		coeffs[2] * lags[last - 1] +
		coeffs[3] * lags[last - 2] +
		coeffs[4] * lags[last - 3]
	);
};

/**
 * AR(4) with intercept. The first four fitted values repeat the observations;
 * future values are produced recursively from earlier predictions.
 */
export class Ar4Forecaster extends BaseForecaster {
	readonly name = "ar4";
	protected readonly minPoints = 10;

	protected fit(history: readonly PricePoint[], horizonDays: number): ModelFit {
		const values = history.map((point) => point.close);
		const coeffs = fitAr4Coefficients(values);

		const fitted = values.map((value, idx) =>
			idx < LAGS ? value : predictAr4(coeffs, values.slice(idx - LAGS, idx))
		);

		const extended = [...values];
		const future: number[] = [];
		for (let step = 0; step < horizonDays; step += 1) {
			const next = predictAr4(coeffs, extended.slice(-LAGS));
			extended.push(next);
			future.push(next);
		}

		return { fitted, future, parameterCount: LAGS + 1, residualStart: LAGS };
	}
}
