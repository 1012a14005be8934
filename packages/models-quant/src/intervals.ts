import { ForecastError, addDays } from "@tickercast/core";
import type { ForecastPoint, PricePoint } from "@tickercast/core";
import type { ModelFit } from "./types";

export const DEFAULT_INTERVAL_WIDTH = 0.8;

// Acklam's rational approximation of the inverse normal CDF.
const A = [
	-3.969683028665376e1, 2.209460984245205e2, -2.759285104469687e2,
	1.38357751867269e2, -3.066479806614716e1, 2.506628277459239,
];
const B = [
	-5.447609879822406e1, 1.615858368580409e2, -1.556989798598866e2,
	6.680131188771972e1, -1.328068155288572e1,
];
const C = [
	-7.784894002430293e-3, -3.223964580411365e-1, -2.400758277161838,
	-2.549732539343734, 4.374664141464968, 2.938163982698783,
];
const D = [
	7.784695709041462e-3, 3.224671290700398e-1, 2.445134137142996,
	3.754408661907416,
];
const P_LOW = 0.02425;

export const normalQuantile = (p: number): number => {
	if (!(p > 0 && p < 1)) {
		throw new RangeError(`Quantile probability must be in (0, 1), got ${p}`);
	}
	if (p < P_LOW) {
		const q = Math.sqrt(-2 * Math.log(p));
		return (
			(((((C[0] * q + C[1]) * q + C[2]) * q + C[3]) * q + C[4]) * q + C[5]) /
			((((D[0] * q + D[1]) * q + D[2]) * q + D[3]) * q + 1)
		);
	}
	if (p > 1 - P_LOW) {
		return -normalQuantile(1 - p);
	}
	const q = p - 0.5;
	const r = q * q;
	return (
		((((((A[0] * r + A[1]) * r + A[2]) * r + A[3]) * r + A[4]) * r + A[5]) * q) /
		(((((B[0] * r + B[1]) * r + B[2]) * r + B[3]) * r + B[4]) * r + 1)
	);
};

/** Two-sided z score covering `width` of a normal distribution. */
export const intervalZ = (width: number): number =>
	normalQuantile(0.5 + width / 2);

export const residualStd = (
	actual: readonly number[],
	fitted: readonly number[],
	parameterCount: number,
	start = 0
): number => {
	let sumSq = 0;
	let count = 0;
	for (let i = start; i < actual.length; i += 1) {
		const residual = actual[i] - fitted[i];
		sumSq += residual * residual;
		count += 1;
	}
	if (count === 0) {
		return 0;
	}
	return Math.sqrt(sumSq / Math.max(count - parameterCount, 1));
};

export const validateInput = (
	model: string,
	history: readonly PricePoint[],
	horizonDays: number,
	minPoints: number
): void => {
	if (!Number.isInteger(horizonDays) || horizonDays <= 0) {
		throw new ForecastError(
			`${model}: horizonDays must be a positive integer, got ${horizonDays}`
		);
	}
	if (history.length < minPoints) {
		throw new ForecastError(
			`${model}: needs at least ${minPoints} observations, got ${history.length}`
		);
	}
	for (let i = 0; i < history.length; i += 1) {
		const point = history[i];
		if (!Number.isFinite(point.close) || !Number.isFinite(point.timestamp)) {
			throw new ForecastError(`${model}: non-finite observation at index ${i}`);
		}
		if (i > 0 && point.timestamp <= history[i - 1].timestamp) {
			throw new ForecastError(`${model}: history must be strictly ascending by date`);
		}
	}
};

/**
 * Attach dates and uncertainty bounds to a model fit. Future step `h` uses
 * the residual spread scaled by `sqrt(h)`.
 */
export const assembleForecast = (
	history: readonly PricePoint[],
	fit: ModelFit,
	intervalWidth: number
): ForecastPoint[] => {
	const closes = history.map((point) => point.close);
	const sigma = residualStd(
		closes,
		fit.fitted,
		fit.parameterCount,
		fit.residualStart ?? 0
	);
	const halfWidth = intervalZ(intervalWidth) * sigma;
	const points: ForecastPoint[] = history.map((point, idx) => ({
		timestamp: point.timestamp,
		yhat: fit.fitted[idx],
		yhatLower: fit.fitted[idx] - halfWidth,
		yhatUpper: fit.fitted[idx] + halfWidth,
	}));

	const lastTimestamp = history[history.length - 1].timestamp;
	fit.future.forEach((yhat, idx) => {
		const step = idx + 1;
		const spread = halfWidth * Math.sqrt(step);
		points.push({
			timestamp: addDays(lastTimestamp, step),
			yhat,
			yhatLower: yhat - spread,
			yhatUpper: yhat + spread,
		});
	});

	for (const point of points) {
		if (!Number.isFinite(point.yhat)) {
			throw new ForecastError("Model produced a non-finite prediction");
		}
	}
	return points;
};
