import { ForecastError } from "@tickercast/core";
import type { PricePoint } from "@tickercast/core";
import { BaseForecaster } from "./baseForecaster";
import type { BaseForecasterOptions } from "./baseForecaster";
import type { ModelFit } from "./types";

export interface HoltOptions extends BaseForecasterOptions {
	alpha?: number;
	beta?: number;
}

const DEFAULT_ALPHA = 0.5;
const DEFAULT_BETA = 0.3;

const ensureSmoothing = (value: number, field: string): number => {
	if (!(value > 0 && value <= 1)) {
		throw new ForecastError(`holt: ${field} must be in (0, 1], got ${value}`);
	}
	return value;
};

/** Holt's linear (double exponential) smoothing. */
export class HoltForecaster extends BaseForecaster {
	readonly name = "holt";
	protected readonly minPoints = 2;
	private readonly alpha: number;
	private readonly beta: number;

	constructor(options: HoltOptions = {}) {
		super(options);
		this.alpha = ensureSmoothing(options.alpha ?? DEFAULT_ALPHA, "alpha");
		this.beta = ensureSmoothing(options.beta ?? DEFAULT_BETA, "beta");
	}

	protected fit(history: readonly PricePoint[], horizonDays: number): ModelFit {
		const values = history.map((point) => point.close);
		let level = values[0];
		let trend = values[1] - values[0];
		const fitted = [values[0]];

		for (let i = 1; i < values.length; i += 1) {
			fitted.push(level + trend);
			const prevLevel = level;
			level = this.alpha * values[i] + (1 - this.alpha) * (level + trend);
			trend = this.beta * (level - prevLevel) + (1 - this.beta) * trend;
		}

		const future: number[] = [];
		for (let step = 1; step <= horizonDays; step += 1) {
			future.push(level + step * trend);
		}

		return { fitted, future, parameterCount: 2, residualStart: 1 };
	}
}
