import { ForecastError } from "@tickercast/core";
import type { ForecastPoint, PricePoint } from "@tickercast/core";
import {
	DEFAULT_INTERVAL_WIDTH,
	assembleForecast,
	validateInput,
} from "./intervals";
import type { Forecaster, ModelFit } from "./types";

export interface BaseForecasterOptions {
	intervalWidth?: number;
}

export abstract class BaseForecaster implements Forecaster {
	abstract readonly name: string;
	protected abstract readonly minPoints: number;
	private readonly intervalWidth: number;

	constructor(options: BaseForecasterOptions = {}) {
		const width = options.intervalWidth ?? DEFAULT_INTERVAL_WIDTH;
		if (!(width > 0 && width < 1)) {
			throw new ForecastError(
				`intervalWidth must be in (0, 1), got ${width}`
			);
		}
		this.intervalWidth = width;
	}

	async fitAndPredict(
		history: readonly PricePoint[],
		horizonDays: number
	): Promise<ForecastPoint[]> {
		validateInput(this.name, history, horizonDays, this.minPoints);
		const fit = this.fit(history, horizonDays);
		return assembleForecast(history, fit, this.intervalWidth);
	}

	protected abstract fit(
		history: readonly PricePoint[],
		horizonDays: number
	): ModelFit;
}
