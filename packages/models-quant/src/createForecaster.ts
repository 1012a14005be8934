import { ConfigError } from "@tickercast/core";
import type { ForecasterOptions } from "@tickercast/core";
import { Ar4Forecaster } from "./ar4";
import { HoltForecaster } from "./holt";
import { LinearTrendForecaster } from "./linearTrend";
import type { Forecaster } from "./types";

export const createForecaster = (
	name: string,
	options: ForecasterOptions = {}
): Forecaster => {
	const { intervalWidth } = options;
	switch (name) {
		case "linear":
			return new LinearTrendForecaster({
				intervalWidth,
				weeklySeasonality: options.weeklySeasonality,
			});
		case "ar4":
			return new Ar4Forecaster({ intervalWidth });
		case "holt":
			return new HoltForecaster({
				intervalWidth,
				alpha: options.alpha,
				beta: options.beta,
			});
		default:
			throw new ConfigError(`Unknown forecaster: ${name}`);
	}
};
