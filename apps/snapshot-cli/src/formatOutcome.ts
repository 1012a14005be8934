import type { InstrumentOutcome } from "@tickercast/snapshot";

export const formatOutcomeLine = (outcome: InstrumentOutcome): string => {
	if (outcome.status === "failed") {
		return `✖ ${outcome.ticker}: ${outcome.message}`;
	}
	const { record } = outcome;
	const horizonPrice = record.forecast.length
		? record.forecast[record.forecast.length - 1]
		: record.nextDayPrice;
	return `✔ ${outcome.ticker}: latest ${record.latestPrice} → ${horizonPrice} (${record.pctChangeHorizon}%)`;
};
