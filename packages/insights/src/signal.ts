import type { Signal } from "@tickercast/core";

export const SIGNAL_THRESHOLD = 0.05;

/** Both inputs are fractions, not percentages. */
export const classifySignal = (
	pctChangeHorizon: number,
	momentum: number
): Signal => {
	if (pctChangeHorizon > SIGNAL_THRESHOLD && momentum > 0) {
		return "bullish";
	}
	if (pctChangeHorizon < -SIGNAL_THRESHOLD && momentum < 0) {
		return "bearish";
	}
	return "watch";
};
