import { startOfUtcDay } from "@tickercast/core";
import type { PricePoint } from "@tickercast/core";

export interface NormalizeSeriesResult {
	points: PricePoint[];
	dropped: number;
}

/**
 * Bucket observations to their UTC calendar date, drop unusable closes and
 * keep the last observation seen for each date. Output is sorted ascending.
 */
export const normalizeSeries = (
	points: readonly PricePoint[]
): NormalizeSeriesResult => {
	const byDay = new Map<number, PricePoint>();
	let dropped = 0;
	for (const point of points) {
		if (
			!Number.isFinite(point.timestamp) ||
			!Number.isFinite(point.close) ||
			point.close <= 0
		) {
			dropped += 1;
			continue;
		}
		const day = startOfUtcDay(point.timestamp);
		if (byDay.has(day)) {
			dropped += 1;
		}
		byDay.set(day, { timestamp: day, close: point.close });
	}
	const sorted = Array.from(byDay.values()).sort(
		(a, b) => a.timestamp - b.timestamp
	);
	return { points: sorted, dropped };
};
