export const TRADING_DAYS_PER_YEAR = 252;
export const MOMENTUM_WINDOW = 5;

/** Day-over-day returns. Steps from a zero close are skipped. */
export const pctChanges = (closes: readonly number[]): number[] => {
	const changes: number[] = [];
	for (let i = 1; i < closes.length; i += 1) {
		const prev = closes[i - 1];
		if (prev !== 0) {
			changes.push((closes[i] - prev) / prev);
		}
	}
	return changes;
};

export const sampleStd = (values: readonly number[]): number => {
	if (values.length < 2) {
		return 0;
	}
	const mean = values.reduce((acc, value) => acc + value, 0) / values.length;
	const sumSq = values.reduce((acc, value) => acc + (value - mean) ** 2, 0);
	return Math.sqrt(sumSq / (values.length - 1));
};

export const annualizedVolatility = (closes: readonly number[]): number =>
	sampleStd(pctChanges(closes)) * Math.sqrt(TRADING_DAYS_PER_YEAR);

/**
 * Relative change across the trailing window (first to last close). A
 * single close, or a zero starting close, yields 0.
 */
export const momentum = (
	closes: readonly number[],
	window = MOMENTUM_WINDOW
): number => {
	const tail = closes.slice(-window);
	if (tail.length < 2) {
		return 0;
	}
	const start = tail[0];
	const end = tail[tail.length - 1];
	return start === 0 ? 0 : (end - start) / start;
};

/** `(to - from) / from`, or 0 when `from` is 0. */
export const relativeChange = (from: number, to: number): number =>
	from === 0 ? 0 : (to - from) / from;
