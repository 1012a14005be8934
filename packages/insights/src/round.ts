/**
 * Round to two decimals, half away from zero on the decimal representation
 * (`12.345 -> 12.35`). Non-finite values become 0 so the output always holds
 * plain numbers.
 */
export const round2 = (value: number): number => {
	if (!Number.isFinite(value)) {
		return 0;
	}
	const sign = value < 0 ? -1 : 1;
	const abs = Math.abs(value);
	const text = String(abs);
	// shift the decimal point textually so 12.345 is not read as 12.34499...
	const scaled = text.includes("e") ? abs * 100 : Number(`${text}e2`);
	const rounded = (sign * Math.round(scaled)) / 100;
	return rounded === 0 ? 0 : rounded;
};

export const roundPct = (fraction: number): number => round2(fraction * 100);
