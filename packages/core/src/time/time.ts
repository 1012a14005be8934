/**
 * Calendar helpers for daily series.
 * All functions operate on UTC epoch milliseconds (no timezone conversion).
 */
import { ConfigError } from "../errors";
import { DAY_MS } from "./constants";

export type PeriodUnit = "d" | "wk" | "mo" | "y" | "ytd" | "max";

export interface ParsedPeriod {
	unit: PeriodUnit;
	n: number;
}

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const PERIOD_PATTERN = /^(\d+)(d|wk|mo|y)$/;
const STEP_UNITS: readonly PeriodUnit[] = ["d", "wk", "mo", "y"];

/**
 * Bucket a timestamp to the start of its period
 * @example bucketTimestamp(1735690261234, 60000) => 1735690260000
 */
export const bucketTimestamp = (ts: number, periodMs: number): number => {
	if (!Number.isFinite(ts)) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	if (!Number.isFinite(periodMs) || periodMs <= 0) {
		throw new Error(`Invalid period ms: ${periodMs}`);
	}
	return Math.floor(ts / periodMs) * periodMs;
};

export const startOfUtcDay = (ts: number): number =>
	bucketTimestamp(ts, DAY_MS);

export const addDays = (ts: number, days: number): number => ts + days * DAY_MS;

/**
 * Render the UTC calendar date of a timestamp as `YYYY-MM-DD`.
 */
export const toIsoDate = (ts: number): string => {
	const date = new Date(ts);
	const yyyy = String(date.getUTCFullYear()).padStart(4, "0");
	const mm = String(date.getUTCMonth() + 1).padStart(2, "0");
	const dd = String(date.getUTCDate()).padStart(2, "0");
	return `${yyyy}-${mm}-${dd}`;
};

/**
 * Parse a `YYYY-MM-DD` string to 00:00 UTC of that date.
 * @throws Error on malformed or impossible dates
 */
export const parseIsoDate = (value: string): number => {
	const match = value.trim().match(ISO_DATE_PATTERN);
	if (!match) {
		throw new Error(`Invalid ISO date: "${value}". Expected YYYY-MM-DD`);
	}
	const year = Number(match[1]);
	const month = Number(match[2]);
	const day = Number(match[3]);
	const ts = Date.UTC(year, month - 1, day);
	if (toIsoDate(ts) !== `${match[1]}-${match[2]}-${match[3]}`) {
		throw new Error(`Invalid ISO date: "${value}"`);
	}
	return ts;
};

/**
 * Parse a lookback period: "5d", "2wk", "6mo", "1y", "ytd" or "max".
 * @throws ConfigError if the period format is invalid
 */
export const parsePeriod = (period: string): ParsedPeriod => {
	if (typeof period !== "string") {
		throw new ConfigError(
			`Invalid period: expected string, got ${typeof period}`
		);
	}
	const trimmed = period.trim().toLowerCase();
	if (trimmed === "ytd" || trimmed === "max") {
		return { unit: trimmed, n: 1 };
	}
	const match = trimmed.match(PERIOD_PATTERN);
	if (!match) {
		throw new ConfigError(
			`Invalid period format: "${period}". Expected format like "5d", "6mo", "1y", "ytd", "max"`
		);
	}
	const n = parseInt(match[1], 10);
	if (n <= 0) {
		throw new ConfigError(
			`Invalid period: length must be positive, got ${n} in "${period}"`
		);
	}
	const unit = STEP_UNITS.find((candidate) => candidate === match[2]);
	if (!unit) {
		throw new ConfigError(`Invalid period unit in "${period}"`);
	}
	return { unit, n };
};

/**
 * First timestamp (00:00 UTC) covered by a lookback period ending at `now`.
 * "max" maps to the epoch.
 */
export const periodStartTimestamp = (period: string, now: number): number => {
	const { unit, n } = parsePeriod(period);
	const today = startOfUtcDay(now);
	const date = new Date(today);
	switch (unit) {
		case "d":
			return addDays(today, -n);
		case "wk":
			return addDays(today, -7 * n);
		case "mo":
			date.setUTCMonth(date.getUTCMonth() - n);
			return date.getTime();
		case "y":
			date.setUTCFullYear(date.getUTCFullYear() - n);
			return date.getTime();
		case "ytd":
			return Date.UTC(date.getUTCFullYear(), 0, 1);
		case "max":
			return 0;
	}
};
