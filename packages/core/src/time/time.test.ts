import { describe, it, expect } from "vitest";
import { ConfigError } from "../errors";
import {
	addDays,
	bucketTimestamp,
	parseIsoDate,
	parsePeriod,
	periodStartTimestamp,
	startOfUtcDay,
	toIsoDate,
} from "./time";

describe("time utilities", () => {
	describe("bucketTimestamp", () => {
		it("should floor to the bucket start", () => {
			expect(bucketTimestamp(1735690261234, 60_000)).toBe(1735690260000);
		});

		it("should floor timestamps before the epoch", () => {
			expect(startOfUtcDay(-1)).toBe(-86_400_000);
		});

		it("should throw on invalid input", () => {
			expect(() => bucketTimestamp(Number.NaN, 60_000)).toThrow(
				"Invalid timestamp"
			);
			expect(() => bucketTimestamp(0, 0)).toThrow("Invalid period ms");
		});
	});

	describe("calendar dates", () => {
		it("should render UTC dates as YYYY-MM-DD", () => {
			expect(toIsoDate(Date.UTC(2025, 0, 5, 23, 59))).toBe("2025-01-05");
			expect(toIsoDate(Date.UTC(2024, 11, 31))).toBe("2024-12-31");
		});

		it("should parse ISO dates to midnight UTC", () => {
			expect(parseIsoDate("2025-03-01")).toBe(Date.UTC(2025, 2, 1));
		});

		it("should reject malformed and impossible dates", () => {
			expect(() => parseIsoDate("2025-3-1")).toThrow("Invalid ISO date");
			expect(() => parseIsoDate("2025-02-30")).toThrow("Invalid ISO date");
		});

		it("should add calendar days across month ends", () => {
			expect(toIsoDate(addDays(parseIsoDate("2025-01-30"), 3))).toBe(
				"2025-02-02"
			);
		});
	});

	describe("parsePeriod", () => {
		it("should parse numeric periods", () => {
			expect(parsePeriod("5d")).toEqual({ unit: "d", n: 5 });
			expect(parsePeriod("2wk")).toEqual({ unit: "wk", n: 2 });
			expect(parsePeriod("6mo")).toEqual({ unit: "mo", n: 6 });
			expect(parsePeriod(" 1Y ")).toEqual({ unit: "y", n: 1 });
		});

		it("should parse open-ended periods", () => {
			expect(parsePeriod("ytd")).toEqual({ unit: "ytd", n: 1 });
			expect(parsePeriod("max")).toEqual({ unit: "max", n: 1 });
		});

		it("should throw ConfigError on invalid periods", () => {
			expect(() => parsePeriod("6")).toThrow(ConfigError);
			expect(() => parsePeriod("6m")).toThrow("Invalid period format");
			expect(() => parsePeriod("0mo")).toThrow(
				"length must be positive, got 0"
			);
		});
	});

	describe("periodStartTimestamp", () => {
		const now = Date.UTC(2025, 5, 15, 14, 30);

		it("should step back whole days and weeks from today", () => {
			expect(toIsoDate(periodStartTimestamp("5d", now))).toBe("2025-06-10");
			expect(toIsoDate(periodStartTimestamp("2wk", now))).toBe("2025-06-01");
		});

		it("should step back calendar months and years", () => {
			expect(toIsoDate(periodStartTimestamp("6mo", now))).toBe("2024-12-15");
			expect(toIsoDate(periodStartTimestamp("1y", now))).toBe("2024-06-15");
		});

		it("should resolve ytd and max", () => {
			expect(toIsoDate(periodStartTimestamp("ytd", now))).toBe("2025-01-01");
			expect(periodStartTimestamp("max", now)).toBe(0);
		});
	});
});
