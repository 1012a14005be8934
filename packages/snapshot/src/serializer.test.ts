import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { SnapshotDocument } from "@tickercast/core";
import { afterEach, describe, expect, it } from "vitest";
import { serializeSnapshot, toSnapshotPayload, writeSnapshot } from "./serializer";

const document: SnapshotDocument = {
	generatedAt: "2025-01-11T06:00:00.000Z",
	tickers: ["AAPL", "NOPE"],
	snapshots: [
		{
			ticker: "AAPL",
			latestPrice: 109,
			forecast: [110, 111],
			nextDayPrice: 110,
			nextDayPct: 0.92,
			pctChangeHorizon: 1.83,
			momentum5d: 3.81,
			annualizedVol: 0.4,
			signal: "watch",
			history: [{ ds: "2025-01-10", y: 109 }],
			forecastDates: ["2025-01-11", "2025-01-12"],
		},
	],
};

const tempDirs: string[] = [];

afterEach(() => {
	for (const dir of tempDirs.splice(0)) {
		fs.rmSync(dir, { recursive: true, force: true });
	}
});

describe("serializer", () => {
	it("maps records to the snake_case wire shape", () => {
		expect(toSnapshotPayload(document)).toEqual({
			generated_at: "2025-01-11T06:00:00.000Z",
			tickers: ["AAPL", "NOPE"],
			snapshots: [
				{
					ticker: "AAPL",
					latest_price: 109,
					forecast: [110, 111],
					next_day_price: 110,
					next_day_pct: 0.92,
					pct_change_7d: 1.83,
					momentum_5d: 3.81,
					annualized_vol: 0.4,
					signal: "watch",
					history: [{ ds: "2025-01-10", y: 109 }],
					forecast_dates: ["2025-01-11", "2025-01-12"],
				},
			],
		});
	});

	it("renders two-space JSON with a trailing newline", () => {
		const text = serializeSnapshot({ ...document, snapshots: [] });
		expect(text).toBe(
			[
				"{",
				'  "generated_at": "2025-01-11T06:00:00.000Z",',
				'  "tickers": [',
				'    "AAPL",',
				'    "NOPE"',
				"  ],",
				'  "snapshots": []',
				"}",
				"",
			].join("\n")
		);
	});

	it("creates missing directories when writing", async () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "tickercast-"));
		tempDirs.push(dir);
		const target = path.join(dir, "nested", "out", "summary.json");

		const written = await writeSnapshot(document, target);

		expect(written).toBe(target);
		expect(JSON.parse(fs.readFileSync(target, "utf-8"))).toEqual(
			toSnapshotPayload(document)
		);
	});
});
