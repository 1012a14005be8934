import fs from "node:fs/promises";
import path from "node:path";

import { createLogger } from "@tickercast/core";
import type { InsightRecord, SnapshotDocument } from "@tickercast/core";

const logger = createLogger("snapshot");

export interface SnapshotEntryPayload {
	ticker: string;
	latest_price: number;
	forecast: number[];
	next_day_price: number;
	next_day_pct: number;
	/** Horizon change in percent; the name is kept for every horizon length. */
	pct_change_7d: number;
	momentum_5d: number;
	annualized_vol: number;
	signal: string;
	history: { ds: string; y: number }[];
	forecast_dates: string[];
}

export interface SnapshotPayload {
	generated_at: string;
	tickers: string[];
	snapshots: SnapshotEntryPayload[];
}

const toEntryPayload = (record: InsightRecord): SnapshotEntryPayload => ({
	ticker: record.ticker,
	latest_price: record.latestPrice,
	forecast: [...record.forecast],
	next_day_price: record.nextDayPrice,
	next_day_pct: record.nextDayPct,
	pct_change_7d: record.pctChangeHorizon,
	momentum_5d: record.momentum5d,
	annualized_vol: record.annualizedVol,
	signal: record.signal,
	history: record.history.map((entry) => ({ ds: entry.ds, y: entry.y })),
	forecast_dates: [...record.forecastDates],
});

export const toSnapshotPayload = (document: SnapshotDocument): SnapshotPayload => ({
	generated_at: document.generatedAt,
	tickers: [...document.tickers],
	snapshots: document.snapshots.map(toEntryPayload),
});

export const serializeSnapshot = (document: SnapshotDocument): string =>
	`${JSON.stringify(toSnapshotPayload(document), null, 2)}\n`;

/** Write the document, creating parent directories. Errors propagate. */
export const writeSnapshot = async (
	document: SnapshotDocument,
	outputPath: string
): Promise<string> => {
	const resolved = path.resolve(outputPath);
	await fs.mkdir(path.dirname(resolved), { recursive: true });
	await fs.writeFile(resolved, serializeSnapshot(document), "utf-8");
	logger.info("snapshot_written", {
		outputPath: resolved,
		requested: document.tickers.length,
		succeeded: document.snapshots.length,
	});
	return resolved;
};
