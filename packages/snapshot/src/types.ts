import type { InsightRecord } from "@tickercast/core";

export type InstrumentStage = "fetch" | "forecast" | "derive";

export interface InstrumentSuccess {
	status: "ok";
	ticker: string;
	record: InsightRecord;
}

export interface InstrumentFailure {
	status: "failed";
	ticker: string;
	stage: InstrumentStage;
	errorName: string;
	message: string;
}

export type InstrumentOutcome = InstrumentSuccess | InstrumentFailure;

export const isInstrumentSuccess = (
	outcome: InstrumentOutcome
): outcome is InstrumentSuccess => outcome.status === "ok";
