import {
	ConfigError,
	createLogger,
	describeError,
} from "@tickercast/core";
import type {
	ForecastPoint,
	InsightRecord,
	ModuleLogger,
	PricePoint,
	SnapshotDocument,
} from "@tickercast/core";
import type { SeriesProvider } from "@tickercast/data";
import { DEFAULT_HISTORY_WINDOW, deriveInsights } from "@tickercast/insights";
import type { Forecaster } from "@tickercast/models-quant";
import { isInstrumentSuccess } from "./types";
import type { InstrumentOutcome, InstrumentStage } from "./types";

const DEFAULT_PERIOD = "6mo";

export interface SnapshotAggregatorOptions {
	provider: SeriesProvider;
	forecaster: Forecaster;
	period?: string;
	historyWindow?: number;
	clock?: () => Date;
	/** Called with each outcome as soon as the instrument is done. */
	onOutcome?: (outcome: InstrumentOutcome) => void;
	logger?: ModuleLogger;
}

type StageResult<T> =
	| { ok: true; value: T }
	| { ok: false; failure: InstrumentOutcome };

export const buildSnapshotDocument = (
	tickers: readonly string[],
	outcomes: readonly InstrumentOutcome[],
	generatedAt: Date
): SnapshotDocument => ({
	generatedAt: generatedAt.toISOString(),
	tickers: [...tickers],
	snapshots: outcomes.filter(isInstrumentSuccess).map((outcome) => outcome.record),
});

/**
 * Runs fetch, forecast and derive for each ticker in order. A failing
 * instrument becomes a `failed` outcome; the run carries on with the next.
 */
export class SnapshotAggregator {
	private readonly period: string;
	private readonly historyWindow: number;
	private readonly clock: () => Date;
	private readonly logger: ModuleLogger;

	constructor(private readonly options: SnapshotAggregatorOptions) {
		this.period = options.period ?? DEFAULT_PERIOD;
		this.historyWindow = options.historyWindow ?? DEFAULT_HISTORY_WINDOW;
		this.clock = options.clock ?? (() => new Date());
		this.logger = options.logger ?? createLogger("snapshot");
	}

	async run(
		tickers: readonly string[],
		horizonDays: number
	): Promise<SnapshotDocument> {
		const outcomes = await this.collect(tickers, horizonDays);
		return buildSnapshotDocument(tickers, outcomes, this.clock());
	}

	async collect(
		tickers: readonly string[],
		horizonDays: number
	): Promise<InstrumentOutcome[]> {
		if (!Number.isInteger(horizonDays) || horizonDays <= 0) {
			throw new ConfigError(
				`horizonDays must be a positive integer, got ${horizonDays}`
			);
		}

		const outcomes: InstrumentOutcome[] = [];
		for (const ticker of tickers) {
			const outcome = await this.processTicker(ticker, horizonDays);
			outcomes.push(outcome);
			this.notify(outcome);
		}
		return outcomes;
	}

	private notify(outcome: InstrumentOutcome): void {
		try {
			this.options.onOutcome?.(outcome);
		} catch (error) {
			const { errorName, message } = describeError(error);
			this.logger.warn("outcome_hook_failed", {
				ticker: outcome.ticker,
				status: outcome.status,
				errorName,
				message,
			});
		}
	}

	private async processTicker(
		ticker: string,
		horizonDays: number
	): Promise<InstrumentOutcome> {
		const history = await this.attempt<PricePoint[]>(ticker, "fetch", () =>
			this.options.provider.fetch(ticker, this.period)
		);
		if (!history.ok) {
			return history.failure;
		}

		const forecast = await this.attempt<ForecastPoint[]>(
			ticker,
			"forecast",
			() => this.options.forecaster.fitAndPredict(history.value, horizonDays)
		);
		if (!forecast.ok) {
			return forecast.failure;
		}

		const record = await this.attempt<InsightRecord>(ticker, "derive", async () =>
			deriveInsights(ticker, history.value, forecast.value, horizonDays, {
				historyWindow: this.historyWindow,
			})
		);
		if (!record.ok) {
			return record.failure;
		}

		const horizonPrice = record.value.forecast.length
			? record.value.forecast[record.value.forecast.length - 1]
			: record.value.nextDayPrice;
		this.logger.info("instrument_ready", {
			ticker,
			points: history.value.length,
			latestPrice: record.value.latestPrice,
			horizonPrice,
			pctChangeHorizon: record.value.pctChangeHorizon,
			momentum5d: record.value.momentum5d,
			annualizedVol: record.value.annualizedVol,
			signal: record.value.signal,
		});
		return { status: "ok", ticker, record: record.value };
	}

	private async attempt<T>(
		ticker: string,
		stage: InstrumentStage,
		task: () => Promise<T>
	): Promise<StageResult<T>> {
		try {
			return { ok: true, value: await task() };
		} catch (error) {
			const { errorName, message } = describeError(error);
			this.logger.warn("instrument_failed", {
				ticker,
				stage,
				errorName,
				message,
			});
			return {
				ok: false,
				failure: { status: "failed", ticker, stage, errorName, message },
			};
		}
	}
}
