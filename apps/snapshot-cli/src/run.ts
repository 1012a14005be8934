import {
	ConfigError,
	FORECASTER_NAMES,
	PROVIDER_NAMES,
	createLogger,
	ensurePositiveInteger,
	getConfigMetadata,
	loadSnapshotConfig,
} from "@tickercast/core";
import type {
	SnapshotConfig,
	SnapshotConfigOverrides,
	SnapshotDocument,
} from "@tickercast/core";
import { createSeriesProvider } from "@tickercast/data";
import type { SeriesProvider } from "@tickercast/data";
import { createForecaster } from "@tickercast/models-quant";
import type { Forecaster } from "@tickercast/models-quant";
import {
	SnapshotAggregator,
	serializeSnapshot,
	writeSnapshot,
} from "@tickercast/snapshot";
import {
	getBooleanArg,
	getListArg,
	getStringArg,
	parseCliArgs,
} from "./cliArgs";
import type { ArgValue } from "./cliArgs";
import { formatOutcomeLine } from "./formatOutcome";

const logger = createLogger("snapshot-cli");

export const USAGE = `Usage:
  npm run snapshot -- [TICKER ...] [options]

Options (all optional):
  --tickers <A,B,...>      Comma separated tickers (overrides positionals)
  --days <n>               Forecast horizon in calendar days
  --period <p>             Lookback: 30d, 12wk, 6mo, 2y, ytd or max
  --provider <name>        yahoo | ccxt
  --exchange <id>          ccxt exchange id (binance, kraken, coinbase, bitstamp)
  --forecaster <name>      linear | ar4 | holt
  --output <path>          Snapshot JSON path
  --profile <name>         Config profile under the config directory
  --configDir <path>       Custom config directory
  --envPath <path>         Custom .env path
  --json                   Print the snapshot JSON to stdout
  --help                   Show this message
`;

export interface SnapshotCliDeps {
	createProvider?: (config: SnapshotConfig) => SeriesProvider;
	createForecaster?: (config: SnapshotConfig) => Forecaster;
	print?: (line: string) => void;
	clock?: () => Date;
}

const pickName = <T extends string>(
	args: Record<string, ArgValue>,
	flag: string,
	allowed: readonly T[]
): T | undefined => {
	const raw = getStringArg(args, flag);
	if (raw === undefined) {
		return undefined;
	}
	const match = allowed.find((candidate) => candidate === raw.toLowerCase());
	if (!match) {
		throw new ConfigError(
			`--${flag} must be one of ${allowed.join(", ")}, got ${raw}`
		);
	}
	return match;
};

export const buildOverrides = (
	flags: Record<string, ArgValue>,
	positionals: string[]
): SnapshotConfigOverrides => {
	const days = getStringArg(flags, "days");
	return {
		tickers:
			getListArg(flags, "tickers") ??
			(positionals.length ? positionals : undefined),
		horizonDays:
			days === undefined ? undefined : ensurePositiveInteger(days, "--days"),
		period: getStringArg(flags, "period"),
		provider: pickName(flags, "provider", PROVIDER_NAMES),
		exchange: getStringArg(flags, "exchange"),
		forecaster: pickName(flags, "forecaster", FORECASTER_NAMES),
		outputPath: getStringArg(flags, "output"),
	};
};

/**
 * Resolve config, run every ticker and write the snapshot. Returns null when
 * only the usage text was requested.
 */
export const runSnapshotCli = async (
	argv: string[],
	deps: SnapshotCliDeps = {}
): Promise<SnapshotDocument | null> => {
	const print = deps.print ?? ((line: string) => console.log(line));
	const { flags, positionals } = parseCliArgs(argv);
	if (getBooleanArg(flags, "help")) {
		print(USAGE);
		return null;
	}

	const config = loadSnapshotConfig(
		{
			envPath: getStringArg(flags, "envPath"),
			configDir: getStringArg(flags, "configDir"),
			profile: getStringArg(flags, "profile"),
		},
		buildOverrides(flags, positionals)
	);
	const metadata = getConfigMetadata(config);
	logger.info("cli_starting", {
		tickers: config.tickers,
		horizonDays: config.horizonDays,
		period: config.period,
		provider: config.provider,
		forecaster: config.forecaster,
		configPath: metadata?.path ?? null,
		configSource: metadata?.source ?? null,
	});

	const provider = deps.createProvider
		? deps.createProvider(config)
		: createSeriesProvider(config);
	const forecaster = deps.createForecaster
		? deps.createForecaster(config)
		: createForecaster(config.forecaster, config.forecasterOptions);

	const aggregator = new SnapshotAggregator({
		provider,
		forecaster,
		period: config.period,
		historyWindow: config.historyWindow,
		clock: deps.clock,
		onOutcome: (outcome) => print(formatOutcomeLine(outcome)),
	});
	const document = await aggregator.run(config.tickers, config.horizonDays);

	const written = await writeSnapshot(document, config.outputPath);
	if (getBooleanArg(flags, "json")) {
		print(serializeSnapshot(document).trimEnd());
	}
	print(`Wrote ${written}`);
	return document;
};
