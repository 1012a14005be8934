import fs from "node:fs";
import path from "node:path";

import { loadEnvFiles } from "./env";
import { ConfigError } from "./errors";
import { parsePeriod } from "./time";

export const PROVIDER_NAMES = ["yahoo", "ccxt"] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

export const FORECASTER_NAMES = ["linear", "ar4", "holt"] as const;
export type ForecasterName = (typeof FORECASTER_NAMES)[number];

export interface ForecasterOptions {
	/** Central probability covered by yhatLower/yhatUpper (default 0.8). */
	intervalWidth?: number;
	weeklySeasonality?: boolean;
	alpha?: number;
	beta?: number;
}

export interface SnapshotConfig {
	tickers: string[];
	horizonDays: number;
	period: string;
	historyWindow: number;
	provider: ProviderName;
	exchange: string;
	forecaster: ForecasterName;
	forecasterOptions: ForecasterOptions;
	/** Absolute path of the JSON artifact. */
	outputPath: string;
}

export type SnapshotConfigOverrides = Partial<
	Omit<SnapshotConfig, "forecasterOptions">
>;

export type ConfigSourceType = "file" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
	envFiles?: string[];
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	profile?: string;
	workspaceRoot?: string;
}

const configMetadata = new WeakMap<object, ConfigMetadata>();

const WORKSPACE_SENTINELS = [path.join("config", "snapshot.json"), ".git"];

const DEFAULT_PROFILE = "snapshot";

let cachedWorkspaceRoot: string | undefined;

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	configMetadata.set(config, {
		...(configMetadata.get(config) ?? {}),
		...metadata,
	});
	return config;
};

export const getConfigMetadata = (config: unknown): ConfigMetadata | null =>
	config && typeof config === "object"
		? configMetadata.get(config) ?? null
		: null;

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readJsonFile = (filePath: string): unknown => {
	if (!fs.existsSync(filePath)) {
		throw new ConfigError(`Config file not found: ${filePath}`);
	}
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new ConfigError(`Config file is not valid JSON: ${filePath}`, {
			cause: error,
		});
	}
};

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

export const parseTickerList = (value?: string): string[] | undefined => {
	if (!value) {
		return undefined;
	}
	const tickers = value
		.split(",")
		.map((token) => token.trim())
		.filter((token) => token.length > 0);
	return tickers.length ? tickers : undefined;
};

export const ensurePositiveInteger = (value: unknown, field: string): number => {
	const num = typeof value === "string" ? Number(value) : value;
	if (typeof num !== "number" || !Number.isInteger(num) || num <= 0) {
		throw new ConfigError(
			`${field} must be a positive integer, got ${JSON.stringify(value)}`
		);
	}
	return num;
};

const ensureString = (value: unknown, field: string): string => {
	if (typeof value !== "string" || !value.trim().length) {
		throw new ConfigError(`${field} must be a non-empty string`);
	}
	return value.trim();
};

const ensureOneOf = <T extends string>(
	value: unknown,
	allowed: readonly T[],
	field: string
): T => {
	const match = allowed.find((candidate) => candidate === value);
	if (!match) {
		throw new ConfigError(
			`${field} must be one of ${allowed.join(", ")}, got ${JSON.stringify(value)}`
		);
	}
	return match;
};

const ensureTickers = (value: unknown, field: string): string[] => {
	if (!Array.isArray(value)) {
		throw new ConfigError(`${field} must be an array of ticker symbols`);
	}
	return value.map((entry, idx) => ensureString(entry, `${field}[${idx}]`));
};

const ensurePeriod = (value: unknown, field: string): string => {
	const period = ensureString(value, field);
	parsePeriod(period);
	return period;
};

const ensureUnitInterval = (value: unknown, field: string): number => {
	if (typeof value !== "number" || !(value > 0 && value <= 1)) {
		throw new ConfigError(`${field} must be a number in (0, 1]`);
	}
	return value;
};

const parseForecasterOptions = (value: unknown): ForecasterOptions => {
	if (value === undefined) {
		return {};
	}
	if (!isRecord(value)) {
		throw new ConfigError("forecasterOptions must be an object");
	}
	const options: ForecasterOptions = {};
	if (value.intervalWidth !== undefined) {
		const width = ensureUnitInterval(
			value.intervalWidth,
			"forecasterOptions.intervalWidth"
		);
		if (width === 1) {
			throw new ConfigError("forecasterOptions.intervalWidth must be below 1");
		}
		options.intervalWidth = width;
	}
	if (value.weeklySeasonality !== undefined) {
		if (typeof value.weeklySeasonality !== "boolean") {
			throw new ConfigError("forecasterOptions.weeklySeasonality must be a boolean");
		}
		options.weeklySeasonality = value.weeklySeasonality;
	}
	if (value.alpha !== undefined) {
		options.alpha = ensureUnitInterval(value.alpha, "forecasterOptions.alpha");
	}
	if (value.beta !== undefined) {
		options.beta = ensureUnitInterval(value.beta, "forecasterOptions.beta");
	}
	return options;
};

const readEnvOverrides = (): SnapshotConfigOverrides => {
	const overrides: SnapshotConfigOverrides = {};
	const tickers = parseTickerList(readOptionalEnvVar("SNAPSHOT_TICKERS"));
	if (tickers) {
		overrides.tickers = tickers;
	}
	const horizon = readOptionalEnvVar("SNAPSHOT_HORIZON_DAYS");
	if (horizon) {
		overrides.horizonDays = ensurePositiveInteger(
			horizon,
			"SNAPSHOT_HORIZON_DAYS"
		);
	}
	const period = readOptionalEnvVar("SNAPSHOT_PERIOD");
	if (period) {
		overrides.period = period;
	}
	const provider = readOptionalEnvVar("SNAPSHOT_PROVIDER");
	if (provider) {
		overrides.provider = ensureOneOf(
			provider.toLowerCase(),
			PROVIDER_NAMES,
			"SNAPSHOT_PROVIDER"
		);
	}
	const exchange = readOptionalEnvVar("SNAPSHOT_EXCHANGE");
	if (exchange) {
		overrides.exchange = exchange;
	}
	const forecaster = readOptionalEnvVar("SNAPSHOT_FORECASTER");
	if (forecaster) {
		overrides.forecaster = ensureOneOf(
			forecaster.toLowerCase(),
			FORECASTER_NAMES,
			"SNAPSHOT_FORECASTER"
		);
	}
	const output = readOptionalEnvVar("SNAPSHOT_OUTPUT");
	if (output) {
		overrides.outputPath = output;
	}
	return overrides;
};

const definedEntries = (
	overrides: SnapshotConfigOverrides
): Record<string, unknown> => {
	const entries: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(overrides)) {
		if (value !== undefined) {
			entries[key] = value;
		}
	}
	return entries;
};

/**
 * Resolve the run configuration. Precedence: profile file < environment
 * (including `.env` files) < explicit overrides.
 */
export const loadSnapshotConfig = (
	options: ConfigLoadOptions = {},
	overrides: SnapshotConfigOverrides = {}
): SnapshotConfig => {
	const workspaceRoot = options.workspaceRoot ?? findWorkspaceRoot();
	const envFiles = loadEnvFiles(workspaceRoot, options.envPath);
	const configDir = options.configDir ?? path.join(workspaceRoot, "config");
	const profile = options.profile ?? DEFAULT_PROFILE;
	const configPath = path.join(
		configDir,
		profile.endsWith(".json") ? profile : `${profile}.json`
	);

	const file = readJsonFile(configPath);
	if (!isRecord(file)) {
		throw new ConfigError(`Config file must hold a JSON object: ${configPath}`);
	}

	const envOverrides = readEnvOverrides();
	const explicit = definedEntries(overrides);
	const merged: Record<string, unknown> = { ...file, ...envOverrides, ...explicit };
	const source: ConfigSourceType =
		Object.keys(envOverrides).length || Object.keys(explicit).length
			? "merged"
			: "file";

	const outputPath = ensureString(merged.outputPath, "outputPath");

	const config: SnapshotConfig = {
		tickers: ensureTickers(merged.tickers, "tickers"),
		horizonDays: ensurePositiveInteger(merged.horizonDays, "horizonDays"),
		period: ensurePeriod(merged.period ?? "6mo", "period"),
		historyWindow: ensurePositiveInteger(
			merged.historyWindow ?? 60,
			"historyWindow"
		),
		provider: ensureOneOf(merged.provider ?? "yahoo", PROVIDER_NAMES, "provider"),
		exchange: ensureString(merged.exchange ?? "binance", "exchange"),
		forecaster: ensureOneOf(
			merged.forecaster ?? "linear",
			FORECASTER_NAMES,
			"forecaster"
		),
		forecasterOptions: parseForecasterOptions(file.forecasterOptions),
		outputPath: path.isAbsolute(outputPath)
			? outputPath
			: path.join(workspaceRoot, outputPath),
	};

	return withConfigMetadata(config, {
		source,
		path: configPath,
		profile,
		envFiles,
	});
};
