export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

interface LoggerSettings {
	pretty: boolean;
	json: boolean;
	minLevel: LogLevel;
	modules: Set<string> | null;
}

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const parseModuleFilter = (raw?: string): Set<string> | null => {
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
};

// Read per call: .env files are loaded after this module is imported.
const readSettings = (): LoggerSettings => {
	const pretty =
		process.env.LOG_PRETTY === "true" ||
		process.env.NODE_ENV === "development";
	return {
		pretty,
		json: process.env.LOG_JSON === "true" || !pretty,
		minLevel: normalizeLevel(process.env.LOG_LEVEL),
		modules: parseModuleFilter(process.env.LOG_MODULE),
	};
};

const shouldLog = (
	settings: LoggerSettings,
	level: LogLevel,
	moduleName: string
): boolean => {
	if (LEVELS[level] < LEVELS[settings.minLevel]) {
		return false;
	}
	if (settings.modules && !settings.modules.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	const settings = readSettings();
	if (!shouldLog(settings, payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (settings.pretty) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (settings.json) {
		try {
			console.log(JSON.stringify(sanitize(base)));
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

const sanitize = (payload: BaseLogPayload): unknown =>
	sanitizeValue(payload, new WeakSet<object>());

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (typeof value === "number" && !Number.isFinite(value)) {
		return String(value);
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	switch (event) {
		case "instrument_ready": {
			printInstrumentReady(rest);
			break;
		}
		case "instrument_failed": {
			printInstrumentFailed(rest);
			break;
		}
		case "snapshot_written": {
			printSnapshotWritten(rest);
			break;
		}
		default:
			break;
	}
}

const fmtValue = (value: unknown): string =>
	value === undefined || value === null ? "-" : String(value);

const printInstrumentReady = (rest: Record<string, unknown>): void => {
	const {
		ticker,
		latestPrice,
		horizonPrice,
		pctChangeHorizon,
		momentum5d,
		annualizedVol,
		signal,
	} = rest;
	console.table([
		{
			ticker,
			latest: latestPrice,
			horizon: horizonPrice,
			"change %": pctChangeHorizon,
			"momentum %": momentum5d,
			"vol %": annualizedVol,
			signal,
		},
	]);
};

const printInstrumentFailed = (rest: Record<string, unknown>): void => {
	console.log(
		`  ${fmtValue(rest.ticker)} failed at ${fmtValue(rest.stage)}: ${fmtValue(
			rest.message
		)}`
	);
};

const printSnapshotWritten = (rest: Record<string, unknown>): void => {
	console.log(
		`  ${fmtValue(rest.succeeded)}/${fmtValue(rest.requested)} instruments -> ${fmtValue(
			rest.outputPath
		)}`
	);
};
