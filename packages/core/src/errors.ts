export class TickercastError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** The provider answered, but with no usable observations. */
export class NoDataError extends TickercastError {
	constructor(readonly ticker: string, detail?: string) {
		super(
			detail
				? `No data returned for ${ticker}: ${detail}`
				: `No data returned for ${ticker}`
		);
	}
}

export class ProviderError extends TickercastError {
	constructor(
		readonly ticker: string,
		message: string,
		options?: { cause?: unknown }
	) {
		super(message, options);
	}
}

export class ForecastError extends TickercastError {}

export class ConfigError extends TickercastError {}

export const describeError = (
	error: unknown
): { errorName: string; message: string } => {
	if (error instanceof Error) {
		return { errorName: error.name, message: error.message };
	}
	return { errorName: "UnknownError", message: String(error) };
};
