import type { OHLCV } from "ccxt";
import type { PricePoint } from "@tickercast/core";

/**
 * Map a CCXT OHLCV row to a close-only price point. Missing fields become
 * NaN so that series normalization drops the row.
 */
export const mapCcxtRowToPricePoint = (row: OHLCV): PricePoint => {
	const [timestamp, , , , close] = row;
	return {
		timestamp: Number(timestamp ?? Number.NaN),
		close: Number(close ?? Number.NaN),
	};
};
