import { InsufficientDataError } from "../errors";
import type { Candle, PivotLevels } from "../types";

export function computePivotLevels(
	high: number,
	low: number,
	close: number,
): PivotLevels {
	const pp = (high + low + close) / 3;
	const range = high - low;
	return {
		pp,
		r1: 2 * pp - low,
		r2: pp + range,
		s1: 2 * pp - high,
		s2: pp - range,
	};
}

// Callers must pass closed candles only; the forming candle would leak the
// current period into its own levels.
export function pivotLevelsFromCandles(candles: Candle[]): PivotLevels {
	if (!candles.length) {
		throw new InsufficientDataError("pivot levels", 1, 0);
	}

	const high = Math.max(...candles.map((c) => c.high));
	const low = Math.min(...candles.map((c) => c.low));
	const close = candles[candles.length - 1].close;
	return computePivotLevels(high, low, close);
}
