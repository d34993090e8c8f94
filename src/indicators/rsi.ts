import { InsufficientDataError } from "../errors";
import type { Candle } from "../types";

export const DEFAULT_RSI_PERIOD = 14;

/**
 * Relative Strength Index with Wilder smoothing. The first average is the
 * plain mean of the first `period` changes; every later change is folded in
 * as `(prev * (period - 1) + change) / period`.
 */
export function computeRSI(
	candles: Candle[],
	period: number = DEFAULT_RSI_PERIOD,
): number {
	if (period < 1) {
		throw new RangeError(`RSI period must be positive, got ${period}`);
	}
	if (candles.length < period + 1) {
		throw new InsufficientDataError(
			`RSI(${period})`,
			period + 1,
			candles.length,
		);
	}

	let gainSum = 0;
	let lossSum = 0;
	for (let i = 1; i <= period; i++) {
		const change = candles[i].close - candles[i - 1].close;
		if (change > 0) gainSum += change;
		else lossSum -= change;
	}

	let avgGain = gainSum / period;
	let avgLoss = lossSum / period;

	for (let i = period + 1; i < candles.length; i++) {
		const change = candles[i].close - candles[i - 1].close;
		const gain = change > 0 ? change : 0;
		const loss = change < 0 ? -change : 0;
		avgGain = (avgGain * (period - 1) + gain) / period;
		avgLoss = (avgLoss * (period - 1) + loss) / period;
	}

	if (avgGain === 0 && avgLoss === 0) return 50;
	if (avgLoss === 0) return 100;

	const rs = avgGain / avgLoss;
	return 100 - 100 / (1 + rs);
}
