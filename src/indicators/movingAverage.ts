import { InsufficientDataError } from "../errors";
import type { Candle, SmaCrossover } from "../types";

export function computeSMA(candles: Candle[], period: number): number {
	if (period < 1) {
		throw new RangeError(`SMA period must be positive, got ${period}`);
	}
	if (candles.length < period) {
		throw new InsufficientDataError(`SMA(${period})`, period, candles.length);
	}

	const recent = candles.slice(-period);
	const sum = recent.reduce((acc, candle) => acc + candle.close, 0);
	return sum / period;
}

/**
 * Compares the short/long SMA pair on the latest candle with the pair one
 * candle earlier. A touch (equal averages) followed by separation counts as
 * a cross.
 */
export function detectSmaCrossover(
	candles: Candle[],
	shortPeriod: number,
	longPeriod: number,
): SmaCrossover {
	const required = Math.max(shortPeriod, longPeriod) + 1;
	if (candles.length < required) {
		throw new InsufficientDataError(
			`SMA crossover(${shortPeriod}/${longPeriod})`,
			required,
			candles.length,
		);
	}

	const previous = candles.slice(0, -1);
	const shortNow = computeSMA(candles, shortPeriod);
	const longNow = computeSMA(candles, longPeriod);
	const shortBefore = computeSMA(previous, shortPeriod);
	const longBefore = computeSMA(previous, longPeriod);

	if (shortBefore <= longBefore && shortNow > longNow) return "UP";
	if (shortBefore >= longBefore && shortNow < longNow) return "DOWN";
	return "NONE";
}
