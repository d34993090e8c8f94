import type { Candle, IndicatorSet, IndicatorSettings } from "../types";
import { computeSMA, detectSmaCrossover } from "./movingAverage";
import { computeRSI } from "./rsi";

export { computeSMA, detectSmaCrossover } from "./movingAverage";
export { computePivotLevels, pivotLevelsFromCandles } from "./pivots";
export { computeRSI, DEFAULT_RSI_PERIOD } from "./rsi";

export function computeIndicatorSet(
	candles: Candle[],
	settings: IndicatorSettings,
): IndicatorSet {
	return {
		smaShort: computeSMA(candles, settings.smaShortPeriod),
		smaLong: computeSMA(candles, settings.smaLongPeriod),
		rsi: computeRSI(candles, settings.rsiPeriod),
		crossover: detectSmaCrossover(
			candles,
			settings.smaShortPeriod,
			settings.smaLongPeriod,
		),
	};
}
