import { describe, expect, it } from "vitest";

import { InsufficientDataError } from "../errors";
import type { Candle } from "../types";
import {
	computeIndicatorSet,
	computePivotLevels,
	computeRSI,
	computeSMA,
	detectSmaCrossover,
	pivotLevelsFromCandles,
} from "./index";

const HOUR_MS = 60 * 60 * 1000;
const BASE_TIMESTAMP = 1_700_000_000_000;

function candlesFromCloses(closes: number[]): Candle[] {
	return closes.map((close, i) => ({
		openTime: BASE_TIMESTAMP + i * HOUR_MS,
		closeTime: BASE_TIMESTAMP + (i + 1) * HOUR_MS - 1,
		open: close,
		high: close + 1,
		low: close - 1,
		close,
		volume: 10,
	}));
}

// 14 alternating changes (+1, -1, ...) starting at 100
function alternatingCloses(): number[] {
	const closes = [100];
	for (let i = 0; i < 14; i++) {
		closes.push(i % 2 === 0 ? 101 : 100);
	}
	return closes;
}

describe("computeSMA", () => {
	it("averages the most recent closes", () => {
		const candles = candlesFromCloses([10, 20, 30, 40, 50]);
		expect(computeSMA(candles, 3)).toBe(40);
		expect(computeSMA(candles, 5)).toBe(30);
	});

	it("fails with InsufficientDataError when shorter than the period", () => {
		for (let length = 0; length < 5; length++) {
			const candles = candlesFromCloses(Array.from({ length }, () => 1));
			expect(() => computeSMA(candles, 5)).toThrow(InsufficientDataError);
		}
	});
});

describe("computeRSI", () => {
	it("requires period + 1 candles", () => {
		const candles = candlesFromCloses(alternatingCloses().slice(0, 14));
		expect(() => computeRSI(candles, 14)).toThrow(InsufficientDataError);
	});

	it("is 50 for balanced gains and losses", () => {
		expect(computeRSI(candlesFromCloses(alternatingCloses()), 14)).toBe(50);
	});

	it("applies Wilder smoothing to changes after the seed window", () => {
		const closes = [...alternatingCloses(), 102];
		// avgGain = (0.5 * 13 + 2) / 14, avgLoss = (0.5 * 13) / 14
		expect(computeRSI(candlesFromCloses(closes), 14)).toBeCloseTo(56.6667, 3);
	});

	it("saturates at 100 and 0 for one-way markets", () => {
		const rising = Array.from({ length: 15 }, (_, i) => 100 + i);
		const falling = Array.from({ length: 15 }, (_, i) => 100 - i);
		expect(computeRSI(candlesFromCloses(rising))).toBe(100);
		expect(computeRSI(candlesFromCloses(falling))).toBe(0);
	});

	it("is neutral for a flat market", () => {
		const flat = Array.from({ length: 20 }, () => 100);
		expect(computeRSI(candlesFromCloses(flat))).toBe(50);
	});
});

describe("computePivotLevels", () => {
	it("derives classic pivot support and resistance", () => {
		expect(computePivotLevels(110, 90, 100)).toEqual({
			pp: 100,
			r1: 110,
			r2: 120,
			s1: 90,
			s2: 80,
		});
	});

	it("reads high, low and last close from a closed window", () => {
		const candles = candlesFromCloses([100, 105, 99]);
		// high = 106, low = 98, close = 99 -> pp = 101
		const levels = pivotLevelsFromCandles(candles);
		expect(levels.pp).toBe(101);
		expect(levels.r1).toBe(104);
		expect(levels.s1).toBe(96);
	});

	it("rejects an empty window", () => {
		expect(() => pivotLevelsFromCandles([])).toThrow(InsufficientDataError);
	});
});

describe("detectSmaCrossover", () => {
	it("reports an upward cross on the latest candle", () => {
		// short(2) before: (10 + 10) / 2 = 10, long(3) before: 10 -> touch
		// short now: (10 + 13) / 2 = 11.5, long now: (10 + 10 + 13) / 3 = 11
		const candles = candlesFromCloses([10, 10, 10, 13]);
		expect(detectSmaCrossover(candles, 2, 3)).toBe("UP");
	});

	it("reports a downward cross", () => {
		const candles = candlesFromCloses([10, 10, 10, 7]);
		expect(detectSmaCrossover(candles, 2, 3)).toBe("DOWN");
	});

	it("reports no cross while the averages keep their order", () => {
		const candles = candlesFromCloses([10, 11, 12, 13, 14]);
		expect(detectSmaCrossover(candles, 2, 3)).toBe("NONE");
	});

	it("needs one candle beyond the long period", () => {
		const candles = candlesFromCloses([10, 10, 10]);
		expect(() => detectSmaCrossover(candles, 2, 3)).toThrow(
			InsufficientDataError,
		);
	});
});

describe("computeIndicatorSet", () => {
	it("bundles averages, RSI and crossover", () => {
		const closes = Array.from({ length: 21 }, (_, i) => 100 + i);
		const set = computeIndicatorSet(candlesFromCloses(closes), {
			smaShortPeriod: 10,
			smaLongPeriod: 20,
			rsiPeriod: 14,
		});
		// last 10 closes: 111..120, last 20: 101..120
		expect(set.smaShort).toBe(115.5);
		expect(set.smaLong).toBe(110.5);
		expect(set.rsi).toBe(100);
		expect(set.crossover).toBe("NONE");
	});
});
