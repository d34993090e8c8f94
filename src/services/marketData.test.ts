import { describe, expect, it } from "vitest";

import type { Candle } from "../types";
import { BinanceMarketData, buildSnapshot } from "./marketData";

const HOUR_MS = 60 * 60 * 1000;
const START = Date.UTC(2024, 2, 1, 0, 0, 0);

function hourlyCandles(count: number): Candle[] {
	return Array.from({ length: count }, (_, i) => ({
		openTime: START + i * HOUR_MS,
		closeTime: START + (i + 1) * HOUR_MS - 1,
		open: 100 + i,
		high: 101 + i,
		low: 99 + i,
		close: 100.5 + i,
		volume: 5,
	}));
}

describe("buildSnapshot", () => {
	it("drops the open candle and slices closed windows", () => {
		const candles = hourlyCandles(49);
		// 30 minutes into the 49th hour
		const takenAt = START + 48 * HOUR_MS + 30 * 60 * 1000;
		const snapshot = buildSnapshot("BTCUSDT", candles, 150, takenAt);

		expect(snapshot.windows.h48).toHaveLength(48);
		expect(snapshot.windows.h24).toHaveLength(24);
		expect(snapshot.windows.h12).toHaveLength(12);
		expect(snapshot.windows.h48.at(-1)?.openTime).toBe(START + 47 * HOUR_MS);
		expect(snapshot.windows.h24[0].open).toBe(124);
		expect(snapshot.change24hPct).toBeCloseTo(((150 - 124) / 124) * 100, 10);
	});

	it("keeps whatever closed history exists", () => {
		const candles = hourlyCandles(5);
		const snapshot = buildSnapshot("BTCUSDT", candles, 100, START + 10 * HOUR_MS);
		expect(snapshot.windows.h48).toHaveLength(5);
		expect(snapshot.windows.h12).toHaveLength(5);
	});

	it("rejects a non-positive price", () => {
		expect(() => buildSnapshot("BTCUSDT", [], 0, START)).toThrow(
			"Invalid current price for BTCUSDT: 0",
		);
	});
});

describe("BinanceMarketData", () => {
	it("requests one candle beyond the 48h window", async () => {
		const requests: number[] = [];
		const source = new BinanceMarketData({
			fetchKlines: async (_symbol, _interval, limit) => {
				requests.push(limit);
				return hourlyCandles(limit);
			},
			latestPrice: async () => 140,
		});

		const snapshot = await source.getSnapshot(
			"BTCUSDT",
			new Date(START + 48 * HOUR_MS + 1_000),
		);
		expect(requests).toEqual([49]);
		expect(snapshot.currentPrice).toBe(140);
		expect(snapshot.windows.h48).toHaveLength(48);
	});
});
