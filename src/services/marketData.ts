import type { Candle, MarketDataSource, MarketSnapshot } from "../types";
import { logger } from "../utils/logger";

const HOURS_IN_WINDOW = { h12: 12, h24: 24, h48: 48 } as const;

export type SpotMarketClient = {
	fetchKlines(symbol: string, interval: "1h", limit: number): Promise<Candle[]>;
	latestPrice(symbol: string): Promise<number>;
};

/**
 * Splits hourly candles into 12h/24h/48h windows. The still-forming candle
 * is dropped so every window holds closed periods only.
 */
export function buildSnapshot(
	symbol: string,
	candles: Candle[],
	currentPrice: number,
	takenAt: number,
): MarketSnapshot {
	if (!Number.isFinite(currentPrice) || currentPrice <= 0) {
		throw new Error(`Invalid current price for ${symbol}: ${currentPrice}`);
	}

	const closed = candles
		.filter((c) => c.closeTime < takenAt)
		.sort((a, b) => a.openTime - b.openTime);
	const h24 = closed.slice(-HOURS_IN_WINDOW.h24);
	const reference = h24[0]?.open;

	return {
		symbol,
		windows: {
			h12: closed.slice(-HOURS_IN_WINDOW.h12),
			h24,
			h48: closed.slice(-HOURS_IN_WINDOW.h48),
		},
		currentPrice,
		change24hPct: reference ? ((currentPrice - reference) / reference) * 100 : 0,
		takenAt,
	};
}

export class BinanceMarketData implements MarketDataSource {
	constructor(private readonly client: SpotMarketClient) {}

	async getSnapshot(
		symbol: string,
		now: Date = new Date(),
	): Promise<MarketSnapshot> {
		// one extra candle for the one still open
		const [candles, currentPrice] = await Promise.all([
			this.client.fetchKlines(symbol, "1h", HOURS_IN_WINDOW.h48 + 1),
			this.client.latestPrice(symbol),
		]);

		const snapshot = buildSnapshot(symbol, candles, currentPrice, now.getTime());
		logger.debug(
			{
				symbol,
				price: snapshot.currentPrice,
				closedCandles: snapshot.windows.h48.length,
			},
			"Market snapshot taken",
		);
		return snapshot;
	}
}
