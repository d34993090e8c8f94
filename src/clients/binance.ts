import { MainClient } from "binance";
import { config } from "../config";
import type { Balances, Candle, TradeSide } from "../types";
import { logger } from "../utils/logger";

export type SymbolMeta = {
	symbol: string;
	baseAsset: string;
	quoteAsset: string;
	status: string;
	filters: Array<Record<string, string>>;
};

export type MarketOrderAck = {
	orderId: number;
	status: string;
	executedQty: number;
	quoteQty: number;
	transactTime: number;
	fees: Balances;
};

export const restClient = new MainClient({
	api_key: config.binance.apiKey,
	api_secret: config.binance.apiSecret,
	baseUrl: config.binance.baseUrl,
	beautifyResponses: true,
	disableTimeSync: true,
});

const cachedSymbols = new Map<string, SymbolMeta>();

function toFilterRecord(filter: object): Record<string, string> {
	return Object.fromEntries(
		Object.entries(filter).map(([key, value]) => [key, String(value)]),
	);
}

export async function fetchSymbolMeta(symbol: string): Promise<SymbolMeta> {
	const cached = cachedSymbols.get(symbol);
	if (cached) return cached;

	const info = await restClient.getExchangeInfo({ symbol });
	const match = info.symbols.find((s) => s.symbol === symbol);
	if (!match) {
		throw new Error(`Symbol metadata not found for ${symbol}`);
	}

	const meta: SymbolMeta = {
		symbol: match.symbol,
		baseAsset: match.baseAsset,
		quoteAsset: match.quoteAsset,
		status: match.status,
		filters: match.filters.map(toFilterRecord),
	};
	cachedSymbols.set(symbol, meta);
	return meta;
}

export async function fetchKlines(
	symbol: string,
	interval: "1h" | "4h" | "1d",
	limit: number,
): Promise<Candle[]> {
	const data = await restClient.getKlines({ symbol, interval, limit });

	return data.map((kline) => ({
		openTime: kline[0],
		open: Number(kline[1]),
		high: Number(kline[2]),
		low: Number(kline[3]),
		close: Number(kline[4]),
		volume: Number(kline[5]),
		closeTime: kline[6],
	}));
}

export async function latestPrice(symbol: string): Promise<number> {
	const ticker = await restClient.getSymbolPriceTicker({ symbol });
	const match = Array.isArray(ticker)
		? ticker.find((t) => t.symbol === symbol)
		: ticker;
	if (!match) {
		throw new Error(`No price ticker returned for ${symbol}`);
	}
	return Number(match.price);
}

export async function fetchFreeBalances(): Promise<Balances> {
	const account = await restClient.getAccountInformation();
	const balances: Balances = {};
	for (const balance of account.balances) {
		const free = Number(balance.free);
		if (free > 0) {
			balances[balance.asset] = free;
		}
	}
	logger.debug({ assets: Object.keys(balances) }, "Fetched exchange balances");
	return balances;
}

export function sumCommissions(
	fills: Array<{ commission: string | number; commissionAsset: string }>,
): Balances {
	const fees: Balances = {};
	for (const fill of fills) {
		const amount = Number(fill.commission);
		if (amount > 0) {
			fees[fill.commissionAsset] = (fees[fill.commissionAsset] ?? 0) + amount;
		}
	}
	return fees;
}

export async function submitMarketOrder(
	symbol: string,
	side: TradeSide,
	quantity: number,
): Promise<MarketOrderAck> {
	const response = await restClient.submitNewOrder({
		symbol,
		side,
		type: "MARKET",
		quantity,
		newOrderRespType: "FULL",
	});

	return {
		orderId: response.orderId,
		status: response.status,
		executedQty: Number(response.executedQty),
		quoteQty: Number(response.cummulativeQuoteQty),
		transactTime: Number(response.transactTime),
		fees: sumCommissions(response.fills ?? []),
	};
}
