import { describe, expect, it, vi } from "vitest";

import type { MarketOrderAck, SymbolMeta } from "../clients/binance";
import type { Order } from "../types";
import {
	BinanceSpotExchange,
	type SpotOrderClient,
	applyStepSize,
	classifyRejection,
	minNotional,
} from "./orderService";

const META: SymbolMeta = {
	symbol: "BTCUSDT",
	baseAsset: "BTC",
	quoteAsset: "USDT",
	status: "TRADING",
	filters: [
		{ filterType: "MARKET_LOT_SIZE", stepSize: "0.00000000", minQty: "0" },
		{ filterType: "LOT_SIZE", stepSize: "0.00100000", minQty: "0.001" },
		{ filterType: "NOTIONAL", minNotional: "5.00000000" },
	],
};

const BUY: Order = { side: "BUY", symbol: "BTCUSDT", quantity: 0.5004, type: "MARKET" };

function client(overrides: Partial<SpotOrderClient> = {}): SpotOrderClient {
	const ack: MarketOrderAck = {
		orderId: 42,
		status: "FILLED",
		executedQty: 0.5,
		quoteQty: 50.25,
		transactTime: 5_000,
		fees: { BTC: 0.0005 },
	};
	return {
		fetchSymbolMeta: async () => META,
		latestPrice: async () => 100,
		fetchFreeBalances: async () => ({ USDT: 100 }),
		submitMarketOrder: async () => ack,
		...overrides,
	};
}

describe("applyStepSize", () => {
	it("floors to the first positive lot step", () => {
		expect(applyStepSize(0.123456, META)).toBe(0.123);
	});

	it("keeps quantities that already sit on a step", () => {
		const fine: SymbolMeta = {
			...META,
			filters: [{ filterType: "MARKET_LOT_SIZE", stepSize: "0.00001000", minQty: "0" }],
		};
		expect(applyStepSize(0.00026, fine)).toBe(0.00026);
		expect(applyStepSize(0.00007, fine)).toBe(0.00007);
		expect(applyStepSize(0.000269, fine)).toBe(0.00026);
	});

	it("leaves the quantity alone without a lot filter", () => {
		expect(applyStepSize(0.123456, { ...META, filters: [] })).toBe(0.123456);
	});
});

describe("minNotional", () => {
	it("reads NOTIONAL or MIN_NOTIONAL filters", () => {
		expect(minNotional(META)).toBe(5);
		expect(
			minNotional({ ...META, filters: [{ filterType: "MIN_NOTIONAL", minNotional: "10" }] }),
		).toBe(10);
		expect(minNotional({ ...META, filters: [] })).toBe(0);
	});
});

describe("classifyRejection", () => {
	it("maps exchange error codes onto rejection reasons", () => {
		expect(classifyRejection({ code: -1015, message: "Too many new orders" })).toEqual({
			reason: "RATE_LIMIT",
			message: "Too many new orders",
		});
		expect(
			classifyRejection({
				code: -2010,
				message: "Account has insufficient balance for requested action.",
			}).reason,
		).toBe("INSUFFICIENT_BALANCE");
		expect(
			classifyRejection({ code: -1013, message: "Filter failure: LOT_SIZE" }).reason,
		).toBe("INVALID_ORDER");
	});

	it("treats errors without an exchange code as connectivity problems", () => {
		expect(classifyRejection(new Error("socket hang up"))).toEqual({
			reason: "CONNECTIVITY",
			message: "socket hang up",
		});
		expect(classifyRejection({ code: "ECONNRESET", message: "reset" }).reason).toBe(
			"CONNECTIVITY",
		);
	});
});

describe("BinanceSpotExchange", () => {
	it("submits the stepped quantity and averages the fill price", async () => {
		const submitMarketOrder = vi.fn(client().submitMarketOrder);
		const exchange = new BinanceSpotExchange(client({ submitMarketOrder }));

		expect(await exchange.submitOrder(BUY)).toEqual({
			status: "FILLED",
			order: BUY,
			fill: { price: 100.5, quantity: 0.5, timestamp: 5_000, fees: { BTC: 0.0005 } },
		});
		expect(submitMarketOrder).toHaveBeenCalledWith("BTCUSDT", "BUY", 0.5);
	});

	it("sends a step-aligned SELL quantity unchanged", async () => {
		const submitMarketOrder = vi.fn(client().submitMarketOrder);
		const exchange = new BinanceSpotExchange(
			client({
				fetchSymbolMeta: async (): Promise<SymbolMeta> => ({
					...META,
					filters: [
						{ filterType: "MARKET_LOT_SIZE", stepSize: "0.00001000", minQty: "0" },
						{ filterType: "NOTIONAL", minNotional: "5.00000000" },
					],
				}),
				latestPrice: async () => 50_000,
				submitMarketOrder,
			}),
		);

		await exchange.submitOrder({ side: "SELL", symbol: "BTCUSDT", quantity: 0.00026, type: "MARKET" });
		expect(submitMarketOrder).toHaveBeenCalledWith("BTCUSDT", "SELL", 0.00026);
	});

	it("rejects orders below the minimum notional without sending them", async () => {
		const submitMarketOrder = vi.fn(client().submitMarketOrder);
		const exchange = new BinanceSpotExchange(client({ submitMarketOrder }));

		const result = await exchange.submitOrder({ ...BUY, quantity: 0.01 });
		expect(result).toMatchObject({ status: "REJECTED", reason: "INVALID_ORDER" });
		expect(submitMarketOrder).not.toHaveBeenCalled();
	});

	it("returns exchange errors as rejections", async () => {
		const exchange = new BinanceSpotExchange(
			client({
				submitMarketOrder: async () => {
					throw { code: -2010, message: "Account has insufficient balance for requested action." };
				},
			}),
		);
		expect(await exchange.submitOrder(BUY)).toMatchObject({
			status: "REJECTED",
			reason: "INSUFFICIENT_BALANCE",
		});
	});

	it("rejects when market metadata cannot be fetched", async () => {
		const exchange = new BinanceSpotExchange(
			client({
				latestPrice: async () => {
					throw new Error("getaddrinfo ENOTFOUND");
				},
			}),
		);
		expect(await exchange.submitOrder(BUY)).toEqual({
			status: "REJECTED",
			order: BUY,
			reason: "CONNECTIVITY",
			message: "getaddrinfo ENOTFOUND",
		});
	});

	it("rejects an order that came back without fills", async () => {
		const exchange = new BinanceSpotExchange(
			client({
				submitMarketOrder: async () => ({
					orderId: 7,
					status: "EXPIRED",
					executedQty: 0,
					quoteQty: 0,
					transactTime: 1,
					fees: {},
				}),
			}),
		);
		expect(await exchange.submitOrder(BUY)).toEqual({
			status: "REJECTED",
			order: BUY,
			reason: "INVALID_ORDER",
			message: "Order 7 finished EXPIRED without fills",
		});
	});
});
