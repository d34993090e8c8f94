import type { MarketOrderAck, SymbolMeta } from "../clients/binance";
import type {
	Balances,
	Exchange,
	Order,
	OrderResult,
	RejectionReason,
} from "../types";
import { logger } from "../utils/logger";

type ApiError = {
	code?: number | string;
	message?: string;
};

const RATE_LIMIT_CODES = new Set([-1003, -1015, 418, 429]);
const INSUFFICIENT_BALANCE_CODE = -2010;
const STEP_EPSILON = 1e-9;

function findFilter(
	meta: SymbolMeta,
	...types: string[]
): Record<string, string> | undefined {
	return meta.filters.find((f) => types.includes(f.filterType));
}

export function applyStepSize(quantity: number, meta: SymbolMeta): number {
	// MARKET_LOT_SIZE often carries a zero step; fall back to LOT_SIZE then
	const stepSize = [findFilter(meta, "MARKET_LOT_SIZE"), findFilter(meta, "LOT_SIZE")]
		.map((filter) => Number(filter?.stepSize))
		.find((step) => step > 0);
	if (!stepSize) return quantity;

	// quantities already on a step divide to n - epsilon in binary floating point
	const steps = Math.floor(quantity / stepSize + STEP_EPSILON);
	return Number((steps * stepSize).toFixed(8));
}

export function minNotional(meta: SymbolMeta): number {
	const filter = findFilter(meta, "NOTIONAL", "MIN_NOTIONAL");
	if (!filter) return 0;
	return Number(filter.minNotional ?? filter.notional ?? 0) || 0;
}

function toApiError(err: unknown): ApiError {
	if (!err || typeof err !== "object") return { message: String(err) };
	const code = "code" in err ? err.code : undefined;
	const message = "message" in err ? err.message : undefined;
	return {
		code: typeof code === "number" || typeof code === "string" ? code : undefined,
		message: typeof message === "string" ? message : String(err),
	};
}

export function classifyRejection(err: unknown): {
	reason: RejectionReason;
	message: string;
} {
	const { code, message = "Unknown exchange error" } = toApiError(err);

	if (typeof code === "number") {
		if (RATE_LIMIT_CODES.has(code)) return { reason: "RATE_LIMIT", message };
		if (
			code === INSUFFICIENT_BALANCE_CODE &&
			/insufficient balance/i.test(message)
		) {
			return { reason: "INSUFFICIENT_BALANCE", message };
		}
		return { reason: "INVALID_ORDER", message };
	}
	return { reason: "CONNECTIVITY", message };
}

export type SpotOrderClient = {
	fetchSymbolMeta(symbol: string): Promise<SymbolMeta>;
	latestPrice(symbol: string): Promise<number>;
	fetchFreeBalances(): Promise<Balances>;
	submitMarketOrder(
		symbol: string,
		side: Order["side"],
		quantity: number,
	): Promise<MarketOrderAck>;
};

/**
 * Spot market orders against Binance. Quantities are floored to the
 * symbol's lot step; anything the exchange refuses comes back as a
 * REJECTED result instead of a thrown error.
 */
export class BinanceSpotExchange implements Exchange {
	constructor(private readonly client: SpotOrderClient) {}

	async getBalances(): Promise<Balances> {
		return this.client.fetchFreeBalances();
	}

	async submitOrder(order: Order): Promise<OrderResult> {
		let meta: SymbolMeta;
		let price: number;
		try {
			[meta, price] = await Promise.all([
				this.client.fetchSymbolMeta(order.symbol),
				this.client.latestPrice(order.symbol),
			]);
		} catch (err) {
			return { status: "REJECTED", order, ...classifyRejection(err) };
		}

		const quantity = applyStepSize(order.quantity, meta);
		if (quantity <= 0) {
			return {
				status: "REJECTED",
				order,
				reason: "INVALID_ORDER",
				message: `Quantity ${order.quantity} is below the lot step for ${order.symbol}`,
			};
		}

		const notional = minNotional(meta);
		if (notional && quantity * price < notional) {
			return {
				status: "REJECTED",
				order,
				reason: "INVALID_ORDER",
				message: `Notional ${quantity * price} is below the minimum ${notional}`,
			};
		}

		let ack: MarketOrderAck;
		try {
			ack = await this.client.submitMarketOrder(order.symbol, order.side, quantity);
		} catch (err) {
			const rejection = classifyRejection(err);
			logger.warn(
				{ symbol: order.symbol, side: order.side, quantity, ...rejection },
				"Market order rejected",
			);
			return { status: "REJECTED", order, ...rejection };
		}

		if (!(ack.executedQty > 0)) {
			return {
				status: "REJECTED",
				order,
				reason: "INVALID_ORDER",
				message: `Order ${ack.orderId} finished ${ack.status} without fills`,
			};
		}

		logger.info(
			{
				symbol: order.symbol,
				side: order.side,
				orderId: ack.orderId,
				executedQty: ack.executedQty,
				quoteQty: ack.quoteQty,
			},
			"Market order filled",
		);

		return {
			status: "FILLED",
			order,
			fill: {
				price: ack.quoteQty / ack.executedQty,
				quantity: ack.executedQty,
				timestamp: ack.transactTime,
				fees: ack.fees,
			},
		};
	}
}
