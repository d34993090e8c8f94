import type { Balances, Exchange, Order, OrderResult } from "../types";
import { logger } from "../utils/logger";

export type PaperExchangeOptions = {
	symbol: string;
	baseAsset: string;
	quoteAsset: string;
	initialBalances: Balances;
	priceSource: (symbol: string) => Promise<number>;
	now?: () => number;
};

/**
 * Fills market orders in memory at the live price. Used for paper trading
 * and as an in-process exchange in tests.
 */
export class PaperExchange implements Exchange {
	private readonly balances: Balances;
	private readonly now: () => number;

	constructor(private readonly options: PaperExchangeOptions) {
		this.balances = { ...options.initialBalances };
		this.now = options.now ?? Date.now;
	}

	async getBalances(): Promise<Balances> {
		return { ...this.balances };
	}

	async submitOrder(order: Order): Promise<OrderResult> {
		if (order.symbol !== this.options.symbol) {
			return {
				status: "REJECTED",
				order,
				reason: "INVALID_ORDER",
				message: `Paper exchange only trades ${this.options.symbol}`,
			};
		}
		if (!(order.quantity > 0)) {
			return {
				status: "REJECTED",
				order,
				reason: "INVALID_ORDER",
				message: `Quantity must be positive, got ${order.quantity}`,
			};
		}

		let price: number;
		try {
			price = await this.options.priceSource(order.symbol);
		} catch (err) {
			return {
				status: "REJECTED",
				order,
				reason: "CONNECTIVITY",
				message: `Price unavailable: ${String(err)}`,
			};
		}

		const { baseAsset, quoteAsset } = this.options;
		const value = price * order.quantity;
		const base = this.balances[baseAsset] ?? 0;
		const quote = this.balances[quoteAsset] ?? 0;

		if (order.side === "BUY" && quote < value) {
			return {
				status: "REJECTED",
				order,
				reason: "INSUFFICIENT_BALANCE",
				message: `Need ${value} ${quoteAsset}, have ${quote}`,
			};
		}
		if (order.side === "SELL" && base < order.quantity) {
			return {
				status: "REJECTED",
				order,
				reason: "INSUFFICIENT_BALANCE",
				message: `Need ${order.quantity} ${baseAsset}, have ${base}`,
			};
		}

		if (order.side === "BUY") {
			this.balances[quoteAsset] = quote - value;
			this.balances[baseAsset] = base + order.quantity;
		} else {
			this.balances[baseAsset] = base - order.quantity;
			this.balances[quoteAsset] = quote + value;
		}

		logger.info(
			{ side: order.side, symbol: order.symbol, price, quantity: order.quantity },
			"Paper order filled",
		);
		return {
			status: "FILLED",
			order,
			fill: { price, quantity: order.quantity, timestamp: this.now(), fees: {} },
		};
	}
}
