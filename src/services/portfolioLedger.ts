import crypto from "node:crypto";
import { LedgerError } from "../errors";
import type {
	BalanceDrift,
	Balances,
	Order,
	PortfolioState,
	PortfolioStats,
	Position,
	TradeRecord,
} from "../types";
import { logger } from "../utils/logger";

export type PortfolioLedgerOptions = {
	symbol: string;
	baseAsset: string;
	quoteAsset: string;
	reconcileTolerance: number;
};

export type ExitLevels = {
	stopLoss: number;
	takeProfit: number;
};

const POSITION_SIGN: Record<Position["side"], number> = { LONG: 1 };

function emptyStats(): PortfolioStats {
	return {
		closedTrades: 0,
		winningTrades: 0,
		losingTrades: 0,
		winRate: 0,
		largestWin: 0,
		largestLoss: 0,
	};
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
	for (const key of Object.keys(value)) {
		const child: unknown = Reflect.get(value, key);
		if (child && typeof child === "object" && !Object.isFrozen(child)) {
			deepFreeze(child);
		}
	}
	return Object.freeze(value);
}

/**
 * In-memory book of balances, the single open position and realized P&L.
 * Exchange balances are compared against it every cycle but never written
 * into it.
 */
export class PortfolioLedger {
	private balances: Balances = {};
	private position: Position | null = null;
	private realizedPnL = 0;
	private readonly trades: TradeRecord[] = [];
	private stats: PortfolioStats = emptyStats();
	private initialized = false;

	constructor(private readonly options: PortfolioLedgerOptions) {}

	get openPosition(): Position | null {
		return this.position ? { ...this.position } : null;
	}

	get isInitialized(): boolean {
		return this.initialized;
	}

	balanceOf(asset: string): number {
		return this.balances[asset] ?? 0;
	}

	initialize(balances: Balances): void {
		if (this.initialized) {
			throw new LedgerError("Ledger balances are already initialized");
		}
		for (const [asset, amount] of Object.entries(balances)) {
			if (!Number.isFinite(amount) || amount < 0) {
				throw new LedgerError(`Invalid starting balance for ${asset}: ${amount}`);
			}
		}
		this.balances = { ...balances };
		this.initialized = true;
		logger.info({ balances: this.balances }, "Ledger initialized");
	}

	applyFill(
		order: Order,
		fillPrice: number,
		fillQty: number,
		timestamp: number = Date.now(),
		exitLevels: ExitLevels = { stopLoss: 0, takeProfit: Number.POSITIVE_INFINITY },
		fees: Balances = {},
	): TradeRecord {
		if (order.symbol !== this.options.symbol) {
			throw new LedgerError(
				`Fill for ${order.symbol} does not belong to ledger ${this.options.symbol}`,
			);
		}
		if (!(fillPrice > 0) || !(fillQty > 0)) {
			throw new LedgerError(
				`Fill price and quantity must be positive, got ${fillPrice} x ${fillQty}`,
			);
		}

		for (const [asset, amount] of Object.entries(fees)) {
			if (!Number.isFinite(amount) || amount < 0) {
				throw new LedgerError(`Invalid ${asset} commission: ${amount}`);
			}
		}

		const record =
			order.side === "BUY"
				? this.openLong(fillPrice, fillQty, timestamp, exitLevels, fees)
				: this.closeLong(fillPrice, fillQty, timestamp, fees);

		this.trades.push(record);
		return record;
	}

	reconcile(exchangeBalances: Balances): BalanceDrift[] {
		const assets = new Set([
			...Object.keys(this.balances),
			...Object.keys(exchangeBalances),
		]);
		const drifts: BalanceDrift[] = [];

		for (const asset of assets) {
			const ledger = this.balances[asset] ?? 0;
			const exchange = exchangeBalances[asset] ?? 0;
			const difference = exchange - ledger;
			if (Math.abs(difference) > this.options.reconcileTolerance) {
				drifts.push({ asset, ledger, exchange, difference });
			}
		}

		if (drifts.length) {
			logger.warn({ drifts }, "Ledger balances drifted from exchange");
		}
		return drifts;
	}

	snapshot(markPrice?: number): Readonly<PortfolioState> {
		const position = this.position ? { ...this.position } : null;
		const unrealizedPnL =
			position && markPrice !== undefined
				? (markPrice - position.entryPrice) *
					position.quantity *
					POSITION_SIGN[position.side]
				: 0;
		const entryValue = position ? position.entryPrice * position.quantity : 0;
		const basePrice = markPrice ?? position?.entryPrice ?? 0;

		return deepFreeze({
			symbol: this.options.symbol,
			balances: { ...this.balances },
			position,
			realizedPnL: this.realizedPnL,
			unrealizedPnL,
			unrealizedPnLPct: entryValue > 0 ? (unrealizedPnL / entryValue) * 100 : 0,
			totalValue:
				this.balanceOf(this.options.quoteAsset) +
				this.balanceOf(this.options.baseAsset) * basePrice,
			trades: this.trades.map((trade) => ({ ...trade, fees: { ...trade.fees } })),
			stats: { ...this.stats },
		});
	}

	private openLong(
		price: number,
		quantity: number,
		timestamp: number,
		exitLevels: ExitLevels,
		fees: Balances,
	): TradeRecord {
		if (this.position) {
			throw new LedgerError(
				`Cannot open a position while one is open (${this.position.quantity} @ ${this.position.entryPrice})`,
			);
		}

		const { baseAsset, quoteAsset } = this.options;
		// commission taken in the base asset never reaches the position
		const held = quantity - (fees[baseAsset] ?? 0);
		if (!(held > 0)) {
			throw new LedgerError(`Commission consumes the whole ${quantity} ${baseAsset} fill`);
		}
		this.debit(quoteAsset, price * quantity);
		this.credit(baseAsset, quantity);
		this.chargeFees(fees);
		this.position = {
			side: "LONG",
			entryPrice: price,
			quantity: held,
			stopLoss: exitLevels.stopLoss,
			takeProfit: exitLevels.takeProfit,
			openedAt: timestamp,
		};

		logger.info({ price, quantity: held, fees }, "Opened position in ledger");
		return this.record("BUY", price, quantity, timestamp, fees, null);
	}

	private closeLong(
		price: number,
		quantity: number,
		timestamp: number,
		fees: Balances,
	): TradeRecord {
		const position = this.position;
		if (!position) {
			throw new LedgerError("Cannot apply a SELL fill without an open position");
		}

		const { baseAsset, quoteAsset } = this.options;
		this.debit(baseAsset, quantity);
		this.credit(quoteAsset, price * quantity);
		this.chargeFees(fees);

		const gross =
			(price - position.entryPrice) * quantity * POSITION_SIGN[position.side];
		const pnl = gross - (fees[quoteAsset] ?? 0);
		this.realizedPnL += pnl;
		this.position = null;
		this.updateStats(pnl);

		if (Math.abs(quantity - position.quantity) > this.options.reconcileTolerance) {
			logger.warn(
				{ filled: quantity, held: position.quantity },
				"Closing fill quantity differs from position size",
			);
		}
		logger.info({ price, quantity, pnl }, "Closed position in ledger");
		return this.record("SELL", price, quantity, timestamp, fees, pnl);
	}

	private updateStats(pnl: number): void {
		const stats = { ...this.stats };
		stats.closedTrades += 1;
		if (pnl > 0) {
			stats.winningTrades += 1;
			stats.largestWin = Math.max(stats.largestWin, pnl);
		} else {
			stats.losingTrades += 1;
			stats.largestLoss = Math.min(stats.largestLoss, pnl);
		}
		stats.winRate = (stats.winningTrades / stats.closedTrades) * 100;
		this.stats = stats;
	}

	private record(
		side: TradeRecord["side"],
		price: number,
		quantity: number,
		timestamp: number,
		fees: Balances,
		realizedPnL: number | null,
	): TradeRecord {
		return Object.freeze({
			id: crypto.randomUUID(),
			timestamp,
			symbol: this.options.symbol,
			side,
			price,
			quantity,
			fees: Object.freeze({ ...fees }),
			realizedPnL,
		});
	}

	private chargeFees(fees: Balances): void {
		for (const [asset, amount] of Object.entries(fees)) {
			this.debit(asset, amount);
		}
	}

	private credit(asset: string, amount: number): void {
		this.balances[asset] = this.balanceOf(asset) + amount;
	}

	private debit(asset: string, amount: number): void {
		const next = this.balanceOf(asset) - amount;
		if (next < 0) {
			logger.warn(
				{ asset, balance: this.balanceOf(asset), amount },
				"Fill exceeds ledger balance; flooring at zero",
			);
		}
		this.balances[asset] = Math.max(0, next);
	}
}
