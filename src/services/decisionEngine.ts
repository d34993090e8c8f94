import { PersistenceError } from "../errors";
import type {
	AdvisorRecommendation,
	Exchange,
	IndicatorSet,
	MarketSnapshot,
	Order,
	PivotLevels,
	Position,
	RejectionReason,
	TradeRecord,
} from "../types";
import { logger } from "../utils/logger";
import type { ExitLevels, PortfolioLedger } from "./portfolioLedger";
import type { TradeLimiter } from "./tradeLimiter";

export type DecisionState =
	| { kind: "IDLE" }
	| { kind: "POSITION_OPEN"; position: Position };

export type DecisionEvent =
	| { type: "BUY_FILLED"; position: Position }
	| { type: "SELL_FILLED" };

export type HoldReason =
	| "DAILY_LIMIT"
	| "NO_SIGNAL"
	| "ZERO_SIZE"
	| "SIGNAL_CONFLICT"
	| "INVALID_EXITS"
	| "PERSISTENCE_FAILURE";

export type BuyReason = "ADVISOR_BUY" | "RSI_OVERSOLD" | "SMA_CROSS_UP";

export type SellReason = "STOP_LOSS" | "TAKE_PROFIT" | "ADVISOR_SELL";

export type Decision =
	| { action: "HOLD"; reason: HoldReason }
	| { action: "BUY"; reason: BuyReason; quantity: number; exitLevels: ExitLevels }
	| { action: "SELL"; reason: SellReason; quantity: number };

export type DecisionSettings = {
	symbol: string;
	quoteAsset: string;
	positionFraction: number;
	rsiOversold: number;
};

export type DecisionInput = {
	state: DecisionState;
	canTrade: boolean;
	price: number;
	indicators: IndicatorSet;
	recommendation: AdvisorRecommendation;
	pivots: PivotLevels;
	quoteBalance: number;
	settings: Pick<DecisionSettings, "positionFraction" | "rsiOversold">;
};

export type DecisionCycle = {
	snapshot: MarketSnapshot;
	indicators: IndicatorSet;
	recommendation: AdvisorRecommendation;
	pivots: PivotLevels;
	now?: Date;
};

export type EvaluationOutcome =
	| { kind: "HOLD"; reason: HoldReason }
	| { kind: "FILLED"; decision: Decision; order: Order; record: TradeRecord }
	| {
			kind: "REJECTED";
			decision: Decision;
			order: Order;
			reason: RejectionReason;
			message: string;
	  };

const BUY_ACTIONS = new Set<AdvisorRecommendation["action"]>(["BUY", "STRONG_BUY"]);
const SELL_ACTIONS = new Set<AdvisorRecommendation["action"]>(["SELL", "STRONG_SELL"]);

function buyReason(input: DecisionInput): BuyReason | null {
	if (BUY_ACTIONS.has(input.recommendation.action)) return "ADVISOR_BUY";
	if (input.indicators.rsi < input.settings.rsiOversold) return "RSI_OVERSOLD";
	if (input.indicators.crossover === "UP") return "SMA_CROSS_UP";
	return null;
}

function sellReason(position: Position, input: DecisionInput): SellReason | null {
	if (input.price <= position.stopLoss) return "STOP_LOSS";
	if (input.price >= position.takeProfit) return "TAKE_PROFIT";
	if (SELL_ACTIONS.has(input.recommendation.action)) return "ADVISOR_SELL";
	return null;
}

function bracketsPrice(levels: ExitLevels, price: number): boolean {
	return levels.stopLoss < price && price < levels.takeProfit;
}

// Advisor levels first, then the S2/R2 pivots; null when neither brackets the entry.
export function entryExitLevels(
	recommendation: AdvisorRecommendation,
	pivots: PivotLevels,
	price: number,
): ExitLevels | null {
	const candidates: ExitLevels[] = [
		{ stopLoss: recommendation.stopLoss, takeProfit: recommendation.takeProfit },
		{ stopLoss: pivots.s2, takeProfit: pivots.r2 },
	];
	return candidates.find((levels) => bracketsPrice(levels, price)) ?? null;
}

/**
 * Picks the action for one cycle. The daily cap is checked first, so no
 * signal can produce an order once the limiter says no.
 */
export function decide(input: DecisionInput): Decision {
	if (!input.canTrade) return { action: "HOLD", reason: "DAILY_LIMIT" };

	if (input.state.kind === "POSITION_OPEN") {
		const reason = sellReason(input.state.position, input);
		if (!reason) return { action: "HOLD", reason: "NO_SIGNAL" };
		return { action: "SELL", reason, quantity: input.state.position.quantity };
	}

	const reason = buyReason(input);
	if (!reason) return { action: "HOLD", reason: "NO_SIGNAL" };
	// Indicators alone do not buy against an explicit advisor sell.
	if (reason !== "ADVISOR_BUY" && SELL_ACTIONS.has(input.recommendation.action)) {
		return { action: "HOLD", reason: "SIGNAL_CONFLICT" };
	}

	const quantity =
		input.price > 0
			? (input.quoteBalance * input.settings.positionFraction) / input.price
			: 0;
	if (!(quantity > 0) || !Number.isFinite(quantity)) {
		return { action: "HOLD", reason: "ZERO_SIZE" };
	}

	const exitLevels = entryExitLevels(input.recommendation, input.pivots, input.price);
	if (!exitLevels) return { action: "HOLD", reason: "INVALID_EXITS" };

	return { action: "BUY", reason, quantity, exitLevels };
}

export function transition(state: DecisionState, event: DecisionEvent): DecisionState {
	switch (event.type) {
		case "BUY_FILLED":
			if (state.kind !== "IDLE") {
				throw new Error("Cannot open a position while one is already open");
			}
			return { kind: "POSITION_OPEN", position: event.position };
		case "SELL_FILLED":
			if (state.kind !== "POSITION_OPEN") {
				throw new Error("Cannot close a position while idle");
			}
			return { kind: "IDLE" };
	}
}

export class DecisionEngine {
	private current: DecisionState = { kind: "IDLE" };

	constructor(
		private readonly limiter: TradeLimiter,
		private readonly ledger: PortfolioLedger,
		private readonly exchange: Exchange,
		private readonly settings: DecisionSettings,
	) {}

	get state(): DecisionState {
		return this.current;
	}

	async evaluate(cycle: DecisionCycle): Promise<EvaluationOutcome> {
		const now = cycle.now ?? new Date();
		const canTrade = await this.limiter.canTrade(now);
		const decision = decide({
			state: this.current,
			canTrade,
			price: cycle.snapshot.currentPrice,
			indicators: cycle.indicators,
			recommendation: cycle.recommendation,
			pivots: cycle.pivots,
			quoteBalance: this.ledger.balanceOf(this.settings.quoteAsset),
			settings: this.settings,
		});

		if (decision.action === "HOLD") {
			logger.debug({ reason: decision.reason }, "Holding");
			return { kind: "HOLD", reason: decision.reason };
		}

		try {
			await this.limiter.checkpoint();
		} catch (err) {
			if (err instanceof PersistenceError) {
				logger.error(
					{ err, action: decision.action },
					"Trade limiter state unwritable; order not sent",
				);
				return { kind: "HOLD", reason: "PERSISTENCE_FAILURE" };
			}
			throw err;
		}

		const order: Order = {
			side: decision.action,
			symbol: this.settings.symbol,
			quantity: decision.quantity,
			type: "MARKET",
		};
		logger.info(
			{ side: order.side, quantity: order.quantity, reason: decision.reason },
			"Submitting order",
		);

		const result = await this.exchange.submitOrder(order);
		if (result.status === "REJECTED") {
			logger.warn(
				{ side: order.side, reason: result.reason, message: result.message },
				"Order rejected; state unchanged",
			);
			return {
				kind: "REJECTED",
				decision,
				order,
				reason: result.reason,
				message: result.message,
			};
		}

		// The order has executed: charge it before anything else can fail.
		try {
			await this.limiter.recordTrade(order.side, now);
		} catch (err) {
			logger.error({ err, side: order.side }, "Failed to persist trade count");
		}

		const { fill } = result;
		let record: TradeRecord;
		try {
			record = this.ledger.applyFill(
				order,
				fill.price,
				fill.quantity,
				fill.timestamp,
				decision.action === "BUY" ? decision.exitLevels : undefined,
				fill.fees,
			);
		} catch (err) {
			logger.error(
				{ err, side: order.side, fill },
				"Exchange fill could not be applied to the ledger",
			);
			throw err;
		}

		const position = this.ledger.openPosition;
		this.current = transition(
			this.current,
			position ? { type: "BUY_FILLED", position } : { type: "SELL_FILLED" },
		);

		if (record.realizedPnL !== null) {
			try {
				await this.limiter.addRealizedPnL(record.realizedPnL, now);
			} catch (err) {
				logger.error({ err, tradeId: record.id }, "Failed to persist daily P&L");
			}
		}

		return { kind: "FILLED", decision, order, record };
	}
}
