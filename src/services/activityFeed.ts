import type { AdvisorRecommendation, Position, TradeRecord } from "../types";
import { logger } from "../utils/logger";

export type ActivitySummary = {
	lastEvent: string;
	alerts: string[];
};

const DEFAULT_CAPACITY = 20;

function price(value: number): string {
	return value.toFixed(2);
}

/**
 * First level the price has reached: the open position's stop-loss and
 * take-profit, then the advisor's buy and sell targets.
 */
export function detectTargetHit(
	currentPrice: number,
	position: Position | null,
	recommendation: AdvisorRecommendation,
): string | null {
	const at = price(currentPrice);
	if (position && currentPrice <= position.stopLoss) return `STOP-LOSS HIT at ${at}`;
	if (position && currentPrice >= position.takeProfit) return `TAKE-PROFIT HIT at ${at}`;
	if (currentPrice <= recommendation.buyTarget) return `BUY TARGET HIT at ${at}`;
	if (currentPrice >= recommendation.sellTarget) return `SELL TARGET HIT at ${at}`;
	return null;
}

export class ActivityFeed {
	private last = "Trader started";
	private readonly alerts: string[] = [];

	constructor(private readonly capacity: number = DEFAULT_CAPACITY) {}

	get lastEvent(): string {
		return this.last;
	}

	observePrice(
		currentPrice: number,
		position: Position | null,
		recommendation: AdvisorRecommendation,
	): string | null {
		const hit = detectTargetHit(currentPrice, position, recommendation);
		if (hit) {
			logger.info({ event: hit }, "Price target hit");
			this.last = hit;
			this.alerts.push(hit);
			if (this.alerts.length > this.capacity) {
				this.alerts.splice(0, this.alerts.length - this.capacity);
			}
		}
		return hit;
	}

	recordFill(record: TradeRecord): void {
		this.last = `${record.side} executed: ${record.quantity} @ ${price(record.price)}`;
	}

	// newest first
	summary(limit = 5): ActivitySummary {
		return {
			lastEvent: this.last,
			alerts: this.alerts.slice(-limit).reverse(),
		};
	}
}
