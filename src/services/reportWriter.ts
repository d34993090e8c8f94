import type { TradingMode } from "../config";
import type {
	AdvisorRecommendation,
	IndicatorSet,
	PivotLevels,
	PortfolioState,
} from "../types";
import { writeFileAtomic } from "../utils/storage";
import type { ActivitySummary } from "./activityFeed";
import type { TradeLimiterStatus } from "./tradeLimiter";

export type ReportInput = {
	mode: TradingMode;
	price: number;
	portfolio: Readonly<PortfolioState>;
	indicators: IndicatorSet;
	recommendation: AdvisorRecommendation;
	pivots: PivotLevels;
	limiter: TradeLimiterStatus;
	activity: ActivitySummary;
	updatedAt: Date;
};

const RULE = "-".repeat(44);

function money(value: number): string {
	return value.toFixed(2);
}

function section(title: string, lines: string[]): string {
	return [RULE, title, RULE, ...lines].join("\n");
}

export function renderReport(input: ReportInput): string {
	const { portfolio, recommendation: rec, pivots, indicators, limiter, activity } = input;
	const position = portfolio.position;
	const balances = Object.entries(portfolio.balances)
		.map(([asset, amount]) => `${asset}: ${amount}`)
		.join(", ");
	const aiLabel =
		rec.source === "AI" ? "AI" : `Fallback (${rec.fallbackReason ?? "unknown"})`;

	return [
		`${portfolio.symbol} ${input.mode === "live" ? "LIVE TRADING" : "PAPER TRADING"}`,
		`Updated: ${input.updatedAt.toISOString()}`,
		section("MARKET", [
			`Price: ${money(input.price)}`,
			`SMA short/long: ${money(indicators.smaShort)} / ${money(indicators.smaLong)} (crossover ${indicators.crossover})`,
			`RSI: ${indicators.rsi.toFixed(2)}`,
		]),
		section("PIVOT LEVELS", [
			`R2: ${money(pivots.r2)}  R1: ${money(pivots.r1)}`,
			`PP: ${money(pivots.pp)}`,
			`S1: ${money(pivots.s1)}  S2: ${money(pivots.s2)}`,
		]),
		section("ADVISOR", [
			`Action: ${rec.action} (${rec.confidence}% confidence, ${aiLabel})`,
			`Stop loss: ${money(rec.stopLoss)}  Take profit: ${money(rec.takeProfit)}`,
			`Buy target: ${money(rec.buyTarget)}  Sell target: ${money(rec.sellTarget)}`,
			`Reasoning: ${rec.reasoning}`,
		]),
		section("POSITION", [
			position
				? `LONG ${position.quantity} @ ${money(position.entryPrice)} (SL ${money(position.stopLoss)}, TP ${money(position.takeProfit)})`
				: "NO POSITION",
			`Unrealized P&L: ${money(portfolio.unrealizedPnL)} (${money(portfolio.unrealizedPnLPct)}%)`,
			`Realized P&L: ${money(portfolio.realizedPnL)}`,
			`Balances: ${balances || "none"}`,
			`Total value: ${money(portfolio.totalValue)}`,
		]),
		section("STATISTICS", [
			`Closed trades: ${portfolio.stats.closedTrades} (won ${portfolio.stats.winningTrades}, lost ${portfolio.stats.losingTrades})`,
			`Win rate: ${portfolio.stats.winRate.toFixed(1)}%`,
			`Largest win: ${money(portfolio.stats.largestWin)}  Largest loss: ${money(portfolio.stats.largestLoss)}`,
		]),
		section("DAILY LIMIT", [
			`Trades today (${limiter.date}): ${limiter.tradesExecuted}/${limiter.maxTradesPerDay}`,
			`Daily P&L: ${money(limiter.dailyPnL)}`,
			limiter.canTrade ? "Trading allowed" : "Trading paused",
			`Next reset: ${limiter.nextResetAt}`,
		]),
		section("ACTIVITY", [
			`Last event: ${activity.lastEvent}`,
			...(activity.alerts.length
				? activity.alerts.map((alert) => `- ${alert}`)
				: ["No recent alerts"]),
		]),
		"",
	].join("\n");
}

export async function writeReport(filePath: string, input: ReportInput): Promise<void> {
	await writeFileAtomic(filePath, renderReport(input));
}
