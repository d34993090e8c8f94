import { TimeoutError, firstValueFrom, from, timeout } from "rxjs";
import type {
	AdvisorAction,
	AdvisorFailure,
	AdvisorRecommendation,
	IndicatorSet,
	LlmBackend,
	MarketSnapshot,
	PivotLevels,
	PortfolioState,
} from "../types";
import { logger } from "../utils/logger";

export type AdvisorOptions = {
	enabled: boolean;
	model: string;
	timeoutMs: number;
	fallbackConfidence: number;
	rsiOversold: number;
	rsiOverbought: number;
};

export type AdvisorAttempt =
	| { ok: true; text: string }
	| { ok: false; reason: AdvisorFailure; error?: unknown };

export type ParsedAdvice = Partial<
	Pick<
		AdvisorRecommendation,
		| "action"
		| "confidence"
		| "stopLoss"
		| "takeProfit"
		| "buyTarget"
		| "sellTarget"
		| "reasoning"
	>
>;

export type RsiThresholds = Pick<AdvisorOptions, "rsiOversold" | "rsiOverbought">;

type FallbackSettings = RsiThresholds & Pick<AdvisorOptions, "fallbackConfidence">;

const ACTION_BY_SCORE: Record<number, AdvisorAction> = {
	2: "STRONG_BUY",
	1: "BUY",
	0: "HOLD",
	[-1]: "SELL",
	[-2]: "STRONG_SELL",
};

const PRICE_FIELDS = [
	["stopLoss", "STOP_LOSS"],
	["takeProfit", "TAKE_PROFIT"],
	["buyTarget", "BUY_TARGET"],
	["sellTarget", "SELL_TARGET"],
] as const;

function clamp(value: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, value));
}

function usd(value: number): string {
	return `$${value.toFixed(2)}`;
}

export function fallbackRecommendation(
	indicators: IndicatorSet,
	pivots: PivotLevels,
	settings: FallbackSettings,
	reason: AdvisorFailure,
	createdAt: number = Date.now(),
): AdvisorRecommendation {
	let score = 0;
	const reasons: string[] = [];

	if (indicators.rsi < settings.rsiOversold) {
		score += 1;
		reasons.push(`RSI ${indicators.rsi.toFixed(1)} indicates oversold conditions`);
	} else if (indicators.rsi > settings.rsiOverbought) {
		score -= 1;
		reasons.push(`RSI ${indicators.rsi.toFixed(1)} indicates overbought conditions`);
	}

	if (indicators.crossover === "UP") {
		score += 1;
		reasons.push("Short SMA crossed above long SMA");
	} else if (indicators.crossover === "DOWN") {
		score -= 1;
		reasons.push("Short SMA crossed below long SMA");
	}

	const action = ACTION_BY_SCORE[score];
	return {
		action,
		confidence: clamp(settings.fallbackConfidence, 0, 100),
		stopLoss: pivots.s2,
		takeProfit: pivots.r2,
		buyTarget: pivots.s1,
		sellTarget: pivots.r1,
		reasoning: reasons.length
			? reasons.join("; ")
			: `${action} recommendation based on mixed signals`,
		source: "Fallback",
		fallbackReason: reason,
		createdAt,
	};
}

export function buildPrompt(
	snapshot: MarketSnapshot,
	indicators: IndicatorSet,
	pivots: PivotLevels,
	portfolio: PortfolioState,
	thresholds: RsiThresholds,
): string {
	const range = (candles: MarketSnapshot["windows"]["h12"]) =>
		candles.length
			? `${usd(Math.min(...candles.map((c) => c.low)))} - ${usd(Math.max(...candles.map((c) => c.high)))}`
			: "Not available";
	const trend =
		indicators.smaShort > indicators.smaLong
			? "BULLISH (short > long)"
			: "BEARISH (short <= long)";
	const rsiCondition =
		indicators.rsi > thresholds.rsiOverbought
			? "OVERBOUGHT"
			: indicators.rsi < thresholds.rsiOversold
				? "OVERSOLD"
				: "NEUTRAL";
	const balances = Object.entries(portfolio.balances)
		.map(([asset, amount]) => `${asset}: ${amount}`)
		.join(", ");
	const position = portfolio.position
		? `Long ${portfolio.position.quantity} @ ${usd(portfolio.position.entryPrice)}, P&L ${(
				((snapshot.currentPrice - portfolio.position.entryPrice) /
					portfolio.position.entryPrice) *
					100
			).toFixed(2)}%`
		: "No open position";

	return `You are a crypto trading analyst specializing in support and resistance analysis.

MARKET DATA FOR ${snapshot.symbol}:
- Current Price: ${usd(snapshot.currentPrice)}
- 24h Change: ${snapshot.change24hPct.toFixed(2)}%
- 12h Range: ${range(snapshot.windows.h12)}
- 24h Range: ${range(snapshot.windows.h24)}
- 48h Range: ${range(snapshot.windows.h48)}
- SMA short: ${usd(indicators.smaShort)}, SMA long: ${usd(indicators.smaLong)}, Trend: ${trend}, Crossover: ${indicators.crossover}
- RSI: ${indicators.rsi.toFixed(2)} (${rsiCondition}; oversold < ${thresholds.rsiOversold}, overbought > ${thresholds.rsiOverbought})
- Pivot: ${usd(pivots.pp)}, S1: ${usd(pivots.s1)}, S2: ${usd(pivots.s2)}, R1: ${usd(pivots.r1)}, R2: ${usd(pivots.r2)}

ACCOUNT:
- Balances: ${balances || "none"}
- Position: ${position}

Answer in EXACTLY this format, one field per line:

RECOMMENDATION: [STRONG_BUY/BUY/HOLD/SELL/STRONG_SELL]
CONFIDENCE: [0-100]%
STOP_LOSS: $[price below strong support]
TAKE_PROFIT: $[price near or above resistance]
BUY_TARGET: $[entry near support]
SELL_TARGET: $[exit near resistance]
REASONING: [2-3 sentences]

Give dollar prices, not percentages.`;
}

function labelPattern(label: string, rest: string): RegExp {
	return new RegExp(`^[\\s*#-]*${label.replace("_", "[_ ]")}[\\s*]*:\\s*${rest}`, "im");
}

function fieldValue(text: string, label: string): string | undefined {
	const value = labelPattern(label, "(.*)$").exec(text)?.[1]?.trim();
	return value ? value : undefined;
}

// The last field may run over several lines; they are joined into one.
function trailingFieldValue(text: string, label: string): string | undefined {
	const value = labelPattern(label, "([\\s\\S]*)")
		.exec(text)?.[1]
		?.split(/\s*\n\s*/)
		.filter(Boolean)
		.join(" ")
		.trim();
	return value ? value : undefined;
}

function parseNumber(value: string | undefined): number | undefined {
	const match = value?.replace(/,/g, "").match(/-?\d+(?:\.\d+)?/);
	if (!match) return undefined;
	const parsed = Number(match[0]);
	return Number.isFinite(parsed) ? parsed : undefined;
}

function parseAction(value: string | undefined): AdvisorAction | undefined {
	const match = value
		?.toUpperCase()
		.match(/\b(STRONG[_ ]BUY|STRONG[_ ]SELL|BUY|SELL|HOLD)\b/);
	if (!match) return undefined;
	const normalized = match[1].replace(" ", "_");
	switch (normalized) {
		case "STRONG_BUY":
		case "BUY":
		case "HOLD":
		case "SELL":
		case "STRONG_SELL":
			return normalized;
		default:
			return undefined;
	}
}

/** Reads whatever labelled fields the model produced; invalid ones are left out. */
export function parseAdvisorResponse(text: string): ParsedAdvice {
	const advice: ParsedAdvice = {};

	const action = parseAction(fieldValue(text, "RECOMMENDATION"));
	if (action) advice.action = action;

	const confidence = parseNumber(fieldValue(text, "CONFIDENCE"));
	if (confidence !== undefined) advice.confidence = clamp(confidence, 0, 100);

	for (const [key, label] of PRICE_FIELDS) {
		const price = parseNumber(fieldValue(text, label));
		if (price !== undefined && price > 0) {
			advice[key] = price;
		}
	}

	const reasoning = trailingFieldValue(text, "REASONING");
	if (reasoning) advice.reasoning = reasoning;

	return advice;
}

/**
 * Asks the LLM for a recommendation and substitutes the pivot/indicator
 * fallback whenever the model is disabled, slow, unreachable or unreadable.
 * Never rejects.
 */
export class AdvisorBridge {
	constructor(
		private readonly backend: LlmBackend | null,
		private readonly options: AdvisorOptions,
		private readonly now: () => number = Date.now,
	) {}

	get usesBackend(): boolean {
		return this.options.enabled && this.backend !== null;
	}

	async checkBackend(): Promise<boolean> {
		if (!this.backend || !this.options.enabled) return false;
		try {
			return await this.backend.healthCheck();
		} catch (err) {
			logger.warn({ err }, "Advisor health check failed");
			return false;
		}
	}

	async getRecommendation(
		snapshot: MarketSnapshot,
		indicators: IndicatorSet,
		pivots: PivotLevels,
		portfolio: PortfolioState,
		backendHealthy?: boolean,
	): Promise<AdvisorRecommendation> {
		const fallback = (reason: AdvisorFailure) =>
			fallbackRecommendation(indicators, pivots, this.options, reason, this.now());

		const attempt = await this.attempt(
			buildPrompt(snapshot, indicators, pivots, portfolio, this.options),
			backendHealthy,
		);
		if (!attempt.ok) {
			const level = attempt.reason === "DISABLED" ? "debug" : "warn";
			logger[level](
				{ reason: attempt.reason, error: attempt.error ? String(attempt.error) : undefined },
				"Advisor unavailable; using fallback targets",
			);
			return fallback(attempt.reason);
		}

		const advice = parseAdvisorResponse(attempt.text);
		if (!Object.keys(advice).length) {
			logger.warn(
				{ preview: attempt.text.slice(0, 200) },
				"Advisor response had no recognised fields; using fallback targets",
			);
			return fallback("UNPARSABLE");
		}

		const base = fallback("UNPARSABLE");
		const merged: AdvisorRecommendation = {
			action: advice.action ?? base.action,
			confidence: advice.confidence ?? base.confidence,
			stopLoss: advice.stopLoss ?? base.stopLoss,
			takeProfit: advice.takeProfit ?? base.takeProfit,
			buyTarget: advice.buyTarget ?? base.buyTarget,
			sellTarget: advice.sellTarget ?? base.sellTarget,
			reasoning: advice.reasoning ?? "AI analysis completed",
			source: "AI",
			createdAt: base.createdAt,
		};

		if (merged.stopLoss >= merged.takeProfit) {
			logger.warn(
				{ stopLoss: merged.stopLoss, takeProfit: merged.takeProfit },
				"Advisor exit levels are inverted; using pivot levels",
			);
			merged.stopLoss = base.stopLoss;
			merged.takeProfit = base.takeProfit;
		}

		logger.info(
			{ action: merged.action, confidence: merged.confidence },
			"Advisor recommendation received",
		);
		return merged;
	}

	private async attempt(
		prompt: string,
		backendHealthy: boolean | undefined,
	): Promise<AdvisorAttempt> {
		if (!this.backend || !this.options.enabled) {
			return { ok: false, reason: "DISABLED" };
		}
		if (backendHealthy === false) {
			return { ok: false, reason: "UNREACHABLE" };
		}

		const controller = new AbortController();
		try {
			const text = await firstValueFrom(
				from(this.backend.generate(prompt, this.options.model, controller.signal)).pipe(
					timeout({ first: this.options.timeoutMs }),
				),
			);
			return { ok: true, text };
		} catch (err) {
			return {
				ok: false,
				reason: err instanceof TimeoutError ? "TIMEOUT" : "UNREACHABLE",
				error: err,
			};
		} finally {
			controller.abort();
		}
	}
}
