import cron, { type ScheduledTask } from "node-cron";
import {
	TimeoutError,
	defer,
	firstValueFrom,
	forkJoin,
	map,
	of,
	switchMap,
	timeout,
	type Observable,
} from "rxjs";
import { formatFillMessage } from "../clients/telegram";
import type { TradingMode } from "../config";
import { InsufficientDataError } from "../errors";
import { computeIndicatorSet, pivotLevelsFromCandles } from "../indicators";
import type {
	AdvisorRecommendation,
	BalanceDrift,
	Balances,
	Exchange,
	IndicatorSet,
	IndicatorSettings,
	MarketDataSource,
	MarketSnapshot,
	PivotLevels,
	TradeRecord,
} from "../types";
import { logger } from "../utils/logger";
import { ActivityFeed } from "./activityFeed";
import type { AdvisorBridge } from "./advisor";
import type { DecisionEngine, EvaluationOutcome } from "./decisionEngine";
import type { PortfolioLedger } from "./portfolioLedger";
import { writeReport } from "./reportWriter";
import type { TradeLimiter } from "./tradeLimiter";

export type CycleSettings = IndicatorSettings & {
	symbol: string;
	mode: TradingMode;
	advisorRefreshSec: number;
	cycleDeadlineMs: number;
	reportPath: string;
};

export type CycleRunnerDeps = {
	market: MarketDataSource;
	exchange: Exchange;
	advisor: AdvisorBridge;
	engine: DecisionEngine;
	ledger: PortfolioLedger;
	limiter: TradeLimiter;
	settings: CycleSettings;
	logTrade: (record: TradeRecord) => Promise<void>;
	notify: (text: string) => Promise<void>;
	now?: () => Date;
};

export type SkipReason = "BUSY" | "DEADLINE" | "INSUFFICIENT_DATA";

export type CycleResult =
	| { status: "SKIPPED"; reason: SkipReason }
	| { status: "FAILED"; error: unknown }
	| { status: "COMPLETED"; outcome: EvaluationOutcome; drifts: BalanceDrift[] };

type Gathered = {
	snapshot: MarketSnapshot;
	balances: Balances;
	indicators: IndicatorSet;
	pivots: PivotLevels;
	recommendation: AdvisorRecommendation;
};

/**
 * Runs one decision cycle at a time. Everything that talks to the outside
 * world before the decision happens under a single deadline; when it
 * expires the cycle is dropped before the engine, ledger or limiter see it.
 */
export class CycleRunner {
	private running = false;
	private cachedAdvice: AdvisorRecommendation | null = null;
	private task: ScheduledTask | null = null;
	private readonly activity = new ActivityFeed();
	private readonly now: () => Date;

	constructor(private readonly deps: CycleRunnerDeps) {
		this.now = deps.now ?? (() => new Date());
	}

	get isRunning(): boolean {
		return this.running;
	}

	start(cronExpression: string, timezone: string): void {
		if (this.task) return;
		this.task = cron.schedule(
			cronExpression,
			async () => {
				await this.runCycle();
			},
			{ timezone },
		);
		logger.info({ cronExpression, timezone }, "Cycle scheduled");
	}

	stop(): void {
		this.task?.stop();
		this.task = null;
	}

	async runCycle(): Promise<CycleResult> {
		if (this.running) {
			logger.warn("Previous cycle still running; skipping tick");
			return { status: "SKIPPED", reason: "BUSY" };
		}

		this.running = true;
		try {
			return await this.execute(this.now());
		} catch (err) {
			logger.error({ err }, "Cycle failed");
			await this.deps.notify(`Cycle failed: ${String(err)}`);
			return { status: "FAILED", error: err };
		} finally {
			this.running = false;
		}
	}

	private async execute(now: Date): Promise<CycleResult> {
		const { settings } = this.deps;

		let gathered: Gathered;
		try {
			gathered = await firstValueFrom(
				this.gather(now).pipe(timeout({ first: settings.cycleDeadlineMs })),
			);
		} catch (err) {
			if (err instanceof TimeoutError) {
				logger.warn(
					{ deadlineMs: settings.cycleDeadlineMs },
					"Cycle deadline exceeded; abandoning cycle",
				);
				return { status: "SKIPPED", reason: "DEADLINE" };
			}
			if (err instanceof InsufficientDataError) {
				logger.warn({ err: err.message }, "Not enough market data; skipping cycle");
				return { status: "SKIPPED", reason: "INSUFFICIENT_DATA" };
			}
			throw err;
		}

		const { snapshot, indicators, pivots, recommendation } = gathered;
		// fallback advice is cheap to recompute, so only model answers are kept
		if (recommendation.source === "AI") {
			this.cachedAdvice = recommendation;
		}

		logger.info(
			{
				price: snapshot.currentPrice,
				rsi: indicators.rsi,
				crossover: indicators.crossover,
				advice: recommendation.action,
				source: recommendation.source,
			},
			"Cycle data gathered",
		);
		this.activity.observePrice(
			snapshot.currentPrice,
			this.deps.ledger.openPosition,
			recommendation,
		);

		const outcome = await this.deps.engine.evaluate({
			snapshot,
			indicators,
			recommendation,
			pivots,
			now,
		});

		if (outcome.kind === "FILLED") {
			this.activity.recordFill(outcome.record);
			await this.afterFill(outcome.record, outcome.decision.reason);
		}

		const balances =
			outcome.kind === "FILLED"
				? await this.deps.exchange.getBalances()
				: gathered.balances;
		const drifts = this.deps.ledger.reconcile(balances);

		try {
			await writeReport(settings.reportPath, {
				mode: settings.mode,
				price: snapshot.currentPrice,
				portfolio: this.deps.ledger.snapshot(snapshot.currentPrice),
				indicators,
				recommendation,
				pivots,
				limiter: this.deps.limiter.status(now),
				activity: this.activity.summary(),
				updatedAt: now,
			});
		} catch (err) {
			logger.error({ err, filePath: settings.reportPath }, "Failed to write report");
		}

		return { status: "COMPLETED", outcome, drifts };
	}

	private gather(now: Date): Observable<Gathered> {
		const { market, exchange, advisor, ledger, settings } = this.deps;
		const reusable = this.reusableAdvice(now);

		return forkJoin({
			snapshot: defer(() => market.getSnapshot(settings.symbol, now)),
			balances: defer(() => exchange.getBalances()),
			healthy: reusable ? of(undefined) : defer(() => advisor.checkBackend()),
		}).pipe(
			switchMap(({ snapshot, balances, healthy }) => {
				const indicators = computeIndicatorSet(snapshot.windows.h48, settings);
				const pivots = pivotLevelsFromCandles(snapshot.windows.h24);
				const advice: Observable<AdvisorRecommendation> = reusable
					? of(reusable)
					: defer(() =>
							advisor.getRecommendation(
								snapshot,
								indicators,
								pivots,
								ledger.snapshot(snapshot.currentPrice),
								healthy,
							),
						);
				return advice.pipe(
					map((recommendation) => ({
						snapshot,
						balances,
						indicators,
						pivots,
						recommendation,
					})),
				);
			}),
		);
	}

	private reusableAdvice(now: Date): AdvisorRecommendation | null {
		const cached = this.cachedAdvice;
		if (!cached) return null;
		const ageSec = (now.getTime() - cached.createdAt) / 1000;
		return ageSec >= 0 && ageSec < this.deps.settings.advisorRefreshSec ? cached : null;
	}

	private async afterFill(record: TradeRecord, reason: string): Promise<void> {
		try {
			await this.deps.logTrade(record);
		} catch (err) {
			logger.error({ err, tradeId: record.id }, "Failed to append trade log");
		}
		await this.deps.notify(formatFillMessage(record, reason));
	}
}
