import { PersistenceError } from "../errors";
import type { DailyTradeState, TradeSide } from "../types";
import { logger } from "../utils/logger";
import { readJson, writeJson } from "../utils/storage";

export type TradeLimiterOptions = {
	filePath: string;
	maxTradesPerDay: number;
};

export type TradeLimiterStatus = {
	date: string;
	tradesExecuted: number;
	tradesRemaining: number;
	maxTradesPerDay: number;
	canTrade: boolean;
	dailyPnL: number;
	nextResetAt: string;
};

// dailyPnL arrived after the first state files were written
export type StoredTradeState = Omit<DailyTradeState, "dailyPnL"> & { dailyPnL?: number };

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function utcDate(now: Date): string {
	return now.toISOString().slice(0, 10);
}

function nextUtcMidnight(now: Date): Date {
	return new Date(
		Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() + 1),
	);
}

function freshState(day: string): DailyTradeState {
	return { utcDate: day, count: 0, lastResetDate: day, dailyPnL: 0 };
}

export function isDailyTradeState(value: unknown): value is StoredTradeState {
	if (!value || typeof value !== "object") return false;
	if (!("utcDate" in value && "count" in value && "lastResetDate" in value)) {
		return false;
	}
	return (
		typeof value.utcDate === "string" &&
		DATE_PATTERN.test(value.utcDate) &&
		typeof value.lastResetDate === "string" &&
		DATE_PATTERN.test(value.lastResetDate) &&
		typeof value.count === "number" &&
		Number.isInteger(value.count) &&
		value.count >= 0 &&
		(!("dailyPnL" in value) ||
			(typeof value.dailyPnL === "number" && Number.isFinite(value.dailyPnL)))
	);
}

/**
 * Sole owner of the per-UTC-day trade counter. Every mutation is written to
 * disk (temp file + rename) before the method resolves. After a failed write
 * the limiter refuses trades until a later write succeeds.
 */
export class TradeLimiter {
	private state: DailyTradeState;
	private unpersisted = false;

	constructor(
		private readonly options: TradeLimiterOptions,
		now: Date = new Date(),
	) {
		if (!Number.isInteger(options.maxTradesPerDay) || options.maxTradesPerDay < 1) {
			throw new RangeError(
				`maxTradesPerDay must be a positive integer, got ${options.maxTradesPerDay}`,
			);
		}
		this.state = freshState(utcDate(now));
	}

	get maxTradesPerDay(): number {
		return this.options.maxTradesPerDay;
	}

	get current(): DailyTradeState {
		return { ...this.state };
	}

	async load(now: Date = new Date()): Promise<DailyTradeState> {
		let stored: StoredTradeState | null = null;
		try {
			stored = await readJson<StoredTradeState | null>(
				this.options.filePath,
				(value): value is StoredTradeState | null => isDailyTradeState(value),
				null,
			);
		} catch (err) {
			logger.warn(
				{ err, filePath: this.options.filePath },
				"Unreadable trade limiter state; starting a fresh day",
			);
		}

		if (stored) {
			this.state = {
				utcDate: stored.utcDate,
				lastResetDate: stored.lastResetDate,
				count: Math.min(stored.count, this.options.maxTradesPerDay),
				dailyPnL: stored.dailyPnL ?? 0,
			};
			logger.info(
				{ day: this.state.utcDate, count: this.state.count },
				"Loaded trade limiter state",
			);
		} else {
			this.state = freshState(utcDate(now));
			try {
				await this.persist();
			} catch (err) {
				logger.error({ err }, "Failed to write initial trade limiter state");
			}
		}

		try {
			await this.resetIfNewDay(now);
		} catch (err) {
			logger.error({ err }, "Failed to persist trade limiter rollover");
		}
		return this.current;
	}

	/**
	 * Resets the counter when the UTC date has moved past the last reset.
	 * A clock running backwards never resets.
	 */
	async resetIfNewDay(now: Date = new Date()): Promise<boolean> {
		if (!this.rollover(now)) return false;
		await this.persist();
		return true;
	}

	async canTrade(now: Date = new Date()): Promise<boolean> {
		try {
			await this.resetIfNewDay(now);
			if (this.unpersisted) {
				await this.persist();
			}
		} catch (err) {
			if (err instanceof PersistenceError) {
				logger.error({ err }, "Trade limiter state not persisted; refusing trades");
				return false;
			}
			throw err;
		}
		return this.state.count < this.options.maxTradesPerDay;
	}

	async recordTrade(side: TradeSide, now: Date = new Date()): Promise<DailyTradeState> {
		this.rollover(now);
		if (this.state.count >= this.options.maxTradesPerDay) {
			throw new Error(
				`Daily trade cap of ${this.options.maxTradesPerDay} already reached for ${this.state.utcDate}`,
			);
		}

		this.state = { ...this.state, count: this.state.count + 1 };
		await this.persist();
		logger.info(
			{
				side,
				day: this.state.utcDate,
				count: this.state.count,
				max: this.options.maxTradesPerDay,
			},
			"Recorded trade against daily limit",
		);
		return this.current;
	}

	async addRealizedPnL(pnl: number, now: Date = new Date()): Promise<DailyTradeState> {
		if (!Number.isFinite(pnl)) {
			throw new RangeError(`Realized P&L must be finite, got ${pnl}`);
		}
		this.rollover(now);
		this.state = { ...this.state, dailyPnL: this.state.dailyPnL + pnl };
		await this.persist();
		logger.info(
			{ pnl, day: this.state.utcDate, dailyPnL: this.state.dailyPnL },
			"Recorded realized P&L for the day",
		);
		return this.current;
	}

	// Rewrites the current state; fails when the state file cannot be written.
	async checkpoint(): Promise<void> {
		await this.persist();
	}

	status(now: Date = new Date()): TradeLimiterStatus {
		const today = utcDate(now);
		const rolled = today > this.state.lastResetDate;
		const executed = rolled ? 0 : this.state.count;
		const remaining = Math.max(0, this.options.maxTradesPerDay - executed);
		return {
			date: rolled ? today : this.state.utcDate,
			tradesExecuted: executed,
			tradesRemaining: remaining,
			maxTradesPerDay: this.options.maxTradesPerDay,
			canTrade: remaining > 0 && !this.unpersisted,
			dailyPnL: rolled ? 0 : this.state.dailyPnL,
			nextResetAt: nextUtcMidnight(now).toISOString(),
		};
	}

	private rollover(now: Date): boolean {
		const today = utcDate(now);
		if (today <= this.state.lastResetDate) return false;

		logger.info(
			{ previousDay: this.state.utcDate, day: today },
			"Reset daily trade limiter",
		);
		this.state = freshState(today);
		return true;
	}

	private async persist(): Promise<void> {
		try {
			await writeJson(this.options.filePath, this.state);
			this.unpersisted = false;
		} catch (err) {
			this.unpersisted = true;
			throw new PersistenceError(this.options.filePath, err);
		}
	}
}
