import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";

import { PortfolioLedger } from "./portfolioLedger";
import { type ReportInput, renderReport, writeReport } from "./reportWriter";

function reportInput(): ReportInput {
	const ledger = new PortfolioLedger({
		symbol: "ETHUSDT",
		baseAsset: "ETH",
		quoteAsset: "USDT",
		reconcileTolerance: 1e-8,
	});
	ledger.initialize({ USDT: 500 });
	ledger.applyFill(
		{ side: "BUY", symbol: "ETHUSDT", quantity: 2, type: "MARKET" },
		100,
		2,
		0,
		{ stopLoss: 90, takeProfit: 130 },
	);

	return {
		mode: "live",
		price: 110,
		portfolio: ledger.snapshot(110),
		indicators: { smaShort: 105, smaLong: 102.5, rsi: 61.234, crossover: "UP" },
		recommendation: {
			action: "HOLD",
			confidence: 50,
			stopLoss: 80,
			takeProfit: 120,
			buyTarget: 90,
			sellTarget: 110,
			reasoning: "Mixed signals",
			source: "Fallback",
			fallbackReason: "TIMEOUT",
			createdAt: 0,
		},
		pivots: { pp: 100, r1: 110, r2: 120, s1: 90, s2: 80 },
		limiter: {
			date: "2024-03-01",
			tradesExecuted: 2,
			tradesRemaining: 0,
			maxTradesPerDay: 2,
			canTrade: false,
			dailyPnL: -3.5,
			nextResetAt: "2024-03-02T00:00:00.000Z",
		},
		activity: {
			lastEvent: "SELL TARGET HIT at 110.00",
			alerts: ["SELL TARGET HIT at 110.00", "BUY TARGET HIT at 90.00"],
		},
		updatedAt: new Date("2024-03-01T12:30:00.000Z"),
	};
}

describe("renderReport", () => {
	it("renders market, advisor, position and limit sections", () => {
		const lines = renderReport(reportInput()).split("\n");

		expect(lines[0]).toBe("ETHUSDT LIVE TRADING");
		expect(lines[1]).toBe("Updated: 2024-03-01T12:30:00.000Z");
		expect(lines).toContain("SMA short/long: 105.00 / 102.50 (crossover UP)");
		expect(lines).toContain("RSI: 61.23");
		expect(lines).toContain("Action: HOLD (50% confidence, Fallback (TIMEOUT))");
		expect(lines).toContain("LONG 2 @ 100.00 (SL 90.00, TP 130.00)");
		expect(lines).toContain("Unrealized P&L: 20.00 (10.00%)");
		expect(lines).toContain("Balances: USDT: 300, ETH: 2");
		expect(lines).toContain("Total value: 520.00");
		expect(lines).toContain("Win rate: 0.0%");
		expect(lines).toContain("Trades today (2024-03-01): 2/2");
		expect(lines).toContain("Daily P&L: -3.50");
		expect(lines).toContain("Trading paused");
	});

	it("lists recent alerts after the last event", () => {
		const lines = renderReport(reportInput()).split("\n");
		const start = lines.indexOf("Last event: SELL TARGET HIT at 110.00");

		expect(lines[start - 2]).toBe("ACTIVITY");
		expect(lines.slice(start + 1, start + 3)).toEqual([
			"- SELL TARGET HIT at 110.00",
			"- BUY TARGET HIT at 90.00",
		]);

		const quiet = renderReport({
			...reportInput(),
			activity: { lastEvent: "Trader started", alerts: [] },
		});
		expect(quiet.endsWith("Last event: Trader started\nNo recent alerts\n")).toBe(true);
	});
});

describe("writeReport", () => {
	it("replaces the report without leaving a temp file", async () => {
		const dir = await fs.mkdtemp(path.join(os.tmpdir(), "report-"));
		const filePath = path.join(dir, "status.txt");
		try {
			await fs.writeFile(filePath, "old report");
			await writeReport(filePath, reportInput());

			expect(await fs.readFile(filePath, "utf8")).toBe(renderReport(reportInput()));
			expect(await fs.readdir(dir)).toEqual(["status.txt"]);
		} finally {
			await fs.rm(dir, { recursive: true, force: true });
		}
	});
});
