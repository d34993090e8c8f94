import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";

import type { TradeRecord } from "../types";
import { logTrade } from "./tradeLogger";

const BUY: TradeRecord = {
	id: "trade-1",
	timestamp: 1_000,
	symbol: "BTCUSDT",
	side: "BUY",
	price: 100,
	quantity: 0.5,
	fees: {},
	realizedPnL: null,
};

describe("logTrade", () => {
	it("appends one JSON line per trade", async () => {
		const dir = await fs.mkdtemp(path.join(os.tmpdir(), "trade-log-"));
		const filePath = path.join(dir, "nested", "trades.log");
		try {
			await logTrade(BUY, filePath);
			await logTrade({ ...BUY, id: "trade-2", side: "SELL", realizedPnL: 5 }, filePath);

			const lines = (await fs.readFile(filePath, "utf8")).trimEnd().split("\n");
			expect(lines.map((line) => JSON.parse(line))).toEqual([
				BUY,
				{ ...BUY, id: "trade-2", side: "SELL", realizedPnL: 5 },
			]);
		} finally {
			await fs.rm(dir, { recursive: true, force: true });
		}
	});
});
