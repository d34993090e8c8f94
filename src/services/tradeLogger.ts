import { config } from "../config";
import type { TradeRecord } from "../types";
import { logger } from "../utils/logger";
import { appendLine } from "../utils/storage";

// One JSON object per line, in fill order.
export async function logTrade(
	record: TradeRecord,
	filePath: string = config.paths.tradeLog,
): Promise<void> {
	await appendLine(filePath, JSON.stringify(record));
	logger.info({ tradeId: record.id, side: record.side }, "Trade recorded");
}
