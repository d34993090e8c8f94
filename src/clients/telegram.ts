import axios from "axios";
import { config } from "../config";
import type { TradeRecord } from "../types";
import { logger } from "../utils/logger";

export function formatFillMessage(record: TradeRecord, reason: string): string {
	const lines = [
		`${record.side} ${record.symbol} (${reason})`,
		`Price: ${record.price}`,
		`Qty: ${record.quantity}`,
	];
	if (record.realizedPnL !== null) {
		lines.push(`PnL: ${record.realizedPnL.toFixed(2)}`);
	}
	return lines.join("\n");
}

/** Failures are logged, not thrown. */
export async function sendTelegramMessage(text: string): Promise<void> {
	if (!config.telegram.botToken || !config.telegram.chatId) {
		logger.debug("Telegram bot token or chat id missing, skipping notification");
		return;
	}

	const url = `https://api.telegram.org/bot${config.telegram.botToken}/sendMessage`;

	try {
		await axios.post(
			url,
			{
				chat_id: config.telegram.chatId,
				text,
			},
			{ timeout: 10_000 },
		);
	} catch (err) {
		logger.error({ err: axios.isAxiosError(err) ? err.message : err }, "Telegram notification failed");
	}
}
