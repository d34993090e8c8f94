import path from "node:path";
import dotenv from "dotenv";

dotenv.config();

export type TradingMode = "live" | "paper";

const mode: TradingMode =
	(process.env.TRADING_MODE || "paper").toLowerCase() === "live"
		? "live"
		: "paper";
const useTestnet =
	(process.env.BINANCE_USE_TESTNET || "true").toLowerCase() === "true";
const spotUrl =
	process.env.BINANCE_SPOT_URL ||
	(useTestnet ? "https://testnet.binance.vision" : "https://api.binance.com");

export const config = {
	mode,
	binance: {
		apiKey: process.env.BINANCE_API_KEY || "",
		apiSecret: process.env.BINANCE_API_SECRET || "",
		baseUrl: spotUrl,
	},
	telegram: {
		botToken: process.env.TELEGRAM_BOT_TOKEN || "",
		chatId: process.env.TELEGRAM_CHAT_ID || "",
	},
	advisor: {
		enabled: (process.env.OLLAMA_ENABLED || "true").toLowerCase() === "true",
		baseUrl: process.env.OLLAMA_URL || "http://localhost:11434",
		model: process.env.OLLAMA_MODEL || "mistral",
		timeoutMs: Number(process.env.ADVISOR_TIMEOUT_SEC || "60") * 1000,
		refreshSec: Number(process.env.ADVISOR_REFRESH_SEC || "300"),
		fallbackConfidence: 50,
	},
	strategy: {
		symbol: process.env.SYMBOL || "BTCUSDT",
		baseAsset: process.env.BASE_ASSET || "BTC",
		quoteAsset: process.env.QUOTE_ASSET || "USDT",
		positionFraction: Number(process.env.POSITION_FRACTION || "0.1"),
		maxTradesPerDay: Number(process.env.MAX_TRADES_PER_DAY || "2"),
		smaShortPeriod: 10,
		smaLongPeriod: 20,
		rsiPeriod: 14,
		rsiOversold: 30,
		rsiOverbought: 70,
		reconcileTolerance: Number(
			process.env.RECONCILE_TOLERANCE || "0.00000001",
		),
	},
	paper: {
		initialQuote: Number(process.env.PAPER_INITIAL_QUOTE || "10000"),
	},
	scheduling: {
		cycleCron: process.env.CYCLE_CRON || "*/30 * * * * *", // every 30s
		cycleDeadlineMs: Number(process.env.CYCLE_DEADLINE_SEC || "120") * 1000,
		timezone: "UTC",
	},
	paths: {
		tradeLimiter: path.join(process.cwd(), "data/trade-state.json"),
		tradeLog: path.join(process.cwd(), "data/trades.log"),
		report: path.join(process.cwd(), "data/portfolio-status.txt"),
	},
};
