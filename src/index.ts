import {
	fetchFreeBalances,
	fetchKlines,
	fetchSymbolMeta,
	latestPrice,
	submitMarketOrder,
} from "./clients/binance";
import { OllamaClient } from "./clients/ollama";
import { PaperExchange } from "./clients/paperExchange";
import { sendTelegramMessage } from "./clients/telegram";
import { config } from "./config";
import { AdvisorBridge } from "./services/advisor";
import { CycleRunner } from "./services/cycleRunner";
import { DecisionEngine } from "./services/decisionEngine";
import { BinanceMarketData } from "./services/marketData";
import { BinanceSpotExchange } from "./services/orderService";
import { PortfolioLedger } from "./services/portfolioLedger";
import { TradeLimiter } from "./services/tradeLimiter";
import { logTrade } from "./services/tradeLogger";
import type { Exchange } from "./types";
import { logger } from "./utils/logger";

const { strategy } = config;

function createExchange(): Exchange {
	if (config.mode === "live") {
		if (!config.binance.apiKey || !config.binance.apiSecret) {
			throw new Error("BINANCE_API_KEY and BINANCE_API_SECRET are required in live mode");
		}
		return new BinanceSpotExchange({
			fetchSymbolMeta,
			latestPrice,
			fetchFreeBalances,
			submitMarketOrder,
		});
	}

	return new PaperExchange({
		symbol: strategy.symbol,
		baseAsset: strategy.baseAsset,
		quoteAsset: strategy.quoteAsset,
		initialBalances: { [strategy.quoteAsset]: config.paper.initialQuote },
		priceSource: latestPrice,
	});
}

async function bootstrap() {
	logger.info({ mode: config.mode, symbol: strategy.symbol }, "Starting pivot pair trader");

	const limiter = new TradeLimiter({
		filePath: config.paths.tradeLimiter,
		maxTradesPerDay: strategy.maxTradesPerDay,
	});
	await limiter.load();

	const exchange = createExchange();
	const ledger = new PortfolioLedger({
		symbol: strategy.symbol,
		baseAsset: strategy.baseAsset,
		quoteAsset: strategy.quoteAsset,
		reconcileTolerance: strategy.reconcileTolerance,
	});
	ledger.initialize(await exchange.getBalances());

	const advisor = new AdvisorBridge(
		config.advisor.enabled ? new OllamaClient(config.advisor.baseUrl) : null,
		{
			enabled: config.advisor.enabled,
			model: config.advisor.model,
			timeoutMs: config.advisor.timeoutMs,
			fallbackConfidence: config.advisor.fallbackConfidence,
			rsiOversold: strategy.rsiOversold,
			rsiOverbought: strategy.rsiOverbought,
		},
	);
	if (advisor.usesBackend && !(await advisor.checkBackend())) {
		logger.warn(
			{ baseUrl: config.advisor.baseUrl },
			"Advisor backend not reachable; fallback targets will be used until it is",
		);
	}

	const engine = new DecisionEngine(limiter, ledger, exchange, {
		symbol: strategy.symbol,
		quoteAsset: strategy.quoteAsset,
		positionFraction: strategy.positionFraction,
		rsiOversold: strategy.rsiOversold,
	});

	const runner = new CycleRunner({
		market: new BinanceMarketData({ fetchKlines, latestPrice }),
		exchange,
		advisor,
		engine,
		ledger,
		limiter,
		settings: {
			symbol: strategy.symbol,
			mode: config.mode,
			smaShortPeriod: strategy.smaShortPeriod,
			smaLongPeriod: strategy.smaLongPeriod,
			rsiPeriod: strategy.rsiPeriod,
			advisorRefreshSec: config.advisor.refreshSec,
			cycleDeadlineMs: config.scheduling.cycleDeadlineMs,
			reportPath: config.paths.report,
		},
		logTrade: (record) => logTrade(record),
		notify: sendTelegramMessage,
	});

	await sendTelegramMessage(
		`Trader started (${config.mode}) on ${strategy.symbol}, max ${strategy.maxTradesPerDay} trades/day`,
	);
	await runner.runCycle();
	runner.start(config.scheduling.cycleCron, config.scheduling.timezone);

	const shutdown = (signal: string) => {
		logger.info({ signal }, "Stopping scheduler");
		runner.stop();
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);
}

bootstrap().catch((err) => {
	logger.error({ err }, "Fatal error");
	process.exitCode = 1;
});
