export type Candle = {
	openTime: number;
	closeTime: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
};

export type CandleWindows = {
	h12: Candle[];
	h24: Candle[];
	h48: Candle[];
};

export type MarketSnapshot = {
	symbol: string;
	windows: CandleWindows;
	currentPrice: number;
	change24hPct: number;
	takenAt: number;
};

export type PivotLevels = {
	pp: number;
	r1: number;
	r2: number;
	s1: number;
	s2: number;
};

export type SmaCrossover = "UP" | "DOWN" | "NONE";

export type IndicatorSet = {
	smaShort: number;
	smaLong: number;
	rsi: number;
	crossover: SmaCrossover;
};

export type IndicatorSettings = {
	smaShortPeriod: number;
	smaLongPeriod: number;
	rsiPeriod: number;
};

export type AdvisorAction = "STRONG_BUY" | "BUY" | "HOLD" | "SELL" | "STRONG_SELL";

export type AdvisorSource = "AI" | "Fallback";

export type AdvisorFailure = "DISABLED" | "TIMEOUT" | "UNREACHABLE" | "UNPARSABLE";

export type AdvisorRecommendation = {
	action: AdvisorAction;
	confidence: number;
	stopLoss: number;
	takeProfit: number;
	buyTarget: number;
	sellTarget: number;
	reasoning: string;
	source: AdvisorSource;
	fallbackReason?: AdvisorFailure;
	createdAt: number;
};

export type DailyTradeState = {
	utcDate: string;
	count: number;
	lastResetDate: string;
	dailyPnL: number;
};

export type TradeSide = "BUY" | "SELL";

export type PositionSide = "LONG";

export type Position = {
	side: PositionSide;
	entryPrice: number;
	quantity: number;
	stopLoss: number;
	takeProfit: number;
	openedAt: number;
};

export type TradeRecord = {
	id: string;
	timestamp: number;
	symbol: string;
	side: TradeSide;
	price: number;
	quantity: number;
	fees: Balances;
	realizedPnL: number | null;
};

export type Balances = Record<string, number>;

export type PortfolioStats = {
	closedTrades: number;
	winningTrades: number;
	losingTrades: number;
	winRate: number;
	largestWin: number;
	largestLoss: number;
};

export type PortfolioState = {
	symbol: string;
	balances: Balances;
	position: Position | null;
	realizedPnL: number;
	unrealizedPnL: number;
	unrealizedPnLPct: number;
	totalValue: number;
	trades: TradeRecord[];
	stats: PortfolioStats;
};

export type OrderType = "MARKET";

export type Order = {
	side: TradeSide;
	symbol: string;
	quantity: number;
	type: OrderType;
};

export type Fill = {
	price: number;
	quantity: number;
	timestamp: number;
	// commission charged per asset
	fees: Balances;
};

export type RejectionReason =
	| "INSUFFICIENT_BALANCE"
	| "RATE_LIMIT"
	| "CONNECTIVITY"
	| "INVALID_ORDER";

export type OrderResult =
	| { status: "FILLED"; order: Order; fill: Fill }
	| {
			status: "REJECTED";
			order: Order;
			reason: RejectionReason;
			message: string;
	  };

export type BalanceDrift = {
	asset: string;
	ledger: number;
	exchange: number;
	difference: number;
};

export type MarketDataSource = {
	getSnapshot(symbol: string, now?: Date): Promise<MarketSnapshot>;
};

export type Exchange = {
	getBalances(): Promise<Balances>;
	submitOrder(order: Order): Promise<OrderResult>;
};

export type LlmBackend = {
	healthCheck(): Promise<boolean>;
	generate(prompt: string, model: string, signal?: AbortSignal): Promise<string>;
};
