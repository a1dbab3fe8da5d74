export type Bar = {
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
};

export type IndicatorName =
	| "emaFast"
	| "emaMedium"
	| "emaSlow"
	| "rsi"
	| "macdHistogram"
	| "stochK"
	| "stochD"
	| "bandPosition"
	| "atr"
	| "adx"
	| "volumeRatio";

export type IndicatorSnapshot = Record<IndicatorName, number | undefined>;

export type IndicatorBar = Bar & { indicators: IndicatorSnapshot };

export type Direction = "LONG" | "SHORT";

export type ScoreCheck =
	| "trend_alignment"
	| "trend_partial"
	| "oscillator_recovery"
	| "oscillator_reversal"
	| "momentum_aligned"
	| "momentum_cross"
	| "momentum_building"
	| "stochastic_extreme_cross"
	| "stochastic_cross"
	| "band_bounce"
	| "trend_strength"
	| "volume_confirmation";

export type SignalReason = {
	direction: Direction;
	check: ScoreCheck;
	weight: number;
};

export type SkipReason =
	| "insufficient_history"
	| "indicators_unavailable"
	| "ranging_market"
	| "oscillator_extreme"
	| "over_extended";

export type Signal = {
	direction: Direction | null;
	buyScore: number;
	sellScore: number;
	reasons: SignalReason[];
	skipped?: SkipReason;
};

export type TradeParams = {
	symbol: string;
	direction: Direction;
	entryPrice: number;
	entryBand: { min: number; max: number };
	stopLoss: number;
	takeProfit: number;
	stopDistance: number;
	stopMultiplier: number;
	positionSize: number;
	riskAmount: number;
	rewardEstimate: number;
	indicators: IndicatorSnapshot;
};

export type AssetClass = "forex" | "metal" | "crypto";

export type SymbolRiskProfile = {
	symbol: string;
	assetClass: AssetClass;
	contractMultiplier: number;
	minSize: number;
	sizeStep: number;
	riskAmount: number;
};

export type OpenTradeState = "OPEN_ARMED" | "OPEN_TRAILED";
export type ClosedTradeState = "CLOSED_WIN" | "CLOSED_LOSS" | "CLOSED_BREAKEVEN";
export type TradeState = OpenTradeState | ClosedTradeState;

export type ExitReason = "STOP_HIT" | "TAKE_PROFIT";

export type StopAdjustment = {
	at: number;
	oldStop: number;
	newStop: number;
	reason: string;
};

export type OpenTrade = {
	id: string;
	symbol: string;
	direction: Direction;
	state: OpenTradeState;
	entryPrice: number;
	originalStopLoss: number;
	currentStopLoss: number;
	takeProfit: number;
	positionSize: number;
	riskDistance: number;
	riskAmount: number;
	breakevenTrigger: number;
	stopMovedToBreakeven: boolean;
	stopAdjustments: StopAdjustment[];
	openedAt: number;
	lastBarAt: number;
	highestPrice: number;
	lowestPrice: number;
	orderId?: string;
};

export type ClosedTrade = Omit<OpenTrade, "state"> & {
	state: ClosedTradeState;
	exitPrice: number;
	exitReason: ExitReason;
	closedAt: number;
	pnl: number;
	pnlR: number;
};

export type Trade = OpenTrade | ClosedTrade;

export type TradeStateDocument = {
	version: 1;
	openTrades: Record<string, OpenTrade>;
	history: ClosedTrade[];
};

export type AdvisoryVerdict = {
	approved: boolean;
	reasoning: string;
};

export type OrderRequest = {
	symbol: string;
	direction: Direction;
	entry: number;
	stopLoss: number;
	takeProfit: number;
	quantity: number;
};

export type OrderResult =
	| { success: true; orderId: string }
	| { success: false; error: string };

export type SymbolMeta = {
	symbol: string;
	pair: string;
	quoteAsset: string;
	status: string;
	filters: Array<{ filterType: string; [key: string]: string | number }>;
};

export function isOpenTrade(trade: Trade): trade is OpenTrade {
	return trade.state === "OPEN_ARMED" || trade.state === "OPEN_TRAILED";
}
