import type { StrategyProfile } from "../config/profiles";
import { getSymbolRiskProfile } from "../config/symbols";
import { computeIndicators } from "../services/indicatorService";
import {
	advanceTrade,
	createOpenTrade,
	type LifecycleRules,
} from "../strategy/lifecycle";
import { evaluate } from "../strategy/signalScorer";
import { DegenerateStopError, deriveTradeParams } from "../strategy/tradeParams";
import {
	type Bar,
	type ClosedTrade,
	type IndicatorBar,
	isOpenTrade,
	type OpenTrade,
} from "../types";

export type BacktestConfig = {
	symbol: string;
	profile: StrategyProfile;
	lifecycle: LifecycleRules;
	riskPerTrade: number;
	initialCapital: number;
	/** Bars skipped before the first evaluation. */
	warmupBars: number;
};

export type SideBreakdown = {
	trades: number;
	wins: number;
};

export type BacktestReport = {
	symbol: string;
	bars: number;
	trades: number;
	wins: number;
	losses: number;
	breakevens: number;
	/** Percentage of trades that won. */
	winRate: number;
	grossProfit: number;
	/** Sum of losing P/L as a positive number. */
	grossLoss: number;
	netPnl: number;
	finalBalance: number;
	/** Infinity when there were gains and no losses; 0 with neither. */
	profitFactor: number;
	maxDrawdownPct: number;
	averageHoldingBars: number;
	long: SideBreakdown;
	short: SideBreakdown;
	/** Trade still open when the data ran out, if any. Not counted above. */
	openAtEnd: OpenTrade | null;
	closedTrades: ClosedTrade[];
};

export function profitFactor(grossProfit: number, grossLoss: number): number {
	if (grossLoss > 0) return grossProfit / grossLoss;
	return grossProfit > 0 ? Number.POSITIVE_INFINITY : 0;
}

function breakdown(trades: ClosedTrade[]): SideBreakdown {
	return {
		trades: trades.length,
		wins: trades.filter((t) => t.state === "CLOSED_WIN").length,
	};
}

function summarize(
	config: BacktestConfig,
	bars: number,
	closedTrades: ClosedTrade[],
	holdingBars: number[],
	maxDrawdownPct: number,
	openAtEnd: OpenTrade | null,
): BacktestReport {
	const wins = closedTrades.filter((t) => t.state === "CLOSED_WIN").length;
	const losses = closedTrades.filter((t) => t.state === "CLOSED_LOSS").length;
	const breakevens = closedTrades.length - wins - losses;
	const grossProfit = closedTrades
		.filter((t) => t.pnl > 0)
		.reduce((sum, t) => sum + t.pnl, 0);
	const grossLoss = -closedTrades
		.filter((t) => t.pnl < 0)
		.reduce((sum, t) => sum + t.pnl, 0);
	const netPnl = grossProfit - grossLoss;

	return {
		symbol: config.symbol,
		bars,
		trades: closedTrades.length,
		wins,
		losses,
		breakevens,
		winRate: closedTrades.length > 0 ? (wins / closedTrades.length) * 100 : 0,
		grossProfit,
		grossLoss,
		netPnl,
		finalBalance: config.initialCapital + netPnl,
		profitFactor: profitFactor(grossProfit, grossLoss),
		maxDrawdownPct,
		averageHoldingBars:
			holdingBars.length > 0
				? holdingBars.reduce((sum, n) => sum + n, 0) / holdingBars.length
				: 0,
		long: breakdown(closedTrades.filter((t) => t.direction === "LONG")),
		short: breakdown(closedTrades.filter((t) => t.direction === "SHORT")),
		openAtEnd,
		closedTrades,
	};
}

/**
 * Replays precomputed indicator bars one at a time with a single position
 * slot. Entries fill at the signal bar's close and are first managed on the
 * next bar, through the same transition function the live manager uses.
 */
export function simulate(
	indicatorBars: IndicatorBar[],
	config: BacktestConfig,
): BacktestReport {
	const symbolProfile = getSymbolRiskProfile(config.symbol, config.riskPerTrade);
	const closedTrades: ClosedTrade[] = [];
	const holdingBars: number[] = [];

	let open: OpenTrade | null = null;
	let entryIndex = 0;
	let balance = config.initialCapital;
	let peak = balance;
	let maxDrawdownPct = 0;

	const start = Math.max(config.warmupBars, 2);
	for (let i = start; i < indicatorBars.length; i++) {
		const bar = indicatorBars[i];

		if (open) {
			const step = advanceTrade(open, bar, config.lifecycle);
			if (isOpenTrade(step.trade)) {
				open = step.trade;
			} else {
				closedTrades.push(step.trade);
				holdingBars.push(i - entryIndex);
				balance += step.trade.pnl;
				peak = Math.max(peak, balance);
				if (peak > 0) {
					maxDrawdownPct = Math.max(maxDrawdownPct, ((peak - balance) / peak) * 100);
				}
				open = null;
			}
		}

		// a slot freed on this bar can be refilled by this bar's signal
		if (open) continue;

		const signal = evaluate(indicatorBars.slice(i - 2, i + 1), config.profile.scorer);
		if (!signal.direction) continue;

		try {
			const params = deriveTradeParams(
				signal.direction,
				bar,
				symbolProfile,
				config.profile.trade,
			);
			open = createOpenTrade(
				{
					symbol: config.symbol,
					direction: signal.direction,
					entryPrice: params.entryPrice,
					stopLoss: params.stopLoss,
					takeProfit: params.takeProfit,
					positionSize: params.positionSize,
					riskAmount: params.riskAmount,
					openedAt: bar.timestamp,
				},
				config.lifecycle,
			);
			entryIndex = i;
		} catch (err) {
			if (!(err instanceof DegenerateStopError)) throw err;
		}
	}

	return summarize(
		config,
		indicatorBars.length,
		closedTrades,
		holdingBars,
		maxDrawdownPct,
		open,
	);
}

export function runBacktest(bars: Bar[], config: BacktestConfig): BacktestReport {
	return simulate(computeIndicators(bars) ?? [], config);
}
