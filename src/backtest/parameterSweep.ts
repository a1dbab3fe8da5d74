import type { StrategyProfile } from "../config/profiles";
import type { BacktestReport } from "./backtestSimulator";

export type SweepOverrides = {
	trendStrengthFloor?: number;
	oscillatorOversold?: number;
	oscillatorOverbought?: number;
	minScore?: number;
	trendFilter?: boolean;
	/** Applied to every stop tier. */
	stopMultiplier?: number;
	rewardRisk?: number;
};

export type SweepGrid = {
	[K in keyof SweepOverrides]?: Array<NonNullable<SweepOverrides[K]>>;
};

export type SweepResult = {
	overrides: SweepOverrides;
	trades: number;
	wins: number;
	winRate: number;
	netPnl: number;
	profitFactor: number;
	maxDrawdownPct: number;
};

export const DEFAULT_SWEEP_GRID: SweepGrid = {
	trendStrengthFloor: [20, 25, 30],
	oscillatorOversold: [30, 35],
	oscillatorOverbought: [65, 70],
	minScore: [4, 4.5, 5],
	trendFilter: [true, false],
	stopMultiplier: [1.5, 2.0, 2.5],
	rewardRisk: [2.0, 2.5, 3.0],
};

function expandKey<K extends keyof SweepOverrides>(
	combos: SweepOverrides[],
	key: K,
	values: Array<NonNullable<SweepOverrides[K]>> | undefined,
): SweepOverrides[] {
	if (!values || values.length === 0) return combos;
	return combos.flatMap((combo) =>
		values.map((value) => {
			const next: SweepOverrides = { ...combo };
			next[key] = value;
			return next;
		}),
	);
}

/** Cartesian product of the grid's values; an empty grid yields one empty combination. */
export function expandGrid(grid: SweepGrid): SweepOverrides[] {
	let combos: SweepOverrides[] = [{}];
	combos = expandKey(combos, "trendStrengthFloor", grid.trendStrengthFloor);
	combos = expandKey(combos, "oscillatorOversold", grid.oscillatorOversold);
	combos = expandKey(combos, "oscillatorOverbought", grid.oscillatorOverbought);
	combos = expandKey(combos, "minScore", grid.minScore);
	combos = expandKey(combos, "trendFilter", grid.trendFilter);
	combos = expandKey(combos, "stopMultiplier", grid.stopMultiplier);
	combos = expandKey(combos, "rewardRisk", grid.rewardRisk);
	return combos;
}

/**
 * Without the trend filter, entries need a wider score margin, mirroring how
 * the counter-trend profiles were tuned.
 */
export function applyOverrides(
	base: StrategyProfile,
	overrides: SweepOverrides,
): StrategyProfile {
	const scorer = { ...base.scorer };
	if (overrides.trendStrengthFloor !== undefined) {
		scorer.trendStrengthFloor = overrides.trendStrengthFloor;
	}
	if (overrides.oscillatorOversold !== undefined) {
		scorer.oscillatorOversold = overrides.oscillatorOversold;
	}
	if (overrides.oscillatorOverbought !== undefined) {
		scorer.oscillatorOverbought = overrides.oscillatorOverbought;
	}
	if (overrides.minScore !== undefined) scorer.minScore = overrides.minScore;
	if (overrides.trendFilter !== undefined) {
		scorer.trendFilter = overrides.trendFilter;
		scorer.margin = overrides.trendFilter ? 1 : 1.5;
	}

	const trade = { ...base.trade, stopTiers: { ...base.trade.stopTiers } };
	if (overrides.stopMultiplier !== undefined) {
		trade.stopTiers.strong = overrides.stopMultiplier;
		trade.stopTiers.moderate = overrides.stopMultiplier;
		trade.stopTiers.weak = overrides.stopMultiplier;
	}
	if (overrides.rewardRisk !== undefined) trade.rewardRisk = overrides.rewardRisk;

	return { scorer, trade };
}

export function toSweepResult(
	overrides: SweepOverrides,
	report: BacktestReport,
): SweepResult {
	return {
		overrides,
		trades: report.trades,
		wins: report.wins,
		winRate: report.winRate,
		netPnl: report.netPnl,
		profitFactor: report.profitFactor,
		maxDrawdownPct: report.maxDrawdownPct,
	};
}

/** Drops runs with too few trades; best profit factor, then P/L, then shallowest drawdown first. */
export function rankSweepResults(
	results: SweepResult[],
	minTrades: number,
): SweepResult[] {
	return results
		.filter((r) => r.trades >= minTrades)
		.sort((a, b) => {
			if (a.profitFactor !== b.profitFactor) {
				return a.profitFactor > b.profitFactor ? -1 : 1;
			}
			if (a.netPnl !== b.netPnl) return b.netPnl - a.netPnl;
			return a.maxDrawdownPct - b.maxDrawdownPct;
		});
}
