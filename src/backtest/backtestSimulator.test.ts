import { describe, expect, it } from "vitest";
import {
	BULLISH_INDICATORS,
	bullishWindow,
	flatBars,
	HOUR,
	indicatorBar,
} from "../__fixtures__/bars";
import { STRATEGY_PROFILES } from "../config/profiles";
import { DEFAULT_LIFECYCLE_RULES } from "../strategy/lifecycle";
import type { IndicatorBar } from "../types";
import {
	type BacktestConfig,
	profitFactor,
	runBacktest,
	simulate,
} from "./backtestSimulator";

const config: BacktestConfig = {
	symbol: "BTCUSDT",
	profile: STRATEGY_PROFILES.optimized,
	lifecycle: DEFAULT_LIFECYCLE_RULES,
	riskPerTrade: 50,
	initialCapital: 20_000,
	warmupBars: 250,
};

// ranging bars that never score, so only the crafted entry trades
function quietBar(index: number, high: number, low: number): IndicatorBar {
	return indicatorBar(
		index * HOUR,
		{ open: (high + low) / 2, high, low, close: (high + low) / 2 },
		{ ...BULLISH_INDICATORS, adx: 10 },
	);
}

describe("runBacktest", () => {
	it("takes no trades on a flat series", () => {
		const report = runBacktest(flatBars(400), config);

		expect(report.bars).toBe(400);
		expect(report.trades).toBe(0);
		expect(report.maxDrawdownPct).toBe(0);
		expect(report.profitFactor).toBe(0);
		expect(report.finalBalance).toBe(20_000);
		expect(report.openAtEnd).toBeNull();
	});

	it("reports nothing for empty input", () => {
		const report = runBacktest([], config);
		expect(report.trades).toBe(0);
		expect(report.bars).toBe(0);
	});
});

describe("simulate", () => {
	const shortWarmup = { ...config, warmupBars: 2 };

	it("books a trailed winner that runs to target", () => {
		// entry 105, stop 103 - 2 * 2 = 99, target 105 + 2.5 * 6 = 120
		const bars = [...bullishWindow(), quietBar(3, 115, 107), quietBar(4, 121, 110)];
		const report = simulate(bars, shortWarmup);

		expect(report.trades).toBe(1);
		expect(report.wins).toBe(1);
		expect(report.long).toEqual({ trades: 1, wins: 1 });
		expect(report.short).toEqual({ trades: 0, wins: 0 });
		expect(report.grossProfit).toBe(125);
		expect(report.grossLoss).toBe(0);
		expect(report.profitFactor).toBe(Number.POSITIVE_INFINITY);
		expect(report.finalBalance).toBe(20_125);
		expect(report.maxDrawdownPct).toBe(0);
		expect(report.averageHoldingBars).toBe(2);

		const [trade] = report.closedTrades;
		expect(trade.exitReason).toBe("TAKE_PROFIT");
		expect(trade.stopMovedToBreakeven).toBe(true);
		expect(trade.currentStopLoss).toBeCloseTo(106.2, 10);
		expect(trade.positionSize).toBe(8.333);
	});

	it("measures drawdown from the balance peak", () => {
		const bars = [...bullishWindow(), quietBar(3, 106, 98)];
		const report = simulate(bars, shortWarmup);

		expect(report.losses).toBe(1);
		expect(report.netPnl).toBe(-50);
		expect(report.grossLoss).toBe(50);
		expect(report.profitFactor).toBe(0);
		expect(report.maxDrawdownPct).toBeCloseTo(0.25, 10);
		expect(report.winRate).toBe(0);
	});

	it("keeps a trade still open at the end out of the totals", () => {
		const bars = [...bullishWindow(), quietBar(3, 107, 104)];
		const report = simulate(bars, shortWarmup);

		expect(report.trades).toBe(0);
		expect(report.openAtEnd?.id).toBe("BTCUSDT_7200000");
		expect(report.openAtEnd?.lastBarAt).toBe(3 * HOUR);
	});

	it("can re-enter on the bar that closed the previous trade", () => {
		const exitAndSignal = indicatorBar(
			3 * HOUR,
			{ open: 104, high: 106, low: 98, close: 105 },
			{ ...BULLISH_INDICATORS, rsi: 47, macdHistogram: 0.3, bandPosition: 0.28 },
		);
		const bars = [...bullishWindow(), exitAndSignal];
		const report = simulate(bars, shortWarmup);

		expect(report.trades).toBe(1);
		expect(report.openAtEnd?.openedAt).toBe(3 * HOUR);
	});
});

describe("profitFactor", () => {
	it("handles the no-loss and no-trade cases", () => {
		expect(profitFactor(30, 10)).toBe(3);
		expect(profitFactor(10, 0)).toBe(Number.POSITIVE_INFINITY);
		expect(profitFactor(0, 0)).toBe(0);
	});
});
