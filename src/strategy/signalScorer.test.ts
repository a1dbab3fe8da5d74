import { describe, expect, it } from "vitest";
import {
	BULLISH_INDICATORS,
	bearishWindow,
	bullishWindow,
	HOUR,
	indicatorBar,
} from "../__fixtures__/bars";
import { type ScorerProfile, STRATEGY_PROFILES } from "../config/profiles";
import type { IndicatorBar } from "../types";
import { evaluate } from "./signalScorer";

const profile: ScorerProfile = STRATEGY_PROFILES.optimized.scorer;

function withLast(
	window: IndicatorBar[],
	patch: Partial<IndicatorBar["indicators"]>,
	prices: Partial<Pick<IndicatorBar, "open" | "close">> = {},
): IndicatorBar[] {
	const last = window[window.length - 1];
	return [
		...window.slice(0, -1),
		{ ...last, ...prices, indicators: { ...last.indicators, ...patch } },
	];
}

describe("evaluate", () => {
	it("scores a LONG when every check agrees", () => {
		const signal = evaluate(bullishWindow(), profile);

		expect(signal.direction).toBe("LONG");
		expect(signal.buyScore).toBe(8.5);
		expect(signal.sellScore).toBe(0);
		expect(signal.skipped).toBeUndefined();
		expect(signal.reasons.map((r) => r.check)).toEqual([
			"trend_alignment",
			"oscillator_recovery",
			"momentum_aligned",
			"momentum_cross",
			"stochastic_extreme_cross",
			"band_bounce",
			"trend_strength",
			"volume_confirmation",
		]);
	});

	it("scores the mirrored SHORT", () => {
		const signal = evaluate(bearishWindow(), profile);

		expect(signal.direction).toBe("SHORT");
		expect(signal.sellScore).toBe(8.5);
		expect(signal.buyScore).toBe(0);
		expect(signal.reasons.every((r) => r.direction === "SHORT")).toBe(true);
		expect(signal.reasons.map((r) => r.check)).toEqual([
			"trend_alignment",
			"oscillator_recovery",
			"momentum_aligned",
			"momentum_cross",
			"stochastic_extreme_cross",
			"band_bounce",
			"trend_strength",
			"volume_confirmation",
		]);
	});

	it("abstains with fewer than three bars", () => {
		const signal = evaluate(bullishWindow().slice(1), profile);
		expect(signal).toEqual({
			direction: null,
			buyScore: 0,
			sellScore: 0,
			reasons: [],
			skipped: "insufficient_history",
		});
	});

	it("abstains when a prior bar is still warming up", () => {
		const window = bullishWindow();
		window[0] = {
			...window[0],
			indicators: { ...window[0].indicators, emaSlow: undefined },
		};
		expect(evaluate(window, profile).skipped).toBe("indicators_unavailable");
	});

	it("treats a missing volume ratio as no volume vote", () => {
		const signal = evaluate(withLast(bullishWindow(), { volumeRatio: undefined }), profile);
		expect(signal.direction).toBe("LONG");
		expect(signal.buyScore).toBe(8);
	});

	it("never signals while trend strength stays under the floor", () => {
		const bars = Array.from({ length: 10 }, (_, i) =>
			indicatorBar(
				i * HOUR,
				{ open: 104, high: 106, low: 103, close: 105 },
				{ ...BULLISH_INDICATORS, adx: 15, rsi: 40 + i },
			),
		);

		for (let end = 3; end <= bars.length; end++) {
			const signal = evaluate(bars.slice(end - 3, end), profile);
			expect(signal.direction).toBeNull();
			expect(signal.skipped).toBe("ranging_market");
		}
	});

	it("rejects oscillator extremes outright", () => {
		const signal = evaluate(withLast(bullishWindow(), { rsi: 15 }), profile);
		expect(signal.skipped).toBe("oscillator_extreme");
		expect(signal.reasons).toEqual([]);
	});

	it("rejects price stretched too far from the medium average", () => {
		const signal = evaluate(withLast(bullishWindow(), {}, { close: 110 }), profile);
		expect(signal.skipped).toBe("over_extended");
	});

	it("holds back a LONG when the oscillator is overbought", () => {
		const signal = evaluate(withLast(bullishWindow(), { rsi: 72 }), profile);
		expect(signal.buyScore).toBe(7);
		expect(signal.direction).toBeNull();
		expect(signal.skipped).toBeUndefined();
	});

	it("needs the minimum score", () => {
		const quiet: ScorerProfile = {
			...profile,
			checks: {
				oscillator: false,
				momentum: false,
				stochastic: false,
				bands: false,
				volume: false,
			},
		};
		const signal = evaluate(bullishWindow(), quiet);
		expect(signal.buyScore).toBe(2.5);
		expect(signal.direction).toBeNull();
	});

	it("blocks entries against the major trend when the trend filter is on", () => {
		const filtered: ScorerProfile = { ...profile, trendFilter: true };
		// short-side checks fire while the medium average sits above the slow one
		const window = bearishWindow().map((bar) => ({
			...bar,
			indicators: { ...bar.indicators, emaSlow: 97 },
		}));

		expect(evaluate(window, profile).direction).toBe("SHORT");
		expect(evaluate(window, filtered).direction).toBeNull();
	});
});
