import type {
	Bar,
	IndicatorBar,
	IndicatorSnapshot,
	TradeParams,
} from "../types";

export const HOUR = 3_600_000;

export function flatBars(count: number, price = 100): Bar[] {
	return Array.from({ length: count }, (_, i) => ({
		timestamp: i * HOUR,
		open: price,
		high: price,
		low: price,
		close: price,
		volume: 10,
	}));
}

export const BULLISH_INDICATORS: IndicatorSnapshot = {
	emaFast: 104,
	emaMedium: 102,
	emaSlow: 100,
	rsi: 45,
	macdHistogram: 0.2,
	stochK: 25,
	stochD: 20,
	bandPosition: 0.25,
	atr: 2,
	adx: 32,
	volumeRatio: 1.5,
};

export const BEARISH_INDICATORS: IndicatorSnapshot = {
	emaFast: 96,
	emaMedium: 98,
	emaSlow: 100,
	rsi: 55,
	macdHistogram: -0.2,
	stochK: 75,
	stochD: 80,
	bandPosition: 0.75,
	atr: 2,
	adx: 32,
	volumeRatio: 1.5,
};

export function indicatorBar(
	timestamp: number,
	prices: Pick<Bar, "open" | "high" | "low" | "close">,
	indicators: IndicatorSnapshot,
): IndicatorBar {
	return { timestamp, volume: 10, ...prices, indicators };
}

/** Three bars whose last one scores a LONG entry at close 105 (low 103, ATR 2, ADX 32). */
export function bullishWindow(start = 0): IndicatorBar[] {
	const prices = { open: 104, high: 106, low: 103, close: 105 };
	return [
		indicatorBar(start, prices, {
			...BULLISH_INDICATORS,
			rsi: 40,
			macdHistogram: -0.2,
			stochK: 15,
			stochD: 18,
			bandPosition: 0.15,
		}),
		indicatorBar(start + HOUR, prices, {
			...BULLISH_INDICATORS,
			rsi: 42,
			macdHistogram: -0.1,
			stochK: 18,
			stochD: 20,
			bandPosition: 0.2,
		}),
		indicatorBar(start + 2 * HOUR, prices, BULLISH_INDICATORS),
	];
}

/** Mirror of `bullishWindow`: the last bar scores a SHORT entry at close 95. */
export function bearishWindow(start = 0): IndicatorBar[] {
	const prices = { open: 96, high: 97, low: 94, close: 95 };
	return [
		indicatorBar(start, prices, {
			...BEARISH_INDICATORS,
			rsi: 60,
			macdHistogram: 0.2,
			stochK: 85,
			stochD: 82,
			bandPosition: 0.85,
		}),
		indicatorBar(start + HOUR, prices, {
			...BEARISH_INDICATORS,
			rsi: 58,
			macdHistogram: 0.1,
			stochK: 82,
			stochD: 80,
			bandPosition: 0.8,
		}),
		indicatorBar(start + 2 * HOUR, prices, BEARISH_INDICATORS),
	];
}

export function tradeParams(overrides: Partial<TradeParams> = {}): TradeParams {
	return {
		symbol: "EURUSD",
		direction: "LONG",
		entryPrice: 1.1,
		entryBand: { min: 1.09967, max: 1.10033 },
		stopLoss: 1.095,
		takeProfit: 1.1125,
		stopDistance: 0.005,
		stopMultiplier: 2,
		positionSize: 0.1,
		riskAmount: 50,
		rewardEstimate: 125,
		indicators: { ...BULLISH_INDICATORS },
		...overrides,
	};
}
