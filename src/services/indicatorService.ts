import { atrSeries } from "../indicators/atr";
import { bandPositionSeries } from "../indicators/bands";
import {
	macdHistogramSeries,
	rsiSeries,
	stochasticSeries,
} from "../indicators/momentum";
import { ema } from "../indicators/movingAverage";
import { adxSeries } from "../indicators/trend";
import { volumeRatioSeries } from "../indicators/volume";
import type { Bar, IndicatorBar } from "../types";

export const INDICATOR_PERIODS = {
	emaFast: 20,
	emaMedium: 50,
	emaSlow: 200,
	rsi: 14,
	macdFast: 12,
	macdSlow: 26,
	macdSignal: 9,
	stochK: 14,
	stochSmoothing: 3,
	stochD: 3,
	bands: 20,
	bandDeviations: 2,
	atr: 14,
	adx: 14,
	volume: 20,
} as const;

function isUsableBar(bar: Bar): boolean {
	return [bar.open, bar.high, bar.low, bar.close, bar.volume].every((v) =>
		Number.isFinite(v),
	);
}

/**
 * Augments each bar with its indicator snapshot. Returns null when the input
 * cannot be evaluated at all; warm-up values are left undefined, never zero.
 */
export function computeIndicators(bars: Bar[]): IndicatorBar[] | null {
	if (bars.length === 0 || !bars.every(isUsableBar)) return null;

	const p = INDICATOR_PERIODS;
	const closes = bars.map((b) => b.close);

	const emaFast = ema(closes, p.emaFast);
	const emaMedium = ema(closes, p.emaMedium);
	const emaSlow = ema(closes, p.emaSlow);
	const rsi = rsiSeries(closes, p.rsi);
	const macdHistogram = macdHistogramSeries(
		closes,
		p.macdFast,
		p.macdSlow,
		p.macdSignal,
	);
	const stoch = stochasticSeries(bars, p.stochK, p.stochSmoothing, p.stochD);
	const bandPosition = bandPositionSeries(closes, p.bands, p.bandDeviations);
	const atr = atrSeries(bars, p.atr);
	const adx = adxSeries(bars, p.adx);
	const volumeRatio = volumeRatioSeries(bars, p.volume);

	return bars.map((bar, i) => ({
		...bar,
		indicators: {
			emaFast: emaFast[i],
			emaMedium: emaMedium[i],
			emaSlow: emaSlow[i],
			rsi: rsi[i],
			macdHistogram: macdHistogram[i],
			stochK: stoch.k[i],
			stochD: stoch.d[i],
			bandPosition: bandPosition[i],
			atr: atr[i],
			adx: adx[i],
			volumeRatio: volumeRatio[i],
		},
	}));
}
