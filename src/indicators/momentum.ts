import type { Bar } from "../types";
import { ema, emptySeries, type Series, sma } from "./movingAverage";

function rsiValue(avgGain: number, avgLoss: number): number {
	if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
	return 100 - 100 / (1 + avgGain / avgLoss);
}

export function rsiSeries(closes: number[], period: number): Series {
	const out = emptySeries(closes.length);
	if (closes.length <= period) return out;

	let gain = 0;
	let loss = 0;
	for (let i = 1; i <= period; i++) {
		const diff = closes[i] - closes[i - 1];
		if (diff >= 0) gain += diff;
		else loss -= diff;
	}

	let avgGain = gain / period;
	let avgLoss = loss / period;
	out[period] = rsiValue(avgGain, avgLoss);

	for (let i = period + 1; i < closes.length; i++) {
		const diff = closes[i] - closes[i - 1];
		const g = diff > 0 ? diff : 0;
		const l = diff < 0 ? -diff : 0;

		avgGain = (avgGain * (period - 1) + g) / period;
		avgLoss = (avgLoss * (period - 1) + l) / period;
		out[i] = rsiValue(avgGain, avgLoss);
	}

	return out;
}

export function macdHistogramSeries(
	closes: number[],
	fastPeriod: number,
	slowPeriod: number,
	signalPeriod: number,
): Series {
	const fast = ema(closes, fastPeriod);
	const slow = ema(closes, slowPeriod);

	const line: Series = closes.map((_, i) => {
		const f = fast[i];
		const s = slow[i];
		return f === undefined || s === undefined ? undefined : f - s;
	});
	const signal = ema(line, signalPeriod);

	return line.map((value, i) => {
		const sig = signal[i];
		return value === undefined || sig === undefined ? undefined : value - sig;
	});
}

export type StochasticSeries = { k: Series; d: Series };

/** Slow stochastic: raw %K over `kPeriod`, smoothed by `smoothing`, %D is the SMA of %K. */
export function stochasticSeries(
	bars: Bar[],
	kPeriod: number,
	smoothing: number,
	dPeriod: number,
): StochasticSeries {
	const raw = emptySeries(bars.length);

	for (let i = kPeriod - 1; i < bars.length; i++) {
		let highest = Number.NEGATIVE_INFINITY;
		let lowest = Number.POSITIVE_INFINITY;
		for (let j = i - kPeriod + 1; j <= i; j++) {
			if (bars[j].high > highest) highest = bars[j].high;
			if (bars[j].low < lowest) lowest = bars[j].low;
		}
		const range = highest - lowest;
		raw[i] = range === 0 ? 50 : (100 * (bars[i].close - lowest)) / range;
	}

	const k = sma(raw, smoothing);
	const d = sma(k, dPeriod);
	return { k, d };
}
