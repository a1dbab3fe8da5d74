import type { Bar } from "../types";
import { emptySeries, type Series } from "./movingAverage";

export function trueRange(curr: Bar, prev: Bar): number {
	return Math.max(
		curr.high - curr.low,
		Math.abs(curr.high - prev.close),
		Math.abs(curr.low - prev.close),
	);
}

/** ATR with Wilder smoothing; the first value is the mean of the first `period` true ranges. */
export function atrSeries(bars: Bar[], period: number): Series {
	const out = emptySeries(bars.length);
	if (bars.length < period + 1) return out;

	let sum = 0;
	for (let i = 1; i <= period; i++) {
		sum += trueRange(bars[i], bars[i - 1]);
	}

	let atr = sum / period;
	out[period] = atr;

	for (let i = period + 1; i < bars.length; i++) {
		atr = (atr * (period - 1) + trueRange(bars[i], bars[i - 1])) / period;
		out[i] = atr;
	}

	return out;
}
