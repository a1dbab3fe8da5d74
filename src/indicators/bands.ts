import { emptySeries, type Series } from "./movingAverage";

/** Position of the close inside Bollinger bands: 0 at the lower band, 1 at the upper. */
export function bandPositionSeries(
	closes: number[],
	period: number,
	deviations: number,
): Series {
	const out = emptySeries(closes.length);

	for (let i = period - 1; i < closes.length; i++) {
		const window = closes.slice(i - period + 1, i + 1);
		const mean = window.reduce((acc, v) => acc + v, 0) / period;
		const variance =
			window.reduce((acc, v) => acc + (v - mean) ** 2, 0) / period;
		const std = Math.sqrt(variance);

		const lower = mean - deviations * std;
		const width = 2 * deviations * std;
		out[i] = width === 0 ? 0.5 : (closes[i] - lower) / width;
	}

	return out;
}
