import type { Bar } from "../types";
import { type Series, sma } from "./movingAverage";

export function volumeRatioSeries(bars: Bar[], period: number): Series {
	const average = sma(
		bars.map((b) => b.volume),
		period,
	);
	return bars.map((bar, i) => {
		const avg = average[i];
		return avg === undefined || avg <= 0 ? undefined : bar.volume / avg;
	});
}
