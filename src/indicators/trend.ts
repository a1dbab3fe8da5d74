import type { Bar } from "../types";
import { trueRange } from "./atr";
import { emptySeries, type Series } from "./movingAverage";

/**
 * ADX with Wilder smoothing. DX needs `period` bars of smoothed movement and
 * ADX averages the first `period` DX values, so the first ADX lands on index 2 * period - 1.
 */
export function adxSeries(bars: Bar[], period: number): Series {
	const out = emptySeries(bars.length);
	if (bars.length < 2 * period) return out;

	const plusDm: number[] = [0];
	const minusDm: number[] = [0];
	const tr: number[] = [0];

	for (let i = 1; i < bars.length; i++) {
		const upMove = bars[i].high - bars[i - 1].high;
		const downMove = bars[i - 1].low - bars[i].low;
		plusDm.push(upMove > downMove && upMove > 0 ? upMove : 0);
		minusDm.push(downMove > upMove && downMove > 0 ? downMove : 0);
		tr.push(trueRange(bars[i], bars[i - 1]));
	}

	let sTr = 0;
	let sPlus = 0;
	let sMinus = 0;
	for (let i = 1; i <= period; i++) {
		sTr += tr[i];
		sPlus += plusDm[i];
		sMinus += minusDm[i];
	}

	const dx = (): number => {
		const plusDi = sTr === 0 ? 0 : (100 * sPlus) / sTr;
		const minusDi = sTr === 0 ? 0 : (100 * sMinus) / sTr;
		const total = plusDi + minusDi;
		return total === 0 ? 0 : (100 * Math.abs(plusDi - minusDi)) / total;
	};

	let dxSum = dx();
	for (let i = period + 1; i < 2 * period; i++) {
		sTr = sTr - sTr / period + tr[i];
		sPlus = sPlus - sPlus / period + plusDm[i];
		sMinus = sMinus - sMinus / period + minusDm[i];
		dxSum += dx();
	}

	let adx = dxSum / period;
	out[2 * period - 1] = adx;

	for (let i = 2 * period; i < bars.length; i++) {
		sTr = sTr - sTr / period + tr[i];
		sPlus = sPlus - sPlus / period + plusDm[i];
		sMinus = sMinus - sMinus / period + minusDm[i];
		adx = (adx * (period - 1) + dx()) / period;
		out[i] = adx;
	}

	return out;
}
