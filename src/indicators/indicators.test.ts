import { describe, expect, it } from "vitest";
import type { Bar } from "../types";
import { atrSeries } from "./atr";
import { bandPositionSeries } from "./bands";
import { macdHistogramSeries, rsiSeries, stochasticSeries } from "./momentum";
import { ema, sma } from "./movingAverage";
import { adxSeries } from "./trend";
import { volumeRatioSeries } from "./volume";

function bar(i: number, close: number, high: number, low: number, volume = 10): Bar {
	return { timestamp: i, open: close, high, low, close, volume };
}

describe("moving averages", () => {
	it("sma needs a full window", () => {
		expect(sma([1, 2, 3, 4], 2)).toEqual([undefined, 1.5, 2.5, 3.5]);
	});

	it("sma skips windows with gaps", () => {
		expect(sma([1, undefined, 3, 4], 2)).toEqual([
			undefined,
			undefined,
			undefined,
			3.5,
		]);
	});

	it("ema is seeded with the sma of the first period", () => {
		expect(ema([1, 2, 3, 4, 5], 3)).toEqual([undefined, undefined, 2, 3, 4]);
	});

	it("ema restarts after a gap", () => {
		expect(ema([1, undefined, 2, 4], 2)).toEqual([
			undefined,
			undefined,
			undefined,
			3,
		]);
	});
});

describe("rsiSeries", () => {
	it("is 100 with gains only and 50 without movement", () => {
		expect(rsiSeries([1, 2, 3, 4], 3)[3]).toBe(100);
		expect(rsiSeries([5, 5, 5, 5], 3)[3]).toBe(50);
	});

	it("applies Wilder smoothing after the seed", () => {
		const rsi = rsiSeries([10, 11, 10, 12, 11], 3);
		expect(rsi.slice(0, 3)).toEqual([undefined, undefined, undefined]);
		expect(rsi[3]).toBeCloseTo(75, 10);
		expect(rsi[4]).toBeCloseTo(54.5454545, 5);
	});
});

describe("atrSeries", () => {
	it("averages true ranges from index `period`", () => {
		const bars = [0, 1, 2, 3, 4].map((i) => bar(i, 10, 11, 9));
		expect(atrSeries(bars, 3)).toEqual([undefined, undefined, undefined, 2, 2]);
	});

	it("is all undefined on short input", () => {
		const bars = [0, 1].map((i) => bar(i, 10, 11, 9));
		expect(atrSeries(bars, 3)).toEqual([undefined, undefined]);
	});
});

describe("adxSeries", () => {
	it("reads 100 in a one-way trend", () => {
		const bars = Array.from({ length: 7 }, (_, i) => bar(i, 10 + i, 11 + i, 9 + i));
		const adx = adxSeries(bars, 3);
		expect(adx.slice(0, 5).every((v) => v === undefined)).toBe(true);
		expect(adx[5]).toBeCloseTo(100, 8);
		expect(adx[6]).toBeCloseTo(100, 8);
	});

	it("reads 0 on a flat series", () => {
		const bars = Array.from({ length: 7 }, (_, i) => bar(i, 10, 10, 10));
		expect(adxSeries(bars, 3)[6]).toBe(0);
	});
});

describe("bandPositionSeries", () => {
	it("places the close relative to the bands", () => {
		const position = bandPositionSeries([1, 2, 3], 3, 1);
		expect(position[2]).toBeCloseTo(0.5 + 1 / (2 * Math.sqrt(2 / 3)), 10);
	});

	it("is 0.5 when the bands have no width", () => {
		expect(bandPositionSeries([4, 4, 4], 3, 2)[2]).toBe(0.5);
	});
});

describe("volumeRatioSeries", () => {
	it("divides volume by its moving average", () => {
		const bars = [10, 10, 10, 40].map((v, i) => bar(i, 1, 1, 1, v));
		expect(volumeRatioSeries(bars, 2)).toEqual([undefined, 1, 1, 1.6]);
	});

	it("is undefined when the average volume is zero", () => {
		const bars = [0, 0, 0].map((v, i) => bar(i, 1, 1, 1, v));
		expect(volumeRatioSeries(bars, 2)).toEqual([undefined, undefined, undefined]);
	});
});

describe("stochasticSeries", () => {
	it("is 50 across a flat range", () => {
		const bars = Array.from({ length: 6 }, (_, i) => bar(i, 5, 5, 5));
		const { k, d } = stochasticSeries(bars, 2, 2, 2);
		expect(k[5]).toBe(50);
		expect(d[5]).toBe(50);
	});

	it("reads 100 when closing at the top of the range", () => {
		const bars = Array.from({ length: 4 }, (_, i) => bar(i, 10 + i, 10 + i, 9 + i));
		const { k } = stochasticSeries(bars, 2, 1, 1);
		expect(k[3]).toBe(100);
	});
});

describe("macdHistogramSeries", () => {
	it("is zero on a constant series once warmed up", () => {
		const closes = new Array<number>(40).fill(100);
		const hist = macdHistogramSeries(closes, 12, 26, 9);
		expect(hist[32]).toBeUndefined();
		expect(hist[33]).toBeCloseTo(0, 10);
	});
});
