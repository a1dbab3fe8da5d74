export type Series = Array<number | undefined>;

export function emptySeries(length: number): Series {
	return new Array<number | undefined>(length).fill(undefined);
}

/** Simple average of the trailing `period` values; undefined until a full window of defined values exists. */
export function sma(values: Series, period: number): Series {
	const out = emptySeries(values.length);

	for (let i = period - 1; i < values.length; i++) {
		let sum = 0;
		let complete = true;
		for (let j = i - period + 1; j <= i; j++) {
			const v = values[j];
			if (v === undefined) {
				complete = false;
				break;
			}
			sum += v;
		}
		if (complete) out[i] = sum / period;
	}

	return out;
}

/** EMA seeded with the SMA of its first `period` defined values. */
export function ema(values: Series, period: number): Series {
	const out = emptySeries(values.length);
	const k = 2 / (period + 1);

	let prev: number | undefined;
	let run = 0;
	let sum = 0;

	for (let i = 0; i < values.length; i++) {
		const v = values[i];
		if (v === undefined) {
			prev = undefined;
			run = 0;
			sum = 0;
			continue;
		}

		if (prev !== undefined) {
			prev = v * k + prev * (1 - k);
			out[i] = prev;
			continue;
		}

		run += 1;
		sum += v;
		if (run === period) {
			prev = sum / period;
			out[i] = prev;
		}
	}

	return out;
}
