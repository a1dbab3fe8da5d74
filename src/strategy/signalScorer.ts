import type { ScorerProfile } from "../config/profiles";
import type {
	Direction,
	IndicatorBar,
	ScoreCheck,
	Signal,
	SignalReason,
	SkipReason,
} from "../types";

type ScoredIndicators = {
	emaFast: number;
	emaMedium: number;
	emaSlow: number;
	rsi: number;
	macdHistogram: number;
	stochK: number;
	stochD: number;
	bandPosition: number;
	atr: number;
	adx: number;
	volumeRatio: number | undefined;
};

function scoredIndicators(bar: IndicatorBar): ScoredIndicators | null {
	const {
		emaFast,
		emaMedium,
		emaSlow,
		rsi,
		macdHistogram,
		stochK,
		stochD,
		bandPosition,
		atr,
		adx,
		volumeRatio,
	} = bar.indicators;

	if (
		emaFast === undefined ||
		emaMedium === undefined ||
		emaSlow === undefined ||
		rsi === undefined ||
		macdHistogram === undefined ||
		stochK === undefined ||
		stochD === undefined ||
		bandPosition === undefined ||
		atr === undefined ||
		adx === undefined
	) {
		return null;
	}

	return {
		emaFast,
		emaMedium,
		emaSlow,
		rsi,
		macdHistogram,
		stochK,
		stochD,
		bandPosition,
		atr,
		adx,
		volumeRatio,
	};
}

function abstain(skipped: SkipReason): Signal {
	return { direction: null, buyScore: 0, sellScore: 0, reasons: [], skipped };
}

/**
 * Scores the latest bar of `recentBars` for a LONG or SHORT entry.
 *
 * Pure function of the window: the last bar is scored, the two bars before it
 * confirm direction changes. Abstains (direction null, `skipped` set) when the
 * window is too short, an indicator is still warming up, or a pre-filter trips.
 */
export function evaluate(
	recentBars: IndicatorBar[],
	profile: ScorerProfile,
): Signal {
	if (recentBars.length < 3) return abstain("insufficient_history");

	const [prev2Bar, prevBar, bar] = recentBars.slice(-3);
	const cur = scoredIndicators(bar);
	const prev = scoredIndicators(prevBar);
	const prev2 = scoredIndicators(prev2Bar);
	if (!cur || !prev || !prev2) return abstain("indicators_unavailable");

	if (cur.adx < profile.trendStrengthFloor) return abstain("ranging_market");
	if (
		cur.rsi <= profile.oscillatorExtremeLow ||
		cur.rsi >= profile.oscillatorExtremeHigh
	) {
		return abstain("oscillator_extreme");
	}
	if (
		Math.abs(bar.close - cur.emaMedium) >
		profile.maxExtensionAtr * cur.atr
	) {
		return abstain("over_extended");
	}

	const { weights, checks } = profile;
	const reasons: SignalReason[] = [];
	let buyScore = 0;
	let sellScore = 0;

	const add = (direction: Direction, check: ScoreCheck, weight: number) => {
		reasons.push({ direction, check, weight });
		if (direction === "LONG") buyScore += weight;
		else sellScore += weight;
	};

	const price = bar.close;
	const majorUp = cur.emaMedium > cur.emaSlow;
	const majorDown = cur.emaMedium < cur.emaSlow;

	// 1. moving-average alignment
	if (price > cur.emaFast && cur.emaFast > cur.emaMedium && majorUp) {
		add("LONG", "trend_alignment", weights.trendFull);
	} else if (majorUp && price > cur.emaSlow) {
		add("LONG", "trend_partial", weights.trendPartial);
	}
	if (price < cur.emaFast && cur.emaFast < cur.emaMedium && majorDown) {
		add("SHORT", "trend_alignment", weights.trendFull);
	} else if (majorDown && price < cur.emaSlow) {
		add("SHORT", "trend_partial", weights.trendPartial);
	}

	// 2. oscillator turning, confirmed against both prior bars
	if (checks.oscillator) {
		const rising = cur.rsi > prev.rsi && cur.rsi > prev2.rsi;
		const falling = cur.rsi < prev.rsi && cur.rsi < prev2.rsi;

		if (rising && cur.rsi > profile.oscillatorOversold && cur.rsi < 50) {
			add("LONG", "oscillator_recovery", weights.oscillatorRecovery);
		} else if (rising && cur.rsi < profile.oscillatorOversold) {
			add("LONG", "oscillator_reversal", weights.oscillatorReversal);
		}
		if (falling && cur.rsi < profile.oscillatorOverbought && cur.rsi > 50) {
			add("SHORT", "oscillator_recovery", weights.oscillatorRecovery);
		} else if (falling && cur.rsi > profile.oscillatorOverbought) {
			add("SHORT", "oscillator_reversal", weights.oscillatorReversal);
		}
	}

	// 3. momentum histogram
	if (checks.momentum) {
		if (cur.macdHistogram > 0) {
			add("LONG", "momentum_aligned", weights.momentumAligned);
			if (prev.macdHistogram <= 0) {
				add("LONG", "momentum_cross", weights.momentumCross);
			} else if (cur.macdHistogram > prev.macdHistogram) {
				add("LONG", "momentum_building", weights.momentumBuilding);
			}
		}
		if (cur.macdHistogram < 0) {
			add("SHORT", "momentum_aligned", weights.momentumAligned);
			if (prev.macdHistogram >= 0) {
				add("SHORT", "momentum_cross", weights.momentumCross);
			} else if (cur.macdHistogram < prev.macdHistogram) {
				add("SHORT", "momentum_building", weights.momentumBuilding);
			}
		}
	}

	// 4. stochastic crossover inside an extreme zone
	if (checks.stochastic) {
		const crossedUp = cur.stochK > cur.stochD && prev.stochK <= prev.stochD;
		const crossedDown = cur.stochK < cur.stochD && prev.stochK >= prev.stochD;

		if (crossedUp && cur.stochK < profile.stochasticExtremeLow) {
			add("LONG", "stochastic_extreme_cross", weights.stochasticExtremeCross);
		} else if (crossedUp && cur.stochK < profile.stochasticMidline) {
			add("LONG", "stochastic_cross", weights.stochasticCross);
		}
		if (crossedDown && cur.stochK > profile.stochasticExtremeHigh) {
			add("SHORT", "stochastic_extreme_cross", weights.stochasticExtremeCross);
		} else if (crossedDown && cur.stochK > profile.stochasticMidline) {
			add("SHORT", "stochastic_cross", weights.stochasticCross);
		}
	}

	// 5. band bounce
	if (checks.bands) {
		if (
			cur.bandPosition < profile.bandLow &&
			cur.bandPosition > prev.bandPosition
		) {
			add("LONG", "band_bounce", weights.bandBounce);
		}
		if (
			cur.bandPosition > profile.bandHigh &&
			cur.bandPosition < prev.bandPosition
		) {
			add("SHORT", "band_bounce", weights.bandBounce);
		}
	}

	// 6. strong trend bonus goes to the major trend
	if (cur.adx > profile.strongTrendThreshold) {
		add(majorUp ? "LONG" : "SHORT", "trend_strength", weights.trendStrengthBonus);
	}

	// 7. volume confirmation follows the bar body
	if (
		checks.volume &&
		cur.volumeRatio !== undefined &&
		cur.volumeRatio >= profile.volumeRatioMin &&
		bar.close !== bar.open
	) {
		add(
			bar.close > bar.open ? "LONG" : "SHORT",
			"volume_confirmation",
			weights.volumeConfirmation,
		);
	}

	const beatsLong = buyScore > sellScore + profile.margin;
	const beatsShort = sellScore > buyScore + profile.margin;

	let direction: Direction | null = null;
	if (
		beatsLong &&
		buyScore >= profile.minScore &&
		(!profile.trendFilter || majorUp) &&
		(!profile.exhaustionGuard || cur.rsi < profile.oscillatorOverbought)
	) {
		direction = "LONG";
	} else if (
		beatsShort &&
		sellScore >= profile.minScore &&
		(!profile.trendFilter || !majorUp) &&
		(!profile.exhaustionGuard || cur.rsi > profile.oscillatorOversold)
	) {
		direction = "SHORT";
	} else if (profile.allowCounterTrend) {
		const counterMin = profile.minScore + profile.counterTrendExtraScore;
		if (
			!majorUp &&
			beatsLong &&
			buyScore >= counterMin &&
			cur.rsi < profile.counterTrendOscillatorLong &&
			cur.bandPosition < profile.bandLow
		) {
			direction = "LONG";
		} else if (
			majorUp &&
			beatsShort &&
			sellScore >= counterMin &&
			cur.rsi > profile.counterTrendOscillatorShort &&
			cur.bandPosition > profile.bandHigh
		) {
			direction = "SHORT";
		}
	}

	return { direction, buyScore, sellScore, reasons };
}
