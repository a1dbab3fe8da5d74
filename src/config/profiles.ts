/**
 * Scorer and trade-parameter profiles.
 *
 * Every weight and threshold the scorer uses lives here so that tunings can be
 * compared side by side and swept by the backtest without forking the scorer.
 */

export type ScoreWeights = {
	trendFull: number;
	trendPartial: number;
	oscillatorRecovery: number;
	oscillatorReversal: number;
	momentumAligned: number;
	momentumCross: number;
	momentumBuilding: number;
	stochasticExtremeCross: number;
	stochasticCross: number;
	bandBounce: number;
	trendStrengthBonus: number;
	volumeConfirmation: number;
};

export type ScoreChecks = {
	oscillator: boolean;
	momentum: boolean;
	stochastic: boolean;
	bands: boolean;
	volume: boolean;
};

export type ScorerProfile = {
	name: string;
	/** ADX below this is treated as a ranging market. */
	trendStrengthFloor: number;
	/** ADX above this earns the trend-strength bonus. */
	strongTrendThreshold: number;
	oscillatorOversold: number;
	oscillatorOverbought: number;
	/** RSI at or beyond these bounds rejects the evaluation outright. */
	oscillatorExtremeLow: number;
	oscillatorExtremeHigh: number;
	/** Max distance of close from the medium EMA, in ATR units. */
	maxExtensionAtr: number;
	stochasticExtremeLow: number;
	stochasticExtremeHigh: number;
	stochasticMidline: number;
	bandLow: number;
	bandHigh: number;
	volumeRatioMin: number;
	minScore: number;
	margin: number;
	trendFilter: boolean;
	exhaustionGuard: boolean;
	allowCounterTrend: boolean;
	counterTrendExtraScore: number;
	counterTrendOscillatorLong: number;
	counterTrendOscillatorShort: number;
	weights: ScoreWeights;
	checks: ScoreChecks;
};

export type StopTiers = {
	strongAbove: number;
	moderateAbove: number;
	strong: number;
	moderate: number;
	weak: number;
};

export type TradeProfile = {
	rewardRisk: number;
	entryBufferPct: number;
	stopTiers: StopTiers;
};

export type StrategyProfile = {
	scorer: ScorerProfile;
	trade: TradeProfile;
};

const DEFAULT_WEIGHTS: ScoreWeights = {
	trendFull: 2,
	trendPartial: 1,
	oscillatorRecovery: 1.5,
	oscillatorReversal: 1,
	momentumAligned: 0.5,
	momentumCross: 1,
	momentumBuilding: 0.5,
	stochasticExtremeCross: 1.5,
	stochasticCross: 0.5,
	bandBounce: 1,
	trendStrengthBonus: 0.5,
	volumeConfirmation: 0.5,
};

const ALL_CHECKS: ScoreChecks = {
	oscillator: true,
	momentum: true,
	stochastic: true,
	bands: true,
	volume: true,
};

const BASE_SCORER: ScorerProfile = {
	name: "base",
	trendStrengthFloor: 25,
	strongTrendThreshold: 30,
	oscillatorOversold: 30,
	oscillatorOverbought: 70,
	oscillatorExtremeLow: 100 / 6,
	oscillatorExtremeHigh: 500 / 6,
	maxExtensionAtr: 3,
	stochasticExtremeLow: 30,
	stochasticExtremeHigh: 70,
	stochasticMidline: 50,
	bandLow: 0.3,
	bandHigh: 0.7,
	volumeRatioMin: 1.2,
	minScore: 5,
	margin: 1,
	trendFilter: false,
	exhaustionGuard: true,
	allowCounterTrend: false,
	counterTrendExtraScore: 1.5,
	counterTrendOscillatorLong: 45,
	counterTrendOscillatorShort: 55,
	weights: DEFAULT_WEIGHTS,
	checks: ALL_CHECKS,
};

const DEFAULT_STOP_TIERS: StopTiers = {
	strongAbove: 35,
	moderateAbove: 25,
	strong: 2.0,
	moderate: 1.5,
	weak: 1.2,
};

export const STRATEGY_PROFILES = {
	optimized: {
		scorer: { ...BASE_SCORER, name: "optimized" },
		trade: {
			rewardRisk: 2.5,
			entryBufferPct: 0.0003,
			stopTiers: { ...DEFAULT_STOP_TIERS, strong: 2.5, moderate: 2.0, weak: 1.5 },
		},
	},
	trendFollowing: {
		scorer: {
			...BASE_SCORER,
			name: "trendFollowing",
			trendStrengthFloor: 20,
			oscillatorOversold: 35,
			oscillatorOverbought: 65,
			minScore: 4,
			trendFilter: true,
		},
		trade: {
			rewardRisk: 2.0,
			entryBufferPct: 0.0003,
			stopTiers: DEFAULT_STOP_TIERS,
		},
	},
	counterTrend: {
		scorer: {
			...BASE_SCORER,
			name: "counterTrend",
			trendStrengthFloor: 20,
			oscillatorOversold: 38,
			oscillatorOverbought: 62,
			minScore: 4,
			trendFilter: true,
			allowCounterTrend: true,
		},
		trade: {
			rewardRisk: 2.0,
			entryBufferPct: 0.0005,
			stopTiers: DEFAULT_STOP_TIERS,
		},
	},
} satisfies Record<string, StrategyProfile>;

export type StrategyProfileName = keyof typeof STRATEGY_PROFILES;

export function isStrategyProfileName(
	value: string,
): value is StrategyProfileName {
	return Object.hasOwn(STRATEGY_PROFILES, value);
}

export function getStrategyProfile(name: StrategyProfileName): StrategyProfile {
	return STRATEGY_PROFILES[name];
}
