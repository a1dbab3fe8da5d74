import type { StopTiers, TradeProfile } from "../config/profiles";
import type {
	Direction,
	IndicatorBar,
	SymbolRiskProfile,
	TradeParams,
} from "../types";

export class DegenerateStopError extends Error {
	constructor(
		readonly symbol: string,
		readonly direction: Direction,
		readonly stopDistance: number,
	) {
		super(
			`Stop distance ${stopDistance} for ${direction} ${symbol} cannot size a position`,
		);
		this.name = "DegenerateStopError";
	}
}

/** Wider stops in strong trends, tighter in weak or ranging ones. */
export function stopMultiplierFor(adx: number, tiers: StopTiers): number {
	if (adx > tiers.strongAbove) return tiers.strong;
	if (adx > tiers.moderateAbove) return tiers.moderate;
	return tiers.weak;
}

function stepDecimals(step: number): number {
	const text = step.toString();
	const exponent = text.match(/e-(\d+)$/);
	if (exponent) return Number(exponent[1]);
	const dot = text.indexOf(".");
	return dot < 0 ? 0 : text.length - dot - 1;
}

/**
 * Units that lose `riskAmount` over `stopDistance`, rounded to the size step
 * and never below the minimum size.
 */
export function positionSize(
	riskAmount: number,
	contractMultiplier: number,
	stopDistance: number,
	minSize: number,
	sizeStep: number,
): number {
	const raw = riskAmount / (contractMultiplier * stopDistance);
	const minSteps = Math.max(1, Math.ceil(minSize / sizeStep - 1e-9));
	const steps = Math.max(minSteps, Math.round(raw / sizeStep));
	return Number((steps * sizeStep).toFixed(stepDecimals(sizeStep)));
}

export function deriveTradeParams(
	direction: Direction,
	bar: IndicatorBar,
	symbolProfile: SymbolRiskProfile,
	tradeProfile: TradeProfile,
): TradeParams {
	const { atr, adx } = bar.indicators;
	if (atr === undefined || adx === undefined) {
		throw new Error(
			`ATR and ADX are required to derive trade params for ${symbolProfile.symbol}`,
		);
	}

	const isLong = direction === "LONG";
	const stopMultiplier = stopMultiplierFor(adx, tradeProfile.stopTiers);
	const entryPrice = bar.close;
	const stopLoss = isLong
		? bar.low - stopMultiplier * atr
		: bar.high + stopMultiplier * atr;
	const stopDistance = Math.abs(entryPrice - stopLoss);

	if (!Number.isFinite(stopDistance) || stopDistance <= 0) {
		throw new DegenerateStopError(symbolProfile.symbol, direction, stopDistance);
	}

	const takeProfit = isLong
		? entryPrice + tradeProfile.rewardRisk * stopDistance
		: entryPrice - tradeProfile.rewardRisk * stopDistance;

	const buffer = entryPrice * tradeProfile.entryBufferPct;
	const size = positionSize(
		symbolProfile.riskAmount,
		symbolProfile.contractMultiplier,
		stopDistance,
		symbolProfile.minSize,
		symbolProfile.sizeStep,
	);
	const rewardEstimate =
		Math.round(
			size *
				symbolProfile.contractMultiplier *
				Math.abs(takeProfit - entryPrice) *
				100,
		) / 100;

	return {
		symbol: symbolProfile.symbol,
		direction,
		entryPrice,
		entryBand: { min: entryPrice - buffer, max: entryPrice + buffer },
		stopLoss,
		takeProfit,
		stopDistance,
		stopMultiplier,
		positionSize: size,
		riskAmount: symbolProfile.riskAmount,
		rewardEstimate,
		indicators: { ...bar.indicators },
	};
}
