import type {
	Bar,
	ClosedTrade,
	ClosedTradeState,
	Direction,
	ExitReason,
	OpenTrade,
	StopAdjustment,
	Trade,
} from "../types";
import { DegenerateStopError } from "./tradeParams";

export type LifecycleRules = {
	/** Favorable move, in R, that arms the breakeven stop. */
	breakevenTriggerR: number;
	/** Profit, in R, locked by the breakeven stop. */
	breakevenLockR: number;
	/** Losses within this many R of zero count as breakeven. */
	breakevenBandR: number;
};

export const DEFAULT_LIFECYCLE_RULES: LifecycleRules = {
	breakevenTriggerR: 1.5,
	breakevenLockR: 0.2,
	breakevenBandR: 0.1,
};

export type LifecycleEvent =
	| { type: "STOP_TRAILED"; trade: OpenTrade; adjustment: StopAdjustment; price: number }
	| { type: "CLOSED"; trade: ClosedTrade };

export type TradeStep = {
	trade: Trade;
	events: LifecycleEvent[];
};

export type OpenTradeInput = {
	symbol: string;
	direction: Direction;
	entryPrice: number;
	stopLoss: number;
	takeProfit: number;
	positionSize: number;
	riskAmount: number;
	openedAt: number;
	orderId?: string;
};

export function tradeId(symbol: string, openedAt: number): string {
	return `${symbol}_${openedAt}`;
}

export function createOpenTrade(
	input: OpenTradeInput,
	rules: LifecycleRules,
): OpenTrade {
	const riskDistance = Math.abs(input.entryPrice - input.stopLoss);
	if (!Number.isFinite(riskDistance) || riskDistance <= 0) {
		throw new DegenerateStopError(input.symbol, input.direction, riskDistance);
	}

	const isLong = input.direction === "LONG";
	return {
		id: tradeId(input.symbol, input.openedAt),
		symbol: input.symbol,
		direction: input.direction,
		state: "OPEN_ARMED",
		entryPrice: input.entryPrice,
		originalStopLoss: input.stopLoss,
		currentStopLoss: input.stopLoss,
		takeProfit: input.takeProfit,
		positionSize: input.positionSize,
		riskDistance,
		riskAmount: input.riskAmount,
		breakevenTrigger: isLong
			? input.entryPrice + rules.breakevenTriggerR * riskDistance
			: input.entryPrice - rules.breakevenTriggerR * riskDistance,
		stopMovedToBreakeven: false,
		stopAdjustments: [],
		openedAt: input.openedAt,
		lastBarAt: input.openedAt,
		highestPrice: input.entryPrice,
		lowestPrice: input.entryPrice,
		orderId: input.orderId,
	};
}

export function classifyResult(
	pnl: number,
	riskAmount: number,
	rules: LifecycleRules,
): ClosedTradeState {
	if (pnl > 0) return "CLOSED_WIN";
	if (pnl >= -rules.breakevenBandR * riskAmount) return "CLOSED_BREAKEVEN";
	return "CLOSED_LOSS";
}

export function closeTrade(
	trade: OpenTrade,
	exitPrice: number,
	exitReason: ExitReason,
	closedAt: number,
	rules: LifecycleRules,
): ClosedTrade {
	const move =
		trade.direction === "LONG"
			? exitPrice - trade.entryPrice
			: trade.entryPrice - exitPrice;
	const pnlR = move / trade.riskDistance;
	const pnl = pnlR * trade.riskAmount;

	return {
		...trade,
		state: classifyResult(pnl, trade.riskAmount, rules),
		exitPrice,
		exitReason,
		closedAt,
		pnl,
		pnlR,
	};
}

/**
 * Applies one bar to an open trade.
 *
 * Order within the bar: arm the breakeven stop, then test the stop, then the
 * target. A bar whose range holds both stop and target closes at the stop.
 * That ordering is a modeling assumption about intrabar paths, not a property
 * of real fills.
 */
export function advanceTrade(
	trade: OpenTrade,
	bar: Bar,
	rules: LifecycleRules,
): TradeStep {
	const isLong = trade.direction === "LONG";
	const next: OpenTrade = {
		...trade,
		stopAdjustments: [...trade.stopAdjustments],
		lastBarAt: bar.timestamp,
		highestPrice: Math.max(trade.highestPrice, bar.high),
		lowestPrice: Math.min(trade.lowestPrice, bar.low),
	};
	const events: LifecycleEvent[] = [];

	if (!next.stopMovedToBreakeven) {
		const triggered = isLong
			? bar.high >= next.breakevenTrigger
			: bar.low <= next.breakevenTrigger;

		if (triggered) {
			const lockedStop = isLong
				? next.entryPrice + rules.breakevenLockR * next.riskDistance
				: next.entryPrice - rules.breakevenLockR * next.riskDistance;
			const improves = isLong
				? lockedStop > next.currentStopLoss
				: lockedStop < next.currentStopLoss;

			if (improves) {
				const adjustment: StopAdjustment = {
					at: bar.timestamp,
					oldStop: next.currentStopLoss,
					newStop: lockedStop,
					reason: `Breakeven lock after ${rules.breakevenTriggerR}R move`,
				};
				next.currentStopLoss = lockedStop;
				next.stopMovedToBreakeven = true;
				next.state = "OPEN_TRAILED";
				next.stopAdjustments.push(adjustment);
				events.push({
					type: "STOP_TRAILED",
					trade: next,
					adjustment,
					price: bar.close,
				});
			}
		}
	}

	const stopHit = isLong
		? bar.low <= next.currentStopLoss
		: bar.high >= next.currentStopLoss;
	if (stopHit) {
		const closed = closeTrade(
			next,
			next.currentStopLoss,
			"STOP_HIT",
			bar.timestamp,
			rules,
		);
		events.push({ type: "CLOSED", trade: closed });
		return { trade: closed, events };
	}

	const targetHit = isLong
		? bar.high >= next.takeProfit
		: bar.low <= next.takeProfit;
	if (targetHit) {
		const closed = closeTrade(
			next,
			next.takeProfit,
			"TAKE_PROFIT",
			bar.timestamp,
			rules,
		);
		events.push({ type: "CLOSED", trade: closed });
		return { trade: closed, events };
	}

	return { trade: next, events };
}
