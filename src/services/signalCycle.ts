import { from, lastValueFrom } from "rxjs";
import { concatMap, toArray } from "rxjs/operators";
import type { ExecutionMode } from "../config";
import type { StrategyProfile } from "../config/profiles";
import { assetClassFor, getSymbolRiskProfile } from "../config/symbols";
import { evaluate } from "../strategy/signalScorer";
import { DegenerateStopError, deriveTradeParams } from "../strategy/tradeParams";
import type { Bar, TradeParams } from "../types";
import { logger } from "../utils/logger";
import type { SignalAdvisor } from "./advisor";
import { computeIndicators } from "./indicatorService";
import { isMarketOpen } from "./marketHours";
import type { TradeNotifier } from "./notifier";
import type { OrderExecutor } from "./orderService";
import type { TradeManager } from "./tradeManager";

export type CycleStatus =
	| "opened"
	| "no_signal"
	| "skipped"
	| "rejected"
	| "failed";

export type SymbolOutcome = {
	symbol: string;
	status: CycleStatus;
	detail?: string;
};

export type SignalCycleDeps = {
	fetchBars: (symbol: string) => Promise<Bar[]>;
	manager: TradeManager;
	notifier: TradeNotifier;
	advisor: SignalAdvisor;
	/** Required in live mode. */
	executor: OrderExecutor | null;
	mode: ExecutionMode;
	profile: StrategyProfile;
	riskPerTrade: number;
	cooldownMinutes: number;
	now?: () => Date;
};

/**
 * One scheduled pass over the watched symbols: advance open trades, then look
 * for a new entry and take it only once it has been delivered or filled.
 */
export class SignalCycle {
	private readonly lastSignalAt = new Map<string, number>();
	private readonly now: () => Date;

	constructor(private readonly deps: SignalCycleDeps) {
		this.now = deps.now ?? (() => new Date());
	}

	async run(symbols: string[]): Promise<SymbolOutcome[]> {
		const outcomes = await lastValueFrom(
			from(symbols).pipe(
				concatMap(async (symbol): Promise<SymbolOutcome> => {
					try {
						return await this.runSymbol(symbol);
					} catch (err) {
						logger.error({ symbol, err }, "Signal cycle failed for symbol");
						return {
							symbol,
							status: "failed",
							detail: err instanceof Error ? err.message : String(err),
						};
					}
				}),
				toArray(),
			),
		);

		logger.info(
			{
				symbols: symbols.length,
				opened: outcomes.filter((o) => o.status === "opened").length,
				failed: outcomes.filter((o) => o.status === "failed").length,
			},
			"Signal cycle complete",
		);
		return outcomes;
	}

	async runSymbol(symbol: string): Promise<SymbolOutcome> {
		const { manager, profile } = this.deps;

		const bars = await this.deps.fetchBars(symbol);
		if (bars.length === 0) {
			return { symbol, status: "skipped", detail: "no_data" };
		}

		await manager.onBars(symbol, bars);

		if (manager.openTradesFor(symbol).length > 0) {
			return { symbol, status: "skipped", detail: "open_trade" };
		}

		const now = this.now();
		const last = this.lastSignalAt.get(symbol);
		if (
			last !== undefined &&
			now.getTime() - last < this.deps.cooldownMinutes * 60_000
		) {
			return { symbol, status: "skipped", detail: "cooldown" };
		}

		if (!isMarketOpen(assetClassFor(symbol), now)) {
			return { symbol, status: "skipped", detail: "market_closed" };
		}

		const indicatorBars = computeIndicators(bars);
		if (!indicatorBars) {
			logger.warn({ symbol, bars: bars.length }, "Indicators unavailable");
			return { symbol, status: "skipped", detail: "indicators_unavailable" };
		}

		const signal = evaluate(indicatorBars.slice(-3), profile.scorer);
		if (!signal.direction) {
			logger.debug(
				{
					symbol,
					skipped: signal.skipped,
					buyScore: signal.buyScore,
					sellScore: signal.sellScore,
				},
				"No signal",
			);
			return { symbol, status: "no_signal", detail: signal.skipped };
		}

		const signalBar = indicatorBars[indicatorBars.length - 1];
		let params: TradeParams;
		try {
			params = deriveTradeParams(
				signal.direction,
				signalBar,
				getSymbolRiskProfile(symbol, this.deps.riskPerTrade),
				profile.trade,
			);
		} catch (err) {
			if (err instanceof DegenerateStopError) {
				logger.warn({ symbol, stopDistance: err.stopDistance }, err.message);
				return { symbol, status: "skipped", detail: "degenerate_stop" };
			}
			throw err;
		}

		const verdict = await this.deps.advisor.review(params, signal);
		if (!verdict.approved) {
			logger.info({ symbol, reasoning: verdict.reasoning }, "Signal rejected by advisor");
			return { symbol, status: "rejected", detail: verdict.reasoning };
		}

		let orderId: string | undefined;
		if (this.deps.mode === "live") {
			if (!this.deps.executor) {
				return { symbol, status: "failed", detail: "no_order_executor" };
			}
			const result = await this.deps.executor.placeOrder({
				symbol,
				direction: signal.direction,
				entry: params.entryPrice,
				stopLoss: params.stopLoss,
				takeProfit: params.takeProfit,
				quantity: params.positionSize,
			});
			if (!result.success) {
				return { symbol, status: "failed", detail: result.error };
			}
			orderId = result.orderId;
			await this.deps.notifier.signalRaised(params, verdict);
		} else {
			const delivered = await this.deps.notifier.signalRaised(params, verdict);
			if (!delivered) {
				logger.warn({ symbol }, "Signal not delivered, trade not recorded");
				return { symbol, status: "failed", detail: "notification_failed" };
			}
		}

		await manager.openTrade(
			symbol,
			signal.direction,
			params,
			signalBar.timestamp,
			orderId,
		);
		this.lastSignalAt.set(symbol, now.getTime());

		logger.info(
			{
				symbol,
				direction: signal.direction,
				buyScore: signal.buyScore,
				sellScore: signal.sellScore,
			},
			"Signal taken",
		);
		return { symbol, status: "opened" };
	}
}
