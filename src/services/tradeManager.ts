import {
	advanceTrade,
	createOpenTrade,
	type LifecycleEvent,
	type LifecycleRules,
	tradeId,
} from "../strategy/lifecycle";
import {
	type Bar,
	type Direction,
	isOpenTrade,
	type OpenTrade,
	type Trade,
	type TradeParams,
} from "../types";
import { logger } from "../utils/logger";
import type { TradeNotifier } from "./notifier";
import type { TradeJournal } from "./tradeLogger";
import type { TradeStore } from "./tradeStore";

export type TradeStats = {
	total: number;
	wins: number;
	losses: number;
	breakevens: number;
	/** Percentage of closed trades that won. */
	winRate: number;
	trailedCount: number;
	/** Trailed trades that closed without a loss. */
	savedByTrail: number;
};

/**
 * Owns the open trades: opens them from trade params, walks them through new
 * bars and persists each transition before anyone is told about it.
 */
export class TradeManager {
	constructor(
		private readonly store: TradeStore,
		private readonly notifier: TradeNotifier,
		private readonly rules: LifecycleRules,
		private readonly journal: TradeJournal,
	) {}

	async openTrade(
		symbol: string,
		direction: Direction,
		params: TradeParams,
		openedAt: number,
		orderId?: string,
	): Promise<OpenTrade> {
		const existing = this.store.get(tradeId(symbol, openedAt));
		if (existing) {
			logger.info({ id: existing.id }, "Trade already open, ignoring duplicate");
			return existing;
		}

		const trade = createOpenTrade(
			{
				symbol,
				direction,
				entryPrice: params.entryPrice,
				stopLoss: params.stopLoss,
				takeProfit: params.takeProfit,
				positionSize: params.positionSize,
				riskAmount: params.riskAmount,
				openedAt,
				orderId,
			},
			this.rules,
		);

		await this.store.upsertOpenTrade(trade);
		await this.journalSafely(trade);
		logger.info(
			{
				id: trade.id,
				symbol,
				direction,
				entry: trade.entryPrice,
				stop: trade.currentStopLoss,
				target: trade.takeProfit,
			},
			"Opened trade",
		);
		return trade;
	}

	openTradesFor(symbol: string): OpenTrade[] {
		return this.store.openForSymbol(symbol);
	}

	/**
	 * Applies closed bars to every open trade of `symbol`. Bars at or before a
	 * trade's `lastBarAt` were already applied and are skipped.
	 */
	async onBars(symbol: string, bars: Bar[]): Promise<Trade[]> {
		const ordered = [...bars].sort((a, b) => a.timestamp - b.timestamp);
		const results: Trade[] = [];

		for (const initial of this.store.openForSymbol(symbol)) {
			let current: Trade = initial;

			for (const bar of ordered) {
				if (!isOpenTrade(current)) break;
				if (bar.timestamp <= current.lastBarAt) continue;

				const step = advanceTrade(current, bar, this.rules);
				current = step.trade;

				if (step.events.length === 0) continue;
				await this.persist(current);
				await this.dispatch(step.events);
			}

			if (isOpenTrade(current) && current.lastBarAt !== initial.lastBarAt) {
				await this.store.upsertOpenTrade(current);
			}
			results.push(current);
		}

		return results;
	}

	stats(): TradeStats {
		const history = this.store.history();
		const wins = history.filter((t) => t.state === "CLOSED_WIN").length;
		const losses = history.filter((t) => t.state === "CLOSED_LOSS").length;
		const breakevens = history.filter(
			(t) => t.state === "CLOSED_BREAKEVEN",
		).length;
		const trailed = history.filter((t) => t.stopMovedToBreakeven);

		return {
			total: history.length,
			wins,
			losses,
			breakevens,
			winRate: history.length > 0 ? (wins / history.length) * 100 : 0,
			trailedCount: trailed.length,
			savedByTrail: trailed.filter((t) => t.pnl >= 0).length,
		};
	}

	private async persist(trade: Trade): Promise<void> {
		if (isOpenTrade(trade)) {
			await this.store.upsertOpenTrade(trade);
			return;
		}
		await this.store.closeTrade(trade);
		await this.journalSafely(trade);
	}

	private async dispatch(events: LifecycleEvent[]): Promise<void> {
		for (const event of events) {
			try {
				if (event.type === "STOP_TRAILED") {
					logger.info(
						{
							id: event.trade.id,
							oldStop: event.adjustment.oldStop,
							newStop: event.adjustment.newStop,
						},
						"Stop moved to breakeven lock",
					);
					await this.notifier.stopTrailed(
						event.trade,
						event.adjustment,
						event.price,
					);
				} else {
					logger.info(
						{
							id: event.trade.id,
							state: event.trade.state,
							exitReason: event.trade.exitReason,
							pnl: event.trade.pnl,
						},
						"Trade closed",
					);
					await this.notifier.tradeClosed(event.trade);
				}
			} catch (err) {
				logger.error({ id: event.trade.id, type: event.type, err }, "Notification failed");
			}
		}
	}

	private async journalSafely(trade: Trade): Promise<void> {
		try {
			await this.journal.record(trade);
		} catch (err) {
			logger.error({ id: trade.id, err }, "Failed to write trade journal");
		}
	}
}
