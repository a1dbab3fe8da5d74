import { z } from "zod";
import type { ClosedTrade, OpenTrade, TradeStateDocument } from "../types";
import { logger } from "../utils/logger";
import { readJson, writeJson } from "../utils/storage";

const directionSchema = z.enum(["LONG", "SHORT"]);

const stopAdjustmentSchema = z.object({
	at: z.number(),
	oldStop: z.number(),
	newStop: z.number(),
	reason: z.string(),
});

const tradeFields = {
	id: z.string().min(1),
	symbol: z.string().min(1),
	direction: directionSchema,
	entryPrice: z.number(),
	originalStopLoss: z.number(),
	currentStopLoss: z.number(),
	takeProfit: z.number(),
	positionSize: z.number(),
	riskDistance: z.number().positive(),
	riskAmount: z.number(),
	breakevenTrigger: z.number(),
	stopMovedToBreakeven: z.boolean(),
	stopAdjustments: z.array(stopAdjustmentSchema),
	openedAt: z.number(),
	lastBarAt: z.number(),
	highestPrice: z.number(),
	lowestPrice: z.number(),
	orderId: z.string().optional(),
};

const openTradeSchema = z.object({
	...tradeFields,
	state: z.enum(["OPEN_ARMED", "OPEN_TRAILED"]),
});

const closedTradeSchema = z.object({
	...tradeFields,
	state: z.enum(["CLOSED_WIN", "CLOSED_LOSS", "CLOSED_BREAKEVEN"]),
	exitPrice: z.number(),
	exitReason: z.enum(["STOP_HIT", "TAKE_PROFIT"]),
	closedAt: z.number(),
	pnl: z.number(),
	pnlR: z.number(),
});

const stateDocumentSchema = z.object({
	version: z.literal(1),
	openTrades: z.record(z.string(), openTradeSchema),
	history: z.array(closedTradeSchema),
});

function emptyDocument(): TradeStateDocument {
	return { version: 1, openTrades: {}, history: [] };
}

export type TradeStoreOptions = {
	filePath: string;
	historyLimit: number;
};

/**
 * Open trades and a bounded tail of closed ones, persisted as a single JSON
 * document. Every mutation rewrites the whole document after the in-memory
 * state is final.
 */
export class TradeStore {
	private openTrades = new Map<string, OpenTrade>();
	private closedTrades: ClosedTrade[] = [];

	constructor(private readonly options: TradeStoreOptions) {}

	async load(): Promise<void> {
		let raw: unknown;
		try {
			raw = await readJson(this.options.filePath, emptyDocument());
		} catch (err) {
			this.reset();
			logger.error(
				{ filePath: this.options.filePath, err },
				"Trade state unreadable; starting empty. Trades already placed with the broker are no longer tracked",
			);
			return;
		}

		const parsed = stateDocumentSchema.safeParse(raw);
		if (!parsed.success) {
			this.reset();
			logger.error(
				{
					filePath: this.options.filePath,
					issues: parsed.error.issues.slice(0, 5),
				},
				"Trade state invalid; starting empty. Trades already placed with the broker are no longer tracked",
			);
			return;
		}

		this.openTrades = new Map(Object.entries(parsed.data.openTrades));
		this.closedTrades = parsed.data.history;
		logger.info(
			{ open: this.openTrades.size, history: this.closedTrades.length },
			"Loaded trade state",
		);
	}

	get(id: string): OpenTrade | undefined {
		return this.openTrades.get(id);
	}

	open(): OpenTrade[] {
		return [...this.openTrades.values()];
	}

	openForSymbol(symbol: string): OpenTrade[] {
		return this.open()
			.filter((t) => t.symbol === symbol)
			.sort((a, b) => a.openedAt - b.openedAt);
	}

	history(): ClosedTrade[] {
		return [...this.closedTrades];
	}

	async upsertOpenTrade(trade: OpenTrade): Promise<void> {
		this.openTrades.set(trade.id, trade);
		await this.save();
	}

	async closeTrade(trade: ClosedTrade): Promise<void> {
		this.openTrades.delete(trade.id);
		this.closedTrades = [...this.closedTrades, trade].slice(
			-this.options.historyLimit,
		);
		await this.save();
		logger.info(
			{ id: trade.id, symbol: trade.symbol, pnl: trade.pnl },
			"Closed trade in store",
		);
	}

	snapshot(): TradeStateDocument {
		return {
			version: 1,
			openTrades: Object.fromEntries(this.openTrades),
			history: [...this.closedTrades],
		};
	}

	private reset(): void {
		this.openTrades = new Map();
		this.closedTrades = [];
	}

	private async save(): Promise<void> {
		await writeJson(this.options.filePath, this.snapshot());
	}
}
