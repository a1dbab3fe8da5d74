import {
	fetchTelegramUpdates,
	type ParseMode,
	sendTelegramMessage,
	type TelegramUpdate,
} from "../clients/telegram";
import type { ExecutionMode } from "../config";
import type { OpenTrade } from "../types";
import { logger } from "../utils/logger";
import { escapeHtml, formatPrice } from "./notifier";
import type { TradeManager, TradeStats } from "./tradeManager";
import type { TradeStore } from "./tradeStore";

export type CommandHandlerDeps = {
	store: TradeStore;
	manager: TradeManager;
	mode: ExecutionMode;
	symbols: string[];
};

const HELP = [
	"<b>Commands</b>",
	"/status - Engine status",
	"/positions - Open trades",
	"/stats - Closed trade statistics",
].join("\n");

export function formatPositions(trades: OpenTrade[]): string {
	if (trades.length === 0) return "No open trades";

	return [
		`<b>Open trades (${trades.length})</b>`,
		...trades.map(
			(t) =>
				`${escapeHtml(t.id)} ${t.direction} @ ${formatPrice(t.entryPrice)} | SL ${formatPrice(t.currentStopLoss)} | TP ${formatPrice(t.takeProfit)}${t.stopMovedToBreakeven ? " (trailed)" : ""}`,
		),
	].join("\n");
}

export function formatStats(stats: TradeStats): string {
	return [
		"<b>Trade stats</b>",
		`Total: ${stats.total} | Wins: ${stats.wins} | Losses: ${stats.losses} | Breakeven: ${stats.breakevens}`,
		`Win rate: ${stats.winRate.toFixed(1)}%`,
		`Trailed: ${stats.trailedCount} (saved ${stats.savedByTrail})`,
	].join("\n");
}

export interface CommandResponder {
	/** Reply for a command, or null when the text is not one. */
	respond(text: string): string | null;
}

/** Read-only bot commands over the tracked trades. */
export class TelegramCommandHandler implements CommandResponder {
	constructor(private readonly deps: CommandHandlerDeps) {}

	respond(text: string): string | null {
		const [token] = text.trim().split(/\s+/);
		if (!token?.startsWith("/")) return null;

		// "/stats@my_bot" in group chats
		const command = token.split("@")[0].toLowerCase();
		switch (command) {
			case "/start":
			case "/help":
				return HELP;
			case "/status":
				return this.status();
			case "/positions":
				return formatPositions(this.deps.store.open());
			case "/stats":
				return formatStats(this.deps.manager.stats());
			default:
				return `Unknown command ${escapeHtml(command)}. Try /help`;
		}
	}

	private status(): string {
		const stats = this.deps.manager.stats();
		return [
			"<b>Status</b>",
			`Mode: ${this.deps.mode}`,
			`Symbols: ${this.deps.symbols.join(", ")}`,
			`Open trades: ${this.deps.store.open().length}`,
			`Closed trades: ${stats.total} (win rate ${stats.winRate.toFixed(1)}%)`,
		].join("\n");
	}
}

export type FetchUpdates = (offset: number) => Promise<TelegramUpdate[]>;
export type SendReply = (text: string, parseMode?: ParseMode) => Promise<boolean>;

/** Answers commands from the configured chat only; other chats are ignored. */
export class TelegramCommandPoller {
	private offset = 0;

	constructor(
		private readonly handler: CommandResponder,
		private readonly chatId: string,
		private readonly fetchUpdates: FetchUpdates = fetchTelegramUpdates,
		private readonly send: SendReply = sendTelegramMessage,
	) {}

	/** Resolves to the number of commands answered. */
	async poll(): Promise<number> {
		const updates = await this.fetchUpdates(this.offset);
		let answered = 0;

		for (const update of updates) {
			this.offset = Math.max(this.offset, update.update_id + 1);

			const message = update.message;
			if (!message?.text || String(message.chat.id) !== this.chatId) continue;

			const reply = this.handler.respond(message.text);
			if (!reply) continue;

			try {
				await this.send(reply, "HTML");
				answered++;
			} catch (err) {
				logger.error({ updateId: update.update_id, err }, "Failed to answer command");
			}
		}

		return answered;
	}
}
