import { type ParseMode, sendTelegramMessage } from "../clients/telegram";
import type {
	AdvisoryVerdict,
	ClosedTrade,
	OpenTrade,
	StopAdjustment,
	TradeParams,
} from "../types";
import { logger } from "../utils/logger";

/**
 * Fire-and-forget trade events. Implementations report delivery as a boolean
 * and never reject.
 */
export interface TradeNotifier {
	signalRaised(params: TradeParams, verdict: AdvisoryVerdict): Promise<boolean>;
	stopTrailed(
		trade: OpenTrade,
		adjustment: StopAdjustment,
		price: number,
	): Promise<boolean>;
	tradeClosed(trade: ClosedTrade): Promise<boolean>;
}

export type SignalStrength = "STRONG" | "MODERATE" | "WEAK";

export function signalStrength(params: TradeParams): SignalStrength {
	const adx = params.indicators.adx ?? 0;
	const volumeRatio = params.indicators.volumeRatio ?? 1;
	if (adx > 30 && volumeRatio > 1.3) return "STRONG";
	if (adx > 25) return "MODERATE";
	return "WEAK";
}

export function formatPrice(value: number): string {
	return Math.abs(value) >= 100 ? value.toFixed(2) : value.toFixed(5);
}

export function escapeHtml(text: string): string {
	return text
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;");
}

function stripHtml(text: string): string {
	return text
		.replace(/<\/?(b|code)>/g, "")
		.replace(/&lt;/g, "<")
		.replace(/&gt;/g, ">")
		.replace(/&amp;/g, "&");
}

const RULE = "━━━━━━━━━━━━━━━━━━━━━";

export function formatSignalMessage(
	params: TradeParams,
	verdict: AdvisoryVerdict,
): string {
	const emoji = params.direction === "LONG" ? "🟢" : "🔴";
	const entry = (params.entryBand.min + params.entryBand.max) / 2;
	const adx = params.indicators.adx ?? 0;
	const rsi = params.indicators.rsi ?? 0;

	return [
		`${emoji} <b>${params.direction} ${escapeHtml(params.symbol)}</b> ${emoji}`,
		RULE,
		`Entry: <code>${formatPrice(entry)}</code> (${formatPrice(params.entryBand.min)} - ${formatPrice(params.entryBand.max)})`,
		`SL: <code>${formatPrice(params.stopLoss)}</code>`,
		`TP: <code>${formatPrice(params.takeProfit)}</code>`,
		`Size: <code>${params.positionSize}</code>`,
		RULE,
		`Risk: $${params.riskAmount.toFixed(0)} | Reward: $${params.rewardEstimate.toFixed(0)}`,
		`Strength: ${signalStrength(params)}`,
		`ADX: ${adx.toFixed(0)} | RSI: ${rsi.toFixed(0)}`,
		`<b>Advisor:</b> ${escapeHtml(verdict.reasoning.slice(0, 200))}`,
	].join("\n");
}

export function formatStopTrailedMessage(
	trade: OpenTrade,
	adjustment: StopAdjustment,
	price: number,
): string {
	const locked =
		trade.direction === "LONG"
			? adjustment.newStop - trade.entryPrice
			: trade.entryPrice - adjustment.newStop;

	return [
		`🔄 <b>STOP MOVED: ${escapeHtml(trade.symbol)}</b>`,
		RULE,
		`Trade: ${trade.direction}`,
		`Entry: ${formatPrice(trade.entryPrice)}`,
		`Current: ${formatPrice(price)}`,
		`Old SL: <code>${formatPrice(adjustment.oldStop)}</code>`,
		`New SL: <code>${formatPrice(adjustment.newStop)}</code>`,
		`Locked: ${formatPrice(locked)} (${(locked / trade.riskDistance).toFixed(2)}R)`,
	].join("\n");
}

const RESULT_LABELS: Record<ClosedTrade["state"], string> = {
	CLOSED_WIN: "✅ WIN",
	CLOSED_LOSS: "❌ LOSS",
	CLOSED_BREAKEVEN: "⚖️ BREAKEVEN",
};

export function formatTradeClosedMessage(trade: ClosedTrade): string {
	const sign = trade.pnl >= 0 ? "+" : "-";
	return [
		`${RESULT_LABELS[trade.state]} <b>TRADE CLOSED: ${escapeHtml(trade.symbol)}</b>`,
		RULE,
		`Type: ${trade.direction}`,
		`Entry: ${formatPrice(trade.entryPrice)}`,
		`Exit: ${formatPrice(trade.exitPrice)}`,
		`Reason: ${trade.exitReason}`,
		`P/L: ${sign}$${Math.abs(trade.pnl).toFixed(2)} (${trade.pnlR.toFixed(2)}R)`,
		`Stop trailed: ${trade.stopMovedToBreakeven ? "yes" : "no"}`,
	].join("\n");
}

export type SendMessage = (text: string, parseMode?: ParseMode) => Promise<boolean>;

export class TelegramNotifier implements TradeNotifier {
	constructor(private readonly send: SendMessage = sendTelegramMessage) {}

	signalRaised(params: TradeParams, verdict: AdvisoryVerdict): Promise<boolean> {
		return this.deliver(params.symbol, formatSignalMessage(params, verdict));
	}

	stopTrailed(
		trade: OpenTrade,
		adjustment: StopAdjustment,
		price: number,
	): Promise<boolean> {
		return this.deliver(
			trade.symbol,
			formatStopTrailedMessage(trade, adjustment, price),
		);
	}

	tradeClosed(trade: ClosedTrade): Promise<boolean> {
		return this.deliver(trade.symbol, formatTradeClosedMessage(trade));
	}

	// HTML first, then the same text without markup
	private async deliver(symbol: string, html: string): Promise<boolean> {
		try {
			return await this.send(html, "HTML");
		} catch (err) {
			logger.warn({ symbol, err }, "HTML notification failed, retrying as plain text");
		}

		try {
			return await this.send(stripHtml(html));
		} catch (err) {
			logger.error({ symbol, err }, "Failed to send notification");
			return false;
		}
	}
}
