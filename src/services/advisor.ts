import { z } from "zod";
import { createGeminiModel, type TextModel } from "../clients/gemini";
import type { AdvisoryVerdict, Signal, TradeParams } from "../types";
import { logger } from "../utils/logger";
import { INDICATOR_PERIODS } from "./indicatorService";

export interface SignalAdvisor {
	review(params: TradeParams, signal: Signal): Promise<AdvisoryVerdict>;
}

const verdictSchema = z.object({
	approved: z.boolean(),
	reasoning: z.string(),
});

function formatIndicator(value: number | undefined, digits: number): string {
	return value === undefined ? "n/a" : value.toFixed(digits);
}

export function buildReviewPrompt(params: TradeParams, signal: Signal): string {
	const { indicators } = params;
	const { emaFast, emaMedium, emaSlow } = INDICATOR_PERIODS;
	const reasons = signal.reasons
		.filter((r) => r.direction === params.direction)
		.map((r) => `${r.check} (+${r.weight})`)
		.join(", ");

	return [
		"You are a risk reviewer for a rules-based trading system.",
		`Proposed trade: ${params.direction} ${params.symbol}`,
		`Entry: ${params.entryPrice} | Stop: ${params.stopLoss} | Target: ${params.takeProfit}`,
		`Scores: buy ${signal.buyScore} / sell ${signal.sellScore}`,
		`Reasons: ${reasons || "none"}`,
		`EMA ${emaFast}/${emaMedium}/${emaSlow}: ${formatIndicator(indicators.emaFast, 5)} / ${formatIndicator(indicators.emaMedium, 5)} / ${formatIndicator(indicators.emaSlow, 5)}`,
		`RSI: ${formatIndicator(indicators.rsi, 1)} | ADX: ${formatIndicator(indicators.adx, 1)} | ATR: ${formatIndicator(indicators.atr, 5)}`,
		`MACD histogram: ${formatIndicator(indicators.macdHistogram, 6)} | Band position: ${formatIndicator(indicators.bandPosition, 2)}`,
		"Approve only if the setup is coherent with the trend and momentum.",
		'Respond with JSON only: {"approved": true|false, "reasoning": "<one or two sentences>"}',
	].join("\n");
}

/** Pulls the first JSON object out of a reply that may carry code fences. */
export function parseVerdict(text: string): AdvisoryVerdict | null {
	const match = text.match(/\{[\s\S]*\}/);
	if (!match) return null;

	let raw: unknown;
	try {
		raw = JSON.parse(match[0]);
	} catch {
		return null;
	}

	const parsed = verdictSchema.safeParse(raw);
	return parsed.success ? parsed.data : null;
}

/**
 * Second-opinion gate backed by a language model. Without a model every
 * signal passes; a failed or unreadable review rejects the signal.
 */
export class ModelAdvisor implements SignalAdvisor {
	constructor(private readonly model: TextModel | null) {}

	async review(params: TradeParams, signal: Signal): Promise<AdvisoryVerdict> {
		if (!this.model) {
			return { approved: true, reasoning: "Advisory review skipped (no model configured)" };
		}

		try {
			const text = await this.model(buildReviewPrompt(params, signal));
			const verdict = parseVerdict(text);
			if (!verdict) {
				logger.warn({ symbol: params.symbol, text: text.slice(0, 200) }, "Unreadable advisory reply");
				return { approved: false, reasoning: "Advisory reply could not be parsed" };
			}
			logger.info(
				{ symbol: params.symbol, approved: verdict.approved },
				"Advisory review complete",
			);
			return verdict;
		} catch (err) {
			logger.error({ symbol: params.symbol, err }, "Advisory review failed");
			return {
				approved: false,
				reasoning: `Advisory review failed: ${err instanceof Error ? err.message : String(err)}`,
			};
		}
	}
}

export function createAdvisor(apiKey: string, model: string): SignalAdvisor {
	return new ModelAdvisor(apiKey ? createGeminiModel(apiKey, model) : null);
}
