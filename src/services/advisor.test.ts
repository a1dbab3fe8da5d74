import { describe, expect, it, vi } from "vitest";
import { bullishWindow, tradeParams } from "../__fixtures__/bars";
import { STRATEGY_PROFILES } from "../config/profiles";
import { evaluate } from "../strategy/signalScorer";
import { buildReviewPrompt, ModelAdvisor, parseVerdict } from "./advisor";

const signal = evaluate(bullishWindow(), STRATEGY_PROFILES.optimized.scorer);
const params = tradeParams({ symbol: "BTCUSDT" });

describe("parseVerdict", () => {
	it("reads a fenced JSON reply", () => {
		expect(
			parseVerdict('```json\n{"approved": false, "reasoning": "weak momentum"}\n```'),
		).toEqual({ approved: false, reasoning: "weak momentum" });
	});

	it("rejects replies without the expected fields", () => {
		expect(parseVerdict('{"approved": "yes"}')).toBeNull();
		expect(parseVerdict("looks fine to me")).toBeNull();
		expect(parseVerdict("{broken")).toBeNull();
	});
});

describe("buildReviewPrompt", () => {
	it("describes the trade and the reasons on its side", () => {
		const prompt = buildReviewPrompt(params, signal);

		expect(prompt).toContain("Proposed trade: LONG BTCUSDT");
		expect(prompt).toContain("Scores: buy 8.5 / sell 0");
		expect(prompt).toContain("Reasons: trend_alignment (+2), oscillator_recovery (+1.5)");
	});

	it("labels the moving averages with the periods they are computed over", () => {
		const lines = buildReviewPrompt(params, signal).split("\n");
		expect(lines[5]).toBe("EMA 20/50/200: 104.00000 / 102.00000 / 100.00000");
	});
});

describe("ModelAdvisor", () => {
	it("approves everything without a model", async () => {
		const verdict = await new ModelAdvisor(null).review(params, signal);
		expect(verdict).toEqual({
			approved: true,
			reasoning: "Advisory review skipped (no model configured)",
		});
	});

	it("returns the model's verdict", async () => {
		const model = vi.fn().mockResolvedValue('{"approved": true, "reasoning": "clean trend"}');
		const verdict = await new ModelAdvisor(model).review(params, signal);

		expect(verdict).toEqual({ approved: true, reasoning: "clean trend" });
		expect(model).toHaveBeenCalledWith(buildReviewPrompt(params, signal));
	});

	it("rejects when the model fails", async () => {
		const model = vi.fn().mockRejectedValue(new Error("quota exceeded"));
		const verdict = await new ModelAdvisor(model).review(params, signal);

		expect(verdict).toEqual({
			approved: false,
			reasoning: "Advisory review failed: quota exceeded",
		});
	});

	it("rejects an unreadable reply", async () => {
		const model = vi.fn().mockResolvedValue("I would take this trade");
		const verdict = await new ModelAdvisor(model).review(params, signal);

		expect(verdict.approved).toBe(false);
	});
});
