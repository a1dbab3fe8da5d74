import path from "node:path";
import { describe, expect, it } from "vitest";
import { flatBars, HOUR } from "../__fixtures__/bars";
import { STRATEGY_PROFILES } from "../config/profiles";
import { computeIndicators } from "../services/indicatorService";
import { DEFAULT_LIFECYCLE_RULES } from "../strategy/lifecycle";
import type { Bar } from "../types";
import type { BacktestConfig } from "./backtestSimulator";
import { expandGrid } from "./parameterSweep";
import { assignRoundRobin, resolveWorkerCount, runSweep } from "./sweepPool";

const config: BacktestConfig = {
	symbol: "BTCUSDT",
	profile: STRATEGY_PROFILES.optimized,
	lifecycle: DEFAULT_LIFECYCLE_RULES,
	riskPerTrade: 50,
	initialCapital: 20_000,
	warmupBars: 250,
};

// Trending wave: long enough swings for the scorer to find entries.
function waveBars(count: number): Bar[] {
	return Array.from({ length: count }, (_, i) => {
		const close = 100 + 10 * Math.sin(i / 15) + i * 0.05;
		return {
			timestamp: i * HOUR,
			open: close - 0.3,
			high: close + 1,
			low: close - 1,
			close,
			volume: 10 + (i % 7) * 3,
		};
	});
}

const FIXTURES = path.join(__dirname, "..", "__fixtures__");

describe("assignRoundRobin", () => {
	it("deals jobs across workers in turn", () => {
		const combos = [1, 2, 3, 4, 5].map((minScore) => ({ minScore }));
		const jobs = assignRoundRobin(combos, 2);

		expect(jobs.map((batch) => batch.map((j) => j.jobId))).toEqual([
			[0, 2, 4],
			[1, 3],
		]);
		expect(jobs[1][0].overrides).toEqual({ minScore: 2 });
	});
});

describe("resolveWorkerCount", () => {
	it("never exceeds the job count", () => {
		expect(resolveWorkerCount(4, 2)).toBe(2);
		expect(resolveWorkerCount(3, 10)).toBe(3);
		expect(resolveWorkerCount(0, 1)).toBe(1);
	});
});

describe("runSweep", () => {
	it("runs in-process when no compiled worker is available", async () => {
		const indicatorBars = computeIndicators(flatBars(300)) ?? [];
		const combos = expandGrid({ minScore: [4, 5], rewardRisk: [2, 3] });

		const results = await runSweep(indicatorBars, config, combos, {
			workers: 2,
			workerPath: path.join(__dirname, "missing-worker.js"),
		});

		expect(results.map((r) => r.overrides)).toEqual(combos);
		expect(results.every((r) => r.trades === 0 && r.profitFactor === 0)).toBe(true);
	});

	it("matches the in-process results when run on worker threads", async () => {
		const indicatorBars = computeIndicators(waveBars(900)) ?? [];
		const combos = expandGrid({
			trendStrengthFloor: [20, 30],
			minScore: [4, 5],
			trendFilter: [true, false],
		});

		const parallel = await runSweep(indicatorBars, config, combos, {
			workers: 3,
			workerPath: path.join(FIXTURES, "sweepWorker.js"),
		});
		const inProcess = await runSweep(indicatorBars, config, combos, { workers: 1 });

		expect(parallel).toHaveLength(8);
		expect(parallel.map((r) => r.overrides)).toEqual(combos);
		expect(parallel).toEqual(inProcess);
	}, 60_000);

	it("rejects when a worker reports a failed job", async () => {
		const indicatorBars = computeIndicators(flatBars(300)) ?? [];
		const combos = expandGrid({ minScore: [4, 5], rewardRisk: [2, 3] });

		await expect(
			runSweep(indicatorBars, config, combos, {
				workers: 2,
				workerPath: path.join(FIXTURES, "failingSweepWorker.js"),
			}),
		).rejects.toThrow(/^Sweep worker failed 2 job\(s\): simulation failed \(job [01]\)$/);
	}, 30_000);

	it("returns nothing for an empty grid of jobs", async () => {
		await expect(runSweep([], config, [], { workers: 2 })).resolves.toEqual([]);
	});
});
