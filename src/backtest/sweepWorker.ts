/**
 * Worker thread entry for the parameter sweep. Receives the indicator dataset
 * and a batch of overrides, posts back one result per combination.
 */

import { parentPort } from "node:worker_threads";
import type { IndicatorBar } from "../types";
import { type BacktestConfig, simulate } from "./backtestSimulator";
import {
	applyOverrides,
	type SweepOverrides,
	type SweepResult,
	toSweepResult,
} from "./parameterSweep";

export type SweepJob = { jobId: number; overrides: SweepOverrides };

export type SweepWorkerRunPayload = {
	type: "runBatch";
	indicatorBars: IndicatorBar[];
	baseConfig: BacktestConfig;
	jobs: SweepJob[];
};

export type SweepWorkerResultPayload = {
	type: "batchResult";
	results: Array<{ jobId: number; result: SweepResult }>;
};

export type SweepWorkerErrorPayload = {
	type: "error";
	jobId: number;
	error: string;
};

export function runSweepJob(
	indicatorBars: IndicatorBar[],
	baseConfig: BacktestConfig,
	overrides: SweepOverrides,
): SweepResult {
	const report = simulate(indicatorBars, {
		...baseConfig,
		profile: applyOverrides(baseConfig.profile, overrides),
	});
	return toSweepResult(overrides, report);
}

function runBatch(payload: SweepWorkerRunPayload): void {
	const results: SweepWorkerResultPayload["results"] = [];

	for (const { jobId, overrides } of payload.jobs) {
		try {
			results.push({
				jobId,
				result: runSweepJob(payload.indicatorBars, payload.baseConfig, overrides),
			});
		} catch (err) {
			parentPort?.postMessage({
				type: "error",
				jobId,
				error: err instanceof Error ? err.message : String(err),
			} satisfies SweepWorkerErrorPayload);
		}
	}

	parentPort?.postMessage({
		type: "batchResult",
		results,
	} satisfies SweepWorkerResultPayload);
	parentPort?.close();
}

parentPort?.on("message", (payload: SweepWorkerRunPayload) => {
	if (payload.type === "runBatch") {
		runBatch(payload);
	}
});
