/**
 * Runs sweep combinations in parallel across CPU cores. Each worker gets its
 * own copy of the indicator dataset plus a round-robin share of the jobs.
 */

import { existsSync } from "node:fs";
import { cpus } from "node:os";
import path from "node:path";
import { Worker } from "node:worker_threads";
import { from, lastValueFrom } from "rxjs";
import { mergeMap, toArray } from "rxjs/operators";
import type { IndicatorBar } from "../types";
import { logger } from "../utils/logger";
import type { BacktestConfig } from "./backtestSimulator";
import type { SweepOverrides, SweepResult } from "./parameterSweep";
import {
	runSweepJob,
	type SweepJob,
	type SweepWorkerErrorPayload,
	type SweepWorkerResultPayload,
	type SweepWorkerRunPayload,
} from "./sweepWorker";

export type SweepPoolOptions = {
	/** 0 picks one per core minus one. */
	workers: number;
	/** Compiled worker script; absent when running from TypeScript sources. */
	workerPath?: string;
};

export function resolveWorkerCount(requested: number, jobs: number): number {
	const wanted = requested > 0 ? requested : Math.max(1, cpus().length - 1);
	return Math.max(1, Math.min(wanted, jobs));
}

export function assignRoundRobin(
	combos: SweepOverrides[],
	workers: number,
): SweepJob[][] {
	const assignments: SweepJob[][] = Array.from({ length: workers }, () => []);
	combos.forEach((overrides, jobId) => {
		assignments[jobId % workers].push({ jobId, overrides });
	});
	return assignments;
}

function runInProcess(
	indicatorBars: IndicatorBar[],
	baseConfig: BacktestConfig,
	combos: SweepOverrides[],
): SweepResult[] {
	return combos.map((overrides) => runSweepJob(indicatorBars, baseConfig, overrides));
}

function runWorker(
	workerPath: string,
	payload: SweepWorkerRunPayload,
): Promise<SweepWorkerResultPayload["results"]> {
	return new Promise((resolve, reject) => {
		const worker = new Worker(workerPath);
		const errors: SweepWorkerErrorPayload[] = [];
		let results: SweepWorkerResultPayload["results"] = [];

		worker.on(
			"message",
			(message: SweepWorkerResultPayload | SweepWorkerErrorPayload) => {
				if (message.type === "batchResult") {
					results = message.results;
				} else {
					errors.push(message);
				}
			},
		);
		worker.on("error", reject);
		worker.on("exit", (code) => {
			if (code !== 0) {
				reject(new Error(`Sweep worker exited with code ${code}`));
			} else if (errors.length > 0) {
				reject(
					new Error(
						`Sweep worker failed ${errors.length} job(s): ${errors[0].error} (job ${errors[0].jobId})`,
					),
				);
			} else {
				resolve(results);
			}
		});

		worker.postMessage(payload);
	});
}

/** Results come back in the order of `combos`. */
export async function runSweep(
	indicatorBars: IndicatorBar[],
	baseConfig: BacktestConfig,
	combos: SweepOverrides[],
	options: SweepPoolOptions,
): Promise<SweepResult[]> {
	if (combos.length === 0) return [];

	const workerPath = options.workerPath ?? path.join(__dirname, "sweepWorker.js");
	const workers = resolveWorkerCount(options.workers, combos.length);

	if (workers === 1 || !existsSync(workerPath)) {
		logger.info({ combinations: combos.length }, "Running sweep in-process");
		return runInProcess(indicatorBars, baseConfig, combos);
	}

	logger.info({ combinations: combos.length, workers }, "Running sweep on worker threads");
	const batches = await lastValueFrom(
		from(assignRoundRobin(combos, workers)).pipe(
			mergeMap((jobs) =>
				runWorker(workerPath, {
					type: "runBatch",
					indicatorBars,
					baseConfig,
					jobs,
				}),
			),
			toArray(),
		),
	);

	const ordered: SweepResult[] = new Array(combos.length);
	for (const { jobId, result } of batches.flat()) {
		ordered[jobId] = result;
	}
	return ordered;
}
