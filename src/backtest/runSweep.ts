import { fetchKlineHistory } from "../clients/binance";
import { config } from "../config";
import { computeIndicators } from "../services/indicatorService";
import { logger } from "../utils/logger";
import {
	DEFAULT_SWEEP_GRID,
	expandGrid,
	rankSweepResults,
	type SweepResult,
} from "./parameterSweep";
import { backtestConfigFor } from "./runBacktest";
import { runSweep } from "./sweepPool";

export function formatSweepResult(rank: number, result: SweepResult): string {
	const o = result.overrides;
	const pf = Number.isFinite(result.profitFactor)
		? result.profitFactor.toFixed(2)
		: "inf";
	return [
		`${rank}. ADX>${o.trendStrengthFloor} | RSI ${o.oscillatorOversold}-${o.oscillatorOverbought} | ATR ${o.stopMultiplier}x | RR ${o.rewardRisk} | Score>=${o.minScore} | ${o.trendFilter ? "Trend" : "Both"}`,
		`   P/L: $${result.netPnl.toFixed(2)} | WR: ${result.winRate.toFixed(1)}% | PF: ${pf} | DD: ${result.maxDrawdownPct.toFixed(1)}% | Trades: ${result.trades}`,
	].join("\n");
}

async function main() {
	const symbol = (process.argv[2] || config.backtest.symbol).toUpperCase();
	const bars = await fetchKlineHistory(symbol, config.strategy.interval, config.backtest.bars);
	const indicatorBars = computeIndicators(bars);
	if (!indicatorBars) {
		throw new Error(`Indicators unavailable for ${symbol} (${bars.length} bars)`);
	}

	const combos = expandGrid(DEFAULT_SWEEP_GRID);
	const startedAt = Date.now();
	const results = await runSweep(indicatorBars, backtestConfigFor(symbol), combos, {
		workers: config.backtest.workers,
	});
	const ranked = rankSweepResults(results, config.backtest.minTrades);

	logger.info(
		{
			symbol,
			combinations: combos.length,
			qualifying: ranked.length,
			elapsedMs: Date.now() - startedAt,
		},
		"Sweep complete",
	);

	const top = ranked.slice(0, 10).map((r, i) => formatSweepResult(i + 1, r));
	process.stdout.write(
		`${top.length > 0 ? top.join("\n\n") : "No combination reached the minimum trade count."}\n`,
	);
}

if (require.main === module) {
	main().catch((err) => {
		logger.error({ err }, "Sweep failed");
		process.exitCode = 1;
	});
}
