import { fetchKlineHistory } from "../clients/binance";
import { config } from "../config";
import { getStrategyProfile } from "../config/profiles";
import { logger } from "../utils/logger";
import { type BacktestConfig, type BacktestReport, runBacktest } from "./backtestSimulator";

export function backtestConfigFor(symbol: string): BacktestConfig {
	return {
		symbol,
		profile: getStrategyProfile(config.strategy.profile),
		lifecycle: config.lifecycle,
		riskPerTrade: config.strategy.riskPerTrade,
		initialCapital: config.backtest.initialCapital,
		warmupBars: config.backtest.warmupBars,
	};
}

export function formatReport(report: BacktestReport): string {
	const pf = Number.isFinite(report.profitFactor)
		? report.profitFactor.toFixed(2)
		: "inf";
	return [
		`Backtest ${report.symbol} over ${report.bars} bars`,
		`Trades: ${report.trades} (W ${report.wins} / L ${report.losses} / BE ${report.breakevens})`,
		`Win rate: ${report.winRate.toFixed(1)}%`,
		`Long: ${report.long.trades} trades, ${report.long.wins} wins | Short: ${report.short.trades} trades, ${report.short.wins} wins`,
		`Net P/L: $${report.netPnl.toFixed(2)} | Final balance: $${report.finalBalance.toFixed(2)}`,
		`Profit factor: ${pf} | Max drawdown: ${report.maxDrawdownPct.toFixed(1)}%`,
		`Average holding: ${report.averageHoldingBars.toFixed(1)} bars`,
	].join("\n");
}

async function main() {
	const symbol = (process.argv[2] || config.backtest.symbol).toUpperCase();
	logger.info(
		{ symbol, interval: config.strategy.interval, bars: config.backtest.bars },
		"Fetching backtest history",
	);

	const bars = await fetchKlineHistory(symbol, config.strategy.interval, config.backtest.bars);
	const report = runBacktest(bars, backtestConfigFor(symbol));

	logger.info(
		{
			trades: report.trades,
			netPnl: report.netPnl,
			maxDrawdownPct: report.maxDrawdownPct,
		},
		"Backtest complete",
	);
	process.stdout.write(`${formatReport(report)}\n`);
}

if (require.main === module) {
	main().catch((err) => {
		logger.error({ err }, "Backtest failed");
		process.exitCode = 1;
	});
}
