import path from "node:path";
import dotenv from "dotenv";
import {
	isStrategyProfileName,
	type StrategyProfileName,
} from "./profiles";

dotenv.config();

export type ExecutionMode = "signal" | "live";
export type BarInterval = "15m" | "1h" | "4h" | "1d";

const BAR_INTERVALS: BarInterval[] = ["15m", "1h", "4h", "1d"];

function parseExecutionMode(raw: string | undefined): ExecutionMode {
	return (raw || "signal").toLowerCase() === "live" ? "live" : "signal";
}

function parseBarInterval(raw: string | undefined): BarInterval {
	return BAR_INTERVALS.find((interval) => interval === raw) ?? "1h";
}

function parseProfileName(raw: string | undefined): StrategyProfileName {
	const name = raw || "optimized";
	return isStrategyProfileName(name) ? name : "optimized";
}

function parseSymbols(raw: string | undefined): string[] {
	return (raw || "BTCUSDT")
		.split(",")
		.map((s) => s.trim().toUpperCase())
		.filter(Boolean);
}

const useTestnet =
	(process.env.BINANCE_USE_TESTNET || "true").toLowerCase() === "true";
const futuresUrl =
	process.env.BINANCE_FUTURES_URL ||
	(useTestnet
		? "https://testnet.binancefuture.com"
		: "https://fapi.binance.com");

export const config = {
	binance: {
		apiKey: process.env.BINANCE_API_KEY || "",
		apiSecret: process.env.BINANCE_API_SECRET || "",
		baseUrl: futuresUrl,
		testnet: useTestnet,
	},
	telegram: {
		botToken: process.env.TELEGRAM_BOT_TOKEN || "",
		chatId: process.env.TELEGRAM_CHAT_ID || "",
	},
	gemini: {
		apiKey: process.env.GEMINI_API_KEY || "",
		model: process.env.GEMINI_MODEL || "gemini-2.0-flash",
	},
	execution: {
		mode: parseExecutionMode(process.env.EXECUTION_MODE),
	},
	strategy: {
		symbols: parseSymbols(process.env.SYMBOLS),
		interval: parseBarInterval(process.env.BAR_INTERVAL),
		lookbackBars: Number(process.env.LOOKBACK_BARS || "300"),
		cooldownMinutes: Number(process.env.COOLDOWN_MINUTES || "60"),
		riskPerTrade: Number(process.env.RISK_PER_TRADE || "50"),
		profile: parseProfileName(process.env.STRATEGY_PROFILE),
		historyLimit: Number(process.env.TRADE_HISTORY_LIMIT || "100"),
	},
	lifecycle: {
		breakevenTriggerR: Number(process.env.BREAKEVEN_TRIGGER_R || "1.5"),
		breakevenLockR: Number(process.env.BREAKEVEN_LOCK_R || "0.2"),
		breakevenBandR: Number(process.env.BREAKEVEN_BAND_R || "0.1"),
	},
	backtest: {
		symbol: (process.env.BACKTEST_SYMBOL || "BTCUSDT").toUpperCase(),
		bars: Number(process.env.BACKTEST_BARS || "6000"),
		initialCapital: Number(process.env.BACKTEST_INITIAL_CAPITAL || "20000"),
		warmupBars: 250,
		minTrades: Number(process.env.SWEEP_MIN_TRADES || "15"),
		// 0 = one per CPU core minus one
		workers: Number(process.env.SWEEP_WORKERS || "0"),
	},
	scheduling: {
		signalCron: process.env.SIGNAL_CRON || "*/15 * * * *",
		// six fields: seconds first
		commandPollCron: process.env.TELEGRAM_POLL_CRON || "*/10 * * * * *",
		timezone: "UTC",
		runCycleOnStart:
			(process.env.RUN_CYCLE_ON_START || "true").toLowerCase() === "true",
	},
	paths: {
		tradeState: path.join(process.cwd(), "data/trade-state.json"),
		tradeLog: path.join(process.cwd(), "data/trades.log"),
	},
};
