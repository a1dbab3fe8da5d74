import cron from "node-cron";
import { fetchBars } from "./clients/binance";
import { config } from "./config";
import { getStrategyProfile } from "./config/profiles";
import { createAdvisor } from "./services/advisor";
import {
	TelegramCommandHandler,
	TelegramCommandPoller,
} from "./services/commandHandler";
import { TelegramNotifier } from "./services/notifier";
import { BinanceOrderExecutor } from "./services/orderService";
import { SignalCycle } from "./services/signalCycle";
import { TradeManager } from "./services/tradeManager";
import { FileTradeJournal } from "./services/tradeLogger";
import { TradeStore } from "./services/tradeStore";
import { logger } from "./utils/logger";

async function bootstrap() {
	logger.info(
		{
			mode: config.execution.mode,
			symbols: config.strategy.symbols,
			interval: config.strategy.interval,
			profile: config.strategy.profile,
		},
		"Starting trend signal engine",
	);

	const store = new TradeStore({
		filePath: config.paths.tradeState,
		historyLimit: config.strategy.historyLimit,
	});
	await store.load();

	const notifier = new TelegramNotifier();
	const manager = new TradeManager(
		store,
		notifier,
		config.lifecycle,
		new FileTradeJournal(config.paths.tradeLog),
	);
	logger.info({ stats: manager.stats(), open: store.open().length }, "Trade history");

	const cycle = new SignalCycle({
		fetchBars: (symbol) =>
			fetchBars(symbol, config.strategy.interval, config.strategy.lookbackBars),
		manager,
		notifier,
		advisor: createAdvisor(config.gemini.apiKey, config.gemini.model),
		executor: config.execution.mode === "live" ? new BinanceOrderExecutor() : null,
		mode: config.execution.mode,
		profile: getStrategyProfile(config.strategy.profile),
		riskPerTrade: config.strategy.riskPerTrade,
		cooldownMinutes: config.strategy.cooldownMinutes,
	});

	let running = false;
	const runCycle = async () => {
		if (running) {
			logger.warn("Previous signal cycle still running, skipping tick");
			return;
		}
		running = true;
		try {
			await cycle.run(config.strategy.symbols);
		} catch (err) {
			logger.error({ err }, "Signal cycle failed");
		} finally {
			running = false;
		}
	};

	cron.schedule(config.scheduling.signalCron, runCycle, {
		timezone: config.scheduling.timezone,
	});

	if (config.telegram.botToken && config.telegram.chatId) {
		const poller = new TelegramCommandPoller(
			new TelegramCommandHandler({
				store,
				manager,
				mode: config.execution.mode,
				symbols: config.strategy.symbols,
			}),
			config.telegram.chatId,
		);
		let polling = false;
		cron.schedule(config.scheduling.commandPollCron, async () => {
			if (polling) return;
			polling = true;
			try {
				await poller.poll();
			} catch (err) {
				logger.error({ err }, "Telegram command poll failed");
			} finally {
				polling = false;
			}
		});
	}

	if (config.scheduling.runCycleOnStart) {
		await runCycle();
	}
}

bootstrap().catch((err) => {
	logger.error({ err }, "Fatal error");
	process.exitCode = 1;
});
