import { config } from "../config";
import type { Trade } from "../types";
import { logger } from "../utils/logger";
import { appendLine } from "../utils/storage";

export interface TradeJournal {
	record(trade: Trade): Promise<void>;
}

export class FileTradeJournal implements TradeJournal {
	constructor(private readonly filePath: string = config.paths.tradeLog) {}

	async record(trade: Trade): Promise<void> {
		await appendLine(this.filePath, JSON.stringify(trade));
		logger.info(
			{ tradeId: trade.id, symbol: trade.symbol, state: trade.state },
			"Trade recorded",
		);
	}
}
