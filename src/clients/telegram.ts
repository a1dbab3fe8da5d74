import axios from "axios";
import { z } from "zod";
import { config } from "../config";
import { logger } from "../utils/logger";

export type ParseMode = "HTML" | "Markdown";

/** Resolves false when no bot is configured; rejects when the Bot API call fails. */
export async function sendTelegramMessage(
	text: string,
	parseMode?: ParseMode,
): Promise<boolean> {
	if (!config.telegram.botToken || !config.telegram.chatId) {
		logger.warn("Telegram bot token or chat id missing, skipping notification");
		return false;
	}

	const url = `https://api.telegram.org/bot${config.telegram.botToken}/sendMessage`;

	await axios.post(url, {
		chat_id: config.telegram.chatId,
		text,
		parse_mode: parseMode,
	});
	return true;
}

const updateSchema = z.object({
	update_id: z.number(),
	message: z
		.object({
			chat: z.object({ id: z.number() }),
			text: z.string().optional(),
		})
		.optional(),
});

const updatesResponseSchema = z.object({
	ok: z.boolean(),
	result: z.array(updateSchema),
});

export type TelegramUpdate = z.infer<typeof updateSchema>;

/** Pending bot updates from `offset` on; empty when no bot is configured. */
export async function fetchTelegramUpdates(offset: number): Promise<TelegramUpdate[]> {
	if (!config.telegram.botToken) return [];

	const url = `https://api.telegram.org/bot${config.telegram.botToken}/getUpdates`;
	const { data } = await axios.get(url, {
		params: { offset, timeout: 0, allowed_updates: JSON.stringify(["message"]) },
	});
	return updatesResponseSchema.parse(data).result;
}
