import pino from "pino";

const level = process.env.LOG_LEVEL || "info";
const pretty = (process.env.LOG_PRETTY || "false").toLowerCase() === "true";

export const logger = pino({
	level,
	base: undefined,
	timestamp: pino.stdTimeFunctions.isoTime,
	transport: pretty
		? { target: "pino-pretty", options: { colorize: true } }
		: undefined,
});
