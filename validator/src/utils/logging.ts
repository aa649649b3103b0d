import { type LevelWithSilent, type Logger, pino } from "pino";
import { PinoPretty } from "pino-pretty";

export type LoggingConfig = {
	level?: LevelWithSilent;
	pretty?: boolean;
};

export const createLogger = ({ level = "info", pretty = false }: LoggingConfig = {}): Logger =>
	pretty ? pino({ level }, PinoPretty({ colorize: true, sync: true })) : pino({ level });
