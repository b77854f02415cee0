import { pino, type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL ?? "warn", destination?: DestinationStream): Logger {
	const options: LoggerOptions = {
		level,
		base: {
			service: "sheet-tables",
		},
	};

	return destination ? pino(options, destination) : pino(options);
}
