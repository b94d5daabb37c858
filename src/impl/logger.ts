/**
 * Logging.
 *
 * Components accept an optional pino Logger and log through a child bound
 * to their component name. Without one they fall back to a shared root
 * logger whose level comes from LOG_LEVEL.
 */

import {pino, type DestinationStream, type Logger} from "pino";

export type {Logger};

export type LogLevel =
	| "fatal"
	| "error"
	| "warn"
	| "info"
	| "debug"
	| "trace"
	| "silent";

export interface LoggerOptions {
	level?: LogLevel;
	/** Where log lines are written (default: stdout). */
	destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
	const config = {
		name: "sluice",
		level: options.level ?? "info",
	};
	return options.destination ? pino(config, options.destination) : pino(config);
}

let rootLogger: Logger | undefined;

function isLogLevel(value: string | undefined): value is LogLevel {
	return (
		value === "fatal" ||
		value === "error" ||
		value === "warn" ||
		value === "info" ||
		value === "debug" ||
		value === "trace" ||
		value === "silent"
	);
}

/**
 * The shared logger used when a component is given none.
 */
export function getRootLogger(): Logger {
	if (!rootLogger) {
		const level = process.env.LOG_LEVEL;
		rootLogger = createLogger({level: isLogLevel(level) ? level : "info"});
	}
	return rootLogger;
}

/**
 * Child logger for one component.
 */
export function componentLogger(component: string, logger?: Logger): Logger {
	return (logger ?? getRootLogger()).child({component});
}
