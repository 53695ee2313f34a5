/**
 * Logger Module
 *
 * Pino-based structured logging. The dashboard owns the terminal, so log lines
 * never go to stdout: they are written to WINDGAUGE_LOG_FILE when it is set
 * (pretty-printed in development), and are silenced otherwise unless LOG_LEVEL
 * asks for them, in which case they go to stderr.
 */

import pino from "pino";

const isDev = process.env.NODE_ENV !== "production";
const logFile = process.env.WINDGAUGE_LOG_FILE;

function resolveLevel(): string {
	if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
	if (!logFile) return "silent";
	return isDev ? "debug" : "info";
}

function resolveDestination(): pino.DestinationStream {
	return pino.destination({ dest: logFile ?? 2, mkdir: logFile !== undefined, sync: false });
}

export const logger =
	logFile && isDev
		? pino({
				level: resolveLevel(),
				transport: {
					target: "pino-pretty",
					options: {
						destination: logFile,
						mkdir: true,
						colorize: false,
						ignore: "pid,hostname",
						translateTime: "HH:MM:ss",
					},
				},
			})
		: pino({ level: resolveLevel() }, resolveDestination());

// Child loggers for different components
export const fetchLogger = logger.child({ module: "fetch" });
export const dataLogger = logger.child({ module: "data" });
export const dashboardLogger = logger.child({ module: "dashboard" });
export const inputLogger = logger.child({ module: "input" });
export const cliLogger = logger.child({ module: "cli" });
