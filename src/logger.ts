import pino from "pino";

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

let rootLogger: Logger | undefined;

function getRootLogger(): Logger {
	rootLogger ??= pino(
		{ name: "tgz2zip", level: "info" },
		pino.destination(2),
	);
	return rootLogger;
}

/** Sets the root level. Children take the level in effect when they are created. */
export function setLogLevel(level: LogLevel): void {
	getRootLogger().level = level;
}

export function createLogger(component: string): Logger {
	return getRootLogger().child({ component });
}
