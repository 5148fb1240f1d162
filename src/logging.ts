// SPDX-License-Identifier: MIT
// MetaIR Logging
// Component-prefixed console logging, filtered by level

import type { LogLevel } from "./config.js";

const LEVEL_RANK: Record<LogLevel, number> = {
	silent: 0,
	error: 1,
	warn: 2,
	info: 3,
	debug: 4,
};

export interface Logger {
	readonly component: string;
	readonly level: LogLevel;
	error(message: string): void;
	warn(message: string): void;
	info(message: string): void;
	debug(message: string): void;
}

/** Where log lines go; defaults to the global console */
export type LogSink = Pick<Console, "error" | "warn" | "info" | "debug">;

export function isLevelEnabled(configured: LogLevel, level: LogLevel): boolean {
	return level !== "silent" && LEVEL_RANK[level] <= LEVEL_RANK[configured];
}

export function createLogger(
	component: string,
	level: LogLevel,
	sink: LogSink = console,
): Logger {
	const prefix = "[" + component + "] ";
	const emit = (at: Exclude<LogLevel, "silent">, message: string): void => {
		if (isLevelEnabled(level, at)) {
			sink[at](prefix + message);
		}
	};
	return {
		component,
		level,
		error: (message) => { emit("error", message); },
		warn: (message) => { emit("warn", message); },
		info: (message) => { emit("info", message); },
		debug: (message) => { emit("debug", message); },
	};
}
