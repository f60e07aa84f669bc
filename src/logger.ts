// All output goes to stderr; stdout is reserved for protocol traffic.
const LEVELS = { debug: 10, info: 20, warn: 30, error: 40 } as const;

export type LogLevel = keyof typeof LEVELS;

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
	threshold = level;
}

function emit(level: LogLevel, args: unknown[]): void {
	if (LEVELS[level] < LEVELS[threshold]) return;
	console.error(`[${level.toUpperCase()}]`, ...args);
}

export const logger = {
	info: (...args: unknown[]) => emit("info", args),
	warn: (...args: unknown[]) => emit("warn", args),
	error: (...args: unknown[]) => emit("error", args),
	debug: (...args: unknown[]) => emit("debug", args),
};
