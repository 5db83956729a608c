import chalk from "chalk";

export type LogContext = Record<string, unknown>;

export type Logger = {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, context?: LogContext): void;
};

type Level = keyof Logger;

const LEVEL_TAGS: Record<Level, () => string> = {
	debug: () => chalk.gray("debug"),
	info: () => chalk.cyan("info"),
	warn: () => chalk.yellow("warning"),
	error: () => chalk.red("error"),
};

export type ConsoleLoggerOptions = {
	verbose?: boolean;
	write?: (line: string) => void;
};

export function createConsoleLogger(
	options: ConsoleLoggerOptions = {},
): Logger {
	const write = options.write ?? ((line: string) => console.error(line));
	const log = (level: Level, message: string, context?: LogContext) => {
		if (level === "debug" && !options.verbose) {
			return;
		}

		write(`${LEVEL_TAGS[level]()}: ${message}${formatContext(context)}`);
	};

	return {
		debug: (message, context) => log("debug", message, context),
		info: (message, context) => log("info", message, context),
		warn: (message, context) => log("warn", message, context),
		error: (message, context) => log("error", message, context),
	};
}

export const silentLogger: Logger = {
	debug() {},
	info() {},
	warn() {},
	error() {},
};

function formatContext(context?: LogContext): string {
	if (!context) {
		return "";
	}

	const entries = Object.entries(context).filter(
		([, value]) => value !== undefined,
	);
	if (entries.length === 0) {
		return "";
	}

	return chalk.gray(
		` ${entries.map(([key, value]) => `${key}=${formatValue(value)}`).join(" ")}`,
	);
}

function formatValue(value: unknown): string {
	if (typeof value === "string") {
		return /\s/.test(value) ? JSON.stringify(value) : value;
	}

	if (value instanceof Error) {
		return JSON.stringify(value.message);
	}

	return JSON.stringify(value) ?? String(value);
}
