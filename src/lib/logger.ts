/**
 * @fileoverview Logging setup.
 *
 * Log entries go to the console (Effect's default logger) and are appended to
 * <data_dir>/logs/reply-drafter.log in a line-oriented format:
 *
 *   2024-05-01T10:00:00.000Z [INFO ] Tick finished chat="42" spans=[tick=12ms]
 */

import * as Fs from "node:fs";
import { Cause, type HashMap, Layer, type List, LogLevel, type LogSpan, Logger } from "effect";
import type { LoggingConfig } from "../config/index.js";
import { getLogFilePath, getLogsDirectory } from "./paths.js";

const formatLevel = (level: LogLevel.LogLevel): string => level.label.padEnd(5);

const formatAnnotations = (annotations: HashMap.HashMap<string, unknown>): string => {
	const pairs: string[] = [];
	for (const [key, value] of annotations) {
		pairs.push(`${key}=${JSON.stringify(value)}`);
	}
	return pairs.length > 0 ? ` ${pairs.join(" ")}` : "";
};

const formatCause = (cause: Cause.Cause<unknown>): string =>
	Cause.isEmpty(cause) ? "" : ` cause=${Cause.pretty(cause)}`;

const formatSpans = (spans: List.List<LogSpan.LogSpan>, now: number): string => {
	const pairs: string[] = [];
	for (const span of spans) {
		pairs.push(`${span.label}=${now - span.startTime}ms`);
	}
	return pairs.length > 0 ? ` spans=[${pairs.join(", ")}]` : "";
};

const formatValue = (value: unknown): string => {
	if (typeof value === "string") {
		return value;
	}
	try {
		return JSON.stringify(value) ?? String(value);
	} catch {
		return String(value);
	}
};

const formatMessage = (message: unknown): string =>
	Array.isArray(message) ? message.map(formatValue).join(" ") : formatValue(message);

/**
 * Formats one log entry as a single line (without the trailing newline).
 */
export const formatLogEntry = (options: Logger.Logger.Options<unknown>): string => {
	const { logLevel, message, annotations, cause, date, spans } = options;
	return [
		`${date.toISOString()} [${formatLevel(logLevel)}] ${formatMessage(message)}`,
		formatAnnotations(annotations),
		formatSpans(spans, date.getTime()),
		formatCause(cause),
	].join("");
};

/**
 * Creates a logger appending to the log file under `dataDir`.
 * The logs directory is created eagerly.
 */
export const createFileLogger = (dataDir: string): Logger.Logger<unknown, void> => {
	const logPath = getLogFilePath(dataDir);
	Fs.mkdirSync(getLogsDirectory(dataDir), { recursive: true });

	return Logger.make((options) => {
		const entry = `${formatLogEntry(options)}\n`;
		// Effect loggers are synchronous
		try {
			Fs.appendFileSync(logPath, entry, "utf-8");
		} catch {
			process.stderr.write(`[LOG WRITE ERROR] ${entry}`);
		}
	});
};

const LEVELS: Record<LoggingConfig["level"], LogLevel.LogLevel> = {
	debug: LogLevel.Debug,
	info: LogLevel.Info,
	warning: LogLevel.Warning,
	error: LogLevel.Error,
};

export const toLogLevel = (level: LoggingConfig["level"]): LogLevel.LogLevel => LEVELS[level];

/**
 * Console plus file logging at the configured minimum level.
 */
export const LoggerLive = (dataDir: string, logging: LoggingConfig): Layer.Layer<never> =>
	Layer.merge(
		Logger.replace(Logger.defaultLogger, Logger.zip(Logger.defaultLogger, createFileLogger(dataDir))),
		Logger.minimumLogLevel(toLogLevel(logging.level)),
	);
