/**
 * @title Logging
 * @description Level-gated logging for @resource-spec/core.
 *
 * @module logging
 */

import type { LogLevel } from "./settings.js";
import { LOG_LEVELS, getSettings } from "./settings.js";

/**
 * Receives log messages that pass the configured level.
 */
export type LogSink = (message: string, level: LogLevel) => void;

function consoleSink(message: string, level: LogLevel): void {
	switch (level) {
		case "error":
			console.error(message);
			break;
		case "warn":
			console.warn(message);
			break;
		case "info":
			console.info(message);
			break;
		default:
			console.debug(message);
	}
}

let sink: LogSink = consoleSink;

/**
 * Replace the log sink.
 *
 * @param next - New sink, or undefined to restore console output
 * @returns The previous sink
 */
export function setLogSink(next?: LogSink): LogSink {
	const previous = sink;
	sink = next ?? consoleSink;
	return previous;
}

/**
 * Logs a message if its level is at or below the configured log level.
 *
 * @param message - The message to log.
 * @param level - The level of the message.
 */
export function logMessage(message: string, level: LogLevel = "info"): void {
	const { logLevel } = getSettings();

	if (LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(logLevel)) {
		sink(message, level);
	}
}
