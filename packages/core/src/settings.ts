/**
 * @title Settings Module
 * @description Runtime settings from environment variables.
 *
 * Settings are read on every call so that changes to the environment take
 * effect without reloading the library.
 *
 * @module settings
 *
 * @envvar RESOURCE_SPEC_LOG_LEVEL - Log level: error, warn, info or debug (default: info).
 * @envvar RESOURCE_SPEC_PERFORM_IO_CHECKS - Check that referenced local files exist (default: true).
 * @envvar RESOURCE_SPEC_LOG_WARNINGS - Log warnings that fall below the active warning level (default: true).
 *
 * The uppercase variants take precedence over lowercase if both are set.
 *
 * @example Validating without touching the filesystem
 * ```bash
 * export RESOURCE_SPEC_PERFORM_IO_CHECKS=false
 * ```
 */

/**
 * Log levels in order of verbosity.
 */
export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

/**
 * A log level.
 */
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Runtime settings.
 */
export interface Settings {
	/** Most verbose level that is still logged. */
	logLevel: LogLevel;
	/** Default for checking that referenced local files exist. */
	performIoChecks: boolean;
	/** Default for logging warnings below the active warning level. */
	logWarnings: boolean;
}

const DEFAULT_SETTINGS: Readonly<Settings> = {
	logLevel: "info",
	performIoChecks: true,
	logWarnings: true,
};

/**
 * Get a setting from environment variables.
 * Checks uppercase first, then lowercase.
 *
 * @param name - Name of the environment variable
 * @returns Raw value or undefined
 */
function getSettingEnv(name: string): string | undefined {
	return process.env[name.toUpperCase()] ?? process.env[name.toLowerCase()];
}

/**
 * Parse a boolean flag.
 *
 * @param value - Raw environment value
 * @param fallback - Value used when the input is missing or not a recognised flag
 */
function parseFlag(value: string | undefined, fallback: boolean): boolean {
	switch (value?.trim().toLowerCase()) {
		case "1":
		case "true":
		case "yes":
		case "on":
			return true;
		case "0":
		case "false":
		case "no":
		case "off":
			return false;
		default:
			return fallback;
	}
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parse a log level, falling back to the default for unknown names.
 */
function parseLogLevel(value: string | undefined): LogLevel {
	const normalised = value?.trim().toLowerCase() ?? "";
	return isLogLevel(normalised) ? normalised : DEFAULT_SETTINGS.logLevel;
}

/**
 * Get the current settings from environment variables.
 *
 * @returns Settings with defaults applied
 */
export function getSettings(): Settings {
	return {
		logLevel: parseLogLevel(getSettingEnv("RESOURCE_SPEC_LOG_LEVEL")),
		performIoChecks: parseFlag(getSettingEnv("RESOURCE_SPEC_PERFORM_IO_CHECKS"), DEFAULT_SETTINGS.performIoChecks),
		logWarnings: parseFlag(getSettingEnv("RESOURCE_SPEC_LOG_WARNINGS"), DEFAULT_SETTINGS.logWarnings),
	};
}
