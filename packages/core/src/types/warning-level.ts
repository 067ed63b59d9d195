/**
 * @title Warning Levels
 * @description Ordered severities used by severity-graded validation rules.
 *
 * @module types
 */

/** Informational advisory. */
export const INFO = 20;
/** Best-practice warning. */
export const WARNING = 30;
/** Likely problem that should be looked at. */
export const ALERT = 35;
/** Blocking failure. */
export const ERROR = 50;

/**
 * A warning level. Higher values are more severe.
 */
export type WarningLevel = typeof INFO | typeof WARNING | typeof ALERT | typeof ERROR;

/**
 * Lower-case name of a warning level.
 */
export type WarningLevelName = "info" | "warning" | "alert" | "error";

/** Levels a warning (as opposed to an error) may carry. */
export type WarningSeverity = typeof INFO | typeof WARNING | typeof ALERT;

const LEVEL_NAMES: Readonly<Record<WarningLevel, WarningLevelName>> = {
	[INFO]: "info",
	[WARNING]: "warning",
	[ALERT]: "alert",
	[ERROR]: "error",
};

const NAME_LEVELS: Readonly<Record<WarningLevelName, WarningLevel>> = {
	info: INFO,
	warning: WARNING,
	alert: ALERT,
	error: ERROR,
};

/**
 * All warning levels in ascending order.
 */
export const WARNING_LEVELS: readonly WarningLevel[] = [INFO, WARNING, ALERT, ERROR];

/**
 * Get the name of a warning level.
 */
export function warningLevelName(level: WarningLevel): WarningLevelName {
	return LEVEL_NAMES[level];
}

/**
 * Check whether a value is one of the known warning levels.
 */
export function isWarningLevel(value: unknown): value is WarningLevel {
	return typeof value === "number" && WARNING_LEVELS.some((level) => level === value);
}

function isWarningLevelName(value: string): value is WarningLevelName {
	return Object.hasOwn(NAME_LEVELS, value);
}

/**
 * Parse a warning level from its name (case-insensitive) or numeric value.
 *
 * @returns The level, or null if the input names no known level
 */
export function parseWarningLevel(value: string | number): WarningLevel | null {
	if (typeof value === "number") {
		return isWarningLevel(value) ? value : null;
	}

	const normalised = value.trim().toLowerCase();
	if (isWarningLevelName(normalised)) {
		return NAME_LEVELS[normalised];
	}

	const numeric = Number(normalised);
	return normalised !== "" && isWarningLevel(numeric) ? numeric : null;
}
