/**
 * Type definitions for @resource-spec/core.
 *
 * @module types
 */

export type { RawLeafValue, RawSequence, RawMapping, RawValue } from "./raw.js";
export {
	isRawLeafValue,
	isPlainObject,
	isMapping,
	isSequence,
	isValidRawValue,
	isValidRawMapping,
	cloneRaw,
} from "./raw.js";

export type { WarningLevel, WarningLevelName, WarningSeverity } from "./warning-level.js";
export {
	INFO,
	WARNING,
	ALERT,
	ERROR,
	WARNING_LEVELS,
	warningLevelName,
	isWarningLevel,
	parseWarningLevel,
} from "./warning-level.js";

export {
	parseFormatVersion,
	formatVersionSeries,
	compareFormatVersions,
	sortFormatVersions,
	isNewerFormatVersion,
	expandPatchVersions,
} from "./format-version.js";
