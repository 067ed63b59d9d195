/**
 * Registry module exports.
 */

export {
	type DescriptionFields,
	type DescriptionFormat,
	type DescriptionFormatOptions,
	defineFormat,
	getFormatVersions,
} from "./format.js";

export { type FormatResolution, GENERIC_TYPE, FormatRegistry } from "./registry.js";

export { BUILTIN_FORMATS, DEFAULT_REGISTRY, getSupportedFormatVersions } from "./builtin.js";
