/**
 * @resource-spec/core - Core library for validating resource description documents.
 *
 * This library provides functionality for:
 * - Raw document values and warning levels
 * - Constraint validators and severity-graded warnings
 * - Relative references resolved against a directory or base URL
 * - Composable schema nodes and validation summaries
 * - Description file reading (rdf.yaml, bioimageio.yaml)
 */

// Type exports
export * from "./types/index.js";

// Error exports
export {
	type ResourceSpecErrorOptions,
	ResourceSpecError,
	ConstraintError,
	ValidationWarning,
	SchemaDefinitionError,
	DescriptionFileError,
	InternalConsistencyError,
	isResourceSpecError,
	isConstraintError,
	getErrorMessage,
	wrapError,
} from "./errors.js";

// Settings and logging exports
export { type LogLevel, type Settings, LOG_LEVELS, getSettings } from "./settings.js";
export { type LogSink, logMessage, setLogSink } from "./logging.js";

export { LIBRARY_VERSION, DESCRIPTION_FILENAMES } from "./constants.js";

// Reference exports
export * from "./references/index.js";

// Validation exports
export * from "./validation/index.js";

// Filesystem exports
export * from "./filesystem/index.js";
