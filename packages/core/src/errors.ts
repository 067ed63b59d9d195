/**
 * @title Errors
 * @description Error types for @resource-spec/core.
 *
 * Provides typed error classes for validation failures, warnings raised by
 * severity-graded rules, and description files that cannot be read.
 *
 * @module errors
 */

import type { WarningLevel } from "./types/warning-level.js";
import { warningLevelName } from "./types/warning-level.js";

/**
 * Options for constructing a ResourceSpecError.
 */
export interface ResourceSpecErrorOptions {
	/** Suggestion for how to resolve the error. */
	suggestion?: string;
	/** Original error that caused this error. */
	cause?: unknown;
}

/**
 * Base error class for all resource-spec errors.
 */
export class ResourceSpecError extends Error {
	/** Error code for programmatic handling. */
	readonly code: string;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(message: string, code: string, options?: ResourceSpecErrorOptions) {
		super(message, { cause: options?.cause });
		this.name = "ResourceSpecError";
		this.code = code;
		this.suggestion = options?.suggestion;

		// Maintain proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display.
	 */
	format(): string {
		let result = `${this.name}: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}

/**
 * A recognised field-level validation failure.
 *
 * Schema nodes catch these where they occur and turn them into located
 * error entries. Anything else thrown during validation is unexpected.
 */
export class ConstraintError extends ResourceSpecError {
	/** Kind tag reported as the error entry's type. */
	readonly type: string;

	constructor(message: string, type = "value_error", options?: ResourceSpecErrorOptions & { code?: string }) {
		super(message, options?.code ?? "CONSTRAINT_ERROR", options);
		this.name = "ConstraintError";
		this.type = type;
	}
}

/**
 * A warning-classified failure raised by a severity-graded rule whose
 * severity reached the active warning level.
 */
export class ValidationWarning extends ConstraintError {
	/** Severity of the violated rule. */
	readonly severity: WarningLevel;
	/** The value that failed the rule. */
	readonly value: unknown;
	/** Metadata supplied by the rule's declaration. */
	readonly context: Readonly<Record<string, unknown>>;

	constructor(
		message: string,
		options: { severity: WarningLevel; value: unknown; context?: Record<string, unknown>; cause?: unknown },
	) {
		super(message, warningLevelName(options.severity), { code: "VALIDATION_WARNING", cause: options.cause });
		this.name = "ValidationWarning";
		this.severity = options.severity;
		this.value = options.value;
		this.context = Object.freeze({ ...options.context });
	}
}

/**
 * Error when a validator or schema node is declared with invalid arguments.
 */
export class SchemaDefinitionError extends ResourceSpecError {
	constructor(message: string, options?: ResourceSpecErrorOptions) {
		super(message, "SCHEMA_DEFINITION_ERROR", options);
		this.name = "SchemaDefinitionError";
	}
}

/**
 * Error when reading or parsing a description file fails.
 */
export class DescriptionFileError extends ResourceSpecError {
	/** Path to the description file. */
	readonly filePath?: string;

	constructor(message: string, options?: { filePath?: string; cause?: unknown }) {
		super(message, "DESCRIPTION_FILE_ERROR", {
			suggestion: options?.filePath ? `Check the description file at: ${options.filePath}` : undefined,
			cause: options?.cause,
		});
		this.name = "DescriptionFileError";
		this.filePath = options?.filePath;
	}
}

/**
 * Error when validation results contradict each other.
 */
export class InternalConsistencyError extends ResourceSpecError {
	constructor(message: string, options?: ResourceSpecErrorOptions) {
		super(message, "INTERNAL_ERROR", options);
		this.name = "InternalConsistencyError";
	}
}

/**
 * Check if an error is a ResourceSpecError.
 */
export function isResourceSpecError(error: unknown): error is ResourceSpecError {
	return error instanceof ResourceSpecError;
}

/**
 * Check if an error is a recognised validation failure.
 */
export function isConstraintError(error: unknown): error is ConstraintError {
	return error instanceof ConstraintError;
}

/**
 * Extract a human-readable message from an unknown error value.
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error as a ResourceSpecError.
 */
export function wrapError(error: unknown, context?: string): ResourceSpecError {
	if (isResourceSpecError(error)) {
		return error;
	}

	const message = getErrorMessage(error);
	const contextPrefix = context ? `${context}: ` : "";

	return new ResourceSpecError(`${contextPrefix}${message}`, "UNKNOWN_ERROR", { cause: error });
}
