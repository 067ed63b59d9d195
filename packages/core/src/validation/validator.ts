/**
 * @title Validators
 * @description The single capability every constraint implements.
 *
 * @module validation
 */

import type { ValidationContext } from "./context.js";

/**
 * A composable value constraint.
 *
 * `validate` returns the (possibly normalised) value or throws a
 * ConstraintError describing the violation.
 */
export interface Validator<I, O = I> {
	validate(value: I, context?: ValidationContext): O;
}

/**
 * Describe the runtime type of a value for error messages.
 */
export function describeType(value: unknown): string {
	if (value === null) {
		return "null";
	}
	if (Array.isArray(value)) {
		return "array";
	}
	if (value instanceof Date) {
		return "Date";
	}
	if (typeof value === "object") {
		return value.constructor?.name ?? "object";
	}
	return typeof value;
}

/**
 * Render a value for an error message.
 */
export function formatValue(value: unknown): string {
	if (typeof value === "string") {
		return `'${value}'`;
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (value instanceof URL) {
		return value.href;
	}
	if (typeof value === "object" && value !== null && !Array.isArray(value) && Object.getPrototypeOf(value) !== Object.prototype) {
		return String(value);
	}
	try {
		return JSON.stringify(value) ?? String(value);
	} catch {
		return String(value);
	}
}
