/**
 * @title Raw Values
 * @description The universe of values a parsed description document may hold.
 *
 * A raw value is a leaf scalar, a sequence of raw values or a mapping from
 * string keys to raw values. YAML timestamps arrive as `Date` leaves.
 *
 * @module types
 */

/**
 * Leaf scalar of a parsed document.
 */
export type RawLeafValue = string | number | boolean | null | Date;

/**
 * Ordered sequence of raw values.
 */
export type RawSequence = RawValue[];

/**
 * String-keyed mapping of raw values.
 */
export interface RawMapping {
	[key: string]: RawValue;
}

/**
 * Any value of a parsed document.
 */
export type RawValue = RawLeafValue | RawSequence | RawMapping;

/**
 * Check whether a value is a raw leaf scalar.
 */
export function isRawLeafValue(value: unknown): value is RawLeafValue {
	return (
		value === null ||
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "boolean" ||
		value instanceof Date
	);
}

/**
 * Check whether a value is a plain object (not an array, date, map or class instance).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null || Array.isArray(value)) {
		return false;
	}
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

/**
 * Narrow a member of a raw document to a mapping.
 */
export function isMapping(value: RawValue | undefined): value is RawMapping {
	return isPlainObject(value);
}

/**
 * Narrow a member of a raw document to a sequence.
 */
export function isSequence(value: RawValue | undefined): value is RawSequence {
	return Array.isArray(value);
}

/**
 * Check recursively whether a value is a valid raw value.
 *
 * Input is expected to be a tree as produced by a document parser; cycles
 * are not detected.
 */
export function isValidRawValue(value: unknown): value is RawValue {
	if (isRawLeafValue(value)) {
		return true;
	}
	if (Array.isArray(value)) {
		return value.every((item) => isValidRawValue(item));
	}
	if (isPlainObject(value)) {
		return Object.getOwnPropertySymbols(value).length === 0 && Object.values(value).every((v) => isValidRawValue(v));
	}
	return false;
}

/**
 * Check recursively whether a value is a valid raw mapping.
 */
export function isValidRawMapping(value: unknown): value is RawMapping {
	return isPlainObject(value) && isValidRawValue(value);
}

/**
 * Deep copy a raw value.
 */
export function cloneRaw<T extends RawValue>(value: T): T {
	return structuredClone(value);
}
