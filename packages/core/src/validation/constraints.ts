/**
 * @title Constraints
 * @description Structural value constraints: character sets, suffixes,
 * uniqueness, emptiness and ad-hoc predicates.
 *
 * @module validation
 */

import * as path from "node:path";
import { ConstraintError, SchemaDefinitionError } from "../errors.js";
import { isPlainObject } from "../types/raw.js";
import { RelativePath } from "../references/relative-path.js";
import { isHttpUrl } from "../references/file-source.js";
import type { ValidationContext } from "./context.js";
import type { Validator } from "./validator.js";
import { formatValue } from "./validator.js";

/**
 * Requires every character of a string to belong to an alphabet.
 */
export class RestrictCharacters implements Validator<string> {
	private readonly allowed: ReadonlySet<string>;

	/**
	 * @param alphabet - Allowed characters
	 * @throws SchemaDefinitionError if the alphabet is empty
	 */
	constructor(readonly alphabet: string) {
		if (alphabet === "") {
			throw new SchemaDefinitionError("Alphabet may not be empty");
		}
		this.allowed = new Set(Array.from(alphabet));
	}

	validate(value: string): string {
		for (const char of value) {
			if (!this.allowed.has(char)) {
				throw new ConstraintError(`'${value}' is not restricted to '${this.alphabet}'`);
			}
		}
		return value;
	}
}

/**
 * Values a suffix can be read from.
 */
export type SuffixInput = string | URL | RelativePath;

/**
 * Extract the final dot-suffix of a path or URL.
 *
 * For URLs the last path segment is used; a trailing `/content` of a Zenodo
 * record file is ignored.
 *
 * @returns The suffix including its dot, or "" if there is none
 */
export function extractSuffix(value: SuffixInput): string {
	let url: URL | undefined;
	if (value instanceof URL) {
		url = value;
	} else if (typeof value === "string" && isHttpUrl(value)) {
		url = new URL(value);
	}

	if (url) {
		let pathname = url.pathname;
		if (url.hostname === "zenodo.org" && pathname.startsWith("/api/records/") && pathname.endsWith("/content")) {
			pathname = pathname.slice(0, -"/content".length);
		}
		const segment = pathname.split("/").at(-1) ?? "";
		const dot = segment.lastIndexOf(".");
		return dot === -1 ? "" : segment.slice(dot);
	}

	const text = value instanceof RelativePath ? value.path : String(value).replaceAll("\\", "/");
	return path.posix.extname(text);
}

/**
 * Requires a path or URL to end in one of the given suffixes.
 */
export class SuffixConstraint implements Validator<SuffixInput> {
	readonly suffixes: readonly string[];
	readonly caseSensitive: boolean;

	/**
	 * @param suffixes - Allowed suffixes, each starting with "."
	 * @param options - Comparison options (default: case-insensitive)
	 * @throws SchemaDefinitionError if no suffix is given or a suffix lacks its dot
	 */
	constructor(suffixes: string | readonly string[], options: { caseSensitive?: boolean } = {}) {
		this.suffixes = typeof suffixes === "string" ? [suffixes] : [...suffixes];
		this.caseSensitive = options.caseSensitive ?? false;

		if (this.suffixes.length === 0) {
			throw new SchemaDefinitionError("At least one suffix is required");
		}
		const invalid = this.suffixes.find((suffix) => !suffix.startsWith("."));
		if (invalid !== undefined) {
			throw new SchemaDefinitionError(`Suffix '${invalid}' must start with '.'`);
		}
	}

	validate<T extends SuffixInput>(value: T): T {
		const suffix = extractSuffix(value);
		const fold = (s: string): string => (this.caseSensitive ? s : s.toLowerCase());

		if (!this.suffixes.some((allowed) => fold(allowed) === fold(suffix))) {
			if (this.suffixes.length === 1) {
				throw new ConstraintError(`Expected suffix ${this.suffixes[0]}, but got '${suffix}'`);
			}
			throw new ConstraintError(`Expected a suffix from (${this.suffixes.join(", ")}), but got '${suffix}'`);
		}
		return value;
	}
}

/**
 * Canonical string key of a value, used to compare entries structurally.
 */
export function canonicalKey(value: unknown): string {
	if (Array.isArray(value)) {
		return `[${value.map((item) => canonicalKey(item)).join(",")}]`;
	}
	if (isPlainObject(value)) {
		const entries = Object.keys(value)
			.sort()
			.map((key) => `${JSON.stringify(key)}:${canonicalKey(value[key])}`);
		return `{${entries.join(",")}}`;
	}
	if (value instanceof Date) {
		return `date:${value.toISOString()}`;
	}
	if (typeof value === "object" && value !== null) {
		return `${value.constructor.name}:${String(value)}`;
	}
	return `${typeof value}:${String(value)}`;
}

/**
 * Requires the entries of a sequence to be distinct.
 */
export class UniqueEntries<T> implements Validator<readonly T[]> {
	validate<S extends readonly T[]>(value: S): S {
		const keys = new Set(value.map((item) => canonicalKey(item)));
		if (keys.size !== value.length) {
			throw new ConstraintError("Entries are not unique.");
		}
		return value;
	}
}

/**
 * Requires a string or sequence to have at least one element.
 */
export class NonEmpty<T extends string | readonly unknown[]> implements Validator<T> {
	validate(value: T): T {
		if (value.length === 0) {
			const message =
				typeof value === "string" ? "String should have at least 1 character" : "List should have at least 1 item";
			throw new ConstraintError(message, "too_short");
		}
		return value;
	}
}

/**
 * Requires an ad-hoc condition to hold.
 *
 * The message may contain a `{value}` placeholder.
 */
export class Predicate<T> implements Validator<T> {
	constructor(
		private readonly check: (value: T, context?: ValidationContext) => boolean,
		private readonly message: string,
	) {}

	validate(value: T, context?: ValidationContext): T {
		if (!this.check(value, context)) {
			throw new ConstraintError(this.message.replaceAll("{value}", formatValue(value)));
		}
		return value;
	}
}
