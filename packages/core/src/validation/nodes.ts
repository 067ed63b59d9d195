/**
 * @title Schema Nodes
 * @description Composable field schemas that parse raw document values into
 * typed values while collecting located errors and warnings.
 *
 * Every node parses its input within a scope carrying the validation context,
 * the current location and the shared parse state. Constraint failures are
 * recorded where they occur so that a single pass reports every violation;
 * anything other than a ConstraintError propagates to the caller.
 *
 * @module validation
 */

import { ConstraintError } from "../errors.js";
import type { RawValue } from "../types/raw.js";
import { isPlainObject, isValidRawValue } from "../types/raw.js";
import type { WarningLevel } from "../types/warning-level.js";
import type { FileSource } from "../references/file-source.js";
import { parseFileSource, parseHttpUrl } from "../references/file-source.js";
import type { RelativePathKind } from "../references/relative-path.js";
import { RelativeDirectory, RelativeFilePath, RelativePath } from "../references/relative-path.js";
import type { ValidationContext } from "./context.js";
import type { Loc } from "./issues.js";
import { ParseState } from "./issues.js";
import type { Validator } from "./validator.js";
import { describeType } from "./validator.js";
import type { AsWarningOptions } from "./warn.js";
import { asWarning, issueWarning } from "./warn.js";
import { SuffixConstraint } from "./constraints.js";

/**
 * Marker returned by a node whose input failed validation.
 */
export const INVALID: unique symbol = Symbol("invalid");

/**
 * Type of the INVALID marker.
 */
export type Invalid = typeof INVALID;

/**
 * Where a node is parsing.
 */
export interface Scope {
	readonly context: ValidationContext;
	readonly loc: Loc;
	readonly state: ParseState;
}

/**
 * Scope of a mapping value or sequence item.
 */
export function childScope(scope: Scope, key: string | number): Scope {
	return { ...scope, loc: [...scope.loc, key] };
}

/**
 * Run a validator and record its failure at the scope's location.
 *
 * @returns The validated value; the input for failures recorded as warnings; INVALID for errors
 */
export function applyValidator<I, O>(validator: Validator<I, O>, value: I, scope: Scope): O | I | Invalid {
	try {
		return validator.validate(value, scope.context);
	} catch (error) {
		if (!(error instanceof ConstraintError)) {
			throw error;
		}
		return scope.state.record(error, scope.loc) ? INVALID : value;
	}
}

/**
 * Issue a severity-graded warning at the scope's location.
 */
export function warnAt(scope: Scope, message: string, severity: WarningLevel, value: unknown): void {
	try {
		issueWarning(message, { severity, value, context: scope.context });
	} catch (error) {
		if (!(error instanceof ConstraintError)) {
			throw error;
		}
		scope.state.record(error, scope.loc);
	}
}

/**
 * Base class of all schema nodes.
 */
export abstract class SchemaNode<T> {
	/** Type of successfully parsed values. */
	declare readonly _output: T;
	/** Human-readable description of the field. */
	description?: string;

	/**
	 * Whether the node accepts an absent mapping key.
	 */
	get acceptsMissing(): boolean {
		return false;
	}

	/**
	 * Parse a value.
	 *
	 * @param value - Raw input (undefined when a mapping key is absent)
	 * @param scope - Where the value is parsed
	 */
	abstract parse(value: unknown, scope: Scope): T | Invalid;

	/**
	 * Attach a description.
	 */
	describe(description: string): this {
		this.description = description;
		return this;
	}

	/**
	 * Allow the value to be absent or null.
	 */
	optional(): OptionalNode<T> {
		return new OptionalNode(this);
	}

	/**
	 * Use a default when the value is absent or null.
	 *
	 * @param make - Creates the default; called once per use
	 */
	default(make: () => T): DefaultNode<T> {
		return new DefaultNode(this, make);
	}

	/**
	 * Apply validators in order after parsing.
	 */
	check(...validators: Validator<T>[]): ConstrainedNode<T> {
		return new ConstrainedNode(this, validators);
	}

	/**
	 * Apply a validator as a severity-graded rule.
	 */
	warn(validator: Validator<T, unknown>, options: AsWarningOptions = {}): ConstrainedNode<T> {
		return new ConstrainedNode(this, [asWarning(validator, options)]);
	}

	/**
	 * Convert the parsed value with a validator.
	 */
	pipe<U>(validator: Validator<T, U>): PipeNode<T, U> {
		return new PipeNode(this, validator);
	}

	/**
	 * Run an additional check with access to the scope.
	 */
	refine(check: (value: T, scope: Scope) => void): RefineNode<T> {
		return new RefineNode(this, check);
	}

	/**
	 * Map the parsed value.
	 */
	transform<U>(fn: (value: T, scope: Scope) => U): TransformNode<T, U> {
		return new TransformNode(this, fn);
	}
}

/**
 * Output type of a node.
 */
export type Infer<N> = N extends SchemaNode<infer T> ? T : never;

/**
 * Node that accepts an absent or null value.
 */
export class OptionalNode<T> extends SchemaNode<T | undefined> {
	readonly isOptional = true;

	constructor(readonly inner: SchemaNode<T>) {
		super();
	}

	override get acceptsMissing(): boolean {
		return true;
	}

	parse(value: unknown, scope: Scope): T | undefined | Invalid {
		return value === undefined || value === null ? undefined : this.inner.parse(value, scope);
	}
}

/**
 * Node that substitutes a default for an absent or null value.
 */
export class DefaultNode<T> extends SchemaNode<T> {
	constructor(
		readonly inner: SchemaNode<T>,
		private readonly make: () => T,
	) {
		super();
	}

	override get acceptsMissing(): boolean {
		return true;
	}

	parse(value: unknown, scope: Scope): T | Invalid {
		if (value !== undefined && value !== null) {
			return this.inner.parse(value, scope);
		}
		return this.make();
	}
}

/**
 * Node that applies validators after its inner node.
 */
export class ConstrainedNode<T> extends SchemaNode<T> {
	constructor(
		readonly inner: SchemaNode<T>,
		readonly validators: readonly Validator<T>[],
	) {
		super();
	}

	override get acceptsMissing(): boolean {
		return this.inner.acceptsMissing;
	}

	parse(value: unknown, scope: Scope): T | Invalid {
		let current = this.inner.parse(value, scope);
		for (const validator of this.validators) {
			if (current === INVALID) {
				break;
			}
			current = applyValidator(validator, current, scope);
		}
		return current;
	}
}

/**
 * Node that converts its inner node's value with a validator.
 */
export class PipeNode<T, U> extends SchemaNode<U> {
	constructor(
		readonly inner: SchemaNode<T>,
		readonly validator: Validator<T, U>,
	) {
		super();
	}

	override get acceptsMissing(): boolean {
		return this.inner.acceptsMissing;
	}

	parse(value: unknown, scope: Scope): U | Invalid {
		const parsed = this.inner.parse(value, scope);
		if (parsed === INVALID) {
			return INVALID;
		}
		try {
			return this.validator.validate(parsed, scope.context);
		} catch (error) {
			if (!(error instanceof ConstraintError)) {
				throw error;
			}
			scope.state.addError(scope.loc, error.message, error.type);
			return INVALID;
		}
	}
}

/**
 * Callbacks stored by refine and transform nodes, declared as methods so that
 * nodes stay assignable to `SchemaNode<unknown>` like the node methods taking them.
 */
interface NodeCallbacks<T, U> {
	refine(value: T, scope: Scope): void;
	transform(value: T, scope: Scope): U;
}

/**
 * Node that runs a scope-aware check after its inner node.
 */
export class RefineNode<T> extends SchemaNode<T> {
	constructor(
		readonly inner: SchemaNode<T>,
		private readonly refinement: NodeCallbacks<T, void>["refine"],
	) {
		super();
	}

	override get acceptsMissing(): boolean {
		return this.inner.acceptsMissing;
	}

	parse(value: unknown, scope: Scope): T | Invalid {
		const parsed = this.inner.parse(value, scope);
		if (parsed === INVALID) {
			return INVALID;
		}

		const errorCount = scope.state.errors.length;
		try {
			this.refinement(parsed, scope);
		} catch (error) {
			if (!(error instanceof ConstraintError)) {
				throw error;
			}
			scope.state.record(error, scope.loc);
		}
		return scope.state.errors.length > errorCount ? INVALID : parsed;
	}
}

/**
 * Node that maps its inner node's value.
 */
export class TransformNode<T, U> extends SchemaNode<U> {
	constructor(
		readonly inner: SchemaNode<T>,
		private readonly fn: NodeCallbacks<T, U>["transform"],
	) {
		super();
	}

	override get acceptsMissing(): boolean {
		return this.inner.acceptsMissing;
	}

	parse(value: unknown, scope: Scope): U | Invalid {
		const parsed = this.inner.parse(value, scope);
		return parsed === INVALID ? INVALID : this.fn(parsed, scope);
	}
}

/**
 * Node defined by a parse function.
 */
export class CustomNode<T> extends SchemaNode<T> {
	constructor(private readonly parser: (value: unknown, scope: Scope) => T | Invalid) {
		super();
	}

	parse(value: unknown, scope: Scope): T | Invalid {
		return this.parser(value, scope);
	}
}

function typeError(scope: Scope, message: string, type: string): Invalid {
	scope.state.addError(scope.loc, message, type);
	return INVALID;
}

/**
 * Options for string nodes.
 */
export interface StringOptions {
	/** Accept numbers and convert them to strings (YAML reads `1.0` as a number). */
	coerceNumbers?: boolean;
	/** Minimum length. */
	minLength?: number;
	/** Maximum length. */
	maxLength?: number;
}

/**
 * Node accepting strings.
 */
export class StringNode extends SchemaNode<string> {
	constructor(private readonly options: StringOptions = {}) {
		super();
	}

	parse(value: unknown, scope: Scope): string | Invalid {
		let text: string;
		if (typeof value === "string") {
			text = value;
		} else if (typeof value === "number" && this.options.coerceNumbers) {
			text = String(value);
		} else {
			return typeError(scope, "Input should be a valid string", "string_type");
		}

		const { minLength, maxLength } = this.options;
		// lengths count code points
		const length = [...text].length;
		if (minLength !== undefined && length < minLength) {
			return typeError(
				scope,
				`String should have at least ${minLength} character${minLength === 1 ? "" : "s"}`,
				"string_too_short",
			);
		}
		if (maxLength !== undefined && length > maxLength) {
			return typeError(
				scope,
				`String should have at most ${maxLength} character${maxLength === 1 ? "" : "s"}`,
				"string_too_long",
			);
		}
		return text;
	}
}

/**
 * Options for number nodes.
 */
export interface NumberOptions {
	/** Require an integer. */
	integer?: boolean;
	/** Inclusive lower bound. */
	min?: number;
	/** Inclusive upper bound. */
	max?: number;
	/** Required divisor. */
	multipleOf?: number;
}

/**
 * Node accepting numbers.
 */
export class NumberNode extends SchemaNode<number> {
	constructor(private readonly options: NumberOptions = {}) {
		super();
	}

	parse(value: unknown, scope: Scope): number | Invalid {
		if (typeof value !== "number" || Number.isNaN(value)) {
			return typeError(scope, "Input should be a valid number", "float_type");
		}

		const { integer, min, max, multipleOf } = this.options;
		if (integer && !Number.isInteger(value)) {
			return typeError(scope, "Input should be a valid integer", "int_type");
		}
		if (min !== undefined && value < min) {
			return typeError(scope, `Input should be greater than or equal to ${min}`, "greater_than_equal");
		}
		if (max !== undefined && value > max) {
			return typeError(scope, `Input should be less than or equal to ${max}`, "less_than_equal");
		}
		if (multipleOf !== undefined && value % multipleOf !== 0) {
			return typeError(scope, `Input should be a multiple of ${multipleOf}`, "multiple_of");
		}
		return value;
	}
}

/**
 * Node accepting booleans.
 */
export class BooleanNode extends SchemaNode<boolean> {
	parse(value: unknown, scope: Scope): boolean | Invalid {
		return typeof value === "boolean" ? value : typeError(scope, "Input should be a valid boolean", "bool_type");
	}
}

/**
 * Primitive values a literal node can accept.
 */
export type LiteralValue = string | number | boolean;

/**
 * Node accepting one of a fixed set of values.
 */
export class LiteralNode<V extends LiteralValue> extends SchemaNode<V> {
	constructor(readonly values: readonly V[]) {
		super();
	}

	parse(value: unknown, scope: Scope): V | Invalid {
		const match = this.values.find((candidate) => candidate === value);
		if (match !== undefined) {
			return match;
		}
		const expected = this.values.map((candidate) => `'${String(candidate)}'`);
		const text = expected.length > 1 ? `${expected.slice(0, -1).join(", ")} or ${expected.at(-1)}` : expected[0];
		return typeError(scope, `Input should be ${text}`, "literal_error");
	}
}

/**
 * Options for array nodes.
 */
export interface ArrayOptions {
	/** Minimum number of items. */
	minLength?: number;
	/** Maximum number of items. */
	maxLength?: number;
}

/**
 * Node accepting sequences.
 */
export class ArrayNode<T> extends SchemaNode<T[]> {
	constructor(
		readonly item: SchemaNode<T>,
		private readonly options: ArrayOptions = {},
	) {
		super();
	}

	parse(value: unknown, scope: Scope): T[] | Invalid {
		if (!Array.isArray(value)) {
			return typeError(scope, "Input should be a valid list", "list_type");
		}

		const { minLength, maxLength } = this.options;
		if (minLength !== undefined && value.length < minLength) {
			return typeError(scope, `List should have at least ${minLength} item${minLength === 1 ? "" : "s"}`, "too_short");
		}
		if (maxLength !== undefined && value.length > maxLength) {
			return typeError(scope, `List should have at most ${maxLength} item${maxLength === 1 ? "" : "s"}`, "too_long");
		}

		const items: T[] = [];
		let valid = true;
		for (const [index, item] of value.entries()) {
			const parsed = this.item.parse(item, childScope(scope, index));
			if (parsed === INVALID) {
				valid = false;
			} else {
				items.push(parsed);
			}
		}
		return valid ? items : INVALID;
	}
}

/**
 * Node accepting string-keyed mappings with uniform values.
 */
export class RecordNode<T> extends SchemaNode<Record<string, T>> {
	constructor(
		readonly value: SchemaNode<T>,
		readonly key?: SchemaNode<string>,
	) {
		super();
	}

	parse(value: unknown, scope: Scope): Record<string, T> | Invalid {
		if (!isPlainObject(value)) {
			return typeError(scope, "Input should be a valid dictionary", "dict_type");
		}

		const result: Record<string, T> = {};
		let valid = true;
		for (const [key, item] of Object.entries(value)) {
			const itemScope = childScope(scope, key);
			if (this.key && this.key.parse(key, itemScope) === INVALID) {
				valid = false;
				continue;
			}
			const parsed = this.value.parse(item, itemScope);
			if (parsed === INVALID) {
				valid = false;
			} else {
				result[key] = parsed;
			}
		}
		return valid ? result : INVALID;
	}
}

/**
 * Field schemas of an object node.
 */
export type Shape = Readonly<Record<string, SchemaNode<unknown>>>;

type OptionalKeys<S extends Shape> = {
	[K in keyof S]: S[K] extends OptionalNode<unknown> ? K : never;
}[keyof S];

/**
 * Output type of an object node.
 */
export type InferShape<S extends Shape> = {
	-readonly [K in Exclude<keyof S, OptionalKeys<S>>]: Infer<S[K]>;
} & {
	-readonly [K in OptionalKeys<S>]?: Exclude<Infer<S[K]>, undefined>;
};

/**
 * Options for object nodes.
 */
export interface ObjectOptions {
	/** Treatment of keys not in the shape (default: "ignore"). */
	unknownKeys?: "ignore" | "forbid";
}

/**
 * Node accepting mappings with a fixed set of fields.
 */
export class ObjectNode<S extends Shape> extends SchemaNode<InferShape<S>> {
	constructor(
		readonly shape: S,
		private readonly options: ObjectOptions = {},
	) {
		super();
	}

	parse(value: unknown, scope: Scope): InferShape<S> | Invalid {
		if (!isPlainObject(value)) {
			return typeError(scope, "Input should be a valid dictionary", "dict_type");
		}

		const result: Record<string, unknown> = {};
		let valid = true;

		for (const [key, node] of Object.entries(this.shape)) {
			const fieldScope = childScope(scope, key);
			const raw = value[key];
			if (raw === undefined && !node.acceptsMissing) {
				fieldScope.state.addError(fieldScope.loc, "Field required", "missing");
				valid = false;
				continue;
			}

			const parsed = node.parse(raw, fieldScope);
			if (parsed === INVALID) {
				valid = false;
			} else if (parsed !== undefined) {
				result[key] = parsed;
			}
		}

		if (this.options.unknownKeys === "forbid") {
			for (const key of Object.keys(value)) {
				if (!Object.hasOwn(this.shape, key)) {
					scope.state.addError([...scope.loc, key], "Extra inputs are not permitted", "extra_forbidden");
					valid = false;
				}
			}
		}

		// Every required field was parsed into `result` above.
		return valid ? (result as InferShape<S>) : INVALID;
	}
}

/**
 * Node accepting the first of several alternatives that parses without errors.
 *
 * When all alternatives fail, the errors of the alternative that got furthest
 * into the value (deepest error location) are reported.
 */
export class UnionNode<T> extends SchemaNode<T> {
	constructor(readonly options: readonly SchemaNode<T>[]) {
		super();
	}

	parse(value: unknown, scope: Scope): T | Invalid {
		let best: ParseState | undefined;
		let bestDepth = Number.NEGATIVE_INFINITY;

		for (const option of this.options) {
			const state = scope.state.fork();
			const parsed = option.parse(value, { ...scope, state });
			if (parsed !== INVALID && !state.hasErrors) {
				scope.state.merge(state);
				return parsed;
			}

			const depth = Math.max(...state.errors.map((error) => error.loc.length));
			if (best === undefined || depth > bestDepth) {
				best = state;
				bestDepth = depth;
			}
		}

		if (best?.hasErrors) {
			scope.state.errors.push(...best.errors);
		} else {
			scope.state.addError(scope.loc, "Input does not match any of the allowed forms", "union_error");
		}
		return INVALID;
	}
}

/**
 * Node accepting any raw value.
 */
export class RawNode extends SchemaNode<RawValue> {
	parse(value: unknown, scope: Scope): RawValue | Invalid {
		return isValidRawValue(value)
			? value
			: typeError(scope, `Input should be a raw document value, got ${describeType(value)}`, "raw_type");
	}
}

/**
 * Options for file source nodes.
 */
export interface FileSourceOptions {
	/** Required suffix(es). */
	suffix?: string | readonly string[];
	/** Compare suffixes case-sensitively. */
	caseSensitive?: boolean;
	/** Whether the file belongs in a resource package. */
	inPackage?: boolean;
}

/**
 * Node accepting an http(s) URL or a path relative to the document root.
 */
export class FileSourceNode extends SchemaNode<FileSource> {
	readonly inPackage: boolean;
	private readonly suffix?: SuffixConstraint;

	constructor(options: FileSourceOptions = {}) {
		super();
		this.inPackage = options.inPackage ?? false;
		this.suffix =
			options.suffix === undefined
				? undefined
				: new SuffixConstraint(options.suffix, { caseSensitive: options.caseSensitive });
	}

	parse(value: unknown, scope: Scope): FileSource | Invalid {
		if (typeof value !== "string" && !(value instanceof URL) && !(value instanceof RelativePath)) {
			return typeError(scope, "Input should be a URL or a relative file path", "file_source_type");
		}

		let source: FileSource;
		try {
			source = parseFileSource(value, scope.context);
		} catch (error) {
			if (!(error instanceof ConstraintError)) {
				throw error;
			}
			scope.state.addError(scope.loc, error.message, error.type);
			return INVALID;
		}

		if (this.suffix && applyValidator(this.suffix, source, scope) === INVALID) {
			return INVALID;
		}
		if (this.inPackage) {
			scope.state.addPackageSource(scope.loc, source);
		}
		return source;
	}
}

/**
 * Node accepting a relative path of a given kind.
 */
export class RelativePathNode extends SchemaNode<RelativePath> {
	constructor(readonly kind: RelativePathKind = "path") {
		super();
	}

	parse(value: unknown, scope: Scope): RelativePath | Invalid {
		if (typeof value !== "string" && !(value instanceof RelativePath)) {
			return typeError(scope, "Input should be a relative path", "path_type");
		}
		try {
			const reference =
				this.kind === "file"
					? new RelativeFilePath(value, scope.context)
					: this.kind === "directory"
						? new RelativeDirectory(value, scope.context)
						: new RelativePath(value, scope.context);
			return reference.validate(scope.context);
		} catch (error) {
			if (!(error instanceof ConstraintError)) {
				throw error;
			}
			scope.state.addError(scope.loc, error.message, error.type);
			return INVALID;
		}
	}
}

/** Node accepting strings. */
export function string(options?: StringOptions): StringNode {
	return new StringNode(options);
}

/** Node accepting numbers. */
export function number(options?: NumberOptions): NumberNode {
	return new NumberNode(options);
}

/** Node accepting integers. */
export function integer(options?: Omit<NumberOptions, "integer">): NumberNode {
	return new NumberNode({ ...options, integer: true });
}

/** Node accepting booleans. */
export function boolean(): BooleanNode {
	return new BooleanNode();
}

/** Node accepting one of the given values. */
export function literal<const V extends LiteralValue>(...values: V[]): LiteralNode<V> {
	return new LiteralNode(values);
}

/** Node accepting sequences of items. */
export function array<T>(item: SchemaNode<T>, options?: ArrayOptions): ArrayNode<T> {
	return new ArrayNode(item, options);
}

/** Node accepting string-keyed mappings with uniform values. */
export function record<T>(value: SchemaNode<T>, key?: SchemaNode<string>): RecordNode<T> {
	return new RecordNode(value, key);
}

/** Node accepting mappings with a fixed set of fields. */
export function object<S extends Shape>(shape: S, options?: ObjectOptions): ObjectNode<S> {
	return new ObjectNode(shape, options);
}

/** Node accepting the first alternative that parses. */
export function union<A, B>(a: SchemaNode<A>, b: SchemaNode<B>): UnionNode<A | B>;
export function union<A, B, C>(a: SchemaNode<A>, b: SchemaNode<B>, c: SchemaNode<C>): UnionNode<A | B | C>;
export function union<A, B, C, D>(
	a: SchemaNode<A>,
	b: SchemaNode<B>,
	c: SchemaNode<C>,
	d: SchemaNode<D>,
): UnionNode<A | B | C | D>;
export function union(...options: SchemaNode<unknown>[]): UnionNode<unknown> {
	return new UnionNode(options);
}

/** Node accepting any raw value. */
export function raw(): RawNode {
	return new RawNode();
}

/** Node accepting a URL or relative file path. */
export function fileSource(options?: FileSourceOptions): FileSourceNode {
	return new FileSourceNode(options);
}

/** Node accepting a relative path. */
export function relativePath(kind?: RelativePathKind): RelativePathNode {
	return new RelativePathNode(kind);
}

/** Node accepting an http(s) URL. */
export function httpUrl(): CustomNode<URL> {
	return new CustomNode((value, scope) => {
		if (typeof value !== "string") {
			return typeError(scope, "Input should be a valid URL", "url_type");
		}
		try {
			return parseHttpUrl(value);
		} catch (error) {
			if (!(error instanceof ConstraintError)) {
				throw error;
			}
			return typeError(scope, error.message, error.type);
		}
	});
}

/** Node defined by a parse function. */
export function custom<T>(parser: (value: unknown, scope: Scope) => T | Invalid): CustomNode<T> {
	return new CustomNode(parser);
}

/**
 * Result of parsing a value with a schema node.
 */
export interface ParseResult<T> {
	/** Parsed value, or null if the input had errors. */
	value: T | null;
	/** Errors, warnings and package sources found. */
	state: ParseState;
}

/**
 * Parse a value with a schema node from the document root.
 *
 * @param node - Schema to apply
 * @param value - Raw input
 * @param context - Validation context
 */
export function parseWithSchema<T>(node: SchemaNode<T>, value: unknown, context: ValidationContext): ParseResult<T> {
	const state = new ParseState();
	const parsed = node.parse(value, { context, loc: [], state });
	return { value: parsed === INVALID || state.hasErrors ? null : parsed, state };
}
