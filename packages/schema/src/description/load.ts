/**
 * @title Description Loading
 * @description Validate a raw description document against the schema of its
 * resource type and format version.
 *
 * Loading runs in these steps:
 * 1. check that the document is a mapping with string `type` and `format_version`
 * 2. resolve the format to validate with, recording any version substitution
 * 3. migrate a copy of the document to that format's latest version
 * 4. validate at warning level ERROR; if that passes and the requested level is
 *    lower, validate again at the requested level to collect warnings
 *
 * @module description
 */

import type {
	ErrorEntry,
	PackageSourceEntry,
	ParseResult,
	RawMapping,
	Root,
	ValidationContext,
	ValidationContextOptions,
	ValidationSummary,
	WarningEntry,
} from "@resource-spec/core";
import {
	ALERT,
	ERROR,
	InternalConsistencyError,
	ParseState,
	ResourceSpecError,
	createValidationSummary,
	createValidationContext,
	describeType,
	formatLoc,
	formatVersionSeries,
	getSourceName,
	isValidRawMapping,
	logMessage,
	parseWithSchema,
	warningLevelName,
	withContext,
} from "@resource-spec/core";
import type { MigrationChain } from "../migration/chain.js";
import { migrateDocument } from "../migration/chain.js";
import type { DescriptionFields, DescriptionFormat } from "../registry/format.js";
import type { FormatRegistry } from "../registry/registry.js";
import { DEFAULT_REGISTRY } from "../registry/builtin.js";

/**
 * A successfully validated description.
 */
export interface ResourceDescription<T extends DescriptionFields = DescriptionFields> {
	/** Declared resource type. */
	readonly type: string;
	/** Format version the description was validated at. */
	readonly formatVersion: string;
	/** Parsed fields. */
	readonly fields: T;
	/** The migrated raw document. */
	readonly content: RawMapping;
	/** Root relative references were resolved against. */
	readonly root: Root;
	/** Name of the document file below the root. */
	readonly fileName: string;
	/** File references that belong in a resource package. */
	readonly packageSources: readonly PackageSourceEntry[];
}

/**
 * Options for loading a description.
 */
export interface LoadDescriptionOptions {
	/** Validation context, or options to create one. */
	context?: ValidationContextOptions;
	/**
	 * Format version to validate at: "discover" (the declared version's series,
	 * default), "latest", or an explicit series such as "0.4" or its latest version.
	 */
	formatVersion?: string;
	/** Registry to resolve formats from (default: the built-in formats). */
	registry?: FormatRegistry;
}

/**
 * Result of loading a description.
 */
export interface LoadDescriptionResult {
	/** The description, or null if validation failed. */
	description: ResourceDescription | null;
	summary: ValidationSummary;
}

/**
 * A document with the fields every description declares.
 */
export interface DescriptionDocument extends RawMapping {
	type: string;
	format_version: string;
}

/**
 * Check the preconditions of a description document.
 *
 * @throws TypeError if the document is not a raw mapping or `type` or `format_version` is not a string
 */
export function assertDescriptionDocument(content: unknown): asserts content is DescriptionDocument {
	if (!isValidRawMapping(content)) {
		throw new TypeError(`Expected a description mapping, but got ${describeType(content)}`);
	}
	for (const field of ["type", "format_version"]) {
		const value = content[field];
		if (typeof value !== "string") {
			throw new TypeError(`Expected '${field}' to be a string, but got ${describeType(value)}`);
		}
	}
}

/**
 * Format chosen for a document.
 */
export interface FormatSelection {
	/** Format to validate with. */
	format: DescriptionFormat;
	/** Version the document is migrated from. */
	version: string;
	/** Note about a replaced declared version. */
	substitution?: string;
}

/**
 * Choose the format a document is validated with.
 *
 * @param registry - Registry to resolve from
 * @param type - Declared resource type
 * @param declared - Declared format version
 * @param requested - "discover", "latest" or an explicit series or version
 * @throws ResourceSpecError if an explicit format version is not supported
 */
export function selectFormat(
	registry: FormatRegistry,
	type: string,
	declared: string,
	requested = "discover",
): FormatSelection {
	const resolved = registry.resolve(type, declared);
	const selection = (format: DescriptionFormat): FormatSelection => ({
		format,
		version: resolved.version,
		substitution: resolved.message,
	});

	if (requested === "discover") {
		return selection(resolved.format);
	}
	if (requested === "latest") {
		return selection(registry.latest(type));
	}

	const series = formatVersionSeries(requested);
	const format = series === null ? undefined : registry.getSeries(type, series);
	if (!format || (requested !== series && requested !== format.latestVersion)) {
		const supported = registry.lineage(type).map((candidate) => candidate.series);
		throw new ResourceSpecError(`Unsupported format version '${requested}' for type '${type}'`, "UNSUPPORTED_FORMAT_VERSION", {
			suggestion: `Use "discover", "latest" or one of: ${supported.join(", ")}`,
		});
	}
	return selection(format);
}

function migrateFrom(chain: MigrationChain, document: RawMapping, version: string): RawMapping {
	return migrateDocument(chain, { ...document, format_version: version });
}

function unexpectedErrorEntry(error: unknown): ErrorEntry {
	const unexpected = error instanceof Error ? error : new Error(String(error));
	return {
		loc: [],
		msg: unexpected.message,
		type: unexpected.name,
		traceback: (unexpected.stack ?? `${unexpected.name}: ${unexpected.message}`).split("\n"),
	};
}

/**
 * Parse a document, turning exceptions other than constraint failures into an error entry.
 */
function runSchema(format: DescriptionFormat, document: RawMapping, context: ValidationContext): ParseResult<DescriptionFields> {
	try {
		return parseWithSchema(format.schema, document, context);
	} catch (error) {
		logMessage(`Unexpected error validating ${format.type} ${format.latestVersion}: ${String(error)}`, "error");
		const state = new ParseState();
		state.errors.push(unexpectedErrorEntry(error));
		return { value: null, state };
	}
}

/**
 * Load and validate a description document.
 *
 * @param content - Raw document, e.g. parsed YAML
 * @param options - Context, target format version and registry
 * @returns The description (null if invalid) and the validation summary
 * @throws TypeError if the document lacks a string `type` or `format_version`
 * @throws ResourceSpecError if an explicit format version is not supported
 * @throws InternalConsistencyError if the warning pass finds errors the strict pass missed
 *
 * @example
 * ```typescript
 * const { description, summary } = loadDescription(yaml.load(text), {
 * 	context: { root: "/data/unet", warningLevel: WARNING },
 * });
 * if (!description) {
 * 	console.log(formatValidationSummary(summary));
 * }
 * ```
 */
export function loadDescription(content: unknown, options: LoadDescriptionOptions = {}): LoadDescriptionResult {
	assertDescriptionDocument(content);
	const registry = options.registry ?? DEFAULT_REGISTRY;
	const context = createValidationContext(options.context);
	const { type } = content;

	const { format, version, substitution } = selectFormat(registry, type, content.format_version, options.formatVersion);
	const warnings: WarningEntry[] = [];
	if (substitution) {
		logMessage(substitution, "info");
		warnings.push({ loc: ["format_version"], msg: substitution, type: warningLevelName(ALERT), severity: ALERT });
	}

	logMessage(`Validating ${type} description with the ${format.type} ${format.latestVersion} format`, "debug");
	const migrated = migrateFrom(format.migration, content, version);

	const collectWarnings = context.warningLevel < ERROR;
	let result = runSchema(
		format,
		migrated,
		withContext(context, { warningLevel: ERROR, logWarnings: collectWarnings ? false : context.logWarnings }),
	);

	if (!result.state.hasErrors && collectWarnings) {
		result = runSchema(format, migrated, context);
		if (result.state.hasErrors) {
			const messages = result.state.errors.map((entry) => `${formatLoc(entry.loc)}: ${entry.msg}`);
			throw new InternalConsistencyError(
				`Validation at warning level ${warningLevelName(context.warningLevel)} found errors that strict validation did not: ${messages.join("; ")}`,
			);
		}
	}

	const summary = createValidationSummary({
		name: `resource-spec static ${type} validation (format version: ${format.latestVersion}).`,
		sourceName: getSourceName(context),
		errors: result.state.errors,
		warnings: [...warnings, ...result.state.warnings],
	});

	const description =
		summary.status === "failed" || result.value === null
			? null
			: Object.freeze({
					type,
					formatVersion: format.latestVersion,
					fields: result.value,
					content: migrated,
					root: context.root,
					fileName: context.fileName,
					packageSources: Object.freeze([...result.state.packageSources]),
				});

	return { description, summary };
}

/**
 * Validate a description document and return only the summary.
 */
export function validateFormat(content: unknown, options: LoadDescriptionOptions = {}): ValidationSummary {
	return loadDescription(content, options).summary;
}

/**
 * Options for migrating a description without validating it.
 */
export interface UpdateFormatOptions {
	/** "latest" (default), "discover" or an explicit series or version. */
	target?: string;
	registry?: FormatRegistry;
}

/**
 * Migrate a description document to a newer format version without validating it.
 *
 * @returns The migrated copy
 * @throws TypeError if the document lacks a string `type` or `format_version`
 */
export function updateFormat(content: unknown, options: UpdateFormatOptions = {}): RawMapping {
	assertDescriptionDocument(content);
	const registry = options.registry ?? DEFAULT_REGISTRY;
	const { format, version, substitution } = selectFormat(
		registry,
		content.type,
		content.format_version,
		options.target ?? "latest",
	);
	if (substitution) {
		logMessage(substitution, "info");
	}
	return migrateFrom(format.migration, content, version);
}
