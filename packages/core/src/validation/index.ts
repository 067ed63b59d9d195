/**
 * Validation module exports.
 */

export {
	type Root,
	type ValidationContext,
	type ValidationContextOptions,
	DEFAULT_FILE_NAME,
	isUrlRoot,
	normaliseRoot,
	createValidationContext,
	withContext,
	joinUrl,
	resolveAgainstRoot,
	getSourceName,
} from "./context.js";

export {
	type Loc,
	type ErrorEntry,
	type WarningEntry,
	type PackageSourceEntry,
	ParseState,
	formatLoc,
} from "./issues.js";

export { type Validator, describeType, formatValue } from "./validator.js";

export {
	type WarningOptions,
	type AsWarningOptions,
	formatWarningMessage,
	issueWarning,
	asWarning,
} from "./warn.js";

export {
	type SuffixInput,
	RestrictCharacters,
	SuffixConstraint,
	UniqueEntries,
	NonEmpty,
	Predicate,
	extractSuffix,
	canonicalKey,
} from "./constraints.js";

export {
	VersionSyntax,
	IdentifierSyntax,
	DatetimeSyntax,
	OrcidChecksum,
	SiUnitSyntax,
	DoiSyntax,
	HttpUrlSyntax,
	SI_UNIT_REGEX,
	getReservedWords,
	parseIsoDatetime,
} from "./syntax.js";

export {
	type Scope,
	type Invalid,
	type Infer,
	type Shape,
	type InferShape,
	type StringOptions,
	type NumberOptions,
	type LiteralValue,
	type ArrayOptions,
	type ObjectOptions,
	type FileSourceOptions,
	type ParseResult,
	INVALID,
	childScope,
	applyValidator,
	warnAt,
	SchemaNode,
	OptionalNode,
	DefaultNode,
	ConstrainedNode,
	PipeNode,
	RefineNode,
	TransformNode,
	CustomNode,
	StringNode,
	NumberNode,
	BooleanNode,
	LiteralNode,
	ArrayNode,
	RecordNode,
	ObjectNode,
	UnionNode,
	RawNode,
	FileSourceNode,
	RelativePathNode,
	string,
	number,
	integer,
	boolean,
	literal,
	array,
	record,
	object,
	union,
	raw,
	fileSource,
	relativePath,
	httpUrl,
	custom,
	parseWithSchema,
} from "./nodes.js";

export {
	type ValidationStatus,
	type ValidationSummary,
	type ValidationSummaryInit,
	type SummaryEntryJson,
	type ValidationSummaryJson,
	type LegacyValidationSummary,
	ROOT_KEY,
	createValidationSummary,
	summaryToJson,
	toLegacySummary,
	formatValidationSummary,
} from "./summary.js";
