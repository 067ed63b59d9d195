/**
 * @title Model Schema
 * @description Description of a trained model, format 0.4.
 *
 * A model lists its input and output tensors, the weights in one or more
 * formats, and test tensors that reproduce the outputs from the inputs.
 *
 * @module schemas
 */

import type { FileSource, Infer, Scope } from "@resource-spec/core";
import {
	ConstraintError,
	DatetimeSyntax,
	INVALID,
	IdentifierSyntax,
	Predicate,
	RestrictCharacters,
	array,
	custom,
	fileSource,
	httpUrl,
	integer,
	literal,
	number,
	object,
	raw,
	record,
	string,
	union,
} from "@resource-spec/core";
import {
	attachmentsV0_2,
	author,
	badge,
	citeEntry,
	config,
	covers,
	documentation,
	icon,
	license,
	maintainer,
	resourceVersion,
	sha256,
} from "./common.js";

const NAME_ALPHABET = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789_- ()";

/** Axis letters: batch, index, time, channel, z, y, x. */
export const AXIS_LETTERS = "bitczyx";

export const DATA_TYPES = [
	"float32",
	"float64",
	"uint8",
	"int8",
	"uint16",
	"int16",
	"uint32",
	"int32",
	"uint64",
	"int64",
	"bool",
] as const;

export const WEIGHTS_FORMATS = [
	"keras_hdf5",
	"onnx",
	"pytorch_state_dict",
	"tensorflow_js",
	"tensorflow_saved_model_bundle",
	"torchscript",
] as const;

export type WeightsFormat = (typeof WEIGHTS_FORMATS)[number];

export const PREPROCESSING_NAMES = [
	"binarize",
	"clip",
	"scale_linear",
	"sigmoid",
	"zero_mean_unit_variance",
	"scale_range",
] as const;

export const POSTPROCESSING_NAMES = [...PREPROCESSING_NAMES, "scale_mean_variance"] as const;

const distinctAxes = new Predicate((axes: string) => new Set(axes).size === axes.length, "Duplicate axes in {value}");

const axes = string({ minLength: 1 }).check(new RestrictCharacters(AXIS_LETTERS), distinctAxes);

const processingKwargs = record(raw()).optional();

const preprocessing = object({ name: literal(...PREPROCESSING_NAMES), kwargs: processingKwargs });

const postprocessing = object({ name: literal(...POSTPROCESSING_NAMES), kwargs: processingKwargs });

/** Shape of a tensor of fixed size. */
const explicitShape = array(integer({ min: 1 }), { minLength: 1 });

/** Shape of an input tensor that may grow in steps. */
const parameterizedShape = object({
	min: array(integer({ min: 1 }), { minLength: 1 }),
	step: array(integer({ min: 0 }), { minLength: 1 }),
}).refine((shape) => {
	if (shape.min.length !== shape.step.length) {
		throw new ConstraintError("'min' and 'step' must have the same length");
	}
});

/** Shape of an output tensor derived from another tensor's shape. */
const implicitShape = object({
	reference_tensor: string({ minLength: 1 }),
	scale: array(number().optional(), { minLength: 1 }),
	offset: array(number({ multipleOf: 0.5 }), { minLength: 1 }),
}).refine((shape) => {
	if (shape.scale.length !== shape.offset.length) {
		throw new ConstraintError("'scale' and 'offset' must have the same length");
	}
});

const tensorFields = {
	name: string().check(new IdentifierSyntax()),
	description: string().optional(),
	axes,
	data_type: literal(...DATA_TYPES),
	data_range: array(number(), { minLength: 2, maxLength: 2 }).optional(),
};

/** Input tensor. */
export const inputTensor = object({
	...tensorFields,
	shape: union(explicitShape, parameterizedShape),
	preprocessing: array(preprocessing).optional(),
});

/** Output tensor. */
export const outputTensor = object({
	...tensorFields,
	shape: union(explicitShape, implicitShape),
	halo: array(integer({ min: 0 })).optional(),
	postprocessing: array(postprocessing).optional(),
});

/** Environment file of a weights entry. */
export interface Dependencies {
	manager: "conda" | "maven" | "pip";
	file: FileSource;
}

const dependencyManager = literal("conda", "maven", "pip");
const dependencyFile = fileSource({ inPackage: true });
const dependenciesObject = object({ manager: dependencyManager, file: dependencyFile });

/** `"<manager>:<file>"` or `{ manager, file }`. */
export const dependencies = custom<Dependencies>((value, scope) => {
	if (typeof value !== "string") {
		return dependenciesObject.parse(value, scope);
	}

	const separator = value.indexOf(":");
	if (separator === -1) {
		scope.state.addError(scope.loc, `'${value}' should be of the form '<manager>:<file>'`);
		return INVALID;
	}
	const manager = dependencyManager.parse(value.slice(0, separator), scope);
	const file = dependencyFile.parse(value.slice(separator + 1), scope);
	return manager === INVALID || file === INVALID ? INVALID : { manager, file };
});

const callableSyntax = new Predicate(
	(value: string) => /^(?:[^:]+\.py:[\p{L}_][\p{L}\p{N}_]*|[\p{L}_][\p{L}\p{N}_]*(?:\.[\p{L}_][\p{L}\p{N}_]*)+)$/u.test(value),
	"{value} is neither '<file>.py:<name>' nor an importable '<module>.<name>'",
);

const weightsEntryFields = {
	source: fileSource({ inPackage: true }),
	sha256: sha256.optional(),
	attachments: attachmentsV0_2.optional(),
	authors: array(author).optional(),
	dependencies: dependencies.optional(),
	parent: literal(...WEIGHTS_FORMATS).optional(),
};

/** Weights of every supported format. */
export const weights = object({
	keras_hdf5: object({ ...weightsEntryFields, tensorflow_version: resourceVersion.optional() }).optional(),
	onnx: object({ ...weightsEntryFields, opset_version: integer({ min: 7 }).optional() }).optional(),
	pytorch_state_dict: object({
		...weightsEntryFields,
		architecture: string().check(callableSyntax),
		architecture_sha256: sha256.optional(),
		kwargs: record(raw()).optional(),
		pytorch_version: resourceVersion.optional(),
	}).optional(),
	tensorflow_js: object({ ...weightsEntryFields, tensorflow_version: resourceVersion.optional() }).optional(),
	tensorflow_saved_model_bundle: object({
		...weightsEntryFields,
		tensorflow_version: resourceVersion.optional(),
	}).optional(),
	torchscript: object({ ...weightsEntryFields, pytorch_version: resourceVersion.optional() }).optional(),
}, { unknownKeys: "forbid" }).refine((entries, scope) => {
	const present = WEIGHTS_FORMATS.filter((format) => entries[format] !== undefined);
	if (present.length === 0) {
		throw new ConstraintError("Missing weights entry", "missing");
	}

	for (const format of present) {
		const parent = entries[format]?.parent;
		if (parent === undefined) {
			continue;
		}
		const loc = [...scope.loc, format, "parent"];
		if (parent === format) {
			scope.state.addError(loc, "Weights entry can't be its own parent.");
		} else if (entries[parent] === undefined) {
			scope.state.addError(loc, `Parent weights '${parent}' not found`);
		}
	}
});

/** Model weights by format. */
export type ModelWeights = Infer<typeof weights>;

function checkTensors(description: ModelV0_4, scope: Scope): void {
	const names = new Map<string, string>();
	const tensors = [
		...description.inputs.map((tensor, index) => ({ tensor, loc: ["inputs", index] })),
		...description.outputs.map((tensor, index) => ({ tensor, loc: ["outputs", index] })),
	];

	for (const { tensor, loc } of tensors) {
		const at = [...scope.loc, ...loc];
		const previous = names.get(tensor.name);
		if (previous !== undefined) {
			scope.state.addError([...at, "name"], `Duplicate tensor name '${tensor.name}' (also used by ${previous})`);
		} else {
			names.set(tensor.name, loc.join("."));
		}

		const shape = tensor.shape;
		const length = Array.isArray(shape) ? shape.length : "min" in shape ? shape.min.length : shape.scale.length;
		if (length !== tensor.axes.length) {
			scope.state.addError(
				[...at, "shape"],
				`Shape has ${length} dimension${length === 1 ? "" : "s"}, but axes '${tensor.axes}' has ${tensor.axes.length}`,
			);
		}
	}

	const inputNames = new Set(description.inputs.map((tensor) => tensor.name));
	description.outputs.forEach((tensor, index) => {
		const shape = tensor.shape;
		if (!Array.isArray(shape) && !inputNames.has(shape.reference_tensor)) {
			scope.state.addError(
				[...scope.loc, "outputs", index, "shape", "reference_tensor"],
				`'${shape.reference_tensor}' not found in inputs`,
			);
		}
	});
}

function checkTestTensors(description: ModelV0_4, scope: Scope): void {
	for (const [field, tensors] of [
		["test_inputs", "inputs"],
		["test_outputs", "outputs"],
	] as const) {
		const expected = description[tensors].length;
		const actual = description[field].length;
		if (actual !== expected) {
			scope.state.addError(
				[...scope.loc, field],
				`Expected ${expected} ${field.replace("_", " ")}, one per entry of '${tensors}', but got ${actual}`,
			);
		}
	}
}

const npyFile = fileSource({ suffix: ".npy", inPackage: true });

const modelFields = object({
	format_version: literal("0.4.10"),
	type: literal("model"),
	name: string({ minLength: 1, maxLength: 128 }).check(new RestrictCharacters(NAME_ALPHABET)),
	description: string(),
	authors: array(author, { minLength: 1 }),
	maintainers: array(maintainer).optional(),
	attachments: attachmentsV0_2.optional(),
	badges: array(badge).optional(),
	cite: array(citeEntry, { minLength: 1 }),
	config: config.optional(),
	covers: covers.optional(),
	documentation,
	git_repo: httpUrl().optional(),
	icon: icon.optional(),
	id: string().optional(),
	id_emoji: string().optional(),
	license,
	links: array(string()).optional(),
	tags: array(string()).optional(),
	version: resourceVersion.optional(),
	inputs: array(inputTensor, { minLength: 1 }),
	outputs: array(outputTensor, { minLength: 1 }),
	test_inputs: array(npyFile, { minLength: 1 }),
	test_outputs: array(npyFile, { minLength: 1 }),
	sample_inputs: array(fileSource({ inPackage: true })).optional(),
	sample_outputs: array(fileSource({ inPackage: true })).optional(),
	timestamp: raw().pipe(new DatetimeSyntax()),
	weights,
	parent: string().optional(),
	run_mode: object({ name: string(), kwargs: record(raw()).optional() }).optional(),
	packaged_by: array(author).optional(),
	training_data: record(raw()).optional(),
});

/** Parsed model description. */
export type ModelV0_4 = Infer<typeof modelFields>;

/** Model description 0.4.10. */
export const modelV0_4 = modelFields.refine((description, scope) => {
	checkTensors(description, scope);
	checkTestTensors(description, scope);
});
