import { describe, it, expect } from "vitest";
import type { RawMapping, SchemaNode } from "@resource-spec/core";
import { RelativeFilePath, createValidationContext, formatLoc, parseWithSchema } from "@resource-spec/core";
import { citeEntry, getKnownLicenses, sha256 } from "../src/schemas/common.js";
import { dependencies, modelV0_4, weights } from "../src/schemas/model.js";
import { genericV0_3 } from "../src/schemas/generic.js";
import { collectionV0_2 } from "../src/schemas/collection.js";
import { NO_IO, createModel } from "./fixtures.js";

const context = createValidationContext(NO_IO);

function errorsOf(value: unknown, node: SchemaNode<unknown>): string[] {
	return parseWithSchema(node, value, context).state.errors.map((entry) => `${formatLoc(entry.loc)}: ${entry.msg}`);
}

describe("common fields", () => {
	it("loads the license list", () => {
		expect(getKnownLicenses().has("MIT")).toBe(true);
		expect(getKnownLicenses().has("Apache-2.0")).toBe(true);
	});

	it("requires a DOI or URL in citations", () => {
		expect(errorsOf({ text: "U-Net" }, citeEntry)).toEqual([": Either 'doi' or 'url' is required"]);
		expect(errorsOf({ text: "U-Net", url: "https://example.com/unet" }, citeEntry)).toEqual([]);
	});

	it("checks SHA-256 hashes", () => {
		expect(errorsOf("a".repeat(64), sha256)).toEqual([]);
		expect(errorsOf("abc", sha256)).toEqual([": 'abc' is not a SHA-256 hash"]);
	});
});

describe("model schema", () => {
	it("accepts a valid model", () => {
		const result = parseWithSchema(modelV0_4, createModel(), context);

		expect(result.state.errors).toEqual([]);
		expect(result.value?.timestamp).toEqual(new Date("2024-03-01T12:00:00Z"));
	});

	it("reports every field error of one pass", () => {
		const document = createModel({
			inputs: [{ name: "raw", axes: "bcyq", data_type: "float32", shape: [1, 1, 256, 256] }],
		});
		delete document.name;

		const locs = parseWithSchema(modelV0_4, document, context).state.errors.map((entry) => formatLoc(entry.loc));

		expect(locs).toEqual(["name", "inputs.0.axes"]);
	});

	it("checks shapes against axes", () => {
		const document = createModel({
			inputs: [{ name: "raw", axes: "bcyx", data_type: "float32", shape: [1, 256, 256] }],
		});

		expect(errorsOf(document, modelV0_4)).toEqual(["inputs.0.shape: Shape has 3 dimensions, but axes 'bcyx' has 4"]);
	});

	it("rejects duplicate tensor names and unknown references", () => {
		const document = createModel({
			outputs: [
				{
					name: "raw",
					axes: "bcyx",
					data_type: "float32",
					shape: { reference_tensor: "image", scale: [1, 1, 1, 1], offset: [0, 0, 0, 0] },
				},
			],
		});

		expect(errorsOf(document, modelV0_4)).toEqual([
			"outputs.0.name: Duplicate tensor name 'raw' (also used by inputs.0)",
			"outputs.0.shape.reference_tensor: 'image' not found in inputs",
		]);
	});

	it("needs one test tensor per tensor", () => {
		const document = createModel({ test_inputs: ["a.npy", "b.npy"] });

		expect(errorsOf(document, modelV0_4)).toEqual([
			"test_inputs: Expected 1 test inputs, one per entry of 'inputs', but got 2",
		]);
	});
});

describe("weights", () => {
	it("requires at least one entry", () => {
		expect(errorsOf({}, weights)).toEqual([": Missing weights entry"]);
	});

	it("forbids unknown formats", () => {
		expect(errorsOf({ onnx: { source: "w.onnx" }, caffe: { source: "w.caffe" } }, weights)).toEqual([
			"caffe: Extra inputs are not permitted",
		]);
	});

	it("checks parents", () => {
		expect(
			errorsOf(
				{ onnx: { source: "w.onnx", parent: "onnx" }, torchscript: { source: "w.pt", parent: "keras_hdf5" } },
				weights,
			),
		).toEqual(["onnx.parent: Weights entry can't be its own parent.", "torchscript.parent: Parent weights 'keras_hdf5' not found"]);
	});
});

describe("dependencies", () => {
	it("parses the string form", () => {
		const result = parseWithSchema(dependencies, "conda:environment.yaml", context);

		expect(result.value?.manager).toBe("conda");
		expect(result.value?.file).toBeInstanceOf(RelativeFilePath);
	});

	it("rejects strings without a manager", () => {
		expect(errorsOf("environment.yaml", dependencies)).toEqual([
			": 'environment.yaml' should be of the form '<manager>:<file>'",
		]);
	});
});

describe("generic schema", () => {
	it("refuses specialized types", () => {
		const document: RawMapping = { format_version: "0.3.0", type: "model", name: "UNet", description: "A model." };

		expect(errorsOf(document, genericV0_3)).toEqual([
			"type: Use the model description instead of this generic description for your model resource.",
		]);
	});
});

describe("collection schema", () => {
	it("rejects duplicate ids", () => {
		const document: RawMapping = {
			format_version: "0.2.3",
			type: "collection",
			name: "Nuclei tools",
			description: "Models and data for nuclei segmentation.",
			collection: [{ id: "unet" }, { id: "stardist" }, { id: "unet" }],
		};

		expect(errorsOf(document, collectionV0_2)).toEqual([
			"collection.2.id: Duplicate id 'unet' (first used at collection.0)",
		]);
	});
});
