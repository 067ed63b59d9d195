import { describe, it, expect } from "vitest";
import type { RawMapping } from "@resource-spec/core";
import { ALERT, INFO, RelativeFilePath, ResourceSpecError, WARNING, custom, toLegacySummary } from "@resource-spec/core";
import {
	assertDescriptionDocument,
	loadDescription,
	selectFormat,
	updateFormat,
	validateFormat,
} from "../../src/description/load.js";
import { getPackageSources } from "../../src/description/package.js";
import { DEFAULT_REGISTRY } from "../../src/registry/builtin.js";
import { defineFormat } from "../../src/registry/format.js";
import { FormatRegistry, GENERIC_TYPE } from "../../src/registry/registry.js";
import { GENERIC_V0_2_CHAIN } from "../../src/migration/generic.js";
import { NO_IO, createDataset, createModel } from "../fixtures.js";

describe("assertDescriptionDocument", () => {
	it("requires a mapping with string type and format_version", () => {
		expect(() => assertDescriptionDocument(null)).toThrow("Expected a description mapping, but got null");
		expect(() => assertDescriptionDocument(["model"])).toThrow("Expected a description mapping, but got array");
		expect(() => assertDescriptionDocument({ type: 42, format_version: "0.4.10" })).toThrow(
			"Expected 'type' to be a string, but got number",
		);
		expect(() => assertDescriptionDocument({ type: "model" })).toThrow(
			"Expected 'format_version' to be a string, but got undefined",
		);
	});

	it("throws a TypeError from loadDescription", () => {
		expect(() => loadDescription({ type: "model", format_version: 0.4 })).toThrow(TypeError);
	});
});

describe("selectFormat", () => {
	it("accepts a series or its latest version", () => {
		expect(selectFormat(DEFAULT_REGISTRY, "dataset", "0.2.4", "0.3").format.latestVersion).toBe("0.3.0");
		expect(selectFormat(DEFAULT_REGISTRY, "dataset", "0.2.4", "0.3.0").format.latestVersion).toBe("0.3.0");
	});

	it("rejects other explicit versions", () => {
		try {
			selectFormat(DEFAULT_REGISTRY, "model", "0.4.10", "0.4.5");
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(ResourceSpecError);
			if (error instanceof ResourceSpecError) {
				expect(error.code).toBe("UNSUPPORTED_FORMAT_VERSION");
				expect(error.message).toBe("Unsupported format version '0.4.5' for type 'model'");
				expect(error.suggestion).toBe('Use "discover", "latest" or one of: 0.4');
			}
		}
		expect(() => selectFormat(DEFAULT_REGISTRY, "model", "0.4.10", "0.3")).toThrow(ResourceSpecError);
	});
});

describe("loadDescription", () => {
	it("loads a valid model", () => {
		const { description, summary } = loadDescription(createModel(), { context: NO_IO });

		expect(summary.status).toBe("passed");
		expect(summary.name).toBe("resource-spec static model validation (format version: 0.4.10).");
		expect(summary.sourceName).toBe("/data/unet/rdf.yaml");
		expect(summary.errors).toEqual([]);
		expect(summary.warnings).toEqual([]);
		expect(description?.type).toBe("model");
		expect(description?.formatVersion).toBe("0.4.10");
	});

	it("migrates a 0.4.1 model and relocates its dependencies", () => {
		const { description, summary } = loadDescription(
			createModel({ format_version: "0.4.1", dependencies: "conda:environment.yaml" }),
			{ context: NO_IO },
		);

		expect(summary.status).toBe("passed");
		expect(summary.warnings).toEqual([]);
		expect(description?.content.format_version).toBe("0.4.10");
		expect("dependencies" in (description?.content ?? {})).toBe(false);
		expect(description?.content.weights).toEqual({
			pytorch_state_dict: {
				source: "weights.pt",
				architecture: "model.py:UNet",
				dependencies: "conda:environment.yaml",
			},
		});
	});

	it("validates future versions with the latest format and warns", () => {
		const { description, summary } = loadDescription(createModel({ format_version: "9999.0.0" }), {
			context: NO_IO,
		});

		expect(description).not.toBeNull();
		expect(summary.errors).toEqual([]);
		expect(summary.warnings).toEqual([
			{
				loc: ["format_version"],
				msg: "Treated future patch version 9999.0.0 as 0.4.10.",
				type: "alert",
				severity: ALERT,
			},
		]);
	});

	it("migrates models older than every known version from the oldest transition", () => {
		const document = createModel({
			format_version: "0.2.0",
			source: "model.py:UNet",
			weights: { pytorch_state_dict: { source: "weights.pt" } },
		});

		const { description, summary } = loadDescription(document, { context: NO_IO });

		expect(summary.status).toBe("passed");
		expect(summary.warnings).toEqual([
			{
				loc: ["format_version"],
				msg: "Treated unknown format version 0.2.0 as 0.3.0.",
				type: "alert",
				severity: ALERT,
			},
		]);
		expect("source" in (description?.content ?? {})).toBe(false);
		expect(description?.content.weights).toEqual({
			pytorch_state_dict: { source: "weights.pt", architecture: "model.py:UNet" },
		});
	});

	it("counts icon length in characters", () => {
		const { summary } = loadDescription(createDataset({ icon: "👍🏽" }), { context: NO_IO });

		expect(summary.status).toBe("passed");
		expect(summary.errors).toEqual([]);
	});

	it("reports unexpected exceptions as errors with a traceback", () => {
		const registry = new FormatRegistry([
			defineFormat({
				type: GENERIC_TYPE,
				latestVersion: "0.2.4",
				migration: GENERIC_V0_2_CHAIN,
				schema: custom(() => {
					throw new RangeError("boom");
				}),
			}),
		]);

		const { description, summary } = loadDescription(
			{ format_version: "0.2.4", type: GENERIC_TYPE, name: "Broken" },
			{ context: NO_IO, registry },
		);

		expect(description).toBeNull();
		expect(summary.status).toBe("failed");
		expect(summary.errors).toHaveLength(1);
		expect(summary.errors[0]).toMatchObject({ loc: [], msg: "boom", type: "RangeError" });
		expect(summary.errors[0]?.traceback?.length).toBeGreaterThan(0);
		expect(summary.errors[0]?.traceback?.[0]).toBe("RangeError: boom");
	});

	it("reports several errors at once", () => {
		const document = createModel({ license: "" });
		delete document.documentation;

		const { description, summary } = loadDescription(document, { context: NO_IO });

		expect(description).toBeNull();
		expect(summary.status).toBe("failed");
		expect(summary.errors.map((entry) => entry.loc)).toEqual([["documentation"], ["license"]]);
		expect(summary.errors[0]?.type).toBe("missing");
	});

	it("reports more warnings at lower warning levels", () => {
		const document = createModel({ license: "Example-License" });
		const count = (warningLevel: typeof INFO | typeof WARNING | undefined) =>
			loadDescription(document, { context: { ...NO_IO, warningLevel } }).summary.warnings.length;

		const strict = loadDescription(document, { context: NO_IO });
		const relaxed = loadDescription(document, { context: { ...NO_IO, warningLevel: WARNING } });

		expect(strict.summary.status).toBe("passed");
		expect(strict.summary.warnings).toEqual([]);
		expect(relaxed.summary.warnings).toEqual([
			{
				loc: ["license"],
				msg: "'Example-License' is not a known SPDX license identifier",
				type: "warning",
				severity: WARNING,
			},
		]);
		expect(count(undefined)).toBeLessThanOrEqual(count(WARNING));
		expect(count(WARNING)).toBeLessThanOrEqual(count(INFO));
	});

	it("collects package sources", () => {
		const { description } = loadDescription(
			createModel({
				weights: {
					pytorch_state_dict: {
						source: "weights.pt",
						architecture: "model.py:UNet",
						dependencies: "conda:environment.yaml",
					},
				},
			}),
			{ context: NO_IO },
		);
		if (!description) {
			throw new Error("expected a description");
		}

		expect(getPackageSources(description)).toEqual({
			documentation: "/data/unet/README.md",
			"test_inputs.0": "/data/unet/test_input.npy",
			"test_outputs.0": "/data/unet/test_output.npy",
			"weights.pytorch_state_dict.source": "/data/unet/weights.pt",
			"weights.pytorch_state_dict.dependencies": "/data/unet/environment.yaml",
		});
		expect(description.packageSources.every(({ source }) => source instanceof RelativeFilePath)).toBe(true);
	});

	it("validates unknown types as generic resources", () => {
		const { description, summary } = loadDescription({
			format_version: "0.2.4",
			type: "tutorial",
			name: "Segmentation tutorial",
			description: "Steps through a segmentation workflow.",
		});

		expect(summary.status).toBe("passed");
		expect(summary.name).toBe("resource-spec static tutorial validation (format version: 0.2.4).");
		expect(description?.type).toBe("tutorial");
	});

	it("migrates to the latest format on request", () => {
		const { description, summary } = loadDescription(
			createDataset({ attachments: { files: ["images.zip"] }, download_url: "https://example.com/images.zip" }),
			{ context: NO_IO, formatVersion: "latest" },
		);

		expect(summary.status).toBe("passed");
		expect(description?.formatVersion).toBe("0.3.0");
		expect(description?.content.attachments).toEqual([{ source: "images.zip" }]);
		expect("download_url" in (description?.content ?? {})).toBe(false);
	});

	it("warns about remote collection entries at INFO", () => {
		const document: RawMapping = {
			format_version: "0.2.3",
			type: "collection",
			name: "Nuclei tools",
			description: "Models and data for nuclei segmentation.",
			collection: [{ id: "unet", rdf_source: "https://example.com/unet/rdf.yaml" }],
		};

		expect(validateFormat(document, { context: NO_IO }).warnings).toEqual([]);
		expect(validateFormat(document, { context: { ...NO_IO, warningLevel: INFO } }).warnings).toEqual([
			{
				loc: ["collection", 0, "rdf_source"],
				msg: "Cannot statically validate remote resource description.",
				type: "info",
				severity: INFO,
			},
		]);
	});

	it("produces a legacy summary", () => {
		const document = createModel({ name: "UNet/2D" });

		const legacy = toLegacySummary(validateFormat(document, { context: NO_IO }));

		expect(legacy.status).toBe("failed");
		expect(Object.keys(legacy.error ?? {})).toEqual(["name"]);
		expect(legacy.traceback).toBeNull();
	});
});

describe("updateFormat", () => {
	it("migrates to the latest version without validating", () => {
		const migrated = updateFormat({
			format_version: "0.3.6",
			type: "model",
			source: "model.py:UNet",
			weights: { pytorch_state_dict: { source: "weights.pt" } },
		});

		expect(migrated).toEqual({
			format_version: "0.4.10",
			type: "model",
			weights: { pytorch_state_dict: { source: "weights.pt", architecture: "model.py:UNet" } },
		});
	});

	it("migrates versions older than every known version", () => {
		const migrated = updateFormat({
			format_version: "0.2.0",
			type: "model",
			source: "model.py:UNet",
			weights: { pytorch_state_dict: { source: "weights.pt" } },
		});

		expect(migrated).toEqual({
			format_version: "0.4.10",
			type: "model",
			weights: { pytorch_state_dict: { source: "weights.pt", architecture: "model.py:UNet" } },
		});
	});

	it("keeps the declared series when discovering", () => {
		const migrated = updateFormat(createDataset({ format_version: "0.2.2", name: "a/b" }), { target: "discover" });

		expect(migrated.format_version).toBe("0.2.4");
		expect(migrated.name).toBe("ab");
	});
});
