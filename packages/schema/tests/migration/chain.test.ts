import { describe, it, expect } from "vitest";
import type { RawMapping } from "@resource-spec/core";
import {
  applyMigrationStep,
  getChainTarget,
  getOldestVersion,
  migrateDocument,
} from "../../src/migration/chain.js";
import { MODEL_V0_4_CHAIN } from "../../src/migration/model.js";
import { GENERIC_V0_2_CHAIN, GENERIC_V0_3_CHAIN } from "../../src/migration/generic.js";
import { COLLECTION_V0_2_CHAIN } from "../../src/migration/collection.js";
import { createModel } from "../fixtures.js";

describe("applyMigrationStep", () => {
  it("applies only at a source version", () => {
    const step = { from: ["0.4.5", "0.4.6"], to: "0.4.7" };
    const matching: RawMapping = { format_version: "0.4.6" };
    const other: RawMapping = { format_version: "0.4.7" };

    expect(applyMigrationStep(step, matching)).toBe(true);
    expect(applyMigrationStep(step, other)).toBe(false);
    expect(matching.format_version).toBe("0.4.7");
  });
});

describe("chain bounds", () => {
  it("knows the oldest and target versions", () => {
    expect(getOldestVersion(MODEL_V0_4_CHAIN)).toBe("0.3.0");
    expect(getChainTarget(MODEL_V0_4_CHAIN)).toBe("0.4.10");
    expect(getChainTarget(GENERIC_V0_2_CHAIN)).toBe("0.2.4");
    expect(getChainTarget(GENERIC_V0_3_CHAIN)).toBe("0.3.0");
    expect(getChainTarget(COLLECTION_V0_2_CHAIN)).toBe("0.2.3");
  });
});

describe("migrateDocument", () => {
  it("does not modify its input", () => {
    const document = createModel({ format_version: "0.4.1", dependencies: "conda:environment.yaml" });

    migrateDocument(MODEL_V0_4_CHAIN, document);

    expect(document.format_version).toBe("0.4.1");
    expect(document.dependencies).toBe("conda:environment.yaml");
  });

  it("relocates root dependencies of 0.4.1 documents", () => {
    const migrated = migrateDocument(
      MODEL_V0_4_CHAIN,
      createModel({ format_version: "0.4.1", dependencies: "conda:environment.yaml" }),
    );

    expect(migrated.format_version).toBe("0.4.10");
    expect("dependencies" in migrated).toBe(false);
    expect(migrated.weights).toEqual({
      pytorch_state_dict: {
        source: "weights.pt",
        architecture: "model.py:UNet",
        dependencies: "conda:environment.yaml",
      },
    });
  });

  it("converges 0.4.1 to 0.4.4 on the same result", () => {
    const results = ["0.4.1", "0.4.2", "0.4.3", "0.4.4"].map((version) =>
      migrateDocument(
        MODEL_V0_4_CHAIN,
        createModel({ format_version: version, parent: { uri: "https://example.com/parent/rdf.yaml" } }),
      ),
    );

    for (const result of results) {
      expect(result).toEqual(results[0]);
    }
    expect(results[0]?.parent).toBe("https://example.com/parent/rdf.yaml");
  });

  it("is idempotent", () => {
    const once = migrateDocument(MODEL_V0_4_CHAIN, createModel({ format_version: "0.3.6" }));
    const twice = migrateDocument(MODEL_V0_4_CHAIN, once);

    expect(twice).toEqual(once);
  });

  it("migrates 0.3 models through every step", () => {
    const document: RawMapping = {
      format_version: "0.3.1",
      type: "model",
      name: "UNet/2D",
      authors: ["Jane Doe"],
      language: "python",
      framework: "pytorch",
      source: "model.py:UNet",
      kwargs: { depth: 4 },
      dependencies: "conda:environment.yaml",
      cite: [{ text: "U-Net", doi: "https://doi.org/10.1007/978-3-319-24574-4_28" }],
      outputs: [{ name: "mask", shape: { reference_input: "raw", scale: [1], offset: [0] } }],
      weights: { pytorch_state_dict: { source: "weights.pt" }, pytorch_script: { source: "weights.torchscript" } },
      config: { bioimageio: { nickname: "humble-otter" } },
    };

    expect(migrateDocument(MODEL_V0_4_CHAIN, document)).toEqual({
      format_version: "0.4.10",
      type: "model",
      name: "UNet2D",
      authors: [{ name: "Jane Doe" }],
      cite: [{ text: "U-Net", doi: "10.1007/978-3-319-24574-4_28" }],
      outputs: [{ name: "mask", shape: { reference_tensor: "raw", scale: [1], offset: [0] } }],
      weights: {
        pytorch_state_dict: {
          source: "weights.pt",
          architecture: "model.py:UNet",
          kwargs: { depth: 4 },
          dependencies: "conda:environment.yaml",
        },
        torchscript: { source: "weights.torchscript" },
      },
      config: { bioimageio: { nickname: "humble-otter" } },
      id: "humble-otter",
    });
  });

  it("treats versions below the oldest as the oldest", () => {
    const migrated = migrateDocument(GENERIC_V0_2_CHAIN, { format_version: "0.1.0", name: "a/b" });

    expect(migrated).toEqual({ format_version: "0.2.4", name: "ab" });
  });

  it("leaves documents past the target unchanged", () => {
    const document: RawMapping = { format_version: "0.5.0", name: "a/b" };

    expect(migrateDocument(MODEL_V0_4_CHAIN, document)).toEqual(document);
  });

  it("stops at an intermediate target", () => {
    const migrated = migrateDocument(GENERIC_V0_3_CHAIN, { format_version: "0.2.2", name: "a/b" }, "0.2.3");

    expect(migrated).toEqual({ format_version: "0.2.3", name: "ab" });
  });

  it("migrates 0.2 generic descriptions to 0.3", () => {
    const migrated = migrateDocument(GENERIC_V0_3_CHAIN, {
      format_version: "0.2.4",
      name: "Nuclei images",
      authors: ["Jane Doe"],
      attachments: { files: ["images.zip"] },
      download_url: "https://example.com/images.zip",
      rdf_source: "https://example.com/rdf.yaml",
    });

    expect(migrated).toEqual({
      format_version: "0.3.0",
      name: "Nuclei images",
      authors: [{ name: "Jane Doe" }],
      attachments: [{ source: "images.zip" }],
    });
  });

  it("merges collection groups", () => {
    const migrated = migrateDocument(COLLECTION_V0_2_CHAIN, {
      format_version: "0.2.0",
      type: "collection",
      model: [{ id: "unet" }],
      dataset: [{ id: "nuclei" }],
    });

    expect(migrated).toEqual({
      format_version: "0.2.3",
      type: "collection",
      collection: [
        { type: "model", id: "unet" },
        { type: "dataset", id: "nuclei" },
      ],
    });
  });
});
