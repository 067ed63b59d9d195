/**
 * @title Built-in Formats
 * @description The description formats shipped with this package, registered
 * once when the module loads.
 *
 * @module registry
 */

import { COLLECTION_V0_2_CHAIN } from "../migration/collection.js";
import { GENERIC_V0_2_CHAIN, GENERIC_V0_3_CHAIN } from "../migration/generic.js";
import { MODEL_V0_4_CHAIN } from "../migration/model.js";
import { collectionV0_2 } from "../schemas/collection.js";
import {
	applicationV0_2,
	applicationV0_3,
	datasetV0_2,
	datasetV0_3,
	genericV0_2,
	genericV0_3,
	notebookV0_2,
	notebookV0_3,
} from "../schemas/generic.js";
import { modelV0_4 } from "../schemas/model.js";
import type { DescriptionFormat } from "./format.js";
import { defineFormat } from "./format.js";
import { FormatRegistry, GENERIC_TYPE } from "./registry.js";

/**
 * Formats of every built-in resource type.
 */
export const BUILTIN_FORMATS: readonly DescriptionFormat[] = [
	defineFormat({ type: GENERIC_TYPE, latestVersion: "0.2.4", migration: GENERIC_V0_2_CHAIN, schema: genericV0_2 }),
	defineFormat({ type: GENERIC_TYPE, latestVersion: "0.3.0", migration: GENERIC_V0_3_CHAIN, schema: genericV0_3 }),
	defineFormat({ type: "application", latestVersion: "0.2.4", migration: GENERIC_V0_2_CHAIN, schema: applicationV0_2 }),
	defineFormat({ type: "application", latestVersion: "0.3.0", migration: GENERIC_V0_3_CHAIN, schema: applicationV0_3 }),
	defineFormat({ type: "dataset", latestVersion: "0.2.4", migration: GENERIC_V0_2_CHAIN, schema: datasetV0_2 }),
	defineFormat({ type: "dataset", latestVersion: "0.3.0", migration: GENERIC_V0_3_CHAIN, schema: datasetV0_3 }),
	defineFormat({ type: "notebook", latestVersion: "0.2.4", migration: GENERIC_V0_2_CHAIN, schema: notebookV0_2 }),
	defineFormat({ type: "notebook", latestVersion: "0.3.0", migration: GENERIC_V0_3_CHAIN, schema: notebookV0_3 }),
	defineFormat({ type: "collection", latestVersion: "0.2.3", migration: COLLECTION_V0_2_CHAIN, schema: collectionV0_2 }),
	defineFormat({ type: "model", latestVersion: "0.4.10", migration: MODEL_V0_4_CHAIN, schema: modelV0_4 }),
];

/** Registry of the built-in formats. */
export const DEFAULT_REGISTRY = new FormatRegistry(BUILTIN_FORMATS);

/**
 * Every format version each built-in resource type can validate.
 *
 * @example
 * ```typescript
 * getSupportedFormatVersions().model; // ["0.3.0", ..., "0.3.6", "0.4.0", ..., "0.4.10"]
 * ```
 */
export function getSupportedFormatVersions(): Record<string, readonly string[]> {
	return DEFAULT_REGISTRY.getSupportedFormatVersions();
}
