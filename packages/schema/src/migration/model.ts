/**
 * @title Model Migration
 * @description Migration chain of model descriptions, from 0.3.0 to the latest
 * 0.4 version.
 *
 * @module migration
 */

import type { RawMapping } from "@resource-spec/core";
import { isMapping, isSequence } from "@resource-spec/core";
import type { MigrationChain } from "./chain.js";
import {
	convertNicknameToId,
	namesToPersons,
	removeDoiPrefix,
	removeEmptyConfig,
	removeGithubPrefix,
	removeSlashesFromNames,
	updatePersons,
} from "./transforms.js";

function getFuture(document: RawMapping): RawMapping | undefined {
	const config = document.config;
	if (!isMapping(config)) {
		return undefined;
	}
	const future = config.future;
	return isMapping(future) ? future : undefined;
}

/**
 * 0.3.1 to 0.3.2: persons become mappings, filled in from `config.future["0.3.2"]`.
 */
export function convertPersons(document: RawMapping): void {
	document.type = "model";

	const future = getFuture(document);
	const pending = future?.["0.3.2"];
	if (future) {
		delete future["0.3.2"];
	}
	const updates = isMapping(pending) ? pending : {};

	for (const field of ["authors", "packaged_by"]) {
		const persons = namesToPersons(document[field]);
		if (persons === undefined) {
			continue;
		}
		document[field] = persons;
		updatePersons(persons, updates[field]);
	}

	const weights = document.weights;
	const weightsUpdates = updates.weights;
	if (isMapping(weights)) {
		for (const [format, entry] of Object.entries(weights)) {
			if (!isMapping(entry) || !("authors" in entry)) {
				continue;
			}
			const persons = namesToPersons(entry.authors);
			if (persons === undefined) {
				continue;
			}
			entry.authors = persons;
			const formatUpdates = isMapping(weightsUpdates) ? weightsUpdates[format] : undefined;
			updatePersons(persons, isMapping(formatUpdates) ? formatUpdates.authors : undefined);
		}
	}

	if ("version" in updates) {
		document.version = updates.version;
	}
}

/**
 * 0.3.2 to 0.3.3: output shapes reference a `reference_tensor`.
 */
export function renameReferenceInput(document: RawMapping): void {
	const outputs = document.outputs;
	if (!isSequence(outputs)) {
		return;
	}
	for (const output of outputs) {
		if (!isMapping(output)) {
			continue;
		}
		const shape = output.shape;
		if (isMapping(shape) && "reference_input" in shape) {
			shape.reference_tensor = shape.reference_input;
			delete shape.reference_input;
		}
	}
}

/**
 * 0.3.6 to 0.4.0: architecture details move into the PyTorch weights entry.
 */
export function moveArchitectureToWeights(document: RawMapping): void {
	delete document.language;
	delete document.framework;

	const moved: Record<string, string> = { source: "architecture", sha256: "architecture_sha256", kwargs: "kwargs" };
	const weights = document.weights;
	const stateDict = isMapping(weights) ? weights.pytorch_state_dict : undefined;

	for (const [from, to] of Object.entries(moved)) {
		if (!(from in document)) {
			continue;
		}
		const value = document[from];
		delete document[from];
		if (isMapping(stateDict) && value !== null) {
			stateDict[to] = value;
		}
	}

	if (isMapping(weights) && "pytorch_script" in weights) {
		weights.torchscript = weights.pytorch_script;
		delete weights.pytorch_script;
	}
}

/**
 * Move root `dependencies` into the PyTorch state dict weights entry.
 *
 * The root field is always removed; it is kept only when that entry is a mapping.
 */
export function moveDependenciesToWeights(document: RawMapping): void {
	if (!("dependencies" in document)) {
		return;
	}
	const dependencies = document.dependencies;
	delete document.dependencies;

	const weights = document.weights;
	const stateDict = isMapping(weights) ? weights.pytorch_state_dict : undefined;
	if (dependencies && isMapping(stateDict)) {
		stateDict.dependencies = dependencies;
	}
}

/**
 * Replace a `parent: { uri, ... }` mapping with its `uri`.
 */
export function collapseParent(document: RawMapping): void {
	const parent = document.parent;
	if (isMapping(parent) && "uri" in parent) {
		document.parent = parent.uri;
	}
}

/**
 * Chain ending at the latest model 0.4 version.
 */
export const MODEL_V0_4_CHAIN: MigrationChain = {
	steps: [
		{ from: ["0.3.0"], to: "0.3.1" },
		{ from: ["0.3.1"], to: "0.3.2", apply: convertPersons },
		{ from: ["0.3.2"], to: "0.3.3", apply: renameReferenceInput },
		{ from: ["0.3.3", "0.3.4", "0.3.5"], to: "0.3.6" },
		{ from: ["0.3.6"], to: "0.4.0", apply: moveArchitectureToWeights },
		{ from: ["0.4.0"], to: "0.4.1", apply: moveDependenciesToWeights },
		{
			from: ["0.4.1", "0.4.2", "0.4.3", "0.4.4"],
			to: "0.4.5",
			apply: (document) => {
				// 0.4.1 documents written before the relocation still carry root dependencies.
				moveDependenciesToWeights(document);
				collapseParent(document);
			},
		},
		{ from: ["0.4.5", "0.4.6"], to: "0.4.7", apply: removeSlashesFromNames },
		{ from: ["0.4.7", "0.4.8"], to: "0.4.9" },
		{ from: ["0.4.9"], to: "0.4.10", apply: convertNicknameToId },
	],
	finalize: (document) => {
		removeDoiPrefix(document);
		removeGithubPrefix(document);
		removeEmptyConfig(document);
	},
};
