/**
 * @title Collection Migration
 * @description Migration chain of collection descriptions.
 *
 * @module migration
 */

import type { RawMapping, RawValue } from "@resource-spec/core";
import { isMapping, isSequence } from "@resource-spec/core";
import type { MigrationChain } from "./chain.js";
import { convertAuthorNames, removeDoiPrefix, removeEmptyConfig, removeSlashesFromNames } from "./transforms.js";

const ENTRY_GROUPS = ["application", "model", "dataset", "notebook"] as const;

/**
 * Merge the per-type entry groups of older collections into `collection`,
 * tagging each entry with its type.
 */
export function mergeCollectionGroups(document: RawMapping): void {
	const merged: RawValue[] = isSequence(document.collection) ? [...document.collection] : [];
	let found = false;

	for (const group of ENTRY_GROUPS) {
		const entries = document[group];
		if (!isSequence(entries)) {
			continue;
		}
		found = true;
		delete document[group];
		for (const entry of entries) {
			merged.push(isMapping(entry) ? { type: group, ...entry } : entry);
		}
	}

	if (found) {
		document.collection = merged;
	}
}

/**
 * Chain ending at collection 0.2.3.
 */
export const COLLECTION_V0_2_CHAIN: MigrationChain = {
	steps: [
		{ from: ["0.2.0", "0.2.1"], to: "0.2.2", apply: mergeCollectionGroups },
		{ from: ["0.2.2"], to: "0.2.3", apply: removeSlashesFromNames },
	],
	prepare: (document) => convertAuthorNames(document, ["authors", "maintainers"]),
	finalize: (document) => {
		removeDoiPrefix(document);
		removeEmptyConfig(document);
	},
};
