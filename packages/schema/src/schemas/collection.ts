/**
 * @title Collection Schema
 * @description Description of a collection of resources.
 *
 * Entries are kept as raw mappings. An entry pointing at a remote description
 * through `rdf_source` cannot be validated without fetching it, which an INFO
 * warning records.
 *
 * @module schemas
 */

import type { FileSource, RawMapping } from "@resource-spec/core";
import {
	INFO,
	INVALID,
	array,
	childScope,
	custom,
	fileSource,
	formatLoc,
	isValidRawMapping,
	literal,
	object,
	string,
	warnAt,
} from "@resource-spec/core";
import { V0_2_FIELDS } from "./generic.js";

/**
 * Entry of a collection.
 */
export interface CollectionEntry {
	/** Description the entry refers to. */
	rdf_source?: FileSource;
	/** Entry id, unique within the collection. */
	id?: string;
	/** The entry as written. */
	content: RawMapping;
}

const entryFields = object({
	rdf_source: fileSource().optional(),
	id: string({ minLength: 1 }).optional(),
});

/** Collection entry. */
export const collectionEntry = custom<CollectionEntry>((value, scope) => {
	if (!isValidRawMapping(value)) {
		scope.state.addError(scope.loc, "Input should be a valid dictionary", "dict_type");
		return INVALID;
	}

	const fields = entryFields.parse(value, scope);
	if (fields === INVALID) {
		return INVALID;
	}
	if (fields.rdf_source !== undefined) {
		warnAt(childScope(scope, "rdf_source"), "Cannot statically validate remote resource description.", INFO, value.rdf_source);
	}
	return { ...fields, content: value };
});

/** Collection description 0.2.3. */
export const collectionV0_2 = object({
	...V0_2_FIELDS,
	format_version: literal("0.2.3"),
	type: literal("collection"),
	collection: array(collectionEntry),
}).refine((description, scope) => {
	const seen = new Map<string, number>();
	description.collection.forEach((entry, index) => {
		if (entry.id === undefined) {
			return;
		}
		const first = seen.get(entry.id);
		if (first === undefined) {
			seen.set(entry.id, index);
			return;
		}
		const loc = [...scope.loc, "collection", index, "id"];
		scope.state.addError(loc, `Duplicate id '${entry.id}' (first used at ${formatLoc(["collection", first])})`);
	});
});
