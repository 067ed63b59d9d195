/**
 * @title Generic Schemas
 * @description Descriptions of generic resources and of the application,
 * dataset and notebook types built on the same fields.
 *
 * @module schemas
 */

import { ConstraintError, array, fileSource, httpUrl, literal, object, string } from "@resource-spec/core";
import {
	attachmentsV0_2,
	attachmentsV0_3,
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
} from "./common.js";

/** Types with a dedicated description of their own. */
export const SPECIALIZED_TYPES = ["application", "collection", "dataset", "model", "notebook"] as const;

function isSpecializedType(type: string): boolean {
	return SPECIALIZED_TYPES.some((candidate) => candidate === type);
}

/** Type of a generic resource; refuses the specialized types. */
export const genericType = string({ minLength: 1 }).refine((type) => {
	if (isSpecializedType(type)) {
		throw new ConstraintError(`Use the ${type} description instead of this generic description for your ${type} resource.`);
	}
});

const commonFields = {
	name: string({ minLength: 1 }),
	description: string(),
	authors: array(author).optional(),
	maintainers: array(maintainer).optional(),
	badges: array(badge).optional(),
	cite: array(citeEntry).optional(),
	config: config.optional(),
	covers: covers.optional(),
	documentation: documentation.optional(),
	git_repo: httpUrl().optional(),
	icon: icon.optional(),
	id: string().optional(),
	id_emoji: string().optional(),
	license: license.optional(),
	links: array(string()).optional(),
	tags: array(string()).optional(),
	version: resourceVersion.optional(),
};

/** Fields of every 0.2 description; `format_version` and `type` are added per type. */
export const V0_2_FIELDS = {
	...commonFields,
	attachments: attachmentsV0_2.optional(),
	download_url: httpUrl().optional(),
	rdf_source: fileSource().optional(),
	source: fileSource().optional(),
};

/** Fields of every 0.3 description; `format_version` and `type` are added per type. */
export const V0_3_FIELDS = {
	...commonFields,
	attachments: attachmentsV0_3.optional(),
	source: fileSource().optional(),
};

/** Generic description 0.2.4. */
export const genericV0_2 = object({
	...V0_2_FIELDS,
	format_version: literal("0.2.4"),
	type: genericType,
});

/** Generic description 0.3.0. */
export const genericV0_3 = object({
	...V0_3_FIELDS,
	format_version: literal("0.3.0"),
	type: genericType,
});

/** Application description 0.2.4. */
export const applicationV0_2 = object({
	...V0_2_FIELDS,
	format_version: literal("0.2.4"),
	type: literal("application"),
	source: fileSource({ inPackage: true }).optional(),
});

/** Application description 0.3.0. */
export const applicationV0_3 = object({
	...V0_3_FIELDS,
	format_version: literal("0.3.0"),
	type: literal("application"),
	source: fileSource({ inPackage: true }).optional(),
});

/** Dataset description 0.2.4. */
export const datasetV0_2 = object({
	...V0_2_FIELDS,
	format_version: literal("0.2.4"),
	type: literal("dataset"),
});

/** Dataset description 0.3.0. */
export const datasetV0_3 = object({
	...V0_3_FIELDS,
	format_version: literal("0.3.0"),
	type: literal("dataset"),
});

/** Notebook description 0.2.4; the source is a Jupyter notebook. */
export const notebookV0_2 = object({
	...V0_2_FIELDS,
	format_version: literal("0.2.4"),
	type: literal("notebook"),
	source: fileSource({ suffix: ".ipynb", inPackage: true }),
});

/** Notebook description 0.3.0. */
export const notebookV0_3 = object({
	...V0_3_FIELDS,
	format_version: literal("0.3.0"),
	type: literal("notebook"),
	source: fileSource({ suffix: ".ipynb", inPackage: true }),
});
