/**
 * @title Generic Migration
 * @description Migration chains of the generic resource description and of
 * the application, dataset and notebook types that share its history.
 *
 * @module migration
 */

import type { RawMapping } from "@resource-spec/core";
import { isMapping, isSequence } from "@resource-spec/core";
import type { MigrationChain, MigrationStep } from "./chain.js";
import {
	convertAuthorNames,
	convertNicknameToId,
	removeDoiPrefix,
	removeEmptyConfig,
	removeGithubPrefix,
	removeSlashesFromNames,
} from "./transforms.js";

function convertAuthors(document: RawMapping): void {
	convertAuthorNames(document, ["authors", "maintainers"]);
}

function finalizeGeneric(document: RawMapping): void {
	removeDoiPrefix(document);
	removeGithubPrefix(document);
	removeEmptyConfig(document);
}

/**
 * Steps of the 0.2 series.
 */
export const GENERIC_V0_2_STEPS: readonly MigrationStep[] = [
	{ from: ["0.2.0", "0.2.1"], to: "0.2.2" },
	{ from: ["0.2.2"], to: "0.2.3", apply: removeSlashesFromNames },
	{ from: ["0.2.3"], to: "0.2.4", apply: convertNicknameToId },
];

/**
 * Replace `attachments: { files: [...] }` with a list of `{ source }` entries.
 */
export function convertAttachments(document: RawMapping): void {
	const attachments = document.attachments;
	if (!isMapping(attachments)) {
		return;
	}
	const files = attachments.files;
	document.attachments = isSequence(files) ? files.map((file) => ({ source: file })) : [];
}

/**
 * Chain ending at generic 0.2.4.
 */
export const GENERIC_V0_2_CHAIN: MigrationChain = {
	steps: GENERIC_V0_2_STEPS,
	prepare: convertAuthors,
	finalize: finalizeGeneric,
};

/**
 * Chain ending at generic 0.3.0.
 */
export const GENERIC_V0_3_CHAIN: MigrationChain = {
	steps: [
		...GENERIC_V0_2_STEPS,
		{
			from: ["0.2.4"],
			to: "0.3.0",
			apply: (document) => {
				convertAttachments(document);
				delete document.download_url;
				delete document.rdf_source;
			},
		},
	],
	prepare: convertAuthors,
	finalize: finalizeGeneric,
};
