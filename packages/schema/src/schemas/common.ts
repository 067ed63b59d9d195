/**
 * @title Common Fields
 * @description Field schemas shared by the descriptions of every resource type.
 *
 * @module schemas
 */

import * as fs from "node:fs";
import {
	ConstraintError,
	DoiSyntax,
	OrcidChecksum,
	Predicate,
	ResourceSpecError,
	VersionSyntax,
	WARNING,
	array,
	fileSource,
	httpUrl,
	object,
	raw,
	record,
	string,
	union,
} from "@resource-spec/core";

const LICENSES_URL = new URL("../../data/spdx-licenses.json", import.meta.url);
let knownLicenses: ReadonlySet<string> | undefined;

/**
 * SPDX license identifiers recognised without a warning.
 */
export function getKnownLicenses(): ReadonlySet<string> {
	if (!knownLicenses) {
		const parsed: unknown = JSON.parse(fs.readFileSync(LICENSES_URL, "utf-8"));
		if (!Array.isArray(parsed) || !parsed.every((id) => typeof id === "string")) {
			throw new ResourceSpecError("License list must be an array of strings", "DATA_ERROR");
		}
		knownLicenses = new Set(parsed);
	}
	return knownLicenses;
}

/** Image file suffixes accepted for covers and icons. */
export const IMAGE_SUFFIXES = [".gif", ".jpeg", ".jpg", ".png", ".svg", ".tif", ".tiff"] as const;

const noSlashes = new Predicate((value: string) => !/[/\\]/.test(value), "{value} must not contain slashes");

const sha256Syntax = new Predicate((value: string) => /^[a-f0-9]{64}$/i.test(value), "{value} is not a SHA-256 hash");

/** Hex-encoded SHA-256 hash. */
export const sha256 = string().check(sha256Syntax);

/** Person's name. */
export const personName = string({ minLength: 1 }).check(noSlashes);

/** Author of a resource or of its weights. */
export const author = object({
	name: personName,
	affiliation: string().optional(),
	email: string().optional(),
	github_user: string().optional(),
	orcid: string().check(new OrcidChecksum()).optional(),
});

/** Maintainer of a resource; identified by a GitHub account. */
export const maintainer = object({
	name: personName.optional(),
	affiliation: string().optional(),
	email: string().optional(),
	github_user: string({ minLength: 1 }),
	orcid: string().check(new OrcidChecksum()).optional(),
});

/** Badge shown next to a resource. */
export const badge = object({
	label: string(),
	icon: httpUrl().optional(),
	url: httpUrl(),
});

/** Citation of a publication; needs a DOI or a URL. */
export const citeEntry = object({
	text: string({ minLength: 1 }),
	doi: string().check(new DoiSyntax()).optional(),
	url: httpUrl().optional(),
}).refine((entry) => {
	if (entry.doi === undefined && entry.url === undefined) {
		throw new ConstraintError("Either 'doi' or 'url' is required", "missing");
	}
});

/** Free-form configuration. */
export const config = record(raw());

/** Version of the described resource, e.g. "1.2.0". */
export const resourceVersion = string({ coerceNumbers: true }).check(new VersionSyntax());

/** SPDX license identifier; unknown identifiers are a warning. */
export const license = string({ minLength: 1 }).warn(
	new Predicate((value: string) => getKnownLicenses().has(value), "{value} is not a known license"),
	{ severity: WARNING, msg: "{value} is not a known SPDX license identifier" },
);

/** Cover images. */
export const covers = array(fileSource({ suffix: IMAGE_SUFFIXES, inPackage: true }));

/** Emoji or image file. */
export const icon = union(string({ minLength: 1, maxLength: 2 }), fileSource({ suffix: IMAGE_SUFFIXES, inPackage: true }));

/** Markdown documentation. */
export const documentation = fileSource({ suffix: ".md", inPackage: true });

/** 0.2 attachments: a mapping with a list of files and arbitrary other keys. */
export const attachmentsV0_2 = object({
	files: array(fileSource({ inPackage: true })).optional(),
});

/** 0.3 attachments: a list of files. */
export const attachmentsV0_3 = array(
	object({
		source: fileSource({ inPackage: true }),
		sha256: sha256.optional(),
	}),
);
