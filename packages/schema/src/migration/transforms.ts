/**
 * @title Migration Transforms
 * @description Structural rewrites shared by the migration chains of several
 * resource types. All transforms work in place and skip sub-fields whose shape
 * does not match.
 *
 * @module migration
 */

import type { RawMapping, RawValue } from "@resource-spec/core";
import { isMapping, isSequence } from "@resource-spec/core";

const DOI_PREFIXES = ["https://doi.org/", "http://dx.doi.org/"] as const;
const GITHUB_PREFIX = "https://github.com/";

/**
 * Replace plain-string entries of a person list with `{ name }` mappings.
 *
 * @returns The converted list, or the input if it is not a list
 */
export function namesToPersons(value: RawValue | undefined): RawValue | undefined {
	if (!isSequence(value)) {
		return value;
	}
	return value.map((entry) => (typeof entry === "string" ? { name: entry } : entry));
}

/**
 * Apply per-entry updates to a list of person mappings, pairwise.
 */
export function updatePersons(persons: RawValue | undefined, updates: RawValue | undefined): void {
	if (!isSequence(persons) || !isSequence(updates)) {
		return;
	}
	persons.forEach((person, index) => {
		const update = updates[index];
		if (isMapping(person) && isMapping(update)) {
			Object.assign(person, update);
		}
	});
}

/**
 * Convert string authors of a document to `{ name }` mappings.
 */
export function convertAuthorNames(document: RawMapping, fields: readonly string[] = ["authors"]): void {
	for (const field of fields) {
		if (field in document) {
			const converted = namesToPersons(document[field]);
			if (converted !== undefined) {
				document[field] = converted;
			}
		}
	}
}

function stripSlashes(name: string): string {
	return name.replaceAll("/", "").replaceAll("\\", "");
}

/**
 * Remove slashes from the resource name and from author and maintainer names.
 */
export function removeSlashesFromNames(document: RawMapping): void {
	if (typeof document.name === "string") {
		document.name = stripSlashes(document.name);
	}

	for (const group of ["authors", "maintainers"]) {
		const persons = document[group];
		if (!isSequence(persons)) {
			continue;
		}
		for (const person of persons) {
			if (isMapping(person) && typeof person.name === "string") {
				person.name = stripSlashes(person.name);
			}
		}
	}
}

/**
 * Copy `config.bioimageio.nickname` to `id` and `nickname_icon` to `id_emoji`.
 */
export function convertNicknameToId(document: RawMapping): void {
	const config = document.config;
	if (!isMapping(config)) {
		return;
	}
	const legacy = config.bioimageio;
	if (!isMapping(legacy)) {
		return;
	}

	if (typeof legacy.nickname === "string") {
		document.id = legacy.nickname;
	}
	if (typeof legacy.nickname_icon === "string") {
		document.id_emoji = legacy.nickname_icon;
	}
}

/**
 * Strip resolver prefixes from citation DOIs.
 */
export function removeDoiPrefix(document: RawMapping): void {
	const cite = document.cite;
	if (!isSequence(cite)) {
		return;
	}

	for (const entry of cite) {
		if (!isMapping(entry) || typeof entry.doi !== "string") {
			continue;
		}
		const doi = entry.doi;
		const prefix = DOI_PREFIXES.find((candidate) => doi.startsWith(candidate));
		if (prefix) {
			entry.doi = doi.slice(prefix.length);
		}
	}
}

/**
 * Strip the GitHub URL prefix from `github_user` of authors and maintainers.
 */
export function removeGithubPrefix(document: RawMapping): void {
	for (const group of ["authors", "maintainers"]) {
		const persons = document[group];
		if (!isSequence(persons)) {
			continue;
		}
		for (const person of persons) {
			if (isMapping(person) && typeof person.github_user === "string" && person.github_user.startsWith(GITHUB_PREFIX)) {
				person.github_user = person.github_user.slice(GITHUB_PREFIX.length);
			}
		}
	}
}

/**
 * Delete an empty `config.future`, then an empty `config`.
 */
export function removeEmptyConfig(document: RawMapping): void {
	const config = document.config;
	if (!isMapping(config)) {
		return;
	}

	const future = config.future;
	if (isMapping(future) && Object.keys(future).length === 0) {
		delete config.future;
	}
	if (Object.keys(config).length === 0) {
		delete document.config;
	}
}
