/**
 * @title Description Formats
 * @description A description format pairs one format series of a resource type
 * with its migration chain and the schema of its latest version.
 *
 * @module registry
 */

import type { SchemaNode } from "@resource-spec/core";
import { expandPatchVersions, formatVersionSeries, sortFormatVersions } from "@resource-spec/core";
import type { MigrationChain } from "../migration/chain.js";

/**
 * Parsed fields of a validated description.
 */
export type DescriptionFields = Record<string, unknown>;

/**
 * One format series of a resource type.
 */
export interface DescriptionFormat {
	/** Resource type, e.g. "model". */
	readonly type: string;
	/** Major.minor series, e.g. "0.4". */
	readonly series: string;
	/** Latest version of the series; documents are validated at this version. */
	readonly latestVersion: string;
	/** Chain migrating older documents to the latest version. */
	readonly migration: MigrationChain;
	/** Schema of the latest version. */
	readonly schema: SchemaNode<DescriptionFields>;
}

/**
 * Options for defining a description format.
 */
export interface DescriptionFormatOptions {
	type: string;
	latestVersion: string;
	migration: MigrationChain;
	schema: SchemaNode<DescriptionFields>;
}

/**
 * Define a description format.
 *
 * @throws Error if the latest version is not a valid format version
 */
export function defineFormat(options: DescriptionFormatOptions): DescriptionFormat {
	const series = formatVersionSeries(options.latestVersion);
	if (!series) {
		throw new Error(`Invalid format version for ${options.type}: ${options.latestVersion}`);
	}
	return Object.freeze({ ...options, series });
}

/**
 * Every version a format can validate: the patch versions of its series up to
 * the latest, plus the versions its migration chain starts from.
 */
export function getFormatVersions(format: DescriptionFormat): string[] {
	const versions = new Set(expandPatchVersions(format.latestVersion));
	for (const step of format.migration.steps) {
		for (const version of step.from) {
			versions.add(version);
		}
		versions.add(step.to);
	}
	return sortFormatVersions(versions);
}
