/**
 * @title Migration Chain
 * @description Ordered structural rewrites that bring a raw document from its
 * declared format version to the latest one of its series.
 *
 * Each step moves a document from one of its `from` versions to its `to`
 * version and does nothing to documents at any other version, so re-running
 * a step or a whole chain is always safe. Steps never throw on malformed
 * input: sub-fields of the wrong shape are left for schema validation to
 * report.
 *
 * @module migration
 */

import type { RawMapping } from "@resource-spec/core";
import { cloneRaw, compareFormatVersions, parseFormatVersion, sortFormatVersions } from "@resource-spec/core";

/**
 * One transition of a migration chain.
 */
export interface MigrationStep {
	/** Versions this step migrates from. */
	readonly from: readonly string[];
	/** Version of the migrated document. */
	readonly to: string;
	/** Rewrite the document in place. */
	readonly apply?: (document: RawMapping) => void;
}

/**
 * Migration chain of one resource type's format series.
 */
export interface MigrationChain {
	/** Steps in ascending order. */
	readonly steps: readonly MigrationStep[];
	/** Normalisation applied before the steps to any document the chain handles. */
	readonly prepare?: (document: RawMapping) => void;
	/** Cleanup applied after the steps to any document the chain handles. */
	readonly finalize?: (document: RawMapping) => void;
}

/**
 * Apply a single step to a document at one of the step's source versions.
 *
 * @param step - Step to apply
 * @param document - Document to rewrite in place
 * @returns Whether the step was applied
 */
export function applyMigrationStep(step: MigrationStep, document: RawMapping): boolean {
	const version = document.format_version;
	if (typeof version !== "string" || !step.from.includes(version)) {
		return false;
	}
	step.apply?.(document);
	document.format_version = step.to;
	return true;
}

/**
 * Oldest version a chain migrates from.
 */
export function getOldestVersion(chain: MigrationChain): string | undefined {
	return sortFormatVersions(chain.steps.flatMap((step) => step.from))[0];
}

/**
 * Version every document handled by the chain ends up at.
 */
export function getChainTarget(chain: MigrationChain): string | undefined {
	return sortFormatVersions(chain.steps.map((step) => step.to)).at(-1);
}

/**
 * Run a migration chain on a copy of a document.
 *
 * Documents declaring a version below the oldest known one are treated as
 * being at the oldest version. Documents past the chain's target, or without
 * a readable format version, are returned unchanged.
 *
 * @param chain - Chain to run
 * @param document - Raw document (not modified)
 * @param target - Stop after the step reaching this version (default: run all steps)
 * @returns The migrated copy
 */
export function migrateDocument(chain: MigrationChain, document: RawMapping, target?: string): RawMapping {
	const migrated = cloneRaw(document);
	const version = migrated.format_version;
	if (typeof version !== "string" || !parseFormatVersion(version)) {
		return migrated;
	}

	const chainTarget = getChainTarget(chain);
	if (chainTarget && compareFormatVersions(version, chainTarget) > 0) {
		return migrated;
	}

	const oldest = getOldestVersion(chain);
	if (oldest && compareFormatVersions(version, oldest) < 0) {
		migrated.format_version = oldest;
	}

	chain.prepare?.(migrated);
	for (const step of chain.steps) {
		if (target && compareFormatVersions(step.to, target) > 0) {
			break;
		}
		applyMigrationStep(step, migrated);
	}
	chain.finalize?.(migrated);

	return migrated;
}
