/**
 * @title Validation Summary
 * @description The aggregate report of one top-level validation call, and
 * its JSON, legacy and text renderings.
 *
 * @module validation
 */

import { LIBRARY_VERSION } from "../constants.js";
import { warningLevelName } from "../types/warning-level.js";
import type { ErrorEntry, Loc, WarningEntry } from "./issues.js";
import { formatLoc } from "./issues.js";

/**
 * Outcome of a validation.
 */
export type ValidationStatus = "passed" | "failed";

/**
 * Aggregate report of one validation call.
 */
export interface ValidationSummary {
	/** Version of this library. */
	readonly libraryVersion: string;
	/** Human-readable name of the validation. */
	readonly name: string;
	/** Root joined with the document file name. */
	readonly sourceName: string;
	/** "failed" iff there are errors. */
	readonly status: ValidationStatus;
	readonly errors: readonly ErrorEntry[];
	readonly warnings: readonly WarningEntry[];
}

/**
 * Fields needed to create a summary.
 */
export interface ValidationSummaryInit {
	name: string;
	sourceName: string;
	errors?: readonly ErrorEntry[];
	warnings?: readonly WarningEntry[];
	libraryVersion?: string;
}

/**
 * Create a frozen summary whose status follows from its errors.
 */
export function createValidationSummary(init: ValidationSummaryInit): ValidationSummary {
	const errors = Object.freeze([...(init.errors ?? [])]);
	const warnings = Object.freeze([...(init.warnings ?? [])]);
	const status: ValidationStatus = errors.length === 0 ? "passed" : "failed";

	return Object.freeze({
		libraryVersion: init.libraryVersion ?? LIBRARY_VERSION,
		name: init.name,
		sourceName: init.sourceName,
		status,
		errors,
		warnings,
	});
}

/**
 * Entry of a serialised summary.
 */
export interface SummaryEntryJson {
	loc: (string | number)[];
	msg: string;
	type: string;
	traceback?: string[];
}

/**
 * Serialised summary.
 */
export interface ValidationSummaryJson {
	library_version: string;
	name: string;
	source_name: string;
	status: ValidationStatus;
	errors: SummaryEntryJson[];
	warnings: SummaryEntryJson[];
}

/**
 * Render a summary in its documented JSON shape.
 */
export function summaryToJson(summary: ValidationSummary): ValidationSummaryJson {
	return {
		library_version: summary.libraryVersion,
		name: summary.name,
		source_name: summary.sourceName,
		status: summary.status,
		errors: summary.errors.map((entry) => ({
			loc: [...entry.loc],
			msg: entry.msg,
			type: entry.type,
			...(entry.traceback ? { traceback: [...entry.traceback] } : {}),
		})),
		warnings: summary.warnings.map((entry) => ({ loc: [...entry.loc], msg: entry.msg, type: entry.type })),
	};
}

/**
 * Summary shape of older consumers: entries keyed by dotted location.
 */
export interface LegacyValidationSummary {
	library_version: string;
	name: string;
	source_name: string;
	status: ValidationStatus;
	/** Error messages by location, or null if there are none. */
	error: Record<string, string> | null;
	/** Warning messages by location. */
	warnings: Record<string, string>;
	/** Stack trace of an unexpected exception, if any. */
	traceback: string[] | null;
}

/** Key used for entries without a location. */
export const ROOT_KEY = "__root__";

function keyedMessages(entries: readonly { loc: Loc; msg: string }[]): Record<string, string> {
	const messages: Record<string, string> = {};
	for (const { loc, msg } of entries) {
		const key = loc.length === 0 ? ROOT_KEY : formatLoc(loc);
		messages[key] = key in messages ? `${messages[key]}\n${msg}` : msg;
	}
	return messages;
}

/**
 * Reshape a summary for older consumers.
 */
export function toLegacySummary(summary: ValidationSummary): LegacyValidationSummary {
	const traceback = summary.errors.find((entry) => entry.traceback)?.traceback;

	return {
		library_version: summary.libraryVersion,
		name: summary.name,
		source_name: summary.sourceName,
		status: summary.status,
		error: summary.errors.length === 0 ? null : keyedMessages(summary.errors),
		warnings: keyedMessages(summary.warnings),
		traceback: traceback ? [...traceback] : null,
	};
}

/**
 * Format a summary as a human-readable report.
 *
 * @example
 * ```
 * failed: resource-spec static model validation (format version: 0.4.10).
 * Source: /data/unet/rdf.yaml
 * Found 1 error(s) and 0 warning(s):
 *
 * [ERROR] inputs.0.name: Field required
 * ```
 */
export function formatValidationSummary(summary: ValidationSummary): string {
	const lines: string[] = [];
	lines.push(`${summary.status}: ${summary.name}`);
	lines.push(`Source: ${summary.sourceName}`);

	if (summary.errors.length === 0 && summary.warnings.length === 0) {
		lines.push("No validation issues found.");
		return lines.join("\n");
	}

	lines.push(`Found ${summary.errors.length} error(s) and ${summary.warnings.length} warning(s):`);
	lines.push("");

	for (const entry of summary.errors) {
		lines.push(`[ERROR] ${formatLoc(entry.loc) || ROOT_KEY}: ${entry.msg}`);
		for (const line of entry.traceback ?? []) {
			lines.push(`        ${line}`);
		}
	}
	for (const entry of summary.warnings) {
		const label = warningLevelName(entry.severity).toUpperCase();
		lines.push(`[${label}] ${formatLoc(entry.loc) || ROOT_KEY}: ${entry.msg}`);
	}

	return lines.join("\n");
}
