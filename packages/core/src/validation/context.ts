/**
 * @title Validation Context
 * @description Immutable per-call settings threaded through every validator.
 *
 * @module validation
 */

import * as path from "node:path";
import type { WarningLevel } from "../types/warning-level.js";
import { ERROR } from "../types/warning-level.js";
import { getSettings } from "../settings.js";

/**
 * Root that relative references resolve against: a filesystem directory or a base URL.
 */
export type Root = string | URL;

/**
 * Settings for one validation call.
 */
export interface ValidationContext {
	/** Directory or base URL of the document. */
	readonly root: Root;
	/** Name of the document file below the root. */
	readonly fileName: string;
	/** Rules of at least this severity are reported; weaker ones are only logged. */
	readonly warningLevel: WarningLevel;
	/** Check that referenced local files exist. */
	readonly performIoChecks: boolean;
	/** Log warnings that fall below the warning level. */
	readonly logWarnings: boolean;
}

/**
 * Options for creating a validation context.
 */
export interface ValidationContextOptions {
	/** Directory or base URL of the document (default: current working directory). */
	root?: Root;
	/** Name of the document file (default: "rdf.yaml"). */
	fileName?: string;
	/** Warning level (default: ERROR). */
	warningLevel?: WarningLevel;
	/** Check that referenced local files exist (default from settings). */
	performIoChecks?: boolean;
	/** Log warnings below the warning level (default from settings). */
	logWarnings?: boolean;
}

/** Conventional name of a description document. */
export const DEFAULT_FILE_NAME = "rdf.yaml";

/**
 * Check whether a root is a base URL.
 */
export function isUrlRoot(root: Root): root is URL {
	return root instanceof URL;
}

/**
 * Normalise a root: http(s) strings become URLs, URLs are copied.
 */
export function normaliseRoot(root: Root): Root {
	if (isUrlRoot(root)) {
		return new URL(root.href);
	}
	if (/^https?:\/\//i.test(root) && URL.canParse(root)) {
		return new URL(root);
	}
	return root;
}

/**
 * Create a frozen validation context.
 *
 * @param options - Context options
 * @returns Validation context with defaults applied
 */
export function createValidationContext(options: ValidationContextOptions = {}): ValidationContext {
	const settings = getSettings();

	return Object.freeze({
		root: normaliseRoot(options.root ?? process.cwd()),
		fileName: options.fileName ?? DEFAULT_FILE_NAME,
		warningLevel: options.warningLevel ?? ERROR,
		performIoChecks: options.performIoChecks ?? settings.performIoChecks,
		logWarnings: options.logWarnings ?? settings.logWarnings,
	});
}

/**
 * Derive a new context with some settings replaced.
 */
export function withContext(context: ValidationContext, overrides: ValidationContextOptions): ValidationContext {
	return createValidationContext({ ...context, ...overrides });
}

/**
 * Append a relative path to a base URL.
 *
 * The last segment of the base is kept even when the base has no trailing slash.
 *
 * @example
 * ```typescript
 * joinUrl(new URL("https://example.com/models/unet"), "weights.pt").href;
 * // "https://example.com/models/unet/weights.pt"
 * ```
 */
export function joinUrl(base: URL, relative: string): URL {
	const directory = new URL(base.href);
	directory.search = "";
	directory.hash = "";
	if (!directory.pathname.endsWith("/")) {
		directory.pathname = `${directory.pathname}/`;
	}

	const encoded = relative
		.split("/")
		.map((segment) => (segment === "." || segment === ".." ? segment : encodeURIComponent(segment)))
		.join("/");
	return new URL(encoded, directory);
}

/**
 * Resolve a relative path against a root.
 */
export function resolveAgainstRoot(root: Root, relative: string): string | URL {
	return isUrlRoot(root) ? joinUrl(root, relative) : path.join(root, relative);
}

/**
 * Identify the validated document: root joined with the file name.
 */
export function getSourceName(context: ValidationContext): string {
	const resolved = resolveAgainstRoot(context.root, context.fileName);
	return typeof resolved === "string" ? resolved : resolved.href;
}
