/**
 * @title File Sources
 * @description A file given either as an http(s) URL or as a path relative
 * to the document root.
 *
 * @module references
 */

import { ConstraintError } from "../errors.js";
import type { ValidationContext } from "../validation/context.js";
import { RelativeFilePath, RelativePath } from "./relative-path.js";

/**
 * A remote file or a file relative to the document root.
 */
export type FileSource = URL | RelativeFilePath;

/**
 * Check whether a string is an absolute http(s) URL.
 */
export function isHttpUrl(value: string): boolean {
	if (!/^https?:\/\//i.test(value) || !URL.canParse(value)) {
		return false;
	}
	return new URL(value).hostname !== "";
}

/**
 * Parse an http(s) URL.
 *
 * @throws ConstraintError if the value is not an absolute http(s) URL
 */
export function parseHttpUrl(value: string): URL {
	if (!isHttpUrl(value)) {
		throw new ConstraintError(`'${value}' is not a valid http(s) URL`, "url_parsing");
	}
	return new URL(value);
}

/**
 * Parse a file source and check that a local file exists when the context asks for it.
 *
 * @param input - URL string, URL or relative reference
 * @param context - Context providing root and I/O settings
 * @throws ConstraintError if the input is neither a URL nor a valid relative path
 */
export function parseFileSource(input: string | URL | RelativePath, context?: ValidationContext): FileSource {
	if (input instanceof URL) {
		return parseHttpUrl(input.href);
	}
	if (typeof input === "string" && /^[a-z][a-z0-9+.-]*:\/\//i.test(input)) {
		return parseHttpUrl(input);
	}
	return new RelativeFilePath(input, context).validate(context);
}

/**
 * Render a file source as an absolute path or URL.
 */
export function fileSourceToString(source: FileSource | RelativePath): string {
	return source instanceof URL ? source.href : source.toString();
}

/**
 * Get the final path segment of a file source.
 */
export function getFileName(source: FileSource | RelativePath): string {
	const text = source instanceof URL ? source.pathname : source.path;
	const segments = text.split("/").filter((segment) => segment !== "");
	return segments.at(-1) ?? "";
}
