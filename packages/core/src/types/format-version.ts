/**
 * @title Format Versions
 * @description Parsing and ordering of `major.minor.patch` format versions.
 *
 * @module types
 */

import * as semver from "semver";

/**
 * Parse a format version string.
 *
 * @returns Parsed version or null if the string is not `major.minor.patch`
 */
export function parseFormatVersion(version: string): semver.SemVer | null {
	return semver.parse(version.trim());
}

/**
 * Get the `major.minor` series of a format version.
 *
 * Accepts both `major.minor.patch` and bare `major.minor` strings.
 *
 * @returns The series (e.g. "0.4") or null if the version cannot be read
 */
export function formatVersionSeries(version: string): string | null {
	const parsed = parseFormatVersion(version);
	if (parsed) {
		return `${parsed.major}.${parsed.minor}`;
	}
	const match = /^\s*(\d+)\.(\d+)\s*$/.exec(version);
	return match ? `${Number(match[1])}.${Number(match[2])}` : null;
}

/**
 * Compare two format versions numerically.
 *
 * Unparseable versions sort before every parseable one.
 */
export function compareFormatVersions(a: string, b: string): number {
	const left = parseFormatVersion(a);
	const right = parseFormatVersion(b);
	if (!left || !right) {
		return (left ? 1 : 0) - (right ? 1 : 0);
	}
	return semver.compare(left, right);
}

/**
 * Sort format versions in ascending order.
 */
export function sortFormatVersions(versions: Iterable<string>): string[] {
	return [...versions].sort(compareFormatVersions);
}

/**
 * Check whether `version` is strictly newer than `reference`.
 */
export function isNewerFormatVersion(version: string, reference: string): boolean {
	const left = parseFormatVersion(version);
	const right = parseFormatVersion(reference);
	return left !== null && right !== null && semver.gt(left, right);
}

/**
 * Enumerate every patch version of a series up to and including `latest`.
 *
 * @example
 * ```typescript
 * expandPatchVersions("0.4.2"); // ["0.4.0", "0.4.1", "0.4.2"]
 * ```
 */
export function expandPatchVersions(latest: string): string[] {
	const parsed = parseFormatVersion(latest);
	if (!parsed) {
		return [];
	}
	return Array.from({ length: parsed.patch + 1 }, (_, patch) => `${parsed.major}.${parsed.minor}.${patch}`);
}
