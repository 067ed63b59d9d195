/**
 * @title Package Sources
 * @description Files a validated description references that belong in its
 * resource package.
 *
 * @module description
 */

import { RelativePath, fileSourceToString, formatLoc } from "@resource-spec/core";
import type { ResourceDescription } from "./load.js";

/**
 * Collect the package files of a description.
 *
 * @returns Absolute source (path or URL) by dotted field location
 *
 * @example
 * ```typescript
 * getPackageSources(description);
 * // { "documentation": "/data/unet/README.md", "test_inputs.0": "/data/unet/in.npy" }
 * ```
 */
export function getPackageSources(description: ResourceDescription): Record<string, string> {
	const sources: Record<string, string> = {};
	for (const { loc, source } of description.packageSources) {
		if (source instanceof URL || source instanceof RelativePath) {
			sources[formatLoc(loc)] = fileSourceToString(source);
		}
	}
	return sources;
}
