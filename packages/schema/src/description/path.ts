/**
 * @title Loading from Files
 * @description Read a description file from disk and validate it with the
 * file's directory as the root of its relative references.
 *
 * @module description
 */

import type { ValidationContextOptions } from "@resource-spec/core";
import { DescriptionFileError, readDescription } from "@resource-spec/core";
import type { LoadDescriptionOptions, LoadDescriptionResult } from "./load.js";
import { loadDescription } from "./load.js";

/**
 * Options for loading a description file.
 */
export interface LoadDescriptionFromPathOptions extends Omit<LoadDescriptionOptions, "context"> {
	/** Context options; root and file name come from the path. */
	context?: Omit<ValidationContextOptions, "root" | "fileName">;
}

/**
 * Load and validate a description from a directory or file.
 *
 * @param source - Directory containing a description file, or the file itself
 * @param options - Loading options
 * @throws DescriptionFileError if no description file is found or it cannot be parsed
 */
export function loadDescriptionFromPath(
	source: string,
	options: LoadDescriptionFromPathOptions = {},
): LoadDescriptionResult {
	const read = readDescription(source);
	if (!read) {
		throw new DescriptionFileError(`No description file found at ${source}`, { filePath: source });
	}

	return loadDescription(read.content, {
		...options,
		context: { ...options.context, root: read.root, fileName: read.fileName },
	});
}
