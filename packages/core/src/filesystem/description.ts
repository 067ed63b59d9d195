/**
 * @description Reading resource description files.
 *
 * Provides functions to find, read and parse YAML description documents into
 * raw mappings ready for validation.
 *
 * @module filesystem
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { RawMapping } from "../types/raw.js";
import { isPlainObject, isValidRawMapping } from "../types/raw.js";
import { DescriptionFileError, getErrorMessage } from "../errors.js";
import { DESCRIPTION_FILENAMES } from "../constants.js";

/**
 * Result of reading a description file.
 */
export interface DescriptionReadResult {
	/** Parsed document. */
	content: RawMapping;
	/** Full path to the description file. */
	filePath: string;
	/** Directory containing the file; the root for relative references. */
	root: string;
	/** Filename used (e.g., "rdf.yaml"). */
	fileName: string;
}

/**
 * Find the description file in a directory.
 *
 * @param directory - Directory to search
 * @returns Path to description file or null if not found
 */
export function findDescriptionFile(directory: string): string | null {
	for (const filename of DESCRIPTION_FILENAMES) {
		const filePath = path.join(directory, filename);
		if (fs.existsSync(filePath)) {
			return filePath;
		}
	}
	return null;
}

/**
 * Parse description content from a YAML (or JSON) string.
 *
 * @param content - YAML content
 * @param sourcePath - Source path for error messages (optional)
 * @returns Parsed document
 * @throws DescriptionFileError if parsing fails
 */
export function parseDescriptionContent(content: string, sourcePath?: string): RawMapping {
	let parsed: unknown;
	try {
		parsed = yaml.load(content);
	} catch (error) {
		throw new DescriptionFileError(`Failed to parse description: ${getErrorMessage(error)}`, {
			filePath: sourcePath,
			cause: error,
		});
	}

	if (!isPlainObject(parsed)) {
		throw new DescriptionFileError("Description file is empty or not a mapping", { filePath: sourcePath });
	}
	if (!isValidRawMapping(parsed)) {
		throw new DescriptionFileError("Description contains values that are not plain data", { filePath: sourcePath });
	}
	return parsed;
}

/**
 * Parse a description file from a path.
 *
 * @param filePath - Full path to the description file
 * @returns Parsed document
 * @throws DescriptionFileError if reading or parsing fails
 */
export function parseDescriptionFile(filePath: string): RawMapping {
	let content: string;
	try {
		content = fs.readFileSync(filePath, "utf-8");
	} catch (error) {
		throw new DescriptionFileError(`Failed to read description file: ${getErrorMessage(error)}`, {
			filePath,
			cause: error,
		});
	}
	return parseDescriptionContent(content, filePath);
}

/**
 * Read a description from a directory or a file path.
 *
 * @param source - Directory containing a description file, or the file itself
 * @returns DescriptionReadResult or null if no description file is found
 */
export function readDescription(source: string): DescriptionReadResult | null {
	const stats = fs.statSync(source, { throwIfNoEntry: false });
	if (!stats) {
		return null;
	}

	const filePath = stats.isDirectory() ? findDescriptionFile(source) : source;
	if (!filePath) {
		return null;
	}

	return {
		content: parseDescriptionFile(filePath),
		filePath,
		root: path.dirname(filePath),
		fileName: path.basename(filePath),
	};
}
