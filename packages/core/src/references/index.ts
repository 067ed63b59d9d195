/**
 * References module exports.
 */

export {
	type RelativePathKind,
	normaliseRelativePath,
	RelativePath,
	RelativeFilePath,
	RelativeDirectory,
} from "./relative-path.js";

export {
	type FileSource,
	isHttpUrl,
	parseHttpUrl,
	parseFileSource,
	fileSourceToString,
	getFileName,
} from "./file-source.js";
