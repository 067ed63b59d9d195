/**
 * Filesystem module exports.
 */

export {
	type DescriptionReadResult,
	findDescriptionFile,
	parseDescriptionFile,
	parseDescriptionContent,
	readDescription,
} from "./description.js";
