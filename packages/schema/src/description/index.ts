/**
 * Description module exports.
 */

export {
	type ResourceDescription,
	type LoadDescriptionOptions,
	type LoadDescriptionResult,
	type DescriptionDocument,
	type FormatSelection,
	type UpdateFormatOptions,
	assertDescriptionDocument,
	selectFormat,
	loadDescription,
	validateFormat,
	updateFormat,
} from "./load.js";

export { getPackageSources } from "./package.js";
export { type LoadDescriptionFromPathOptions, loadDescriptionFromPath } from "./path.js";
export { DescriptionCache } from "./cache.js";
