/**
 * Schema module exports.
 */

export {
	IMAGE_SUFFIXES,
	getKnownLicenses,
	sha256,
	personName,
	author,
	maintainer,
	badge,
	citeEntry,
	config,
	resourceVersion,
	license,
	covers,
	icon,
	documentation,
	attachmentsV0_2,
	attachmentsV0_3,
} from "./common.js";

export {
	SPECIALIZED_TYPES,
	V0_2_FIELDS,
	V0_3_FIELDS,
	genericType,
	genericV0_2,
	genericV0_3,
	applicationV0_2,
	applicationV0_3,
	datasetV0_2,
	datasetV0_3,
	notebookV0_2,
	notebookV0_3,
} from "./generic.js";

export { type CollectionEntry, collectionEntry, collectionV0_2 } from "./collection.js";

export {
	type WeightsFormat,
	type Dependencies,
	type ModelWeights,
	type ModelV0_4,
	AXIS_LETTERS,
	DATA_TYPES,
	WEIGHTS_FORMATS,
	PREPROCESSING_NAMES,
	POSTPROCESSING_NAMES,
	inputTensor,
	outputTensor,
	dependencies,
	weights,
	modelV0_4,
} from "./model.js";
