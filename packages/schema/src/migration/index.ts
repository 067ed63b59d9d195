/**
 * Migration module exports.
 */

export {
	type MigrationStep,
	type MigrationChain,
	applyMigrationStep,
	getOldestVersion,
	getChainTarget,
	migrateDocument,
} from "./chain.js";

export {
	namesToPersons,
	updatePersons,
	convertAuthorNames,
	removeSlashesFromNames,
	convertNicknameToId,
	removeDoiPrefix,
	removeGithubPrefix,
	removeEmptyConfig,
} from "./transforms.js";

export { GENERIC_V0_2_STEPS, GENERIC_V0_2_CHAIN, GENERIC_V0_3_CHAIN, convertAttachments } from "./generic.js";
export { COLLECTION_V0_2_CHAIN, mergeCollectionGroups } from "./collection.js";
export {
	MODEL_V0_4_CHAIN,
	convertPersons,
	renameReferenceInput,
	moveArchitectureToWeights,
	moveDependenciesToWeights,
	collapseParent,
} from "./model.js";
