export {
	BACKUP_MARKER,
	createBackup,
	formatBackupTimestamp,
	listBackups,
	resolveBackupPath,
} from "./backup";
export {
	BASE_COMPONENT,
	DEFAULT_COMPONENTS,
	DEFAULT_REPO_BASE_URL,
	hasLockedVersion,
	isLockedVersion,
	resolveComponentUrl,
	shortSha,
	VERSIONS_COMMENT,
} from "./defaults";
export { mergeWithDefaults } from "./merge";
export type {
	ComponentEntry,
	ComponentInput,
	ComponentInputMap,
	ComponentMap,
	VersionsDocument,
} from "./schema";
export { LATEST_VERSION, parseVersionsDocument } from "./schema";
export type { SaveResult, VersionStoreOptions } from "./store";
export { serializeDocument, VersionStore } from "./store";
