export { createFleetContext, type FleetContext, type FleetContextInput } from "./context";
export {
	type ComponentEntry,
	type ComponentMap,
	DEFAULT_COMPONENTS,
	listBackups,
	type SaveResult,
	type VersionsDocument,
	VersionStore,
} from "./config";
export * from "./errors";
export {
	installAll,
	lockAll,
	rollbackAll,
	setVersionAll,
	statusAll,
	summarizeOutcomes,
	unlockAll,
	updateAll,
} from "./fleet";
export { type CommitInfo, GitRepository } from "./git/repository";
export { inspectComponent, inspectProject } from "./sync/inspect";
export { syncComponent } from "./sync/engine";
export type * from "./types/fleet";
export type * from "./types/sync";
