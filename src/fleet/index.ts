export { type InstallAllOptions, installAll, resolveInstallVersion } from "./install";
export { rollbackAll } from "./rollback";
export { selectComponents } from "./select";
export { type StatusAllOptions, statusAll } from "./status";
export { isSuccessfulOutcome, summarizeOutcomes, summarizeStatus } from "./summary";
export { toSyncTargets, type UpdateAllOptions, updateAll } from "./update";
export { lockAll, type SetVersionOptions, setVersionAll, unlockAll } from "./versions";
