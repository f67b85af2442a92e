import type { SaveResult } from "../config/store";
import type { ComponentStatus, ProjectStatus, SyncOutcome } from "./sync";

export type Selection = {
	names?: string[];
	all?: boolean;
};

export type BatchEntryStatus = "changed" | "skipped" | "failed";

export type BatchEntry = {
	name: string;
	status: BatchEntryStatus;
	details: string;
	from?: string | null;
	to?: string | null;
	/** Rollback only: commits between the locked commit and the previous HEAD. */
	commitsBack?: number;
};

/**
 * Result of a lock/unlock/rollback/set-version batch. The versions file is
 * written once, after all components were processed.
 */
export type BatchResult = {
	entries: BatchEntry[];
	changed: string[];
	skipped: string[];
	failed: string[];
	saved: SaveResult | null;
	backupPath: string | null;
	ok: boolean;
};

export type OutcomeSummary = {
	total: number;
	succeeded: number;
	failed: number;
	ok: boolean;
};

/** Hand-off to the build step for components whose code changed. */
export type RebuildRequest = {
	name: string;
	path: string;
	npmInstall: boolean;
	npmBuild: boolean;
};

export type UpdateReport = {
	outcomes: SyncOutcome[];
	summary: OutcomeSummary;
	rebuild: RebuildRequest[];
};

export type StatusSummary = {
	withChanges: string[];
	ahead: string[];
	behind: string[];
	missing: string[];
	clean: boolean;
};

export type StatusReport = {
	project: ProjectStatus | null;
	components: ComponentStatus[];
	summary: StatusSummary;
};

export type InstallMode = "dev" | "prod";

export type InstallEntry = {
	name: string;
	status: "cloned" | "recloned" | "present" | "failed";
	version: string;
	details: string;
	warning?: string;
};

export type InstallReport = {
	mode: InstallMode;
	entries: InstallEntry[];
	failed: string[];
	ok: boolean;
};
