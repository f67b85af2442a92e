import type { ComponentEntry } from "../config/schema";

export type SyncStatus =
	| "missing"
	| "not-a-repository"
	| "locked"
	| "up-to-date"
	| "updated"
	| "has-uncommitted-changes"
	| "rebase-failed"
	| "clone-failed"
	| "error";

export type SyncOutcome = {
	name: string;
	status: SyncStatus;
	details: string;
	before?: string;
	after?: string;
	behind?: number;
	ahead?: number;
};

export type SyncTarget = {
	name: string;
	entry: ComponentEntry;
	url: string | null;
};

export type RemoteSyncState =
	| "synced"
	| "ahead"
	| "behind"
	| "diverged"
	| "no-remote-branch"
	| "local-only";

export type ComponentSyncState =
	| RemoteSyncState
	| "missing"
	| "not-a-repository"
	| "error";

export type ComponentStatus = {
	name: string;
	exists: boolean;
	isRepository: boolean;
	locked: boolean;
	version: string;
	lockedVersion: string | null;
	currentCommit: string | null;
	branch: string | null;
	dirty: boolean;
	sync: ComponentSyncState;
	/** Branch the counts compare against, e.g. `origin/main`. */
	remoteRef: string | null;
	ahead: number;
	behind: number;
	details: string;
};

export type ProjectStatus = {
	path: string;
	branch: string | null;
	currentCommit: string | null;
	dirty: boolean;
	sync: RemoteSyncState | "error";
	remoteRef: string | null;
	ahead: number;
	behind: number;
	details: string;
};
