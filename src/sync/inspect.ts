import { isLockedVersion } from "../config/defaults";
import {
	type FleetContext,
	openComponentRepository,
	openRepository,
} from "../context";
import { toErrorMessage } from "../errors";
import { DEFAULT_REMOTE, type GitRepository } from "../git/repository";
import type {
	ComponentStatus,
	ProjectStatus,
	RemoteSyncState,
	SyncTarget,
} from "../types/sync";
import { fetchBestEffort } from "./engine";

export type InspectOptions = {
	fetch: boolean;
};

/** `ahead = count(remote..local)`, `behind = count(local..remote)`. */
export const classifySync = (ahead: number, behind: number): RemoteSyncState => {
	if (ahead > 0 && behind > 0) return "diverged";
	if (ahead > 0) return "ahead";
	if (behind > 0) return "behind";
	return "synced";
};

const describeCounts = (ahead: number, behind: number) => {
	const parts: string[] = [];
	if (ahead > 0) parts.push(`${ahead} ahead`);
	if (behind > 0) parts.push(`${behind} behind`);
	return parts.length > 0 ? parts.join(", ") : "Up to date";
};

type RemoteComparison = {
	sync: RemoteSyncState;
	remoteRef: string | null;
	ahead: number;
	behind: number;
	details: string;
};

const compareWithRemote = async (
	repo: GitRepository,
	resolveBranch: () => Promise<string | null>,
): Promise<RemoteComparison> => {
	const remoteUrl = await repo.getRemoteUrl(DEFAULT_REMOTE);
	if (!remoteUrl) {
		return {
			sync: "local-only",
			remoteRef: null,
			ahead: 0,
			behind: 0,
			details: "No remote configured",
		};
	}
	const branch = await resolveBranch();
	if (!branch) {
		return {
			sync: "no-remote-branch",
			remoteRef: null,
			ahead: 0,
			behind: 0,
			details: "Remote branch not found",
		};
	}
	const remoteRef = `${DEFAULT_REMOTE}/${branch}`;
	const ahead = await repo.countCommitsBetween(remoteRef, "HEAD");
	const behind = await repo.countCommitsBetween("HEAD", remoteRef);
	return {
		sync: classifySync(ahead, behind),
		remoteRef,
		ahead,
		behind,
		details: describeCounts(ahead, behind),
	};
};

/**
 * Read-only view of one component. Compares against the same remote
 * default branch an update would merge from. Never rebases, merges or
 * checks out.
 */
export const inspectComponent = async (
	context: FleetContext,
	target: SyncTarget,
	options: InspectOptions,
): Promise<ComponentStatus> => {
	const { version, locked_version: lockedVersion } = target.entry;
	const status: ComponentStatus = {
		name: target.name,
		exists: false,
		isRepository: false,
		locked: isLockedVersion(version),
		version,
		lockedVersion: lockedVersion || null,
		currentCommit: null,
		branch: null,
		dirty: false,
		sync: "missing",
		remoteRef: null,
		ahead: 0,
		behind: 0,
		details: "Repository not cloned",
	};
	try {
		const repo = openComponentRepository(context, target.name, target.url);
		status.exists = await repo.exists();
		if (!status.exists) {
			return status;
		}
		status.isRepository = await repo.isRepository();
		if (!status.isRepository) {
			return { ...status, sync: "not-a-repository", details: "Not a git repository" };
		}
		if (options.fetch) {
			await fetchBestEffort(context, repo, target.name);
		}
		status.currentCommit = await repo.getCurrentCommit();
		status.branch = await repo.getCurrentBranch();
		status.dirty = await repo.isDirty();
		const comparison = await compareWithRemote(repo, () =>
			repo.resolveDefaultBranch(),
		);
		return { ...status, ...comparison };
	} catch (error) {
		return { ...status, sync: "error", details: toErrorMessage(error) };
	}
};

/**
 * Status of the repository holding the versions file, compared with the
 * upstream of its current branch. Null when the project is not a checkout.
 */
export const inspectProject = async (
	context: FleetContext,
	options: InspectOptions,
): Promise<ProjectStatus | null> => {
	const repo = openRepository(context, context.projectDir);
	if (!(await repo.isRepository())) {
		return null;
	}
	const status: ProjectStatus = {
		path: repo.path,
		branch: null,
		currentCommit: null,
		dirty: false,
		sync: "synced",
		remoteRef: null,
		ahead: 0,
		behind: 0,
		details: "",
	};
	try {
		if (options.fetch) {
			await fetchBestEffort(context, repo, "project");
		}
		status.branch = await repo.getCurrentBranch();
		status.currentCommit = await repo.getCurrentCommit();
		status.dirty = await repo.isDirty();
		const branch = status.branch;
		const comparison = await compareWithRemote(repo, async () =>
			branch && branch !== "HEAD" && (await repo.hasRemoteBranch(branch))
				? branch
				: null,
		);
		return { ...status, ...comparison };
	} catch (error) {
		return { ...status, sync: "error", details: toErrorMessage(error) };
	}
};
