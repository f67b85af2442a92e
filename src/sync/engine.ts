import { formatBackupTimestamp } from "../config/backup";
import { isLockedVersion, shortSha } from "../config/defaults";
import { type FleetContext, openComponentRepository } from "../context";
import { FetchFailedError, RebaseConflictError, toErrorMessage } from "../errors";
import { DEFAULT_REMOTE, type GitRepository } from "../git/repository";
import { redactRepoUrl } from "../git/redact";
import type { SyncOutcome, SyncStatus, SyncTarget } from "../types/sync";

export type SyncOptions = {
	/** Stash local changes instead of refusing to update a dirty tree. */
	force?: boolean;
};

type OutcomeExtras = Omit<SyncOutcome, "name" | "status" | "details">;

const createOutcome =
	(name: string) =>
	(status: SyncStatus, details: string, extras: OutcomeExtras = {}) => ({
		name,
		status,
		details,
		...extras,
	});

const pluralize = (count: number, word: string) =>
	`${count} ${word}${count === 1 ? "" : "s"}`;

/** Fetch failures are reported and the comparison runs on cached refs. */
export const fetchBestEffort = async (
	context: FleetContext,
	repo: GitRepository,
	name: string,
) => {
	try {
		await repo.fetch({ quiet: true });
		return true;
	} catch (error) {
		if (!(error instanceof FetchFailedError)) {
			throw error;
		}
		context.warn?.(`${name}: ${error.message}; using cached remote refs`);
		return false;
	}
};

const updateWorkingCopy = async (
	context: FleetContext,
	repo: GitRepository,
	target: SyncTarget,
	options: SyncOptions,
): Promise<SyncOutcome> => {
	const outcome = createOutcome(target.name);
	await fetchBestEffort(context, repo, target.name);

	const current = await repo.getCommitInfo("HEAD");
	if (!current) {
		return outcome("error", "Cannot read the current commit");
	}

	const { version } = target.entry;
	if (isLockedVersion(version)) {
		return outcome(
			"locked",
			`Locked at ${shortSha(version)}; run "fleet unlock ${target.name}" before updating`,
			{ before: current.sha, after: current.sha },
		);
	}

	let stashNote = "";
	if (await repo.isDirty()) {
		if (!options.force) {
			return outcome(
				"has-uncommitted-changes",
				"Has local changes; commit or stash them first",
				{ before: current.sha },
			);
		}
		await repo.stash(`fleet update ${formatBackupTimestamp(context.now())}`);
		stashNote = "; local changes stashed";
	}

	const branch = await repo.resolveDefaultBranch();
	if (!branch) {
		return outcome(
			"error",
			`No main or master branch on ${DEFAULT_REMOTE}${stashNote}`,
			{ before: current.sha },
		);
	}
	const remoteRef = `${DEFAULT_REMOTE}/${branch}`;
	const remote = await repo.getCommitInfo(remoteRef);
	if (!remote) {
		return outcome("error", `Cannot read ${remoteRef}${stashNote}`, {
			before: current.sha,
		});
	}

	const behind = await repo.countCommitsBetween(current.sha, remote.sha);
	const ahead = await repo.countCommitsBetween(remote.sha, current.sha);

	if (behind === 0) {
		const localNote =
			ahead > 0 ? ` (${pluralize(ahead, "local commit")} not on ${remoteRef})` : "";
		return outcome("up-to-date", `${current.shaShort}${localNote}${stashNote}`, {
			before: current.sha,
			after: current.sha,
			behind,
			ahead,
		});
	}

	if (ahead > 0) {
		context.logger?.(
			`${target.name}: rebasing ${pluralize(ahead, "local commit")} onto ${remoteRef}`,
		);
		try {
			await repo.rebase(remoteRef);
		} catch (error) {
			if (!(error instanceof RebaseConflictError)) {
				throw error;
			}
			return outcome(
				"rebase-failed",
				`Rebase onto ${remoteRef} failed; manual merge needed${stashNote}`,
				{ before: current.sha, after: current.sha, behind, ahead },
			);
		}
	} else {
		await repo.mergeFastForward(remoteRef);
	}

	const updated = await repo.getCommitInfo("HEAD");
	if (!updated) {
		return outcome("error", "Cannot read the commit after updating", {
			before: current.sha,
		});
	}
	return outcome(
		"updated",
		`${current.shaShort} → ${updated.shaShort} (${pluralize(behind, "commit")})${stashNote}`,
		{ before: current.sha, after: updated.sha, behind, ahead },
	);
};

/**
 * Brings one component up to date with its remote default branch. Locked
 * components and dirty trees are never touched (unless `force` stashes the
 * local changes). Never throws: every failure becomes an outcome.
 */
export const syncComponent = async (
	context: FleetContext,
	target: SyncTarget,
	options: SyncOptions = {},
): Promise<SyncOutcome> => {
	const outcome = createOutcome(target.name);
	let repo: GitRepository;
	try {
		repo = openComponentRepository(context, target.name, target.url);
	} catch (error) {
		return outcome("error", toErrorMessage(error));
	}

	try {
		if (!(await repo.exists())) {
			if (!target.url) {
				return outcome("clone-failed", "Not cloned and no repository URL configured");
			}
			context.logger?.(`${target.name}: cloning ${redactRepoUrl(target.url)}`);
			try {
				await repo.clone();
			} catch (error) {
				return outcome("clone-failed", toErrorMessage(error));
			}
		}
		if (!(await repo.isRepository())) {
			return outcome("not-a-repository", `${repo.path} is not a git repository`);
		}
		return await updateWorkingCopy(context, repo, target, options);
	} catch (error) {
		return outcome("error", toErrorMessage(error));
	}
};
