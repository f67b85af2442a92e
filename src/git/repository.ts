import { mkdir, readdir } from "node:fs/promises";
import path from "node:path";

import {
	CloneFailedError,
	FetchFailedError,
	GitCommandError,
	InvalidRefError,
	RebaseConflictError,
	toErrorMessage,
} from "../errors";
import { pathExists } from "../paths";
import { redactRepoUrl } from "./redact";
import { type GitLogger, type GitOptions, runGit } from "./run-git";

export type CommitInfo = {
	sha: string;
	shaShort: string;
	/** Committer date, ISO 8601. */
	date: string;
	subject: string;
	author: string;
};

export type GitRepositoryOptions = {
	url?: string | null;
	logger?: GitLogger;
	progressLogger?: GitLogger;
	timeoutMs?: number;
	allowFileProtocol?: boolean;
};

export const DEFAULT_REMOTE = "origin";
export const DEFAULT_BRANCH_CANDIDATES = ["main", "master"] as const;

const FIELD_SEPARATOR = "\x1f";
const COMMIT_INFO_FORMAT = ["%H", "%h", "%cI", "%s", "%an"].join("%x1f");

export const parseCommitInfo = (stdout: string): CommitInfo | null => {
	const line = stdout.trim();
	if (!line) {
		return null;
	}
	const [sha = "", shaShort = "", date = "", subject = "", author = ""] =
		line.split(FIELD_SEPARATOR);
	if (!/^[0-9a-f]{7,64}$/i.test(sha)) {
		return null;
	}
	return { sha, shaShort, date, subject, author };
};

/** A ref git would read as an option when passed as a positional argument. */
export const isOptionLikeRef = (ref: string) => ref.trimStart().startsWith("-");

export const parseCount = (stdout: string) => {
	const value = Number.parseInt(stdout.trim(), 10);
	return Number.isFinite(value) && value > 0 ? value : 0;
};

/**
 * One working copy on disk. Holds no state besides its path and remote URL;
 * every query runs git again, so two instances for the same path always
 * agree.
 */
export class GitRepository {
	readonly path: string;
	readonly url: string | null;
	private readonly options: GitRepositoryOptions;

	constructor(repoPath: string, options: GitRepositoryOptions = {}) {
		this.path = path.resolve(repoPath);
		this.url = options.url ?? null;
		this.options = options;
	}

	async exists() {
		return pathExists(this.path);
	}

	async isRepository() {
		return pathExists(path.join(this.path, ".git"));
	}

	/** True when the directory holds nothing besides `.git`. */
	async isEmpty() {
		const entries = await readdir(this.path);
		return entries.every((entry) => entry === ".git");
	}

	async clone(): Promise<void> {
		if (!this.url) {
			throw new CloneFailedError(`Cannot clone ${this.path}: no URL configured.`);
		}
		const parent = path.dirname(this.path);
		try {
			await mkdir(parent, { recursive: true });
			await runGit(["clone", this.url, this.path], {
				...this.gitOptions(parent),
				progressLogger: this.options.progressLogger,
			});
		} catch (error) {
			throw new CloneFailedError(
				`Clone of ${redactRepoUrl(this.url)} failed: ${toErrorMessage(error)}`,
				{ cause: error },
			);
		}
	}

	async fetch(options: { quiet?: boolean } = {}): Promise<void> {
		const args = ["fetch", "--all"];
		if (options.quiet ?? true) {
			args.push("--quiet");
		}
		try {
			await this.git(args);
		} catch (error) {
			throw new FetchFailedError(
				`Fetch in ${this.path} failed: ${toErrorMessage(error)}`,
				{ cause: error },
			);
		}
	}

	async checkout(ref: string, options: { force?: boolean } = {}) {
		if (isOptionLikeRef(ref)) {
			throw new InvalidRefError(`Refusing to check out '${ref}': not a ref.`);
		}
		const args = ["checkout", "--quiet"];
		if (options.force) {
			args.push("--force");
		}
		args.push(ref, "--");
		await this.git(args);
	}

	async isDirty() {
		const stdout = await this.git(["status", "--porcelain"]);
		return stdout.trim().length > 0;
	}

	async getCurrentCommit() {
		return this.tryGit(["rev-parse", "--verify", "HEAD"]);
	}

	/** Branch name, or `HEAD` when detached. */
	async getCurrentBranch() {
		return this.tryGit(["rev-parse", "--abbrev-ref", "HEAD"]);
	}

	async getCommitInfo(ref = "HEAD"): Promise<CommitInfo | null> {
		if (isOptionLikeRef(ref)) {
			return null;
		}
		const stdout = await this.tryGit([
			"log",
			"-1",
			`--format=${COMMIT_INFO_FORMAT}`,
			ref,
			"--",
		]);
		return stdout === null ? null : parseCommitInfo(stdout);
	}

	/** Commits reachable from `toRef` but not from `fromRef`; 0 when unresolvable. */
	async countCommitsBetween(fromRef: string, toRef: string) {
		if (isOptionLikeRef(fromRef) || isOptionLikeRef(toRef)) {
			return 0;
		}
		const stdout = await this.tryGit([
			"rev-list",
			"--count",
			`${fromRef}..${toRef}`,
		]);
		return stdout === null ? 0 : parseCount(stdout);
	}

	async hasRemoteBranch(branch: string, remote = DEFAULT_REMOTE) {
		const stdout = await this.tryGit([
			"rev-parse",
			"--verify",
			"--quiet",
			`refs/remotes/${remote}/${branch}`,
		]);
		return stdout !== null;
	}

	async getRemoteUrl(remote = DEFAULT_REMOTE) {
		return this.tryGit(["remote", "get-url", remote]);
	}

	/** `main` when the remote has it, else `master`, else null. */
	async resolveDefaultBranch(remote = DEFAULT_REMOTE) {
		for (const branch of DEFAULT_BRANCH_CANDIDATES) {
			if (await this.hasRemoteBranch(branch, remote)) {
				return branch;
			}
		}
		return null;
	}

	/** Rebases onto `upstream`; a failed rebase is aborted before throwing. */
	async rebase(upstream: string): Promise<void> {
		try {
			await this.git(["rebase", upstream]);
		} catch (error) {
			if (!(error instanceof GitCommandError)) {
				throw error;
			}
			await this.tryGit(["rebase", "--abort"]);
			throw new RebaseConflictError(
				`Rebase of ${this.path} onto ${upstream} failed: ${error.message}`,
				{ cause: error },
			);
		}
	}

	async mergeFastForward(ref: string): Promise<void> {
		await this.git(["merge", "--ff-only", ref]);
	}

	async stash(message: string): Promise<void> {
		await this.git(["stash", "push", "--include-untracked", "-m", message]);
	}

	private gitOptions(cwd = this.path): GitOptions {
		return {
			cwd,
			timeoutMs: this.options.timeoutMs,
			allowFileProtocol: this.options.allowFileProtocol,
			logger: this.options.logger,
		};
	}

	private async git(args: string[]) {
		return runGit(args, this.gitOptions());
	}

	private async tryGit(args: string[]): Promise<string | null> {
		try {
			return (await this.git(args)).trim();
		} catch (error) {
			if (error instanceof GitCommandError) {
				return null;
			}
			throw error;
		}
	}
}
