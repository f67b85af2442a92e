import { mkdir, readdir, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { syncComponent } from "../../src/sync/engine";
import type { SyncTarget } from "../../src/types/sync";
import {
	cloneComponent,
	commitFile,
	createContext,
	createFixture,
	createRemote,
	type Fixture,
	git,
	localComponent,
	pushCommits,
	type Remote,
} from "../helpers";

describe("syncComponent", () => {
	let fixture: Fixture;
	let remote: Remote;

	beforeEach(async () => {
		fixture = await createFixture();
		remote = await createRemote(fixture, "webapi");
	});

	afterEach(async () => {
		await fixture.cleanup();
	});

	const targetFor = (overrides: Partial<SyncTarget["entry"]> = {}): SyncTarget => ({
		name: remote.name,
		entry: localComponent(remote, overrides),
		url: remote.bare,
	});

	it("fast-forwards a clone that is behind", async () => {
		const clone = await cloneComponent(fixture, remote);
		const before = git(clone, "rev-parse", "HEAD");
		const tip = await pushCommits(remote, 3);

		const outcome = await syncComponent(createContext(fixture), targetFor());

		expect(outcome.status).toBe("updated");
		expect(outcome.behind).toBe(3);
		expect(outcome.ahead).toBe(0);
		expect(outcome.before).toBe(before);
		expect(outcome.after).toBe(tip);
		expect(outcome.details).toContain("(3 commits)");
		expect(git(clone, "rev-parse", "HEAD")).toBe(tip);
	});

	it("reports up-to-date with the short commit", async () => {
		const clone = await cloneComponent(fixture, remote);
		const outcome = await syncComponent(createContext(fixture), targetFor());
		expect(outcome.status).toBe("up-to-date");
		expect(outcome.details).toBe(git(clone, "rev-parse", "--short", "HEAD"));
	});

	it("never moves a locked component", async () => {
		const clone = await cloneComponent(fixture, remote);
		const pinned = git(clone, "rev-parse", "HEAD");
		await pushCommits(remote, 2);

		const outcome = await syncComponent(
			createContext(fixture),
			targetFor({ version: pinned, locked_version: pinned }),
		);

		expect(outcome.status).toBe("locked");
		expect(outcome.details).toBe(
			`Locked at ${pinned.slice(0, 8)}; run "fleet unlock webapi" before updating`,
		);
		expect(git(clone, "rev-parse", "HEAD")).toBe(pinned);
	});

	it("refuses to update a dirty working copy", async () => {
		const clone = await cloneComponent(fixture, remote);
		const before = git(clone, "rev-parse", "HEAD");
		await pushCommits(remote, 1);
		await writeFile(path.join(clone, "README.md"), "local edit\n", "utf8");

		const outcome = await syncComponent(createContext(fixture), targetFor());

		expect(outcome.status).toBe("has-uncommitted-changes");
		expect(outcome.details).toBe("Has local changes; commit or stash them first");
		expect(git(clone, "rev-parse", "HEAD")).toBe(before);
		expect(git(clone, "status", "--porcelain")).toBe("M README.md");
	});

	it("stashes local changes when forced", async () => {
		const clone = await cloneComponent(fixture, remote);
		const tip = await pushCommits(remote, 1);
		await writeFile(path.join(clone, "notes.txt"), "scratch\n", "utf8");

		const outcome = await syncComponent(createContext(fixture), targetFor(), { force: true });

		expect(outcome.status).toBe("updated");
		expect(outcome.details.endsWith("; local changes stashed")).toBe(true);
		expect(git(clone, "rev-parse", "HEAD")).toBe(tip);
		expect(git(clone, "stash", "list").split("\n")).toHaveLength(1);
		expect(git(clone, "status", "--porcelain")).toBe("");
	});

	it("rebases local commits onto the remote branch", async () => {
		const clone = await cloneComponent(fixture, remote);
		await commitFile(clone, "local.txt", "local\n", "local work");
		await pushCommits(remote, 2);

		const outcome = await syncComponent(createContext(fixture), targetFor());

		expect(outcome.status).toBe("updated");
		expect(outcome.ahead).toBe(1);
		expect(outcome.behind).toBe(2);
		expect(git(clone, "rev-list", "--count", "HEAD..origin/main")).toBe("0");
		expect(git(clone, "rev-list", "--count", "origin/main..HEAD")).toBe("1");
		expect(git(clone, "log", "-1", "--format=%s")).toBe("local work");
	});

	it("aborts a conflicting rebase and leaves the tree clean", async () => {
		const clone = await cloneComponent(fixture, remote);
		const localHead = await commitFile(clone, "README.md", "local\n", "local readme");
		await commitFile(remote.seed, "README.md", "remote\n", "remote readme");
		git(remote.seed, "push", "--quiet", "origin", "main");

		const outcome = await syncComponent(createContext(fixture), targetFor());

		expect(outcome.status).toBe("rebase-failed");
		expect(outcome.details).toBe("Rebase onto origin/main failed; manual merge needed");
		expect(git(clone, "rev-parse", "HEAD")).toBe(localHead);
		expect(git(clone, "status", "--porcelain")).toBe("");
		expect(await readdir(path.join(clone, ".git"))).not.toContain("rebase-merge");
	});

	it("clones a missing component", async () => {
		const outcome = await syncComponent(createContext(fixture), targetFor());
		const clone = path.join(fixture.componentsDir, "webapi");
		expect(outcome.status).toBe("up-to-date");
		expect(git(clone, "rev-parse", "HEAD")).toBe(git(remote.seed, "rev-parse", "HEAD"));
	});

	it("logs the clone through the context logger", async () => {
		const logger = vi.fn();
		await syncComponent(createContext(fixture, { logger }), targetFor());
		expect(logger).toHaveBeenCalledWith(`webapi: cloning ${remote.bare}`);
	});

	it("reports clone-failed without a URL", async () => {
		const outcome = await syncComponent(createContext(fixture), {
			...targetFor(),
			url: null,
		});
		expect(outcome).toEqual({
			name: "webapi",
			status: "clone-failed",
			details: "Not cloned and no repository URL configured",
		});
	});

	it("reports clone-failed when the remote does not exist", async () => {
		const outcome = await syncComponent(createContext(fixture), {
			...targetFor(),
			url: path.join(fixture.remotesDir, "missing.git"),
		});
		expect(outcome.status).toBe("clone-failed");
		expect(outcome.details.startsWith("Clone of ")).toBe(true);
	});

	it("reports a directory that is not a repository", async () => {
		const dir = path.join(fixture.componentsDir, "webapi");
		await mkdir(dir, { recursive: true });
		await writeFile(path.join(dir, "stray.txt"), "x", "utf8");

		const outcome = await syncComponent(createContext(fixture), targetFor());

		expect(outcome.status).toBe("not-a-repository");
		expect(outcome.details).toBe(`${dir} is not a git repository`);
	});

	it("reports an error when origin has neither main nor master", async () => {
		const develop = await createRemote(fixture, "develop-only", "develop");
		await cloneComponent(fixture, develop);

		const outcome = await syncComponent(createContext(fixture), {
			name: develop.name,
			entry: localComponent(develop),
			url: develop.bare,
		});

		expect(outcome.status).toBe("error");
		expect(outcome.details).toBe("No main or master branch on origin");
	});

	it("falls back to master", async () => {
		const legacy = await createRemote(fixture, "legacy", "master");
		const clone = await cloneComponent(fixture, legacy);
		const tip = await pushCommits(legacy, 1);

		const outcome = await syncComponent(createContext(fixture), {
			name: legacy.name,
			entry: localComponent(legacy),
			url: legacy.bare,
		});

		expect(outcome.status).toBe("updated");
		expect(git(clone, "rev-parse", "HEAD")).toBe(tip);
	});

	it("updates from cached remote refs when the fetch fails", async () => {
		const clone = await cloneComponent(fixture, remote);
		const tip = await pushCommits(remote, 2);
		git(clone, "fetch", "--quiet");
		await rename(remote.bare, `${remote.bare}.moved`);
		const warn = vi.fn();

		const outcome = await syncComponent(createContext(fixture, { warn }), targetFor());

		expect(outcome).toMatchObject({ status: "updated", behind: 2, after: tip });
		expect(warn).toHaveBeenCalledTimes(1);
		expect(warn.mock.calls[0]?.[0]).toMatch(
			/^webapi: Fetch in .* failed: .*; using cached remote refs$/,
		);
		expect(git(clone, "rev-parse", "HEAD")).toBe(tip);
	});
});
