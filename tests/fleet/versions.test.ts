import { access, writeFile } from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { listBackups } from "../../src/config/backup";
import { rollbackAll } from "../../src/fleet/rollback";
import { updateAll } from "../../src/fleet/update";
import { lockAll, setVersionAll, unlockAll } from "../../src/fleet/versions";
import { UsageError } from "../../src/errors";
import {
	cloneComponent,
	createContext,
	createFixture,
	createRemote,
	type Fixture,
	git,
	localComponent,
	pushCommits,
	readVersions,
	type Remote,
	writeVersions,
} from "../helpers";

describe("version batches", () => {
	let fixture: Fixture;
	let webapi: Remote;
	let webclient: Remote;
	let webapiClone: string;
	let webclientClone: string;

	beforeEach(async () => {
		fixture = await createFixture();
		webapi = await createRemote(fixture, "webapi");
		webclient = await createRemote(fixture, "webclient");
		webapiClone = await cloneComponent(fixture, webapi);
		webclientClone = await cloneComponent(fixture, webclient);
		await writeVersions(fixture, {
			webapi: localComponent(webapi),
			webclient: localComponent(webclient),
		});
	});

	afterEach(async () => {
		await fixture.cleanup();
	});

	it("locks the checked-out commit and unlocks back to latest", async () => {
		const context = createContext(fixture);
		const head = git(webapiClone, "rev-parse", "HEAD");

		const locked = await lockAll(context, { names: ["webapi"] });
		expect(locked.changed).toEqual(["webapi"]);
		expect((await readVersions(fixture)).webapi).toMatchObject({
			version: head,
			locked_version: head,
		});

		const unlocked = await unlockAll(context, { names: ["webapi"] });
		expect(unlocked.changed).toEqual(["webapi"]);
		expect((await readVersions(fixture)).webapi).toMatchObject({
			version: "latest",
			locked_version: head,
		});
	});

	it("writes the file once per batch and keeps one backup", async () => {
		const result = await lockAll(createContext(fixture), { all: true });
		expect(result.changed).toEqual(["webapi", "webclient"]);
		expect(result.backupPath).toBe(`${fixture.configPath}.backup_20240517_093015`);
		expect(await listBackups(fixture.configPath)).toEqual([result.backupPath]);
	});

	it("leaves the file alone when nothing changed", async () => {
		const result = await unlockAll(createContext(fixture), { all: true });
		expect(result.changed).toEqual([]);
		expect(result.skipped).toEqual(["webapi", "webclient"]);
		expect(result.saved).toBeNull();
		expect(await listBackups(fixture.configPath)).toEqual([]);
	});

	it("relocking at the same commit changes nothing", async () => {
		const context = createContext(fixture);
		await lockAll(context, { names: ["webapi"] });
		const before = await readVersions(fixture);

		const again = await lockAll(context, { names: ["webapi"] });

		expect(again.changed).toEqual([]);
		expect(again.entries[0]?.details).toMatch(/^Already locked at [0-9a-f]{8}$/);
		expect(await readVersions(fixture)).toEqual(before);
	});

	it("skips unknown and uncloned components", async () => {
		await writeVersions(fixture, {
			webapi: localComponent(webapi),
			ghost: { url: null },
		});
		const result = await lockAll(createContext(fixture), { names: ["ghost", "nope"] });
		expect(result.entries).toEqual([
			{ name: "nope", status: "skipped", details: "Not found in the versions file" },
			{ name: "ghost", status: "skipped", details: "Not cloned" },
		]);
		expect(result.ok).toBe(true);
		expect(result.saved).toBeNull();
	});

	it("requires a selection", async () => {
		await expect(lockAll(createContext(fixture), { names: [] })).rejects.toBeInstanceOf(
			UsageError,
		);
	});

	it("rolls back to the locked commit after an update", async () => {
		const context = createContext(fixture);
		const lockedAt = git(webapiClone, "rev-parse", "HEAD");
		await lockAll(context, { names: ["webapi"] });
		await unlockAll(context, { names: ["webapi"] });
		await pushCommits(webapi, 3);
		const update = await updateAll(context, { only: ["webapi"] });
		expect(update.outcomes[0]?.status).toBe("updated");

		const result = await rollbackAll(context, { names: ["webapi"] });

		expect(result.entries).toEqual([
			{
				name: "webapi",
				status: "changed",
				details: `Rolled back to ${git(webapiClone, "rev-parse", "--short", "HEAD")} (3 commits back)`,
				from: "latest",
				to: lockedAt,
				commitsBack: 3,
			},
		]);
		expect(git(webapiClone, "rev-parse", "HEAD")).toBe(lockedAt);
		expect((await readVersions(fixture)).webapi).toMatchObject({
			version: lockedAt,
			locked_version: lockedAt,
		});
	});

	it("pins the version when the locked commit is already checked out", async () => {
		const context = createContext(fixture);
		const head = git(webapiClone, "rev-parse", "HEAD");
		await lockAll(context, { names: ["webapi"] });
		await unlockAll(context, { names: ["webapi"] });

		const result = await rollbackAll(context, { names: ["webapi"] });

		expect(result.entries[0]).toMatchObject({ status: "changed", commitsBack: 0 });
		expect((await readVersions(fixture)).webapi?.version).toBe(head);

		const again = await rollbackAll(context, { names: ["webapi"] });
		expect(again.entries[0]?.status).toBe("skipped");
	});

	it("does not roll back a dirty working copy", async () => {
		const context = createContext(fixture);
		await lockAll(context, { names: ["webapi"] });
		await unlockAll(context, { names: ["webapi"] });
		await pushCommits(webapi, 1);
		await updateAll(context, { only: ["webapi"] });
		const head = git(webapiClone, "rev-parse", "HEAD");
		await writeFile(path.join(webapiClone, "README.md"), "edited\n", "utf8");

		const result = await rollbackAll(context, { names: ["webapi"] });

		expect(result.entries[0]).toEqual({
			name: "webapi",
			status: "skipped",
			details: "Has local changes; commit or stash them first",
		});
		expect(git(webapiClone, "rev-parse", "HEAD")).toBe(head);
	});

	it("skips components without a locked version", async () => {
		const result = await rollbackAll(createContext(fixture), { names: ["webclient"] });
		expect(result.entries[0]).toEqual({
			name: "webclient",
			status: "skipped",
			details: "No locked version to roll back to",
		});
		expect(git(webclientClone, "status", "--porcelain")).toBe("");
	});

	it("skips a locked commit the clone does not have", async () => {
		await writeVersions(fixture, {
			webapi: localComponent(webapi, {
				locked_version: "0000000000000000000000000000000000000001",
			}),
		});
		const result = await rollbackAll(createContext(fixture), { names: ["webapi"] });
		expect(result.entries[0]).toEqual({
			name: "webapi",
			status: "skipped",
			details: "Locked commit 00000000 not found; fetch and retry",
		});
	});

	it("does not pass an option-like locked version to git", async () => {
		const target = path.join(fixture.root, "written-by-git.txt");
		await writeVersions(fixture, {
			webapi: localComponent(webapi, { locked_version: `--output=${target}` }),
		});

		const result = await rollbackAll(createContext(fixture), { names: ["webapi"] });

		expect(result.entries).toEqual([
			{ name: "webapi", status: "skipped", details: "Not found in the versions file" },
		]);
		await expect(access(target)).rejects.toThrow();
	});

	it("sets a version without touching the checkout", async () => {
		const head = git(webclientClone, "rev-parse", "HEAD");
		const result = await setVersionAll(createContext(fixture), {
			names: ["webclient"],
			version: "v2.1.0",
		});
		expect(result.entries).toEqual([
			{
				name: "webclient",
				status: "changed",
				details: "latest → v2.1.0",
				from: "latest",
				to: "v2.1.0",
			},
		]);
		expect((await readVersions(fixture)).webclient?.version).toBe("v2.1.0");
		expect(git(webclientClone, "rev-parse", "HEAD")).toBe(head);
	});

	it("rejects a version that starts with a dash", async () => {
		await expect(
			setVersionAll(createContext(fixture), { names: ["webclient"], version: "--orphan" }),
		).rejects.toThrow("Version '--orphan' must not start with '-'");
	});

	it("rejects an empty version", async () => {
		await expect(
			setVersionAll(createContext(fixture), { names: ["webclient"], version: "  " }),
		).rejects.toThrow("Version must not be empty");
	});
});
