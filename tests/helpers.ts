import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { execaSync } from "execa";
import type { ComponentEntry, ComponentInput } from "../src/config/schema";
import { createFleetContext, type FleetContext, type FleetContextInput } from "../src/context";

export const FIXED_NOW = new Date(2024, 4, 17, 9, 30, 15);

export const git = (cwd: string, ...args: string[]) =>
	execaSync("git", args, { cwd, stdin: "ignore" }).stdout.trim();

export type Fixture = {
	root: string;
	projectDir: string;
	componentsDir: string;
	configPath: string;
	remotesDir: string;
	seedsDir: string;
	cleanup: () => Promise<void>;
};

export const createFixture = async (): Promise<Fixture> => {
	const root = await mkdtemp(path.join(os.tmpdir(), "fleet-test-"));
	const projectDir = path.join(root, "project");
	const remotesDir = path.join(root, "remotes");
	const seedsDir = path.join(root, "seeds");
	await Promise.all([
		mkdir(projectDir, { recursive: true }),
		mkdir(remotesDir, { recursive: true }),
		mkdir(seedsDir, { recursive: true }),
	]);
	return {
		root,
		projectDir,
		componentsDir: path.join(projectDir, "external"),
		configPath: path.join(projectDir, "versions.json"),
		remotesDir,
		seedsDir,
		cleanup: () => rm(root, { recursive: true, force: true }),
	};
};

/** Context with no built-in components and no convention URLs. */
export const createContext = (
	fixture: Fixture,
	overrides: FleetContextInput = {},
): FleetContext =>
	createFleetContext({
		projectDir: fixture.projectDir,
		defaults: {},
		repoBaseUrl: null,
		allowFileProtocol: true,
		now: () => FIXED_NOW,
		...overrides,
	});

export const commitFile = async (
	repoDir: string,
	file: string,
	content: string,
	message = `update ${file}`,
) => {
	await writeFile(path.join(repoDir, file), content, "utf8");
	git(repoDir, "add", file);
	git(repoDir, "commit", "--quiet", "-m", message);
	return git(repoDir, "rev-parse", "HEAD");
};

export type Remote = {
	name: string;
	bare: string;
	seed: string;
	branch: string;
};

/**
 * A bare "origin" plus a seed working copy used to push new commits to it.
 * The seed starts with one commit of `README.md`.
 */
export const createRemote = async (
	fixture: Fixture,
	name: string,
	branch = "main",
): Promise<Remote> => {
	const bare = path.join(fixture.remotesDir, `${name}.git`);
	const seed = path.join(fixture.seedsDir, name);
	git(fixture.root, "init", "--quiet", "--bare", "-b", branch, bare);
	git(fixture.root, "init", "--quiet", "-b", branch, seed);
	await commitFile(seed, "README.md", `# ${name}\n`, "initial commit");
	git(seed, "remote", "add", "origin", bare);
	git(seed, "push", "--quiet", "origin", branch);
	return { name, bare, seed, branch };
};

/** Commits `count` new files in the seed and pushes them; returns the new tip. */
export const pushCommits = async (remote: Remote, count: number, prefix = "change") => {
	for (let index = 1; index <= count; index += 1) {
		await commitFile(remote.seed, `${prefix}-${index}.txt`, `${prefix} ${index}\n`);
	}
	git(remote.seed, "push", "--quiet", "origin", remote.branch);
	return git(remote.seed, "rev-parse", "HEAD");
};

/** Clones `remote` into the components directory under its own name. */
export const cloneComponent = async (fixture: Fixture, remote: Remote) => {
	await mkdir(fixture.componentsDir, { recursive: true });
	const target = path.join(fixture.componentsDir, remote.name);
	git(fixture.componentsDir, "clone", "--quiet", remote.bare, target);
	return target;
};

export const writeVersions = async (
	fixture: Fixture,
	components: Record<string, ComponentInput>,
) => {
	const document = { _comment: "test", components };
	await writeFile(fixture.configPath, `${JSON.stringify(document, null, 2)}\n`, "utf8");
};

export const readVersions = async (fixture: Fixture) => {
	const parsed: { components: Record<string, ComponentInput> } = JSON.parse(
		await readFile(fixture.configPath, "utf8"),
	);
	return parsed.components;
};

/** Versions entry for a component cloned from a local bare remote. */
export const localComponent = (
	remote: Remote,
	overrides: Partial<ComponentEntry> = {},
): ComponentEntry => ({
	version: "latest",
	locked_version: null,
	url: remote.bare,
	npm_install: false,
	npm_build: false,
	...overrides,
});
