import { mkdir, rm } from "node:fs/promises";

import { hasLockedVersion, isLockedVersion } from "../config/defaults";
import type { ComponentEntry } from "../config/schema";
import { type FleetContext, loadStore, openComponentRepository } from "../context";
import { toErrorMessage } from "../errors";
import type { GitRepository } from "../git/repository";
import type { InstallEntry, InstallMode, InstallReport } from "../types/fleet";

export type InstallAllOptions = {
	mode?: InstallMode;
	onStart?: (name: string) => void;
	onEntry?: (entry: InstallEntry) => void;
};

/**
 * The version an install checks out. Production installs fall back to the
 * rollback target for components that track latest.
 */
export const resolveInstallVersion = (entry: ComponentEntry, mode: InstallMode) => {
	if (
		mode === "prod" &&
		!isLockedVersion(entry.version) &&
		hasLockedVersion(entry.locked_version)
	) {
		return entry.locked_version;
	}
	return entry.version;
};

const needsReclone = async (repo: GitRepository) =>
	!(await repo.isRepository()) || (await repo.isEmpty());

const checkoutVersion = async (
	context: FleetContext,
	repo: GitRepository,
	name: string,
	version: string,
) => {
	if (!isLockedVersion(version)) {
		return undefined;
	}
	try {
		await repo.checkout(version);
		return undefined;
	} catch (error) {
		const warning = `${name}: checkout of ${version} failed (${toErrorMessage(error)}); staying on the default branch`;
		context.warn?.(warning);
		return warning;
	}
};

/**
 * Brings the components directory to a usable state: clones what is
 * missing, replaces broken checkouts and leaves valid ones alone.
 */
export const installAll = async (
	context: FleetContext,
	options: InstallAllOptions = {},
): Promise<InstallReport> => {
	const mode = options.mode ?? "dev";
	const store = await loadStore(context);
	await mkdir(context.componentsDir, { recursive: true });

	const entries: InstallEntry[] = [];
	for (const [name, entry] of store.getComponents()) {
		options.onStart?.(name);
		const version = resolveInstallVersion(entry, mode);
		const result = await installComponent(context, {
			name,
			version,
			url: store.resolveUrl(name),
		});
		entries.push(result);
		options.onEntry?.(result);
	}
	const failed = entries
		.filter((entry) => entry.status === "failed")
		.map((entry) => entry.name);
	return { mode, entries, failed, ok: failed.length === 0 };
};

type InstallTarget = {
	name: string;
	version: string;
	url: string | null;
};

const installComponent = async (
	context: FleetContext,
	target: InstallTarget,
): Promise<InstallEntry> => {
	const { name, version } = target;
	const result = (
		status: InstallEntry["status"],
		details: string,
		warning?: string,
	): InstallEntry => ({
		name,
		status,
		version,
		details,
		...(warning ? { warning } : {}),
	});

	try {
		const repo = openComponentRepository(context, name, target.url);
		let status: InstallEntry["status"] = "cloned";
		if (await repo.exists()) {
			if (!(await needsReclone(repo))) {
				return result("present", "Already installed");
			}
			context.logger?.(`${name}: removing incomplete checkout at ${repo.path}`);
			await rm(repo.path, { recursive: true, force: true });
			status = "recloned";
		}
		if (!target.url) {
			return result("failed", "No repository URL configured");
		}
		try {
			await repo.clone();
		} catch (error) {
			return result("failed", toErrorMessage(error));
		}
		const warning = await checkoutVersion(context, repo, name, version);
		const details = isLockedVersion(version)
			? `${status === "cloned" ? "Cloned" : "Re-cloned"} at ${version}`
			: status === "cloned"
				? "Cloned"
				: "Re-cloned";
		return result(status, warning ? `${details} (checkout failed)` : details, warning);
	} catch (error) {
		return result("failed", toErrorMessage(error));
	}
};
