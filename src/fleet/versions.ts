import { isLockedVersion, shortSha } from "../config/defaults";
import { LATEST_VERSION } from "../config/schema";
import { type FleetContext, loadStore, openComponentRepository } from "../context";
import { toErrorMessage, UsageError } from "../errors";
import { isOptionLikeRef } from "../git/repository";
import type { BatchResult, Selection } from "../types/fleet";
import { finishBatch, selectComponents, unknownEntries } from "./select";

/** Pins each selected component to the commit currently checked out. */
export const lockAll = async (
	context: FleetContext,
	selection: Selection,
): Promise<BatchResult> => {
	const store = await loadStore(context);
	const { selected, unknown } = selectComponents(store, selection, "lock");
	const entries = unknownEntries(unknown);

	for (const [name, entry] of selected) {
		const skip = (details: string) =>
			entries.push({ name, status: "skipped", details });
		try {
			const repo = openComponentRepository(context, name);
			if (!(await repo.isRepository())) {
				skip("Not cloned");
				continue;
			}
			const head = await repo.getCurrentCommit();
			if (!head) {
				skip("Cannot read the current commit");
				continue;
			}
			if (entry.version === head && entry.locked_version === head) {
				skip(`Already locked at ${shortSha(head)}`);
				continue;
			}
			store.lock(name, head);
			entries.push({
				name,
				status: "changed",
				details: `Locked at ${shortSha(head)}`,
				from: entry.version,
				to: head,
			});
		} catch (error) {
			entries.push({ name, status: "failed", details: toErrorMessage(error) });
		}
	}
	return finishBatch(store, entries);
};

/** Returns the selected components to tracking latest. */
export const unlockAll = async (
	context: FleetContext,
	selection: Selection,
): Promise<BatchResult> => {
	const store = await loadStore(context);
	const { selected, unknown } = selectComponents(store, selection, "unlock");
	const entries = unknownEntries(unknown);

	for (const [name, entry] of selected) {
		if (!isLockedVersion(entry.version)) {
			entries.push({ name, status: "skipped", details: "Not locked" });
			continue;
		}
		store.unlock(name);
		entries.push({
			name,
			status: "changed",
			details: `Unlocked (was ${shortSha(entry.version)})`,
			from: entry.version,
			to: LATEST_VERSION,
		});
	}
	return finishBatch(store, entries);
};

export type SetVersionOptions = Selection & {
	version: string;
};

/** Sets `version` to a commit, tag or "latest" without touching the working copy. */
export const setVersionAll = async (
	context: FleetContext,
	options: SetVersionOptions,
): Promise<BatchResult> => {
	const version = options.version.trim();
	if (!version) {
		throw new UsageError("Version must not be empty");
	}
	if (isOptionLikeRef(version)) {
		throw new UsageError(`Version '${version}' must not start with '-'`);
	}
	const store = await loadStore(context);
	const { selected, unknown } = selectComponents(store, options, "set-version");
	const entries = unknownEntries(unknown);

	for (const [name, entry] of selected) {
		if (entry.version === version) {
			entries.push({ name, status: "skipped", details: `Already at ${version}` });
			continue;
		}
		store.setVersion(name, version);
		entries.push({
			name,
			status: "changed",
			details: `${entry.version} → ${version}`,
			from: entry.version,
			to: version,
		});
	}
	return finishBatch(store, entries);
};
