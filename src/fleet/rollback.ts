import { hasLockedVersion, shortSha } from "../config/defaults";
import { type FleetContext, loadStore, openComponentRepository } from "../context";
import { toErrorMessage } from "../errors";
import type { BatchResult, Selection } from "../types/fleet";
import { finishBatch, selectComponents, unknownEntries } from "./select";

const pluralize = (count: number, word: string) =>
	`${count} ${word}${count === 1 ? "" : "s"}`;

/**
 * Checks out each selected component's `locked_version` and pins
 * `version` to it. A dirty tree or an unresolvable commit skips the
 * component without touching it.
 */
export const rollbackAll = async (
	context: FleetContext,
	selection: Selection,
): Promise<BatchResult> => {
	const store = await loadStore(context);
	const { selected, unknown } = selectComponents(store, selection, "rollback");
	const entries = unknownEntries(unknown);

	for (const [name, entry] of selected) {
		const skip = (details: string) =>
			entries.push({ name, status: "skipped", details });
		const locked = entry.locked_version;
		if (!hasLockedVersion(locked)) {
			skip("No locked version to roll back to");
			continue;
		}
		try {
			const repo = openComponentRepository(context, name);
			if (!(await repo.isRepository())) {
				skip("Not cloned");
				continue;
			}
			const target = await repo.getCommitInfo(locked);
			if (!target) {
				skip(`Locked commit ${shortSha(locked)} not found; fetch and retry`);
				continue;
			}
			const previous = await repo.getCurrentCommit();
			if (previous === target.sha) {
				if (entry.version === locked) {
					skip(`Already at ${target.shaShort}`);
					continue;
				}
				store.rollback(name);
				entries.push({
					name,
					status: "changed",
					details: `Pinned to ${target.shaShort} (already checked out)`,
					from: entry.version,
					to: locked,
					commitsBack: 0,
				});
				continue;
			}
			if (await repo.isDirty()) {
				skip("Has local changes; commit or stash them first");
				continue;
			}
			await repo.checkout(target.sha);
			store.rollback(name);
			const commitsBack = previous
				? await repo.countCommitsBetween(target.sha, previous)
				: 0;
			entries.push({
				name,
				status: "changed",
				details: `Rolled back to ${target.shaShort} (${pluralize(commitsBack, "commit")} back)`,
				from: entry.version,
				to: locked,
				commitsBack,
			});
		} catch (error) {
			entries.push({ name, status: "failed", details: toErrorMessage(error) });
		}
	}
	return finishBatch(store, entries);
};
