import type { ComponentEntry } from "../config/schema";
import type { VersionStore } from "../config/store";
import { UsageError } from "../errors";
import type { BatchEntry, BatchResult, Selection } from "../types/fleet";

export type SelectedComponents = {
	selected: Array<[string, ComponentEntry]>;
	unknown: string[];
};

/**
 * Components named by the selection, in the order they appear in the
 * versions file. Unknown names are returned separately.
 */
export const selectComponents = (
	store: VersionStore,
	selection: Selection,
	command: string,
): SelectedComponents => {
	if (selection.all) {
		return { selected: store.getComponents(), unknown: [] };
	}
	const names = selection.names ?? [];
	if (names.length === 0) {
		throw new UsageError(
			`No components specified. Usage: fleet ${command} <component...> | --all`,
		);
	}
	const wanted = new Set(names);
	return {
		selected: store.getComponents().filter(([name]) => wanted.has(name)),
		unknown: Array.from(wanted).filter((name) => !store.has(name)),
	};
};

export const unknownEntries = (names: string[]): BatchEntry[] =>
	names.map((name) => ({
		name,
		status: "skipped",
		details: "Not found in the versions file",
	}));

/** Saves once when anything changed; a save failure propagates. */
export const finishBatch = async (
	store: VersionStore,
	entries: BatchEntry[],
): Promise<BatchResult> => {
	const pick = (status: BatchEntry["status"]) =>
		entries.filter((entry) => entry.status === status).map((entry) => entry.name);
	const changed = pick("changed");
	const failed = pick("failed");
	const saved = changed.length > 0 ? await store.save() : null;
	return {
		entries,
		changed,
		skipped: pick("skipped"),
		failed,
		saved,
		backupPath: saved?.backupPath ?? null,
		ok: failed.length === 0,
	};
};
