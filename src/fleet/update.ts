import type { VersionStore } from "../config/store";
import { type FleetContext, loadStore } from "../context";
import { getComponentPath } from "../paths";
import { syncComponent } from "../sync/engine";
import type { RebuildRequest, UpdateReport } from "../types/fleet";
import type { SyncOutcome, SyncTarget } from "../types/sync";
import { summarizeOutcomes } from "./summary";

export type UpdateAllOptions = {
	force?: boolean;
	/** Restrict the run to these components; all when omitted or empty. */
	only?: string[];
	onStart?: (name: string) => void;
	onOutcome?: (outcome: SyncOutcome) => void;
};

export const toSyncTargets = (
	store: VersionStore,
	only?: string[],
): SyncTarget[] => {
	const wanted = only && only.length > 0 ? new Set(only) : null;
	return store
		.getComponents()
		.filter(([name]) => !wanted || wanted.has(name))
		.map(([name, entry]) => ({ name, entry, url: store.resolveUrl(name) }));
};

/**
 * Updates every component in versions-file order, one at a time. One
 * component's failure never stops the others.
 */
export const updateAll = async (
	context: FleetContext,
	options: UpdateAllOptions = {},
): Promise<UpdateReport> => {
	const store = await loadStore(context);
	const targets = toSyncTargets(store, options.only);
	const outcomes: SyncOutcome[] = [];
	const unknown = (options.only ?? []).filter((name) => !store.has(name));
	for (const name of unknown) {
		const outcome: SyncOutcome = {
			name,
			status: "error",
			details: "Not found in the versions file",
		};
		outcomes.push(outcome);
		options.onOutcome?.(outcome);
	}

	const rebuild: RebuildRequest[] = [];
	for (const target of targets) {
		options.onStart?.(target.name);
		const outcome = await syncComponent(context, target, { force: options.force });
		outcomes.push(outcome);
		options.onOutcome?.(outcome);
		const { npm_install: npmInstall, npm_build: npmBuild } = target.entry;
		if (outcome.status === "updated" && (npmInstall || npmBuild)) {
			rebuild.push({
				name: target.name,
				path: getComponentPath(context.componentsDir, target.name),
				npmInstall,
				npmBuild,
			});
		}
	}
	return { outcomes, summary: summarizeOutcomes(outcomes), rebuild };
};
