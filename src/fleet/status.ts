import { type FleetContext, loadStore } from "../context";
import { inspectComponent, inspectProject } from "../sync/inspect";
import type { StatusReport } from "../types/fleet";
import type { ComponentStatus } from "../types/sync";
import { summarizeStatus } from "./summary";
import { toSyncTargets } from "./update";

export type StatusAllOptions = {
	/** Refresh remote refs first; defaults to true. */
	fetch?: boolean;
	includeProject?: boolean;
	onStatus?: (status: ComponentStatus) => void;
};

/** Read-only report over the project checkout and every component. */
export const statusAll = async (
	context: FleetContext,
	options: StatusAllOptions = {},
): Promise<StatusReport> => {
	const fetch = options.fetch ?? true;
	const store = await loadStore(context);
	const project =
		options.includeProject === false ? null : await inspectProject(context, { fetch });
	const components: ComponentStatus[] = [];
	for (const target of toSyncTargets(store)) {
		const status = await inspectComponent(context, target, { fetch });
		components.push(status);
		options.onStatus?.(status);
	}
	return { project, components, summary: summarizeStatus(components) };
};
