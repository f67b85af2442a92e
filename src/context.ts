import path from "node:path";

import {
	type ComponentMap,
	DEFAULT_COMPONENTS,
	DEFAULT_REPO_BASE_URL,
	VersionStore,
} from "./config";
import { GitRepository } from "./git/repository";
import { getComponentPath, resolveComponentsDir, resolveConfigPath } from "./paths";

export type FleetLogger = (message: string) => void;

/**
 * Everything a fleet operation needs, passed explicitly so nothing depends
 * on process-wide state.
 */
export type FleetContext = {
	projectDir: string;
	configPath: string;
	componentsDir: string;
	defaults: ComponentMap;
	/** Base for convention URLs (`<base>/<name>.git`); null disables them. */
	repoBaseUrl: string | null;
	timeoutMs?: number;
	allowFileProtocol?: boolean;
	logger?: FleetLogger;
	progressLogger?: FleetLogger;
	warn?: FleetLogger;
	now: () => Date;
};

export type FleetContextInput = Partial<Omit<FleetContext, "projectDir">> & {
	projectDir?: string;
};

export const createFleetContext = (
	input: FleetContextInput = {},
): FleetContext => {
	const projectDir = path.resolve(input.projectDir ?? process.cwd());
	return {
		...input,
		projectDir,
		configPath: resolveConfigPath(projectDir, input.configPath),
		componentsDir: resolveComponentsDir(projectDir, input.componentsDir),
		defaults: input.defaults ?? DEFAULT_COMPONENTS,
		repoBaseUrl:
			input.repoBaseUrl === undefined ? DEFAULT_REPO_BASE_URL : input.repoBaseUrl,
		now: input.now ?? (() => new Date()),
	};
};

export const loadStore = (context: FleetContext) =>
	VersionStore.load(context.configPath, {
		defaults: context.defaults,
		repoBaseUrl: context.repoBaseUrl,
		warn: context.warn,
		now: context.now,
	});

export const openRepository = (
	context: FleetContext,
	repoPath: string,
	url: string | null = null,
) =>
	new GitRepository(repoPath, {
		url,
		logger: context.logger,
		progressLogger: context.progressLogger,
		timeoutMs: context.timeoutMs,
		allowFileProtocol: context.allowFileProtocol,
	});

export const openComponentRepository = (
	context: FleetContext,
	name: string,
	url: string | null = null,
) => openRepository(context, getComponentPath(context.componentsDir, name), url);
