import {
	type ComponentEntry,
	type ComponentMap,
	LATEST_VERSION,
} from "./schema";

export const DEFAULT_REPO_BASE_URL = "https://github.com/humlab-speech";

export const VERSIONS_COMMENT =
	"Version can be: 'latest' (tracks main/master), a git commit SHA, or a git tag. " +
	"Use 'locked_version' to record current stable version for rollback.";

/** Field values for a component that only the user's file knows about. */
export const BASE_COMPONENT: ComponentEntry = {
	version: LATEST_VERSION,
	locked_version: null,
	url: null,
	npm_install: false,
	npm_build: false,
};

const component = (
	overrides: Partial<ComponentEntry> = {},
): ComponentEntry => ({ ...BASE_COMPONENT, ...overrides });

export const DEFAULT_COMPONENTS: ComponentMap = {
	webclient: component({ npm_install: true, npm_build: true }),
	"container-agent": component({ npm_install: true }),
	webapi: component(),
	"wsrng-server": component({ npm_install: true }),
	"session-manager": component({ npm_install: true }),
	"emu-webapp-server": component({ npm_install: true }),
	"EMU-webApp": component({
		url: "https://github.com/humlab-speech/EMU-webApp.git",
		npm_install: true,
		npm_build: true,
	}),
};

export const isLockedVersion = (version: string) => version !== LATEST_VERSION;

/** `N/A` is what older files wrote for "never locked". */
export const hasLockedVersion = (
	lockedVersion: string | null | undefined,
): lockedVersion is string =>
	typeof lockedVersion === "string" &&
	lockedVersion.length > 0 &&
	lockedVersion !== "N/A";

/** Configured URL, or `<baseUrl>/<name>.git` by convention. */
export const resolveComponentUrl = (
	name: string,
	entry: Pick<ComponentEntry, "url">,
	baseUrl: string | null = DEFAULT_REPO_BASE_URL,
): string | null => {
	if (entry.url) {
		return entry.url;
	}
	if (!baseUrl) {
		return null;
	}
	return `${baseUrl.replace(/\/+$/, "")}/${name}.git`;
};

export const shortSha = (value: string | null | undefined) =>
	value ? value.slice(0, 8) : "-";
