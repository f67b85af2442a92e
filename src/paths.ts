import { access } from "node:fs/promises";
import path from "node:path";

import { assertSafeComponentName } from "./component-name";

export const DEFAULT_CONFIG_FILENAME = "versions.json";
export const DEFAULT_COMPONENTS_DIRNAME = "external";

export const toPosixPath = (value: string) => value.replace(/\\/g, "/");

export const pathExists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

export const resolveConfigPath = (projectDir: string, configPath?: string) =>
	configPath
		? path.resolve(projectDir, configPath)
		: path.resolve(projectDir, DEFAULT_CONFIG_FILENAME);

export const resolveComponentsDir = (
	projectDir: string,
	componentsDir?: string,
) => path.resolve(projectDir, componentsDir ?? DEFAULT_COMPONENTS_DIRNAME);

/**
 * Working copy location for a component. The name is validated so a
 * configuration entry can never point the git commands outside the
 * components root.
 */
export const getComponentPath = (componentsDir: string, name: string) => {
	assertSafeComponentName(name);
	const componentPath = path.join(componentsDir, name);
	if (path.dirname(componentPath) !== path.resolve(componentsDir)) {
		throw new Error(`Invalid component path for '${name}'.`);
	}
	return componentPath;
};
