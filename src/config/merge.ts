import { BASE_COMPONENT } from "./defaults";
import type {
	ComponentEntry,
	ComponentInput,
	ComponentInputMap,
	ComponentMap,
} from "./schema";

const fillMissingFields = (
	entry: ComponentInput,
	base: ComponentEntry,
): ComponentEntry => ({ ...base, ...entry });

/**
 * Combines a loaded document with the built-in defaults. Components only in
 * the defaults are added; for components in both, only fields absent from
 * the loaded entry are taken from the default. Values the user wrote,
 * including explicit nulls, always win. Inputs are not mutated.
 */
export const mergeWithDefaults = (
	loaded: ComponentInputMap,
	defaults: ComponentMap,
): ComponentMap => {
	const merged: ComponentMap = {};
	for (const [name, entry] of Object.entries(loaded)) {
		merged[name] = fillMissingFields(entry, defaults[name] ?? BASE_COMPONENT);
	}
	for (const [name, entry] of Object.entries(defaults)) {
		if (!(name in merged)) {
			merged[name] = { ...entry };
		}
	}
	return merged;
};
