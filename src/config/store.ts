import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import {
	BackupFailedError,
	ConfigCorruptError,
	ConfigSaveError,
	getErrnoCode,
	toErrorMessage,
} from "../errors";
import { pathExists } from "../paths";
import { createBackup } from "./backup";
import {
	DEFAULT_COMPONENTS,
	hasLockedVersion,
	isLockedVersion,
	resolveComponentUrl,
	VERSIONS_COMMENT,
} from "./defaults";
import { mergeWithDefaults } from "./merge";
import {
	type ComponentEntry,
	type ComponentInputMap,
	type ComponentMap,
	LATEST_VERSION,
	parseVersionsDocument,
	type VersionsDocument,
} from "./schema";

export type VersionStoreOptions = {
	defaults?: ComponentMap;
	repoBaseUrl?: string | null;
	warn?: (message: string) => void;
	now?: () => Date;
};

export type SaveResult = {
	path: string;
	backupPath: string | null;
	backupError: BackupFailedError | null;
};

const cloneComponents = (components: ComponentMap): ComponentMap =>
	structuredClone(components);

const readVersionsFile = async (
	configPath: string,
): Promise<ComponentInputMap | null> => {
	let raw: string;
	try {
		raw = await readFile(configPath, "utf8");
	} catch (error) {
		if (getErrnoCode(error) === "ENOENT") {
			return null;
		}
		throw new ConfigCorruptError(
			`Failed to read ${configPath}: ${toErrorMessage(error)}`,
			{ cause: error },
		);
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		throw new ConfigCorruptError(
			`Invalid JSON in ${configPath}: ${toErrorMessage(error)}`,
			{ cause: error },
		);
	}
	try {
		return parseVersionsDocument(parsed);
	} catch (error) {
		throw new ConfigCorruptError(`${configPath}: ${toErrorMessage(error)}`, {
			cause: error,
		});
	}
};

/**
 * The fleet's desired state: component name to version intent. Mutations
 * only touch memory; nothing reaches disk until `save()`.
 */
export class VersionStore {
	readonly path: string;
	private readonly components: ComponentMap;
	private readonly options: VersionStoreOptions;

	constructor(
		configPath: string,
		components: ComponentMap,
		options: VersionStoreOptions = {},
	) {
		this.path = path.resolve(configPath);
		this.components = cloneComponents(components);
		this.options = options;
	}

	/**
	 * Missing file: defaults. Unreadable or invalid file: a warning and the
	 * defaults. Otherwise the file merged with the defaults.
	 */
	static async load(configPath: string, options: VersionStoreOptions = {}) {
		const defaults = options.defaults ?? DEFAULT_COMPONENTS;
		let loaded: ComponentInputMap | null = null;
		try {
			loaded = await readVersionsFile(configPath);
		} catch (error) {
			if (!(error instanceof ConfigCorruptError)) {
				throw error;
			}
			options.warn?.(`${error.message}; using default configuration`);
		}
		const components = loaded
			? mergeWithDefaults(loaded, defaults)
			: cloneComponents(defaults);
		return new VersionStore(configPath, components, options);
	}

	/**
	 * Backs up the current file (best-effort), then atomically replaces it.
	 * Only a failure to write the new document is thrown.
	 */
	async save(): Promise<SaveResult> {
		let backupPath: string | null = null;
		let backupError: BackupFailedError | null = null;
		if (await pathExists(this.path)) {
			try {
				backupPath = await createBackup(this.path, this.now());
			} catch (error) {
				backupError = new BackupFailedError(
					`Backup of ${this.path} failed: ${toErrorMessage(error)}`,
					{ cause: error },
				);
				this.options.warn?.(`${backupError.message}; saving anyway`);
			}
		}
		const tempPath = `${this.path}.${process.pid}.tmp`;
		try {
			await mkdir(path.dirname(this.path), { recursive: true });
			await writeFile(tempPath, serializeDocument(this.toDocument()), "utf8");
			await rename(tempPath, this.path);
		} catch (error) {
			await rm(tempPath, { force: true });
			throw new ConfigSaveError(
				`Failed to write ${this.path}: ${toErrorMessage(error)}`,
				{ cause: error },
			);
		}
		return { path: this.path, backupPath, backupError };
	}

	toDocument(): VersionsDocument {
		return {
			_comment: VERSIONS_COMMENT,
			components: cloneComponents(this.components),
		};
	}

	has(name: string) {
		return Object.hasOwn(this.components, name);
	}

	names() {
		return Object.keys(this.components);
	}

	getComponents(): Array<[string, ComponentEntry]> {
		return Object.entries(this.components).map(([name, entry]) => [
			name,
			{ ...entry },
		]);
	}

	getComponent(name: string): ComponentEntry | undefined {
		const entry = this.entry(name);
		return entry ? { ...entry } : undefined;
	}

	getVersion(name: string) {
		return this.entry(name)?.version ?? LATEST_VERSION;
	}

	getLockedVersion(name: string) {
		const locked = this.entry(name)?.locked_version;
		return hasLockedVersion(locked) ? locked : null;
	}

	isLocked(name: string) {
		return isLockedVersion(this.getVersion(name));
	}

	resolveUrl(name: string) {
		const entry = this.entry(name);
		if (!entry) {
			return null;
		}
		return resolveComponentUrl(name, entry, this.options.repoBaseUrl);
	}

	/** Pins `version` and records the same SHA as the rollback target. */
	lock(name: string, sha: string) {
		const entry = this.entry(name);
		if (!entry) return false;
		entry.version = sha;
		entry.locked_version = sha;
		return true;
	}

	/** Back to tracking latest; `locked_version` is kept for rollback. */
	unlock(name: string) {
		const entry = this.entry(name);
		if (!entry) return false;
		entry.version = LATEST_VERSION;
		return true;
	}

	rollback(name: string) {
		const entry = this.entry(name);
		if (!entry || !hasLockedVersion(entry.locked_version)) return false;
		entry.version = entry.locked_version;
		return true;
	}

	setVersion(name: string, version: string) {
		const entry = this.entry(name);
		if (!entry) return false;
		entry.version = version;
		return true;
	}

	private entry(name: string): ComponentEntry | undefined {
		return this.has(name) ? this.components[name] : undefined;
	}

	private now() {
		return this.options.now?.() ?? new Date();
	}
}

export const serializeDocument = (document: VersionsDocument) =>
	`${JSON.stringify(document, null, 2)}\n`;
