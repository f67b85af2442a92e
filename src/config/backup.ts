import { copyFile } from "node:fs/promises";
import path from "node:path";

import fg from "fast-glob";

import { pathExists } from "../paths";

export const BACKUP_MARKER = ".backup_";
const MAX_SAME_SECOND_BACKUPS = 999;

const pad = (value: number, length = 2) => String(value).padStart(length, "0");

/** Local time as `YYYYMMDD_HHMMSS`. */
export const formatBackupTimestamp = (date: Date) =>
	`${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
	`${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

/**
 * Next unused backup path for `configPath`. A second save within the same
 * second gets a zero-padded counter so names keep sorting in creation order.
 */
export const resolveBackupPath = async (configPath: string, now: Date) => {
	const base = `${configPath}${BACKUP_MARKER}${formatBackupTimestamp(now)}`;
	if (!(await pathExists(base))) {
		return base;
	}
	for (let counter = 1; counter <= MAX_SAME_SECOND_BACKUPS; counter += 1) {
		const candidate = `${base}_${pad(counter, 3)}`;
		if (!(await pathExists(candidate))) {
			return candidate;
		}
	}
	throw new Error(`Too many backups of ${configPath} within one second.`);
};

export const createBackup = async (configPath: string, now: Date) => {
	const backupPath = await resolveBackupPath(configPath, now);
	await copyFile(configPath, backupPath);
	return backupPath;
};

/** Existing backups of `configPath`, oldest first. */
export const listBackups = async (configPath: string) => {
	const directory = path.dirname(configPath);
	const pattern = `${fg.escapePath(path.basename(configPath))}${BACKUP_MARKER}*`;
	const matches = await fg(pattern, {
		cwd: directory,
		absolute: true,
		onlyFiles: true,
		dot: true,
	});
	return matches.map((match) => path.normalize(match)).sort();
};
