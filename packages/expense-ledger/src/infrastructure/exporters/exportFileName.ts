import { existsSync } from "node:fs";
import { join, resolve } from "node:path";

const pad = (value: number) => value.toString().padStart(2, "0");

/**
 * Local timestamp like `20240115_093005`.
 */
export function exportTimestamp(now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${date}_${time}`;
}

/**
 * Build a default export path, e.g. `expenses_export_20240115_093005.csv`.
 * Appends `_1`, `_2`, ... while the name is taken, so repeated exports
 * within the same second don't overwrite each other.
 */
export function defaultExportPath(
  directory: string,
  extension: string,
  now: Date,
  exists: (path: string) => boolean = existsSync
): string {
  const base = `expenses_export_${exportTimestamp(now)}`;
  let candidate = join(directory, `${base}.${extension}`);
  for (let attempt = 1; exists(candidate); attempt++) {
    candidate = join(directory, `${base}_${attempt}.${extension}`);
  }
  return resolve(candidate);
}

export interface ExportTarget {
  /** Directory for generated names. */
  exportDir: string;
  /** Clock for generated names. */
  now?: () => Date;
}

/**
 * The explicit destination if given (relative to the working directory),
 * otherwise a generated name in the export directory.
 */
export function resolveExportPath(
  destination: string | undefined,
  extension: string,
  target: ExportTarget
): string {
  if (destination !== undefined && destination.trim()) {
    return resolve(destination);
  }
  const now = target.now?.() ?? new Date();
  return defaultExportPath(target.exportDir, extension, now);
}
