import { copyFileSync, existsSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { PersistError } from "@/domain/errors";
import type { LedgerStorage, WarningHandler } from "@/application/ports";
import { dev } from "@/dev";
import { hasErrorCode } from "../fsErrors";

export interface FileStorageOptions {
  /**
   * Where the previous contents are copied before each write.
   * @default `${path}.backup`
   */
  backupPath?: string;

  /**
   * Called for failed backups and leftover temporary files.
   * @default logs with dev.warn
   */
  onWarning?: WarningHandler;
}

/**
 * File-backed storage.
 *
 * Writes go to a temporary sibling first and are renamed over the target,
 * so a crash mid-write leaves either the old or the new file. Before each
 * write the current file is copied to the backup path (best-effort).
 */
export class FileStorage implements LedgerStorage {
  readonly backupPath: string;
  readonly tempPath: string;
  private readonly onWarning: WarningHandler;

  constructor(
    readonly path: string,
    options: FileStorageOptions = {}
  ) {
    this.backupPath = options.backupPath ?? `${path}.backup`;
    this.tempPath = `${path}.tmp`;
    this.onWarning =
      options.onWarning ?? ((warning) => dev.warn(warning.message));
  }

  get location(): string {
    return this.path;
  }

  read(): string | undefined {
    try {
      return readFileSync(this.path, "utf8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return undefined;
      throw new PersistError(this.path, "read", error);
    }
  }

  write(contents: string): void {
    this.backup();

    try {
      writeFileSync(this.tempPath, contents, "utf8");
      renameSync(this.tempPath, this.path);
    } catch (error) {
      this.removeTemp();
      throw new PersistError(this.path, "write", error);
    }
  }

  private backup(): void {
    if (!existsSync(this.path)) return;

    try {
      copyFileSync(this.path, this.backupPath);
    } catch (error) {
      this.onWarning({
        type: "backup-failed",
        path: this.backupPath,
        message: `Could not back up ${this.path} to ${this.backupPath}, saving anyway`,
        error,
      });
    }
  }

  private removeTemp(): void {
    if (!existsSync(this.tempPath)) return;

    try {
      rmSync(this.tempPath);
    } catch (error) {
      this.onWarning({
        type: "cleanup-failed",
        path: this.tempPath,
        message: `Could not remove temporary file ${this.tempPath}`,
        error,
      });
    }
  }
}
