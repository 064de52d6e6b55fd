/**
 * Development-only logging.
 *
 * Everything here is a no-op when `NODE_ENV` is `"production"`, so embedding
 * applications can ship the ledger without console noise.
 *
 * @example
 * ```ts
 * dev.warn("Backup failed, saving anyway:", error);
 * // Development: console.warn("[expense-ledger] Backup failed, saving anyway:", error)
 * ```
 */

const PREFIX = "[expense-ledger]";

/**
 * Check if running in development mode.
 */
export function isDev(): boolean {
  return process.env.NODE_ENV !== "production";
}

export namespace dev {
  /**
   * Log a warning only in development.
   */
  export function warn(message: string, ...args: unknown[]): void {
    if (isDev()) {
      console.warn(`${PREFIX} ${message}`, ...args);
    }
  }
}
