/**
 * Non-fatal conditions raised while reading or writing the ledger.
 * `listener-failed` means a change listener threw after the change was saved.
 */
export type LedgerWarning =
  | { type: "empty-store"; path: string; message: string }
  | { type: "backup-failed"; path: string; message: string; error: unknown }
  | { type: "cleanup-failed"; path: string; message: string; error: unknown }
  | { type: "listener-failed"; path: string; message: string; error: unknown };

export type WarningHandler = (warning: LedgerWarning) => void;

/**
 * Port for the ledger's backing storage (raw text).
 */
export interface LedgerStorage {
  /** Where the ledger lives, for messages. */
  readonly location: string;

  /**
   * Read the stored text.
   * Returns `undefined` when nothing has been stored yet.
   * Throws PersistError on I/O failure.
   */
  read(): string | undefined;

  /**
   * Replace the stored text, keeping the previous contents as a backup.
   * Throws PersistError on I/O failure; the previous contents stay intact.
   */
  write(contents: string): void;
}
