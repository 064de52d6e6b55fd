export { openExpenseLedger, detectSpreadsheetWriter, ExpenseLedger } from "./ledger";
export type { ExpenseLedgerOptions } from "./ledger";
export {
  resolveLedgerConfig,
  DEFAULT_DATA_FILE,
  BACKUP_SUFFIX,
  type LedgerConfig,
  type LedgerConfigOptions,
} from "./config";
export {
  ExpenseStore,
  type ExpenseInput,
  type ExpenseChange,
  type ExpenseChangeType,
  type ExpenseStoreOptions,
} from "./application/ExpenseStore";
export * from "./application/ports";
export * from "./domain/errors";
export * from "./domain/entities";
export * from "./domain/validation";
export * from "./domain/services";
export * from "./domain/value-objects";
export * from "./infrastructure/exporters";
export * from "./infrastructure/storage";
export { dev, isDev } from "./dev";
export type { Listener, Unsubscribe } from "./emitter";
