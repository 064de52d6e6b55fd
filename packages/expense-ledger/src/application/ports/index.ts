export type {
  LedgerStorage,
  LedgerWarning,
  WarningHandler,
} from "./LedgerStorage";
export type {
  SheetLayout,
  SheetCell,
  SheetTotalRow,
  SpreadsheetWriter,
} from "./SpreadsheetWriter";
