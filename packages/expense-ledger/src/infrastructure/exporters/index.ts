export {
  DelimitedTextExporter,
  CSV_COLUMNS,
  encodeDelimited,
  encodeField,
  encodeRow,
} from "./DelimitedTextExporter";
export {
  SpreadsheetExporter,
  buildSheetLayout,
  SHEET_TITLE,
  SHEET_HEADER,
  MAX_COLUMN_WIDTH,
} from "./SpreadsheetExporter";
export {
  defaultExportPath,
  exportTimestamp,
  resolveExportPath,
  type ExportTarget,
} from "./exportFileName";
