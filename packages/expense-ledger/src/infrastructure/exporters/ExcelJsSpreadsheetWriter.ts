import ExcelJS from "exceljs";
import type { SheetLayout, SpreadsheetWriter } from "@/application/ports";

export const HEADER_FILL = "FFD9E1F2";

/**
 * SpreadsheetWriter backed by exceljs.
 * Header cells are bold, filled and centered; the grand total is bold.
 */
export class ExcelJsSpreadsheetWriter implements SpreadsheetWriter {
  readonly name = "exceljs";

  async write(layout: SheetLayout, destination: string): Promise<void> {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet(layout.title);

    const header = sheet.addRow(layout.header);
    header.eachCell((cell) => {
      cell.font = { bold: true };
      cell.fill = {
        type: "pattern",
        pattern: "solid",
        fgColor: { argb: HEADER_FILL },
      };
      cell.alignment = { horizontal: "center" };
    });

    for (const values of layout.rows) {
      const row = sheet.addRow(values);
      layout.columnFormats.forEach((format, index) => {
        if (format) row.getCell(index + 1).numFmt = format;
      });
    }

    layout.columnWidths.forEach((width, index) => {
      sheet.getColumn(index + 1).width = width;
    });

    const { total } = layout;
    sheet.getCell(total.row, total.labelColumn).value = total.label;
    const value = sheet.getCell(total.row, total.valueColumn);
    value.value = total.value;
    value.font = { bold: true };
    const format = layout.columnFormats[total.valueColumn - 1];
    if (format) value.numFmt = format;

    await workbook.xlsx.writeFile(destination);
  }
}
