import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { describe, it, expect } from "vitest";
import {
  DelimitedTextExporter,
  encodeDelimited,
  encodeField,
} from "./DelimitedTextExporter";
import { Expense } from "@/domain/entities";
import { ExportEmptyError, PersistError } from "@/domain/errors";
import { useTempDir } from "@/test/tempDir";

const example = () => [
  Expense.create({ date: "2024-01-15", category: "Food", amount: 25.5, description: "Lunch" }),
  Expense.create({ date: "2024-01-16", category: "Transport", amount: 15, description: "Bus fare" }),
];

/** Minimal CSV reader for checking what a spreadsheet app would see. */
function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
    } else if (ch === "\r" && text[i + 1] === "\n") {
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
      i++;
    } else {
      field += ch;
    }
  }
  return rows;
}

describe("encodeField()", () => {
  it("should leave plain fields alone", () => {
    expect(encodeField("Bus fare")).toBe("Bus fare");
  });

  it("should quote fields with delimiters, quotes or line breaks", () => {
    expect(encodeField("a,b")).toBe('"a,b"');
    expect(encodeField('say "hi"')).toBe('"say ""hi"""');
    expect(encodeField("two\nlines")).toBe('"two\nlines"');
    expect(encodeField("cr\rhere")).toBe('"cr\rhere"');
  });
});

describe("encodeDelimited()", () => {
  it("should write the header and one row per expense in order", () => {
    expect(encodeDelimited(example())).toBe(
      "date,category,amount,description\r\n" +
        "2024-01-15,Food,25.50,Lunch\r\n" +
        "2024-01-16,Transport,15.00,Bus fare\r\n"
    );
  });

  it("should round-trip descriptions with commas and quotes", () => {
    const description = 'a, "b", c';
    const csv = encodeDelimited([
      Expense.create({ date: "2024-01-20", category: "Food", amount: 30, description }),
    ]);

    expect(csv.split("\r\n")[1]).toBe('2024-01-20,Food,30.00,"a, ""b"", c"');
    expect(parseCsv(csv)[1][3]).toBe(description);
  });
});

describe("DelimitedTextExporter", () => {
  const tempDir = useTempDir();
  const now = () => new Date(2024, 0, 15, 9, 30, 5);

  it("should write to the given destination", () => {
    const exporter = new DelimitedTextExporter({ exportDir: tempDir(), now });
    const destination = join(tempDir(), "out.csv");

    const path = exporter.export(example(), destination);

    expect(path).toBe(destination);
    expect(readFileSync(path, "utf8")).toBe(encodeDelimited(example()));
  });

  it("should generate unique timestamped names", () => {
    const exporter = new DelimitedTextExporter({ exportDir: tempDir(), now });

    const first = exporter.export(example());
    const second = exporter.export(example());

    expect(first).toBe(join(tempDir(), "expenses_export_20240115_093005.csv"));
    expect(second).toBe(join(tempDir(), "expenses_export_20240115_093005_1.csv"));
  });

  it("should refuse to export nothing and create no file", () => {
    const exporter = new DelimitedTextExporter({ exportDir: tempDir(), now });
    const destination = join(tempDir(), "empty.csv");

    expect(() => exporter.export([], destination)).toThrow(ExportEmptyError);
    expect(existsSync(destination)).toBe(false);
  });

  it("should throw PersistError when the file can't be written", () => {
    const exporter = new DelimitedTextExporter({ exportDir: tempDir(), now });

    expect(() =>
      exporter.export(example(), join(tempDir(), "missing", "out.csv"))
    ).toThrow(PersistError);
  });
});
