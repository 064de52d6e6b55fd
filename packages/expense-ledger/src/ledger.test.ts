import { readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, it, expect, vi } from "vitest";
import { detectSpreadsheetWriter, openExpenseLedger } from "./ledger";
import {
  CapabilityUnavailableError,
  CorruptStoreError,
  ExportEmptyError,
  IndexOutOfRangeError,
  isLedgerError,
} from "./domain/errors";
import { InMemoryStorage } from "./infrastructure/storage";
import type { SpreadsheetWriter } from "./application/ports";
import { useTempDir } from "./test/tempDir";

describe("openExpenseLedger()", () => {
  const tempDir = useTempDir();
  const now = () => new Date(2024, 0, 20, 18, 45, 0);

  const open = (overrides: Parameters<typeof openExpenseLedger>[0] = {}) =>
    openExpenseLedger({
      dataFile: join(tempDir(), "expenses.json"),
      exportDir: tempDir(),
      spreadsheet: null,
      env: {},
      now,
      ...overrides,
    });

  it("should record, summarize and export the example ledger", async () => {
    const ledger = await open();

    ledger.add({ date: "2024-01-15", category: "Food", amount: "25.50", description: "Lunch" });
    ledger.add({ date: "2024-01-16", category: "Transport", amount: "15.00", description: "Bus fare" });

    expect(ledger.total().toFixed()).toBe("40.50");
    expect(ledger.summaryByCategory().get("Food")?.amount).toBe(25.5);
    expect(ledger.summaryByCategory().get("Transport")?.amount).toBe(15);

    const path = ledger.exportDelimited();
    expect(path).toBe(join(tempDir(), "expenses_export_20240120_184500.csv"));
    expect(readFileSync(path, "utf8").split("\r\n")).toEqual([
      "date,category,amount,description",
      "2024-01-15,Food,25.50,Lunch",
      "2024-01-16,Transport,15.00,Bus fare",
      "",
    ]);
  });

  it("should reload what was saved", async () => {
    const first = await open();
    first.add({ date: "2024-01-15", category: "Food", amount: 25.5, description: "Lunch" });
    first.add({ category: "Rent", amount: 900, description: "January" });

    const second = await open();

    expect(second.list().map((e) => e.toData())).toEqual([
      { date: "2024-01-15", category: "Food", amount: 25.5, description: "Lunch" },
      { date: "2024-01-20", category: "Rent", amount: 900, description: "January" },
    ]);
    expect(second.listWithPositions().map((p) => p.position)).toEqual([1, 2]);
  });

  it("should keep a backup of the previous file", async () => {
    const ledger = await open();
    ledger.add({ date: "2024-01-15", category: "Food", amount: 25.5, description: "Lunch" });
    ledger.delete(0);

    const backup = JSON.parse(readFileSync(ledger.config.backupFile, "utf8"));
    expect(backup).toHaveLength(1);
    expect(JSON.parse(readFileSync(ledger.config.dataFile, "utf8"))).toEqual([]);
  });

  it("should refuse to open a corrupt file", async () => {
    writeFileSync(join(tempDir(), "expenses.json"), "{ broken");

    await expect(open()).rejects.toThrow(CorruptStoreError);
  });

  it("should report out-of-range positions as ledger errors", async () => {
    const ledger = await open();
    let caught: unknown;
    try {
      ledger.delete(0);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(IndexOutOfRangeError);
    expect(isLedgerError(caught, "IndexOutOfRange")).toBe(true);
    expect(isLedgerError(caught, "ExportEmpty")).toBe(false);
  });

  it("should refuse empty exports", async () => {
    const ledger = await open();

    expect(() => ledger.exportDelimited()).toThrow(ExportEmptyError);
  });

  it("should use the given storage", async () => {
    const storage = new InMemoryStorage();
    const ledger = await open({ storage });

    ledger.add({ date: "2024-01-15", category: "Food", amount: 1, description: "Gum" });

    expect(JSON.parse(storage.read() ?? "")).toEqual([
      { date: "2024-01-15", category: "Food", amount: 1, description: "Gum" },
    ]);
  });

  it("should pass warnings to the handler", async () => {
    writeFileSync(join(tempDir(), "expenses.json"), "\n");
    const onWarning = vi.fn();

    await open({ onWarning });

    expect(onWarning).toHaveBeenCalledWith(expect.objectContaining({ type: "empty-store" }));
  });

  it("should notify change listeners", async () => {
    const ledger = await open();
    const listener = vi.fn();
    ledger.onChange(listener);

    ledger.add({ date: "2024-01-15", category: "Food", amount: 1, description: "Gum" });
    ledger.edit(0, { date: "2024-01-15", category: "Food", amount: 2, description: "Gum" });

    expect(listener.mock.calls.map(([change]) => change.type)).toEqual(["add", "edit"]);
  });

  describe("spreadsheet capability", () => {
    it("should report a missing spreadsheet writer", async () => {
      const ledger = await open();
      ledger.add({ date: "2024-01-15", category: "Food", amount: 1, description: "Gum" });

      expect(ledger.canExportSpreadsheet).toBe(false);
      await expect(ledger.exportSpreadsheet()).rejects.toThrow(CapabilityUnavailableError);
    });

    it("should export through a configured writer", async () => {
      const writer: SpreadsheetWriter = {
        name: "fake",
        write: vi.fn().mockResolvedValue(undefined),
      };
      const ledger = await open({ spreadsheet: writer });
      ledger.add({ date: "2024-01-15", category: "Food", amount: 1, description: "Gum" });

      const path = await ledger.exportSpreadsheet("report.xlsx");

      expect(ledger.canExportSpreadsheet).toBe(true);
      expect(path.endsWith("report.xlsx")).toBe(true);
      expect(writer.write).toHaveBeenCalledTimes(1);
    });

    it("should detect exceljs", async () => {
      const writer = await detectSpreadsheetWriter();
      expect(writer?.name).toBe("exceljs");
    });

    it("should detect exceljs when no writer is given", async () => {
      const ledger = await open({ spreadsheet: undefined });
      expect(ledger.canExportSpreadsheet).toBe(true);
    });
  });
});
