import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "./domain/errors";

export const DEFAULT_DATA_FILE = "expenses.json";
export const BACKUP_SUFFIX = ".backup";

/**
 * Options accepted by `resolveLedgerConfig()`.
 * Anything left out falls back to the environment, then to defaults.
 */
export interface LedgerConfigOptions {
  /**
   * Path of the JSON file holding the ledger.
   * Env: `EXPENSE_LEDGER_FILE`.
   * @default "expenses.json"
   */
  dataFile?: string;

  /**
   * Directory where exports without an explicit path are written.
   * Env: `EXPENSE_LEDGER_EXPORT_DIR`.
   * @default process.cwd()
   */
  exportDir?: string;

  /**
   * Indentation of the JSON file.
   * @default 2
   */
  indent?: number;

  /**
   * Reject records with an empty description.
   * Env: `EXPENSE_LEDGER_REQUIRE_DESCRIPTION` (`true`/`false`/`1`/`0`).
   * @default true
   */
  requireDescription?: boolean;
}

export interface LedgerConfig {
  dataFile: string;
  backupFile: string;
  exportDir: string;
  indent: number;
  requireDescription: boolean;
}

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  EXPENSE_LEDGER_FILE: z.string().min(1).optional(),
  EXPENSE_LEDGER_EXPORT_DIR: z.string().min(1).optional(),
  EXPENSE_LEDGER_REQUIRE_DESCRIPTION: flag.optional(),
});

const configSchema = z.object({
  dataFile: z.string().min(1, "dataFile must not be empty"),
  exportDir: z.string().min(1, "exportDir must not be empty"),
  indent: z.number().int().min(0).max(10),
  requireDescription: z.boolean(),
});

type Env = Record<string, string | undefined>;

/**
 * Merge explicit options, environment variables and defaults.
 * Paths are resolved against the current working directory.
 */
export function resolveLedgerConfig(
  options: LedgerConfigOptions = {},
  env: Env = process.env
): LedgerConfig {
  const fromEnv = envSchema.safeParse(env);
  if (!fromEnv.success) {
    throw new ConfigError(formatIssues(fromEnv.error));
  }

  const merged = configSchema.safeParse({
    dataFile: options.dataFile ?? fromEnv.data.EXPENSE_LEDGER_FILE ?? DEFAULT_DATA_FILE,
    exportDir:
      options.exportDir ?? fromEnv.data.EXPENSE_LEDGER_EXPORT_DIR ?? process.cwd(),
    indent: options.indent ?? 2,
    requireDescription:
      options.requireDescription ??
      fromEnv.data.EXPENSE_LEDGER_REQUIRE_DESCRIPTION ??
      true,
  });
  if (!merged.success) {
    throw new ConfigError(formatIssues(merged.error));
  }

  const dataFile = resolve(merged.data.dataFile);
  return {
    ...merged.data,
    dataFile,
    backupFile: dataFile + BACKUP_SUFFIX,
    exportDir: resolve(merged.data.exportDir),
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
