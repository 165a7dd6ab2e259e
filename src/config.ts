import { config as loadDotenv } from "dotenv";
import { z } from "zod";

/**
 * Module: Runtime Configuration
 * Purpose: Load `.env` once and validate the settings the ingestion core reads.
 */
export interface IngestConfig {
  databasePath: string;
  maxHeaderScanRows: number;
  partTimeoutMs: number;
  sourcesPath?: string;
  logLevel: string;
}

const EnvSchema = z.object({
  DATABASE_PATH: z.string().trim().min(1).default("refdata.sqlite"),
  MAX_HEADER_SCAN_ROWS: z.coerce.number().int().min(1).max(200).default(15),
  PART_TIMEOUT_MINUTES: z.coerce.number().positive().default(24 * 60),
  SOURCES_PATH: z.string().trim().min(1).optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

let envInitialized = false;

/**
 * Load `.env` (or `envFile`) into `process.env`. Existing variables win.
 */
export function initEnv(envFile?: string): void {
  if (envInitialized) return;
  loadDotenv(envFile ? { path: envFile } : undefined);
  envInitialized = true;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): IngestConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }
  const e = parsed.data;
  return {
    databasePath: e.DATABASE_PATH,
    maxHeaderScanRows: e.MAX_HEADER_SCAN_ROWS,
    partTimeoutMs: Math.round(e.PART_TIMEOUT_MINUTES * 60_000),
    sourcesPath: e.SOURCES_PATH,
    logLevel: e.LOG_LEVEL,
  };
}
