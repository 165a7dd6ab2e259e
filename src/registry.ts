import { readFileSync } from "node:fs";
import { z } from "zod";
import type { DataSourceConfig } from "./types.js";
import { InvalidSourceConfigError, SourceInUseError, UnknownSourceError } from "./errors.js";
import { ownValue } from "./sanitize.js";
import { childLogger, type Logger } from "./logger.js";

/**
 * Module: Source Registry
 * Purpose: Hold the declarative configuration of every data source (canonical columns,
 * header aliases, unique key, special-value rules, derived columns, multi-part and
 * variant policy) and resolve it by source code. Adding a source is data, not code.
 */
const IDENT_RE = /^[a-z][a-z0-9_]*$/;
const SOURCE_CODE_RE = /^[A-Z][A-Z0-9_]*$/;
// Added by the store to every data table and current view
const RESERVED_COLUMNS = new Set(["data_version_id", "part_index", "row_seq", "version_variant", "version_label"]);

const ColumnSchema = z.object({
  name: z.string().regex(IDENT_RE, "column names must be lower_snake_case"),
  type: z.enum(["text", "integer", "numeric", "date", "boolean"]),
  required: z.boolean().default(false),
  nullable: z.boolean().optional(),
  description: z.string().optional(),
});

const SpecialValueSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("null_token"), token: z.string().min(1) }),
  z.object({ kind: z.literal("flag_token"), token: z.string().min(1) }),
  z.object({ kind: z.literal("pattern"), pattern: z.string().min(1), group: z.number().int().min(0).optional() }),
  z.object({ kind: z.literal("uppercase") }),
]);

const DerivedSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("concat"),
    column: z.string(),
    from: z.array(z.string()).min(1),
    separator: z.string().optional(),
    onlyIfNull: z.boolean().optional(),
  }),
  z.object({
    kind: z.literal("extract"),
    column: z.string(),
    from: z.string(),
    pattern: z.string().min(1),
    group: z.number().int().min(0).optional(),
    allowed: z.array(z.union([z.string(), z.number()])).optional(),
  }),
]);

export const DataSourceConfigSchema = z
  .object({
    sourceCode: z.string().trim().toUpperCase().pipe(z.string().regex(SOURCE_CODE_RE)),
    name: z.string().min(1),
    category: z.string().optional(),
    description: z.string().optional(),
    targetTable: z.string().regex(IDENT_RE, "target tables must be lower_snake_case"),
    columns: z.array(ColumnSchema).min(1),
    aliases: z.record(z.array(z.string().min(1))).default({}),
    uniqueKey: z.array(z.string()).min(1),
    specialValues: z.record(z.array(SpecialValueSchema)).default({}),
    derived: z.array(DerivedSchema).default([]),
    multiPart: z
      .object({ enabled: z.boolean(), defaultPartCount: z.number().int().min(1).optional() })
      .default({ enabled: false }),
    variants: z.array(z.string().trim().toUpperCase().pipe(z.string().regex(SOURCE_CODE_RE))).default([]),
    nullTokens: z.array(z.string()).default(["NULL", "N/A", "NAN"]),
  })
  .superRefine((cfg, ctx) => {
    const names = new Set(cfg.columns.map((c) => c.name));
    const check = (col: string, path: Array<string | number>) => {
      if (!names.has(col)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path, message: `unknown column "${col}"` });
      }
    };
    if (names.size !== cfg.columns.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["columns"], message: "duplicate column names" });
    }
    cfg.columns.forEach((col, i) => {
      if (RESERVED_COLUMNS.has(col.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["columns", i, "name"], message: `"${col.name}" is reserved` });
      }
    });
    for (const col of Object.keys(cfg.aliases)) check(col, ["aliases", col]);
    cfg.uniqueKey.forEach((col, i) => check(col, ["uniqueKey", i]));
    for (const col of Object.keys(cfg.specialValues)) check(col, ["specialValues", col]);
    cfg.derived.forEach((rule, i) => {
      check(rule.column, ["derived", i, "column"]);
      const from = rule.kind === "concat" ? rule.from : [rule.from];
      from.forEach((col) => check(col, ["derived", i, "from"]));
    });
    for (const col of cfg.columns) {
      const derivedTarget = cfg.derived.some((d) => d.column === col.name);
      if (col.required && !derivedTarget && !ownValue(cfg.aliases, col.name)?.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["aliases", col.name],
          message: `required column "${col.name}" has no header aliases`,
        });
      }
    }
    if (!cfg.multiPart.enabled && cfg.multiPart.defaultPartCount !== undefined && cfg.multiPart.defaultPartCount !== 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["multiPart"], message: "single-part sources cannot default to several parts" });
    }
  });

export type DataSourceConfigInput = z.input<typeof DataSourceConfigSchema>;

export function parseSourceConfig(input: unknown): DataSourceConfig {
  const parsed = DataSourceConfigSchema.safeParse(input);
  if (!parsed.success) {
    const label =
      typeof input === "object" && input !== null && "sourceCode" in input ? String(input.sourceCode) : "source";
    throw new InvalidSourceConfigError(
      `Invalid configuration for ${label}`,
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    );
  }
  return parsed.data;
}

export function parseSourceConfigs(json: unknown): DataSourceConfig[] {
  const list = z.object({ sources: z.array(z.unknown()) }).safeParse(json);
  if (!list.success) throw new InvalidSourceConfigError("Source file must contain a `sources` array");
  return list.data.sources.map(parseSourceConfig);
}

export const DEFAULT_SOURCES_URL = new URL("../data/sources.json", import.meta.url);

export function loadSourceConfigsFromFile(path: string | URL = DEFAULT_SOURCES_URL): DataSourceConfig[] {
  const text = readFileSync(path, "utf8");
  return parseSourceConfigs(JSON.parse(text));
}

const normalizeAlias = (s: string) => s.trim().replace(/\s+/g, " ").toUpperCase();

/**
 * True when `next` differs from `prev` only by added header aliases.
 */
export function isAdditiveAliasChange(prev: DataSourceConfig, next: DataSourceConfig): boolean {
  const strip = (c: DataSourceConfig) => JSON.stringify({ ...c, aliases: {} });
  if (strip(prev) !== strip(next)) return false;
  return Object.entries(prev.aliases).every(([col, list]) => {
    const after = new Set((ownValue(next.aliases, col) ?? []).map(normalizeAlias));
    return list.every((a) => after.has(normalizeAlias(a)));
  });
}

export interface SourceRegistryOptions {
  // Reports whether versions already reference a source code
  isReferenced?: (sourceCode: string) => boolean;
  logger?: Logger;
}

export class SourceRegistry {
  private readonly sources = new Map<string, DataSourceConfig>();
  private readonly isReferenced: (sourceCode: string) => boolean;
  private readonly log: Logger;

  constructor(configs: DataSourceConfig[] = [], options: SourceRegistryOptions = {}) {
    this.isReferenced = options.isReferenced ?? (() => false);
    this.log = childLogger(options.logger, "registry");
    for (const cfg of configs) this.register(cfg);
  }

  static withDefaults(options: SourceRegistryOptions = {}): SourceRegistry {
    return new SourceRegistry(loadSourceConfigsFromFile(), options);
  }

  resolve(sourceCode: string): DataSourceConfig {
    const cfg = this.sources.get(sourceCode.trim().toUpperCase());
    if (!cfg) throw new UnknownSourceError(sourceCode);
    return cfg;
  }

  has(sourceCode: string): boolean {
    return this.sources.has(sourceCode.trim().toUpperCase());
  }

  list(): DataSourceConfig[] {
    return [...this.sources.values()];
  }

  register(input: DataSourceConfig | DataSourceConfigInput): DataSourceConfig {
    const cfg = parseSourceConfig(input);
    const prev = this.sources.get(cfg.sourceCode);
    if (prev && this.isReferenced(cfg.sourceCode) && !isAdditiveAliasChange(prev, cfg)) {
      throw new SourceInUseError(cfg.sourceCode);
    }
    for (const other of this.sources.values()) {
      if (other.sourceCode !== cfg.sourceCode && other.targetTable === cfg.targetTable && !sameColumns(other, cfg)) {
        throw new InvalidSourceConfigError(
          `${cfg.sourceCode} shares table ${cfg.targetTable} with ${other.sourceCode} but declares different columns`
        );
      }
    }
    this.sources.set(cfg.sourceCode, cfg);
    this.log.debug({ event: "registry.source.registered", sourceCode: cfg.sourceCode, replaced: Boolean(prev) }, "Source registered");
    return cfg;
  }

  /**
   * Additive alias update; always allowed, even for referenced sources.
   */
  addAliases(sourceCode: string, column: string, aliases: string[]): DataSourceConfig {
    const cfg = this.resolve(sourceCode);
    if (!cfg.columns.some((c) => c.name === column)) {
      throw new InvalidSourceConfigError(`${cfg.sourceCode} has no column "${column}"`);
    }
    const existing = ownValue(cfg.aliases, column) ?? [];
    const seen = new Set(existing.map(normalizeAlias));
    const added = aliases.filter((a) => a.trim() !== "" && !seen.has(normalizeAlias(a)));
    const next: DataSourceConfig = { ...cfg, aliases: { ...cfg.aliases, [column]: [...existing, ...added] } };
    this.sources.set(cfg.sourceCode, next);
    this.log.info({ event: "registry.aliases.added", sourceCode: cfg.sourceCode, column, added }, "Header aliases added");
    return next;
  }
}

function sameColumns(a: DataSourceConfig, b: DataSourceConfig): boolean {
  const shape = (c: DataSourceConfig) =>
    c.columns
      .map((col) => `${col.name}:${col.type}`)
      .sort()
      .join(",");
  return shape(a) === shape(b);
}
