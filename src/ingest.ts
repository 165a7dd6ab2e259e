import { createHash } from "node:crypto";
import Database from "better-sqlite3";
import type {
  DataSourceConfig,
  DataVersion,
  IngestFileRequest,
  IngestResult,
  Row,
  TabularData,
  ValidationIssue,
  VersionKey,
  VersionReport,
} from "./types.js";
import { initEnv, loadConfig, type IngestConfig } from "./config.js";
import { SourceRegistry, loadSourceConfigsFromFile, parseSourceConfig, type DataSourceConfigInput } from "./registry.js";
import { SqliteVersionStore } from "./store.js";
import { PartAssembler } from "./assembler.js";
import { VersionManager } from "./versions.js";
import { readTabular } from "./tabular.js";
import { detectHeaderRow, type HeaderRowDetection } from "./headers.js";
import { transformRecords } from "./transform.js";
import { buildReport, columnStats, summarizeReport } from "./report.js";
import { StructuralError, UnknownVariantError, describeKey } from "./errors.js";
import { childLogger, createLogger, type Logger } from "./logger.js";

/**
 * Module: Ingestion Core
 * Purpose: Entry point tying the pipeline together.
 *   file -> tabular matrix -> header row -> typed rows -> staged part -> completed version -> current
 * Row-level problems come back as issues; unknown sources or variants, structural problems
 * and state conflicts are thrown.
 */
export interface IngestionCoreOptions {
  config?: Partial<IngestConfig>;
  // Open database handle; `config.databasePath` is opened otherwise
  database?: Database.Database;
  // Source configurations; defaults to `config.sourcesPath` or the bundled data/sources.json
  sources?: Array<DataSourceConfig | DataSourceConfigInput>;
  // Used as given; otherwise a logger at `config.logLevel` is created
  logger?: Logger;
  now?: () => Date;
}

export function createIngestionCore(options: IngestionCoreOptions = {}): IngestionCore {
  initEnv();
  const config: IngestConfig = { ...loadConfig(), ...options.config };
  return new IngestionCore(config, options);
}

const sha256 = (content: string | Uint8Array): string => createHash("sha256").update(content).digest("hex");

export class IngestionCore {
  readonly registry: SourceRegistry;
  readonly store: SqliteVersionStore;
  readonly logger: Logger;
  private readonly versions: VersionManager;
  private readonly assembler: PartAssembler;
  private readonly log: Logger;

  constructor(readonly config: IngestConfig, options: Omit<IngestionCoreOptions, "config"> = {}) {
    const base = options.logger ?? createLogger(config.logLevel);
    this.logger = base;
    this.log = childLogger(base, "ingest");
    this.store = new SqliteVersionStore(options.database ?? config.databasePath, { logger: base });
    this.registry = new SourceRegistry([], {
      isReferenced: (code) => this.store.hasVersions(code),
      logger: base,
    });
    this.versions = new VersionManager({
      store: this.store,
      partTimeoutMs: config.partTimeoutMs,
      logger: base,
      now: options.now,
    });
    this.assembler = new PartAssembler(this.store, base);

    const initial = options.sources ?? loadSourceConfigsFromFile(config.sourcesPath);
    for (const cfg of this.mergePersisted(initial)) this.registerSource(cfg);
  }

  // Configurations changed at runtime (persisted in the store) take precedence
  private mergePersisted(initial: Array<DataSourceConfig | DataSourceConfigInput>): Array<DataSourceConfig | DataSourceConfigInput> {
    const byCode = new Map<string, DataSourceConfig | DataSourceConfigInput>();
    for (const cfg of initial) byCode.set(cfg.sourceCode.trim().toUpperCase(), cfg);
    for (const raw of this.store.loadSourceConfigs()) {
      const stored = parseSourceConfig(raw);
      byCode.set(stored.sourceCode, stored);
    }
    return [...byCode.values()];
  }

  /**
   * Submit one file (one part) of a version.
   */
  async ingestFile(request: IngestFileRequest): Promise<IngestResult> {
    const source = this.registry.resolve(request.sourceCode);
    const key: VersionKey = {
      sourceCode: source.sourceCode,
      variant: this.resolveVariant(source, request.variant),
      versionLabel: request.versionLabel.trim(),
    };
    if (!key.versionLabel) throw new StructuralError("Version label is required");
    const partIndex = request.partIndex ?? 1;

    return this.versions.withVersion(key, async () => {
      const opened = this.versions.open(key, source, request.declaredPartCount);
      const issues: ValidationIssue[] = [];

      const { table, header } = this.failOnStructural(opened, () => {
        this.assembler.checkPart(opened, partIndex, request.declaredPartCount);
        return this.readPart(request, source, partIndex);
      });

      const fileRef = { fileName: request.fileName, line: 0, partIndex };
      const headerRef = { ...fileRef, line: table.lines[header.headerRowIndex] ?? header.headerRowIndex + 1 };
      for (const raw of header.unmatched) {
        issues.push({
          ref: headerRef,
          column: null,
          kind: "unmatched_header",
          severity: "warn",
          message: `Header "${raw}" matches no column of ${source.sourceCode}`,
        });
      }
      for (const dup of header.duplicates) {
        issues.push({
          ref: headerRef,
          column: dup.column,
          kind: "duplicate_header",
          severity: "warn",
          message: `Header "${dup.header}" also maps to ${dup.column}; column ${dup.firstIndex + 1} is used`,
        });
      }

      const transformed = transformRecords(
        table.rows,
        header.headerRowIndex,
        header.mapping,
        source,
        request.fileName,
        partIndex,
        table.lines
      );
      const counters = {
        attempted: transformed.attempted,
        accepted: transformed.rows.length,
        rejected: transformed.rejected,
        skipped: transformed.skipped,
      };
      issues.push(...transformed.issues);
      if (transformed.attempted === 0) {
        issues.push({ ref: fileRef, column: null, kind: "no_data_rows", severity: "warn", message: "File has no data rows" });
      }

      const fileHash = sha256(request.content);
      const seenBefore = this.store.findCompletedPartByHash(source.sourceCode, fileHash);
      if (seenBefore) {
        issues.push({
          ref: fileRef,
          column: null,
          kind: "duplicate_file",
          severity: "warn",
          message: `Same content as part ${seenBefore.partIndex} of version ${seenBefore.versionLabel}`,
        });
      }

      const now = this.versions.now();
      const assembly = this.assembler.submitPart(
        opened,
        { partIndex, fileName: request.fileName, fileHash, counters, issues },
        transformed.rows,
        request.declaredPartCount,
        now
      );
      this.log.info(
        {
          event: "ingest.part.accepted",
          version: describeKey(key),
          partIndex,
          fileName: request.fileName,
          accepted: transformed.rows.length,
          rejected: transformed.rejected,
        },
        "Part accepted"
      );

      let version = this.requireVersion(key);
      if (assembly.complete) {
        const outcome = this.versions.complete(version, source, fileRef);
        issues.push(...outcome.issues);
        version = outcome.version;
      }

      let promoted = false;
      if (request.promote && version.status === "completed") {
        version = await this.versions.promoteLocked(key);
        promoted = true;
      }

      const report = buildReport(
        issues,
        counters,
        version.status === "failed",
        columnStats(transformed.rows.map((r) => r.row), source.columns.map((c) => c.name))
      );
      this.log.debug({ event: "ingest.report", version: describeKey(key), summary: summarizeReport(report) }, "Report");

      return {
        status: version.status,
        acceptedRows: transformed.rows.length,
        issues,
        report,
        version,
        assembly,
        promoted,
      };
    });
  }

  promoteVersion(sourceCode: string, variant: string | null, versionLabel: string): Promise<DataVersion> {
    return this.versions.promote(this.keyFor(sourceCode, variant, versionLabel));
  }

  /**
   * Versions of a source and variant, newest first.
   */
  listVersions(sourceCode: string, variant: string | null): DataVersion[] {
    const source = this.registry.resolve(sourceCode);
    return this.versions.list(source.sourceCode, this.resolveVariant(source, variant));
  }

  getVersion(sourceCode: string, variant: string | null, versionLabel: string): DataVersion | undefined {
    return this.versions.find(this.keyFor(sourceCode, variant, versionLabel));
  }

  /**
   * Issues, row counters and column statistics accumulated over every part of a version.
   */
  getVersionReport(sourceCode: string, variant: string | null, versionLabel: string): VersionReport | undefined {
    const source = this.registry.resolve(sourceCode);
    const version = this.versions.find(this.keyFor(sourceCode, variant, versionLabel));
    if (!version) return undefined;
    const rows =
      version.status === "completed"
        ? this.store.versionRows(source, version.id)
        : this.store.stagedRows(version.id).map((r) => r.row);
    const issues = this.store.versionIssues(version.id);
    const report = buildReport(
      issues,
      this.store.partCounters(version.id),
      version.status === "failed",
      columnStats(rows, source.columns.map((c) => c.name))
    );
    return { version, issues, report };
  }

  abortVersion(sourceCode: string, variant: string | null, versionLabel: string, reason?: string): Promise<DataVersion> {
    return this.versions.abort(this.keyFor(sourceCode, variant, versionLabel), reason);
  }

  expireStaleVersions(): Promise<DataVersion[]> {
    return this.versions.expireStale();
  }

  readCurrentRows(sourceCode: string, variant: string | null): Row[] {
    const source = this.registry.resolve(sourceCode);
    return this.store.readCurrentRows(source, this.resolveVariant(source, variant));
  }

  registerSource(input: DataSourceConfig | DataSourceConfigInput): DataSourceConfig {
    const cfg = this.registry.register(input);
    this.store.ensureSourceTable(cfg);
    this.store.saveSourceConfig(cfg, this.versions.now());
    return cfg;
  }

  addAliases(sourceCode: string, column: string, aliases: string[]): DataSourceConfig {
    const cfg = this.registry.addAliases(sourceCode, column, aliases);
    this.store.saveSourceConfig(cfg, this.versions.now());
    return cfg;
  }

  close(): void {
    this.store.close();
  }

  private readPart(
    request: IngestFileRequest,
    source: DataSourceConfig,
    partIndex: number
  ): { table: TabularData; header: HeaderRowDetection } {
    const table = readTabular(request.content, request.fileName);
    const header = detectHeaderRow(table.rows, source, this.config.maxHeaderScanRows);
    if (!header.found) {
      const line = table.lines[header.headerRowIndex] ?? header.headerRowIndex + 1;
      const missing: ValidationIssue[] = header.missing.map((column) => ({
        ref: { fileName: request.fileName, line, partIndex },
        column,
        kind: "missing_header",
        severity: "fatal",
        message: `Required column "${column}" has no matching header`,
      }));
      throw new StructuralError(`${request.fileName}: missing required header(s) ${header.missing.join(", ")}`, missing);
    }
    return { table, header };
  }

  // Structural problems with a submission fail the whole version
  private failOnStructural<T>(version: DataVersion, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StructuralError) {
        this.versions.fail(version, err.message, err.issues[0]?.kind ?? "aborted", err.issues);
      }
      throw err;
    }
  }

  private keyFor(sourceCode: string, variant: string | null, versionLabel: string): VersionKey {
    const source = this.registry.resolve(sourceCode);
    return { sourceCode: source.sourceCode, variant: this.resolveVariant(source, variant), versionLabel: versionLabel.trim() };
  }

  private resolveVariant(source: DataSourceConfig, variant: string | null): string | null {
    const v = variant?.trim().toUpperCase() || null;
    if (source.variants.length === 0) {
      if (v !== null) throw new UnknownVariantError(source.sourceCode, v, []);
      return null;
    }
    if (v === null || !source.variants.includes(v)) throw new UnknownVariantError(source.sourceCode, v, source.variants);
    return v;
  }

  private requireVersion(key: VersionKey): DataVersion {
    const v = this.versions.find(key);
    if (!v) throw new Error(`Version ${describeKey(key)} vanished`);
    return v;
  }
}
