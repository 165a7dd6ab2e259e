import Database from "better-sqlite3";
import type {
  CellValue,
  DataSourceConfig,
  DataVersion,
  IssueKind,
  IssueSeverity,
  Row,
  SemanticType,
  ValidationIssue,
  VersionKey,
  VersionStatus,
} from "./types.js";
import type { LocatedRow } from "./transform.js";
import type { RowCounters } from "./report.js";
import { childLogger, type Logger } from "./logger.js";

/**
 * Module: Version Store
 * Purpose: Durable state of the ingestion core on better-sqlite3.
 * Tables:
 * - data_sources: persisted source configurations.
 * - data_versions: one row per (source, variant, label); at most one current per (source, variant).
 * - version_parts / staged_rows: received parts and their rows until the version completes.
 * - version_issues: issues of each part (replaced with the part) and of the version itself.
 * - one data table per source `targetTable`, tagged by data_version_id, plus a
 *   `current_<source>` view over the promoted version.
 * Every mutating method is one synchronous transaction.
 */
const SCHEMA = `
CREATE TABLE IF NOT EXISTS data_sources (
  source_code TEXT PRIMARY KEY,
  target_table TEXT NOT NULL,
  config_json TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS data_versions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  source_code TEXT NOT NULL,
  variant TEXT NOT NULL DEFAULT '',
  version_label TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('pending', 'processing', 'completed', 'failed')),
  is_current INTEGER NOT NULL DEFAULT 0,
  record_count INTEGER NOT NULL DEFAULT 0,
  part_count_expected INTEGER NOT NULL,
  error_message TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  imported_at TEXT,
  UNIQUE (source_code, variant, version_label)
);
CREATE UNIQUE INDEX IF NOT EXISTS idx_data_versions_current
  ON data_versions(source_code, variant) WHERE is_current = 1;

CREATE TABLE IF NOT EXISTS version_parts (
  version_id INTEGER NOT NULL REFERENCES data_versions(id) ON DELETE CASCADE,
  part_index INTEGER NOT NULL,
  file_name TEXT NOT NULL,
  file_hash TEXT NOT NULL,
  row_count INTEGER NOT NULL,
  rows_attempted INTEGER NOT NULL DEFAULT 0,
  rows_rejected INTEGER NOT NULL DEFAULT 0,
  rows_skipped INTEGER NOT NULL DEFAULT 0,
  submitted_at TEXT NOT NULL,
  PRIMARY KEY (version_id, part_index)
);
CREATE INDEX IF NOT EXISTS idx_version_parts_hash ON version_parts(file_hash);

CREATE TABLE IF NOT EXISTS staged_rows (
  version_id INTEGER NOT NULL,
  part_index INTEGER NOT NULL,
  line INTEGER NOT NULL,
  payload TEXT NOT NULL,
  FOREIGN KEY (version_id, part_index) REFERENCES version_parts(version_id, part_index) ON DELETE CASCADE
);
CREATE INDEX IF NOT EXISTS idx_staged_rows_part ON staged_rows(version_id, part_index);

-- part_index is NULL for issues raised on the version as a whole
CREATE TABLE IF NOT EXISTS version_issues (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  version_id INTEGER NOT NULL REFERENCES data_versions(id) ON DELETE CASCADE,
  part_index INTEGER,
  file_name TEXT NOT NULL,
  line INTEGER NOT NULL,
  ref_part_index INTEGER,
  column_name TEXT,
  kind TEXT NOT NULL,
  severity TEXT NOT NULL,
  message TEXT NOT NULL,
  FOREIGN KEY (version_id, part_index) REFERENCES version_parts(version_id, part_index) ON DELETE CASCADE
);
CREATE INDEX IF NOT EXISTS idx_version_issues_version ON version_issues(version_id, part_index);
`;

const SQL_TYPES: Record<SemanticType, string> = {
  text: "TEXT",
  integer: "INTEGER",
  numeric: "REAL",
  date: "TEXT",
  boolean: "INTEGER",
};

const q = (ident: string): string => `"${ident.replace(/"/g, '""')}"`;
const variantColumn = (variant: string | null): string => variant ?? "";
export const currentViewName = (sourceCode: string): string => `current_${sourceCode.toLowerCase()}`;

interface VersionRecord {
  id: number;
  source_code: string;
  variant: string;
  version_label: string;
  status: VersionStatus;
  is_current: number;
  record_count: number;
  part_count_expected: number;
  error_message: string | null;
  created_at: string;
  updated_at: string;
  imported_at: string | null;
}

export interface PartSubmission {
  partIndex: number;
  fileName: string;
  fileHash: string;
  counters: RowCounters;
  issues: readonly ValidationIssue[];
}

interface IssueRecord {
  file_name: string;
  line: number;
  ref_part_index: number | null;
  column_name: string | null;
  kind: IssueKind;
  severity: IssueSeverity;
  message: string;
}

export interface StagedRow {
  partIndex: number;
  fileName: string;
  line: number;
  row: Row;
}

export interface MatchingPart {
  versionLabel: string;
  variant: string | null;
  partIndex: number;
}

export interface VersionStoreOptions {
  logger?: Logger;
}

const toSqlValue = (v: CellValue | undefined): string | number | null => {
  if (v === undefined || v === null) return null;
  if (typeof v === "boolean") return v ? 1 : 0;
  return v;
};

const fromSqlValue = (v: unknown, type: SemanticType): CellValue => {
  if (v === null || v === undefined) return null;
  if (type === "boolean") return v === 1 || v === true;
  if (typeof v === "string" || typeof v === "number") return v;
  if (typeof v === "bigint") return Number(v);
  return null;
};

const isCellValue = (v: unknown): v is CellValue =>
  v === null || typeof v === "string" || typeof v === "number" || typeof v === "boolean";

function toRow(config: DataSourceConfig, rec: Record<string, unknown>): Row {
  const row: Row = {};
  for (const col of config.columns) row[col.name] = fromSqlValue(rec[col.name], col.type);
  return row;
}

function parsePayload(payload: string): Row {
  const parsed: unknown = JSON.parse(payload);
  const row: Row = {};
  if (typeof parsed !== "object" || parsed === null) return row;
  for (const [k, v] of Object.entries(parsed)) {
    row[k] = isCellValue(v) ? v : null;
  }
  return row;
}

export class SqliteVersionStore {
  readonly db: Database.Database;
  private readonly log: Logger;

  constructor(database: Database.Database | string, options: VersionStoreOptions = {}) {
    this.db = typeof database === "string" ? new Database(database) : database;
    this.log = childLogger(options.logger, "store");
    if (!this.db.memory) this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(SCHEMA);
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  // --------------------------------------------------------------------------
  // Sources
  // --------------------------------------------------------------------------

  saveSourceConfig(config: DataSourceConfig, now: Date): void {
    this.db
      .prepare(
        `INSERT INTO data_sources (source_code, target_table, config_json, updated_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(source_code) DO UPDATE SET
           target_table = excluded.target_table,
           config_json = excluded.config_json,
           updated_at = excluded.updated_at`
      )
      .run(config.sourceCode, config.targetTable, JSON.stringify(config), now.toISOString());
  }

  /**
   * Raw persisted configurations; callers validate them through the registry.
   */
  loadSourceConfigs(): unknown[] {
    return this.db
      .prepare<[], { config_json: string }>("SELECT config_json FROM data_sources ORDER BY source_code")
      .all()
      .map((r): unknown => JSON.parse(r.config_json));
  }

  /**
   * Create (or widen) the data table of a source, its unique-key index and its current view.
   */
  ensureSourceTable(config: DataSourceConfig): void {
    const table = config.targetTable;
    const create = this.db.transaction(() => {
      const existing = new Set(
        this.db
          .prepare<[string], { name: string }>("SELECT name FROM pragma_table_info(?)")
          .all(table)
          .map((c) => c.name)
      );
      if (existing.size === 0) {
        const cols = config.columns.map((c) => `${q(c.name)} ${SQL_TYPES[c.type]}`);
        this.db.exec(
          `CREATE TABLE ${q(table)} (
            data_version_id INTEGER NOT NULL REFERENCES data_versions(id) ON DELETE CASCADE,
            ${cols.join(",\n            ")},
            part_index INTEGER NOT NULL
          )`
        );
      } else {
        for (const c of config.columns) {
          if (!existing.has(c.name)) {
            this.db.exec(`ALTER TABLE ${q(table)} ADD COLUMN ${q(c.name)} ${SQL_TYPES[c.type]}`);
          }
        }
      }
      const keyExpr = config.uniqueKey.map((k) => `IFNULL(${q(k)}, '')`).join(", ");
      this.db.exec(
        `CREATE UNIQUE INDEX IF NOT EXISTS ${q(`ux_${table}_${config.uniqueKey.join("_")}`)}
           ON ${q(table)}(data_version_id, ${keyExpr})`
      );
      const view = currentViewName(config.sourceCode);
      this.db.exec(`DROP VIEW IF EXISTS ${q(view)}`);
      this.db.exec(
        `CREATE VIEW ${q(view)} AS
           SELECT t.rowid AS row_seq, v.variant AS version_variant, v.version_label AS version_label, t.*
           FROM ${q(table)} t
           JOIN data_versions v ON v.id = t.data_version_id
           WHERE v.is_current = 1 AND v.source_code = '${config.sourceCode}'`
      );
    });
    create();
    this.log.debug({ event: "store.table.ensured", sourceCode: config.sourceCode, table }, "Source table ready");
  }

  hasVersions(sourceCode: string): boolean {
    return (
      this.db
        .prepare<[string], { one: number }>("SELECT 1 AS one FROM data_versions WHERE source_code = ? LIMIT 1")
        .get(sourceCode) !== undefined
    );
  }

  // --------------------------------------------------------------------------
  // Versions
  // --------------------------------------------------------------------------

  findVersion(key: VersionKey): DataVersion | undefined {
    const rec = this.db
      .prepare<[string, string, string], VersionRecord>(
        "SELECT * FROM data_versions WHERE source_code = ? AND variant = ? AND version_label = ?"
      )
      .get(key.sourceCode, variantColumn(key.variant), key.versionLabel);
    return rec ? this.toVersion(rec) : undefined;
  }

  getVersionById(id: number): DataVersion | undefined {
    const rec = this.db.prepare<[number], VersionRecord>("SELECT * FROM data_versions WHERE id = ?").get(id);
    return rec ? this.toVersion(rec) : undefined;
  }

  createVersion(key: VersionKey, partCountExpected: number, now: Date): DataVersion {
    const ts = now.toISOString();
    const info = this.db
      .prepare(
        `INSERT INTO data_versions (source_code, variant, version_label, status, part_count_expected, created_at, updated_at)
         VALUES (?, ?, ?, 'pending', ?, ?, ?)`
      )
      .run(key.sourceCode, variantColumn(key.variant), key.versionLabel, partCountExpected, ts, ts);
    return this.requireVersion(Number(info.lastInsertRowid));
  }

  setStatus(
    id: number,
    status: VersionStatus,
    now: Date,
    errorMessage: string | null = null,
    issues: readonly ValidationIssue[] = []
  ): DataVersion {
    const update = this.db.transaction(() => {
      this.db
        .prepare("UPDATE data_versions SET status = ?, error_message = ?, updated_at = ? WHERE id = ?")
        .run(status, errorMessage, now.toISOString(), id);
      if (status === "failed") this.db.prepare("DELETE FROM staged_rows WHERE version_id = ?").run(id);
      this.insertIssues(id, null, issues);
    });
    update();
    return this.requireVersion(id);
  }

  /**
   * Newest first.
   */
  listVersions(sourceCode: string, variant: string | null): DataVersion[] {
    return this.db
      .prepare<[string, string], VersionRecord>(
        "SELECT * FROM data_versions WHERE source_code = ? AND variant = ? ORDER BY created_at DESC, id DESC"
      )
      .all(sourceCode, variantColumn(variant))
      .map((r) => this.toVersion(r));
  }

  /**
   * Open versions whose last activity is older than `cutoff`.
   */
  listStaleVersions(cutoff: Date): DataVersion[] {
    return this.db
      .prepare<[string], VersionRecord>(
        "SELECT * FROM data_versions WHERE status IN ('pending', 'processing') AND updated_at < ? ORDER BY id"
      )
      .all(cutoff.toISOString())
      .map((r) => this.toVersion(r));
  }

  /**
   * Record count of the most recently imported completed version, other than `excludeId`.
   */
  previousCompletedCount(sourceCode: string, variant: string | null, excludeId: number): number | undefined {
    return this.db
      .prepare<[string, string, number], { record_count: number }>(
        `SELECT record_count FROM data_versions
         WHERE source_code = ? AND variant = ? AND status = 'completed' AND id <> ?
         ORDER BY imported_at DESC, id DESC LIMIT 1`
      )
      .get(sourceCode, variantColumn(variant), excludeId)?.record_count;
  }

  // --------------------------------------------------------------------------
  // Parts
  // --------------------------------------------------------------------------

  /**
   * Stage a part's rows, counters and issues, replacing whatever was staged for the same part index.
   */
  replacePart(versionId: number, part: PartSubmission, rows: readonly LocatedRow[], now: Date): void {
    const ts = now.toISOString();
    const deletePart = this.db.prepare("DELETE FROM version_parts WHERE version_id = ? AND part_index = ?");
    const insertPart = this.db.prepare(
      `INSERT INTO version_parts
         (version_id, part_index, file_name, file_hash, row_count, rows_attempted, rows_rejected, rows_skipped, submitted_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const insertRow = this.db.prepare(
      "INSERT INTO staged_rows (version_id, part_index, line, payload) VALUES (?, ?, ?, ?)"
    );
    const touch = this.db.prepare(
      "UPDATE data_versions SET status = 'processing', updated_at = ? WHERE id = ? AND status IN ('pending', 'processing')"
    );

    const tx = this.db.transaction((staged: readonly LocatedRow[]) => {
      deletePart.run(versionId, part.partIndex);
      insertPart.run(
        versionId,
        part.partIndex,
        part.fileName,
        part.fileHash,
        staged.length,
        part.counters.attempted,
        part.counters.rejected,
        part.counters.skipped,
        ts
      );
      for (const r of staged) {
        insertRow.run(versionId, part.partIndex, r.line, JSON.stringify(r.row));
      }
      this.insertIssues(versionId, part.partIndex, part.issues);
      touch.run(ts, versionId);
    });
    tx(rows);
  }

  partRowCounts(versionId: number): Record<number, number> {
    const counts: Record<number, number> = {};
    for (const r of this.db
      .prepare<[number], { part_index: number; row_count: number }>(
        "SELECT part_index, row_count FROM version_parts WHERE version_id = ? ORDER BY part_index"
      )
      .all(versionId)) {
      counts[r.part_index] = r.row_count;
    }
    return counts;
  }

  /**
   * Row counters summed over the received parts.
   */
  partCounters(versionId: number): RowCounters {
    const rec = this.db
      .prepare<[number], RowCounters>(
        `SELECT COALESCE(SUM(rows_attempted), 0) AS attempted,
                COALESCE(SUM(row_count), 0) AS accepted,
                COALESCE(SUM(rows_rejected), 0) AS rejected,
                COALESCE(SUM(rows_skipped), 0) AS skipped
         FROM version_parts WHERE version_id = ?`
      )
      .get(versionId);
    return rec ?? { attempted: 0, accepted: 0, rejected: 0, skipped: 0 };
  }

  /**
   * Issues recorded for a version: per part in part order, then version-level ones.
   */
  versionIssues(versionId: number): ValidationIssue[] {
    return this.db
      .prepare<[number], IssueRecord>(
        `SELECT file_name, line, ref_part_index, column_name, kind, severity, message
         FROM version_issues WHERE version_id = ?
         ORDER BY part_index IS NULL, part_index, id`
      )
      .all(versionId)
      .map((r) => ({
        ref:
          r.ref_part_index === null
            ? { fileName: r.file_name, line: r.line }
            : { fileName: r.file_name, line: r.line, partIndex: r.ref_part_index },
        column: r.column_name,
        kind: r.kind,
        severity: r.severity,
        message: r.message,
      }));
  }

  stagedRows(versionId: number): StagedRow[] {
    return this.db
      .prepare<[number], { part_index: number; file_name: string; line: number; payload: string }>(
        `SELECT s.part_index, p.file_name, s.line, s.payload
         FROM staged_rows s
         JOIN version_parts p ON p.version_id = s.version_id AND p.part_index = s.part_index
         WHERE s.version_id = ?
         ORDER BY s.part_index, s.line`
      )
      .all(versionId)
      .map((r) => ({ partIndex: r.part_index, fileName: r.file_name, line: r.line, row: parsePayload(r.payload) }));
  }

  /**
   * A part of a completed version of `sourceCode` with the same content hash.
   */
  findCompletedPartByHash(sourceCode: string, fileHash: string): MatchingPart | undefined {
    const rec = this.db
      .prepare<[string, string], { version_label: string; variant: string; part_index: number }>(
        `SELECT v.version_label, v.variant, p.part_index
         FROM version_parts p
         JOIN data_versions v ON v.id = p.version_id
         WHERE v.source_code = ? AND v.status = 'completed' AND p.file_hash = ?
         ORDER BY v.id DESC LIMIT 1`
      )
      .get(sourceCode, fileHash);
    return rec ? { versionLabel: rec.version_label, variant: rec.variant || null, partIndex: rec.part_index } : undefined;
  }

  // --------------------------------------------------------------------------
  // Completion & promotion
  // --------------------------------------------------------------------------

  /**
   * Move the staged rows into the source data table and mark the version completed.
   */
  completeVersion(
    versionId: number,
    config: DataSourceConfig,
    rows: readonly StagedRow[],
    now: Date,
    issues: readonly ValidationIssue[] = []
  ): DataVersion {
    const ts = now.toISOString();
    const names = config.columns.map((c) => c.name);
    const insert = this.db.prepare(
      `INSERT INTO ${q(config.targetTable)} (data_version_id, ${names.map(q).join(", ")}, part_index)
       VALUES (?, ${names.map(() => "?").join(", ")}, ?)`
    );
    const tx = this.db.transaction((staged: readonly StagedRow[]) => {
      for (const r of staged) {
        insert.run(versionId, ...names.map((n) => toSqlValue(r.row[n])), r.partIndex);
      }
      this.db.prepare("DELETE FROM staged_rows WHERE version_id = ?").run(versionId);
      this.db
        .prepare(
          `UPDATE data_versions
           SET status = 'completed', record_count = ?, error_message = NULL, imported_at = ?, updated_at = ?
           WHERE id = ?`
        )
        .run(staged.length, ts, ts, versionId);
      this.insertIssues(versionId, null, issues);
    });
    tx(rows);
    return this.requireVersion(versionId);
  }

  /**
   * Make `versionId` the only current version of its (source, variant) in one transaction.
   * Any failure rolls back, leaving the previous current version in place.
   */
  promote(versionId: number, now: Date): DataVersion {
    const target = this.requireVersion(versionId);
    const ts = now.toISOString();
    const unset = this.db.prepare(
      "UPDATE data_versions SET is_current = 0, updated_at = ? WHERE source_code = ? AND variant = ? AND is_current = 1 AND id <> ?"
    );
    const set = this.db.prepare("UPDATE data_versions SET is_current = 1, updated_at = ? WHERE id = ?");
    const tx = this.db.transaction(() => {
      unset.run(ts, target.sourceCode, variantColumn(target.variant), versionId);
      set.run(ts, versionId);
    });
    tx();
    return this.requireVersion(versionId);
  }

  currentVersion(sourceCode: string, variant: string | null): DataVersion | undefined {
    const rec = this.db
      .prepare<[string, string], VersionRecord>(
        "SELECT * FROM data_versions WHERE source_code = ? AND variant = ? AND is_current = 1"
      )
      .get(sourceCode, variantColumn(variant));
    return rec ? this.toVersion(rec) : undefined;
  }

  /**
   * Rows of the current version, read through the source's current view.
   */
  readCurrentRows(config: DataSourceConfig, variant: string | null): Row[] {
    const read = this.db.transaction((v: string) =>
      this.db
        .prepare<[string], Record<string, unknown>>(
          `SELECT * FROM ${q(currentViewName(config.sourceCode))} WHERE version_variant = ? ORDER BY row_seq`
        )
        .all(v)
    );
    return read(variantColumn(variant)).map((rec) => toRow(config, rec));
  }

  /**
   * Rows a completed version moved into the source data table.
   */
  versionRows(config: DataSourceConfig, versionId: number): Row[] {
    return this.db
      .prepare<[number], Record<string, unknown>>(
        `SELECT * FROM ${q(config.targetTable)} WHERE data_version_id = ? ORDER BY rowid`
      )
      .all(versionId)
      .map((rec) => toRow(config, rec));
  }

  private insertIssues(versionId: number, partIndex: number | null, issues: readonly ValidationIssue[]): void {
    if (!issues.length) return;
    const insert = this.db.prepare(
      `INSERT INTO version_issues
         (version_id, part_index, file_name, line, ref_part_index, column_name, kind, severity, message)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    for (const i of issues) {
      insert.run(versionId, partIndex, i.ref.fileName, i.ref.line, i.ref.partIndex ?? null, i.column, i.kind, i.severity, i.message);
    }
  }

  private requireVersion(id: number): DataVersion {
    const v = this.getVersionById(id);
    if (!v) throw new Error(`data_versions row ${id} vanished`);
    return v;
  }

  private toVersion(rec: VersionRecord): DataVersion {
    const parts = this.db
      .prepare<[number], { part_index: number }>(
        "SELECT part_index FROM version_parts WHERE version_id = ? ORDER BY part_index"
      )
      .all(rec.id)
      .map((p) => p.part_index);
    return {
      id: rec.id,
      sourceCode: rec.source_code,
      variant: rec.variant === "" ? null : rec.variant,
      versionLabel: rec.version_label,
      status: rec.status,
      isCurrent: rec.is_current === 1,
      recordCount: rec.record_count,
      partCountExpected: rec.part_count_expected,
      partsReceived: parts,
      errorMessage: rec.error_message,
      createdAt: rec.created_at,
      updatedAt: rec.updated_at,
      importedAt: rec.imported_at,
    };
  }
}
