/**
 * Module: Public Types
 * Purpose: Define the data source contract, typed rows, validation issues,
 * version metadata and ingest result shapes exposed to callers.
 */
export type SemanticType = "text" | "integer" | "numeric" | "date" | "boolean";

// Dates are ISO yyyy-MM-dd strings
export type CellValue = string | number | boolean | null;
export type Row = Record<string, CellValue>;

// Raw cells of an uploaded file; lines[i] is the 1-based file line where rows[i] starts
export interface TabularData {
  rows: string[][];
  lines: number[];
}

export interface ColumnDef {
  name: string;
  type: SemanticType;
  // Header must be present in every file; value must be non-null unless `nullable`
  required: boolean;
  nullable?: boolean;
  description?: string;
}

export type SpecialValueRule =
  | { kind: "null_token"; token: string }
  | { kind: "flag_token"; token: string }
  | { kind: "pattern"; pattern: string; group?: number }
  | { kind: "uppercase" };

export type DerivedColumnRule =
  | {
      kind: "concat";
      column: string;
      from: string[];
      separator?: string;
      onlyIfNull?: boolean;
    }
  | {
      kind: "extract";
      column: string;
      from: string;
      pattern: string;
      group?: number;
      allowed?: Array<string | number>;
    };

export interface MultiPartPolicy {
  enabled: boolean;
  defaultPartCount?: number;
}

export interface DataSourceConfig {
  sourceCode: string;
  name: string;
  category?: string;
  description?: string;
  targetTable: string;
  columns: ColumnDef[];
  aliases: Record<string, string[]>;
  uniqueKey: string[];
  specialValues: Record<string, SpecialValueRule[]>;
  derived: DerivedColumnRule[];
  multiPart: MultiPartPolicy;
  variants: string[];
  nullTokens: string[];
}

export type IssueSeverity = "warn" | "error" | "fatal";

export type IssueKind =
  | "unmatched_header"
  | "duplicate_header"
  | "unreadable_file"
  | "missing_header"
  | "type_error"
  | "key_type_error"
  | "missing_required"
  | "duplicate_key"
  | "cross_part_duplicate"
  | "derived_skipped"
  | "part_count_mismatch"
  | "part_index_out_of_range"
  | "part_timeout"
  | "empty_version"
  | "aborted"
  | "duplicate_file"
  | "row_count_shift"
  | "no_data_rows";

export interface RowReference {
  fileName: string;
  line: number; // 1-based line in the source file, 0 for file-level issues
  partIndex?: number;
}

export interface ValidationIssue {
  ref: RowReference;
  column: string | null;
  kind: IssueKind;
  severity: IssueSeverity;
  message: string;
}

export type VersionStatus = "pending" | "processing" | "completed" | "failed";

export interface VersionKey {
  sourceCode: string;
  variant: string | null;
  versionLabel: string;
}

export interface DataVersion extends VersionKey {
  id: number;
  status: VersionStatus;
  isCurrent: boolean;
  recordCount: number;
  partCountExpected: number;
  partsReceived: number[];
  errorMessage: string | null;
  createdAt: string;
  updatedAt: string;
  importedAt: string | null;
}

export interface AssemblyStatus {
  received: number;
  expected: number;
  complete: boolean;
  partsReceived: number[];
  partRowCounts: Record<number, number>;
}

export interface ColumnStats {
  column: string;
  nullCount: number;
  // Share of accepted rows, 0-100 with two decimals
  nullPercentage: number;
  // First non-null values, as text cut to 50 characters
  sampleValues: string[];
}

export interface ValidationReport {
  rowsAttempted: number;
  rowsAccepted: number;
  rowsRejected: number;
  rowsSkipped: number;
  issueCounts: Array<{ kind: IssueKind; column: string | null; count: number }>;
  warnings: number;
  errors: number;
  fatal: number;
  failed: boolean;
  columnStats: ColumnStats[];
}

// Everything recorded for one version across all of its submissions
export interface VersionReport {
  version: DataVersion;
  issues: ValidationIssue[];
  report: ValidationReport;
}

export interface IngestResult {
  status: VersionStatus;
  acceptedRows: number;
  issues: ValidationIssue[];
  report: ValidationReport;
  version: DataVersion;
  assembly: AssemblyStatus;
  promoted: boolean;
}

export interface IngestFileRequest {
  sourceCode: string;
  variant: string | null;
  versionLabel: string;
  partIndex?: number;
  declaredPartCount?: number | null;
  content: string | Uint8Array;
  fileName: string;
  promote?: boolean;
}
