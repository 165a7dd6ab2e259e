import type { IssueKind, RowReference, ValidationIssue, VersionKey, VersionStatus } from "./types.js";

/**
 * Module: Error Taxonomy
 * Purpose: Typed failures surfaced by the ingestion core. Structural and
 * state-conflict errors abort the operation; row-level problems are issues,
 * never exceptions.
 */
export type IngestErrorCode =
  | "UNKNOWN_SOURCE"
  | "UNKNOWN_VARIANT"
  | "STRUCTURAL"
  | "PART_COUNT_MISMATCH"
  | "VERSION_CLOSED"
  | "VERSION_NOT_COMPLETED"
  | "VERSION_NOT_FOUND"
  | "SOURCE_IN_USE"
  | "INVALID_SOURCE_CONFIG";

export class IngestError extends Error {
  readonly code: IngestErrorCode;

  constructor(code: IngestErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

const describeKey = (key: VersionKey): string =>
  `${key.sourceCode}${key.variant ? `/${key.variant}` : ""}@${key.versionLabel}`;

/**
 * Issue for a failure that concerns a whole file or version rather than one row.
 */
export const fatalIssue = (
  kind: IssueKind,
  message: string,
  ref: RowReference = { fileName: "", line: 0 }
): ValidationIssue => ({ ref, column: null, kind, severity: "fatal", message });

export class UnknownSourceError extends IngestError {
  constructor(readonly sourceCode: string) {
    super("UNKNOWN_SOURCE", `Unknown data source: ${sourceCode}`);
  }
}

export class UnknownVariantError extends IngestError {
  constructor(readonly sourceCode: string, readonly variant: string | null, allowed: string[]) {
    super(
      "UNKNOWN_VARIANT",
      allowed.length
        ? `Variant "${variant ?? ""}" is not valid for ${sourceCode}. Allowed: ${allowed.join(", ")}`
        : `${sourceCode} has no variants; got "${variant ?? ""}"`
    );
  }
}

export class StructuralError extends IngestError {
  constructor(message: string, readonly issues: ValidationIssue[] = [], code: IngestErrorCode = "STRUCTURAL") {
    super(code, message);
  }
}

const mismatchMessage = (key: VersionKey, expected: number, declared: number): string =>
  `Part count mismatch for ${describeKey(key)}: version expects ${expected}, submission declared ${declared}`;

export class PartCountMismatchError extends StructuralError {
  constructor(key: VersionKey, readonly expected: number, readonly declared: number) {
    super(
      mismatchMessage(key, expected, declared),
      [fatalIssue("part_count_mismatch", mismatchMessage(key, expected, declared))],
      "PART_COUNT_MISMATCH"
    );
  }
}

export class VersionClosedError extends IngestError {
  constructor(key: VersionKey, readonly status: VersionStatus) {
    super("VERSION_CLOSED", `Version ${describeKey(key)} is ${status} and accepts no further parts`);
  }
}

export class VersionNotCompletedError extends IngestError {
  constructor(key: VersionKey, readonly status: VersionStatus) {
    super("VERSION_NOT_COMPLETED", `Version ${describeKey(key)} is ${status}; only completed versions can be promoted`);
  }
}

export class VersionNotFoundError extends IngestError {
  constructor(key: VersionKey) {
    super("VERSION_NOT_FOUND", `Version ${describeKey(key)} does not exist`);
  }
}

export class SourceInUseError extends IngestError {
  constructor(readonly sourceCode: string) {
    super(
      "SOURCE_IN_USE",
      `${sourceCode} is referenced by existing versions; only additive alias changes are allowed`
    );
  }
}

export class InvalidSourceConfigError extends IngestError {
  constructor(message: string, readonly problems: string[] = []) {
    super("INVALID_SOURCE_CONFIG", problems.length ? `${message}: ${problems.join("; ")}` : message);
  }
}

export { describeKey };
