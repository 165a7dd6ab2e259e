import type { AssemblyStatus, DataSourceConfig, DataVersion, VersionKey } from "./types.js";
import type { LocatedRow } from "./transform.js";
import type { PartSubmission, SqliteVersionStore } from "./store.js";
import { PartCountMismatchError, StructuralError, fatalIssue } from "./errors.js";
import { childLogger, type Logger } from "./logger.js";

/**
 * Module: Part Assembler
 * Purpose: Collect the parts of one version, enforce agreement on the expected part count,
 * and report completeness. Completeness is set equality of received indices with
 * {1..expected}, so parts may arrive in any order and a resubmitted index replaces
 * the rows staged for it.
 */
const isDeclared = (n: number | null | undefined): n is number => n !== null && n !== undefined;

/**
 * Part count fixed by the first part of a version: the declared count, the source's
 * default, or 1. Single-part sources only accept a declared count of 1.
 */
export function expectedPartCount(config: DataSourceConfig, key: VersionKey, declared: number | null | undefined): number {
  if (!config.multiPart.enabled) {
    if (isDeclared(declared) && declared !== 1) throw new PartCountMismatchError(key, 1, declared);
    return 1;
  }
  if (isDeclared(declared)) {
    if (!Number.isInteger(declared) || declared < 1) {
      const message = `Declared part count must be a positive integer, got ${declared}`;
      throw new StructuralError(message, [fatalIssue("part_count_mismatch", message)]);
    }
    return declared;
  }
  return config.multiPart.defaultPartCount ?? 1;
}

export function assemblyStatus(version: DataVersion, partRowCounts: Record<number, number>): AssemblyStatus {
  const received = new Set(version.partsReceived);
  let complete = received.size === version.partCountExpected;
  for (let i = 1; complete && i <= version.partCountExpected; i++) complete = received.has(i);
  return {
    received: received.size,
    expected: version.partCountExpected,
    complete,
    partsReceived: [...received].sort((a, b) => a - b),
    partRowCounts,
  };
}

export class PartAssembler {
  private readonly log: Logger;

  constructor(private readonly store: SqliteVersionStore, logger?: Logger) {
    this.log = childLogger(logger, "assembler");
  }

  /**
   * Reject a submission whose declared count disagrees with the version, or whose
   * index lies outside 1..expected.
   */
  checkPart(version: DataVersion, partIndex: number, declared: number | null | undefined): void {
    if (isDeclared(declared) && declared !== version.partCountExpected) {
      throw new PartCountMismatchError(version, version.partCountExpected, declared);
    }
    if (!Number.isInteger(partIndex) || partIndex < 1 || partIndex > version.partCountExpected) {
      const message = `Part index ${partIndex} is outside 1..${version.partCountExpected}`;
      throw new StructuralError(message, [
        fatalIssue("part_index_out_of_range", message, { fileName: "", line: 0, partIndex }),
      ]);
    }
  }

  submitPart(
    version: DataVersion,
    part: PartSubmission,
    rows: readonly LocatedRow[],
    declared: number | null | undefined,
    now: Date
  ): AssemblyStatus {
    this.checkPart(version, part.partIndex, declared);
    const replaced = version.partsReceived.includes(part.partIndex);
    this.store.replacePart(version.id, part, rows, now);
    const status = this.status(version.id);
    this.log.info(
      {
        event: "assembler.part.staged",
        versionId: version.id,
        partIndex: part.partIndex,
        rows: rows.length,
        issues: part.issues.length,
        replaced,
        received: status.received,
        expected: status.expected,
      },
      replaced ? "Part replaced" : "Part staged"
    );
    return status;
  }

  status(versionId: number): AssemblyStatus {
    const version = this.store.getVersionById(versionId);
    if (!version) throw new Error(`Version ${versionId} not found`);
    return assemblyStatus(version, this.store.partRowCounts(versionId));
  }
}
