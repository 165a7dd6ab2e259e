import type { DataSourceConfig, DataVersion, RowReference, ValidationIssue, VersionKey } from "./types.js";
import type { SqliteVersionStore } from "./store.js";
import { expectedPartCount } from "./assembler.js";
import { keyOf } from "./transform.js";
import { KeyedMutex } from "./lock.js";
import {
  StructuralError,
  VersionClosedError,
  VersionNotCompletedError,
  VersionNotFoundError,
  describeKey,
  fatalIssue,
} from "./errors.js";
import { childLogger, type Logger } from "./logger.js";

/**
 * Module: Version Manager
 * Purpose: Own the lifecycle of data versions.
 *   pending -> processing -> completed | failed; `isCurrent` is orthogonal.
 * Completed and failed versions are terminal. Every mutation of one version runs under
 * its key in the mutex; promotion also holds the (source, variant) key so two
 * promotions never interleave.
 */
export interface VersionManagerOptions {
  store: SqliteVersionStore;
  partTimeoutMs: number;
  logger?: Logger;
  now?: () => Date;
  mutex?: KeyedMutex;
}

export interface CompletionOutcome {
  version: DataVersion;
  issues: ValidationIssue[];
}

// Below 50% or above 150% of the previous completed version
const SHIFT_LOW = 0.5;
const SHIFT_HIGH = 1.5;

const isTerminal = (v: DataVersion): boolean => v.status === "completed" || v.status === "failed";

export class VersionManager {
  readonly now: () => Date;
  private readonly store: SqliteVersionStore;
  private readonly mutex: KeyedMutex;
  private readonly partTimeoutMs: number;
  private readonly log: Logger;

  constructor(options: VersionManagerOptions) {
    this.store = options.store;
    this.partTimeoutMs = options.partTimeoutMs;
    this.now = options.now ?? (() => new Date());
    this.mutex = options.mutex ?? new KeyedMutex();
    this.log = childLogger(options.logger, "versions");
  }

  withVersion<T>(key: VersionKey, fn: () => Promise<T> | T): Promise<T> {
    return this.mutex.runExclusive(`version:${describeKey(key)}`, fn);
  }

  find(key: VersionKey): DataVersion | undefined {
    return this.store.findVersion(key);
  }

  list(sourceCode: string, variant: string | null): DataVersion[] {
    return this.store.listVersions(sourceCode, variant);
  }

  isTimedOut(version: DataVersion): boolean {
    if (isTerminal(version)) return false;
    return this.now().getTime() - Date.parse(version.updatedAt) > this.partTimeoutMs;
  }

  /**
   * Return the open version for `key`, creating it on the first part.
   * Call under `withVersion(key)`.
   */
  open(key: VersionKey, config: DataSourceConfig, declared: number | null | undefined): DataVersion {
    const existing = this.store.findVersion(key);
    if (existing) {
      if (this.isTimedOut(existing)) {
        const failed = this.fail(existing, `Timed out waiting for parts after ${this.partTimeoutMs} ms`, "part_timeout");
        throw new VersionClosedError(key, failed.status);
      }
      if (isTerminal(existing)) throw new VersionClosedError(key, existing.status);
      return existing;
    }

    let expected: number;
    try {
      expected = expectedPartCount(config, key, declared);
    } catch (err) {
      // A rejected first part still leaves a failed version behind
      const created = this.store.createVersion(key, 1, this.now());
      const issues = err instanceof StructuralError ? err.issues : [];
      this.fail(created, err instanceof Error ? err.message : String(err), "part_count_mismatch", issues);
      throw err;
    }
    const created = this.store.createVersion(key, expected, this.now());
    this.log.info(
      { event: "version.created", versionId: created.id, version: describeKey(key), partCountExpected: expected },
      "Version created"
    );
    return created;
  }

  /**
   * Fail a version, keeping `issues` (or a single fatal issue of `kind`) in its report.
   */
  fail(
    version: DataVersion,
    reason: string,
    kind: ValidationIssue["kind"] = "aborted",
    issues: readonly ValidationIssue[] = []
  ): DataVersion {
    const recorded = issues.length ? issues : [fatalIssue(kind, reason)];
    const failed = this.store.setStatus(version.id, "failed", this.now(), reason, recorded);
    this.log.warn(
      { event: "version.failed", versionId: version.id, version: describeKey(version), kind, reason },
      "Version failed"
    );
    return failed;
  }

  /**
   * All parts are present: check key uniqueness across parts and at least one row,
   * then move the staged rows into the data table. Returns the terminal version.
   */
  complete(version: DataVersion, config: DataSourceConfig, ref: RowReference): CompletionOutcome {
    const staged = this.store.stagedRows(version.id);
    const issues: ValidationIssue[] = [];

    const seen = new Map<string, { partIndex: number; line: number }>();
    for (const r of staged) {
      const key = keyOf(r.row, config.uniqueKey);
      const first = seen.get(key);
      if (first) {
        issues.push({
          ref: { fileName: r.fileName, line: r.line, partIndex: r.partIndex },
          column: null,
          kind: "cross_part_duplicate",
          severity: "fatal",
          message: `Unique key ${key} also appears in part ${first.partIndex} line ${first.line}`,
        });
        continue;
      }
      seen.set(key, { partIndex: r.partIndex, line: r.line });
    }
    if (issues.length) {
      const failed = this.fail(version, `${issues.length} unique key(s) repeated across parts`, "cross_part_duplicate", issues);
      return { version: failed, issues };
    }

    if (staged.length === 0) {
      issues.push({ ref, column: null, kind: "empty_version", severity: "fatal", message: "Version has no accepted rows" });
      return { version: this.fail(version, "Version has no accepted rows", "empty_version", issues), issues };
    }

    const previous = this.store.previousCompletedCount(version.sourceCode, version.variant, version.id);
    if (previous !== undefined && previous > 0) {
      const ratio = staged.length / previous;
      if (ratio < SHIFT_LOW || ratio > SHIFT_HIGH) {
        issues.push({
          ref,
          column: null,
          kind: "row_count_shift",
          severity: "warn",
          message: `Row count ${staged.length} differs sharply from the previous version (${previous})`,
        });
      }
    }

    const completed = this.store.completeVersion(version.id, config, staged, this.now(), issues);
    this.log.info(
      { event: "version.completed", versionId: version.id, version: describeKey(version), records: completed.recordCount },
      "Version completed"
    );
    return { version: completed, issues };
  }

  /**
   * Make a completed version current. Call under `withVersion(key)`.
   */
  promoteLocked(key: VersionKey): Promise<DataVersion> {
    const currentKey = `current:${key.sourceCode}/${key.variant ?? ""}`;
    return this.mutex.runExclusive(currentKey, () => {
      const version = this.store.findVersion(key);
      if (!version) throw new VersionNotFoundError(key);
      if (version.status !== "completed") throw new VersionNotCompletedError(key, version.status);
      const previous = this.store.currentVersion(key.sourceCode, key.variant);
      const promoted = this.store.promote(version.id, this.now());
      this.log.info(
        {
          event: "version.promoted",
          versionId: promoted.id,
          version: describeKey(key),
          previousVersionId: previous?.id ?? null,
        },
        "Version promoted"
      );
      return promoted;
    });
  }

  promote(key: VersionKey): Promise<DataVersion> {
    return this.withVersion(key, () => this.promoteLocked(key));
  }

  abort(key: VersionKey, reason = "Aborted by caller"): Promise<DataVersion> {
    return this.withVersion(key, () => {
      const version = this.store.findVersion(key);
      if (!version) throw new VersionNotFoundError(key);
      if (isTerminal(version)) throw new VersionClosedError(key, version.status);
      return this.fail(version, reason, "aborted");
    });
  }

  /**
   * Fail every open version that has received no part within the timeout.
   */
  async expireStale(): Promise<DataVersion[]> {
    const cutoff = new Date(this.now().getTime() - this.partTimeoutMs);
    const expired: DataVersion[] = [];
    for (const stale of this.store.listStaleVersions(cutoff)) {
      const result = await this.withVersion(stale, () => {
        const fresh = this.store.findVersion(stale);
        if (!fresh || !this.isTimedOut(fresh)) return undefined;
        return this.fail(fresh, `Timed out waiting for parts after ${this.partTimeoutMs} ms`, "part_timeout");
      });
      if (result) expired.push(result);
    }
    return expired;
  }
}
