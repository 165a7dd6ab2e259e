/**
 * @fileoverview End-to-end tests for ingestion, multi-part assembly and version promotion
 * against an in-memory SQLite database.
 */

import { describe, it, expect, afterEach } from "vitest";
import Database from "better-sqlite3";
import * as XLSX from "xlsx";
import { createIngestionCore, type IngestionCore, type IngestionCoreOptions } from "../ingest.js";
import { createLogger } from "../logger.js";
import {
  PartCountMismatchError,
  SourceInUseError,
  StructuralError,
  UnknownSourceError,
  UnknownVariantError,
  VersionClosedError,
  VersionNotCompletedError,
  VersionNotFoundError,
} from "../errors.js";

const RVU_HEADER = "HCPCS,MOD,WORK RVU";
const rvuCsv = (...lines: string[]) => [RVU_HEADER, ...lines].join("\n");

const PTP_HEADER =
  "Column 1,Column 2,*=in existence prior to 1996,Effective Date,Deletion Date,Modifier 0=not allowed,PTP Edit Rationale";
const ptpCsv = (components: string[], comprehensive = "0001A") =>
  [PTP_HEADER, ...components.map((c) => `${comprehensive},${c},,20240101,*,1,Standards of medical practice`)].join("\n");

const codes = (prefix: string, n: number) => Array.from({ length: n }, (_, i) => `${prefix}${i + 1}`);

let core: IngestionCore | undefined;
let db: Database.Database;

function makeCore(options: Omit<IngestionCoreOptions, "database"> = {}): IngestionCore {
  db = new Database(":memory:");
  core = createIngestionCore({ ...options, database: db });
  return core;
}

afterEach(() => {
  core?.close();
  core = undefined;
});

describe("single-part ingestion", () => {
  it("ingests, promotes and reads one RVU row", async () => {
    const c = makeCore();
    const res = await c.ingestFile({
      sourceCode: "PFS_RVU",
      variant: null,
      versionLabel: "2024A",
      content: rvuCsv("99213,,1.5"),
      fileName: "PPRRVU24_JAN.csv",
    });

    expect(res.status).toBe("completed");
    expect(res.acceptedRows).toBe(1);
    expect(res.issues).toEqual([]);
    expect(res.promoted).toBe(false);
    expect(res.version).toMatchObject({ variant: null, recordCount: 1, isCurrent: false, partsReceived: [1] });
    expect(res.report).toMatchObject({ rowsAttempted: 1, rowsAccepted: 1, failed: false });

    expect(c.readCurrentRows("PFS_RVU", null)).toEqual([]);
    const promoted = await c.promoteVersion("PFS_RVU", null, "2024A");
    expect(promoted.isCurrent).toBe(true);

    const rows = c.readCurrentRows("PFS_RVU", null);
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ hcpcs_code: "99213", modifier: null, work_rvu: 1.5, status_code: null });
  });

  it("reports unmatched headers and rejected rows without failing", async () => {
    const c = makeCore();
    const res = await c.ingestFile({
      sourceCode: "PFS_RVU",
      variant: null,
      versionLabel: "2024A",
      content: "HCPCS,MOD,WORK RVU,NOTES\n99213,,1.5,x\n99214,,abc,y\n",
      fileName: "rvu.csv",
    });
    expect(res.status).toBe("completed");
    expect(res.issues.map((i) => [i.kind, i.severity, i.ref.line])).toEqual([
      ["unmatched_header", "warn", 1],
      ["type_error", "error", 3],
    ]);
    expect(res.report).toMatchObject({ rowsAttempted: 2, rowsAccepted: 1, rowsRejected: 1, warnings: 1, errors: 1 });
  });

  it("reports repeated headers apart from unknown ones", async () => {
    const c = makeCore();
    const res = await c.ingestFile({
      sourceCode: "PFS_RVU",
      variant: null,
      versionLabel: "2024A",
      content: "HCPCS,CPT,MOD,WORK RVU,NOTES\n99213,99999,,1.5,x\n",
      fileName: "rvu.csv",
    });
    expect(res.status).toBe("completed");
    expect(res.issues.map((i) => [i.kind, i.column, i.ref.line, i.message])).toEqual([
      ["unmatched_header", null, 1, 'Header "NOTES" matches no column of PFS_RVU'],
      ["duplicate_header", "hcpcs_code", 1, 'Header "CPT" also maps to hcpcs_code; column 1 is used'],
    ]);
    expect(res.report.columnStats.find((s) => s.column === "hcpcs_code")?.sampleValues).toEqual(["99213"]);
  });

  it("references file lines past cells that span lines", async () => {
    const c = makeCore();
    const res = await c.ingestFile({
      sourceCode: "PFS_RVU",
      variant: null,
      versionLabel: "2024A",
      content: 'HCPCS,MOD,WORK RVU,DESCRIPTION\n99213,,1.5,"Office visit\nestablished"\n99214,,abc,Office visit\n',
      fileName: "rvu.csv",
    });
    expect(res.issues.map((i) => [i.kind, i.ref.line])).toEqual([["type_error", 4]]);
    expect(c.getVersionReport("PFS_RVU", null, "2024A")?.issues.map((i) => i.ref.line)).toEqual([4]);
  });

  it("promotes in the same call when asked to", async () => {
    const c = makeCore();
    const res = await c.ingestFile({
      sourceCode: "pfs_rvu",
      variant: null,
      versionLabel: "2024A",
      content: rvuCsv("99213,,1.5"),
      fileName: "rvu.csv",
      promote: true,
    });
    expect(res.promoted).toBe(true);
    expect(res.version.isCurrent).toBe(true);
  });

  it("reads workbooks with title rows above the header", async () => {
    const c = makeCore();
    const sheet = XLSX.utils.aoa_to_sheet([
      ["CY2024 Physician Fee Schedule"],
      [],
      ["HCPCS", "MOD", "WORK RVU"],
      ["99213", "", "1.5"],
      ["99214", "26", "2.25"],
    ]);
    const book = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(book, sheet, "Data");
    const bytes = new Uint8Array(XLSX.write(book, { type: "array", bookType: "xlsx" }));

    const res = await c.ingestFile({
      sourceCode: "PFS_RVU",
      variant: null,
      versionLabel: "2024A",
      content: bytes,
      fileName: "PPRRVU24.xlsx",
      promote: true,
    });
    expect(res.status).toBe("completed");
    expect(res.acceptedRows).toBe(2);
    const rows = c.readCurrentRows("PFS_RVU", null);
    expect(rows.map((r) => [r.hcpcs_code, r.modifier, r.work_rvu])).toEqual([
      ["99213", null, 1.5],
      ["99214", "26", 2.25],
    ]);
  });

  it("fails a version with no accepted rows", async () => {
    const c = makeCore();
    const res = await c.ingestFile({
      sourceCode: "PFS_RVU",
      variant: null,
      versionLabel: "2024A",
      content: `${RVU_HEADER}\n`,
      fileName: "rvu.csv",
    });
    expect(res.status).toBe("failed");
    expect(res.issues.map((i) => i.kind)).toEqual(["no_data_rows", "empty_version"]);
    expect(res.report.failed).toBe(true);
    expect(res.version.errorMessage).toBe("Version has no accepted rows");
    expect(c.getVersionReport("PFS_RVU", null, "2024A")?.issues.map((i) => [i.kind, i.ref.partIndex])).toEqual([
      ["no_data_rows", 1],
      ["empty_version", 1],
    ]);
  });

  it("keeps an MUE of zero through storage", async () => {
    const c = makeCore();
    const res = await c.ingestFile({
      sourceCode: "NCCI_MUE_PRAC",
      variant: null,
      versionLabel: "2024Q2",
      content: [
        "HCPCS/CPT Code,Practitioner Services MUE Values,MUE Adjudication Indicator,MUE Rationale",
        "a0021,0,2 Date of Service Edit: Policy,CMS Policy",
        "99213,1,3 Date of Service Edit: Clinical,Clinical Data",
      ].join("\n"),
      fileName: "MCR_MUE_PractitionerServices.csv",
      promote: true,
    });
    expect(res.issues).toEqual([]);
    expect(c.readCurrentRows("NCCI_MUE_PRAC", null)).toEqual([
      {
        hcpcs_code: "A0021",
        mue_value: 0,
        mue_rationale: "CMS Policy",
        mai_id: 2,
        mai_description: "2 Date of Service Edit: Policy",
      },
      {
        hcpcs_code: "99213",
        mue_value: 1,
        mue_rationale: "Clinical Data",
        mai_id: 3,
        mai_description: "3 Date of Service Edit: Clinical",
      },
    ]);
  });
});

describe("structural errors", () => {
  it("throws for unknown sources and variants before creating a version", async () => {
    const c = makeCore();
    const base = { versionLabel: "2024Q1", content: ptpCsv(["A1"]), fileName: "ptp.txt" };

    await expect(c.ingestFile({ ...base, sourceCode: "NOPE", variant: null })).rejects.toBeInstanceOf(UnknownSourceError);
    await expect(c.ingestFile({ ...base, sourceCode: "NCCI_PTP", variant: null })).rejects.toBeInstanceOf(
      UnknownVariantError
    );
    await expect(c.ingestFile({ ...base, sourceCode: "NCCI_PTP", variant: "FACILITY" })).rejects.toBeInstanceOf(
      UnknownVariantError
    );
    await expect(
      c.ingestFile({ ...base, sourceCode: "PFS_RVU", variant: "HOSPITAL", content: rvuCsv("99213,,1") })
    ).rejects.toBeInstanceOf(UnknownVariantError);

    expect(c.store.hasVersions("NCCI_PTP")).toBe(false);
    expect(c.store.hasVersions("PFS_RVU")).toBe(false);
  });

  it("fails the version when a required header is missing", async () => {
    const c = makeCore();
    const err = await c
      .ingestFile({
        sourceCode: "PFS_RVU",
        variant: null,
        versionLabel: "2024A",
        content: "MOD,WORK RVU\n,1.5\n",
        fileName: "rvu.csv",
      })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StructuralError);
    if (!(err instanceof StructuralError)) return;
    expect(err.issues.map((i) => [i.kind, i.column, i.severity])).toEqual([["missing_header", "hcpcs_code", "fatal"]]);
    expect(c.getVersion("PFS_RVU", null, "2024A")?.status).toBe("failed");
    const kept = c.getVersionReport("PFS_RVU", null, "2024A");
    expect(kept?.issues.map((i) => [i.kind, i.column, i.ref.line])).toEqual([["missing_header", "hcpcs_code", 1]]);
    expect(kept?.report).toMatchObject({ rowsAttempted: 0, fatal: 1, failed: true });
  });

  it("rejects a part count other than one for single-part sources", async () => {
    const c = makeCore();
    await expect(
      c.ingestFile({
        sourceCode: "PFS_RVU",
        variant: null,
        versionLabel: "2024A",
        declaredPartCount: 2,
        content: rvuCsv("99213,,1.5"),
        fileName: "rvu.csv",
      })
    ).rejects.toBeInstanceOf(PartCountMismatchError);
    expect(c.getVersion("PFS_RVU", null, "2024A")).toMatchObject({ status: "failed", partCountExpected: 1 });
  });

  it("rejects disagreeing part counts and out-of-range indices", async () => {
    const c = makeCore();
    const submit = (label: string, partIndex: number, declaredPartCount: number) =>
      c.ingestFile({
        sourceCode: "NCCI_PTP",
        variant: "HOSPITAL",
        versionLabel: label,
        partIndex,
        declaredPartCount,
        content: ptpCsv(codes(`P${partIndex}-`, 2)),
        fileName: `ptp_${partIndex}.txt`,
      });

    await submit("2024Q1", 1, 2);
    await expect(submit("2024Q1", 2, 3)).rejects.toBeInstanceOf(PartCountMismatchError);
    expect(c.getVersion("NCCI_PTP", "HOSPITAL", "2024Q1")?.status).toBe("failed");

    const err = await submit("2024Q2", 3, 2).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StructuralError);
    if (!(err instanceof StructuralError)) return;
    expect(err.issues[0].kind).toBe("part_index_out_of_range");
    expect(c.getVersion("NCCI_PTP", "HOSPITAL", "2024Q2")?.status).toBe("failed");
  });
});

describe("multi-part assembly", () => {
  const submitPtp = (c: IngestionCore, partIndex: number, components: string[], label = "2024Q1") =>
    c.ingestFile({
      sourceCode: "NCCI_PTP",
      variant: "hospital",
      versionLabel: label,
      partIndex,
      declaredPartCount: 2,
      content: ptpCsv(components),
      fileName: `ccipra_${partIndex}.txt`,
    });

  it("completes once both parts arrive and keeps variants apart", async () => {
    const c = makeCore();
    const first = await submitPtp(c, 1, codes("A", 5));
    expect(first.status).toBe("processing");
    expect(first.assembly).toMatchObject({ received: 1, expected: 2, complete: false, partsReceived: [1] });

    const second = await submitPtp(c, 2, codes("B", 5));
    expect(second.status).toBe("completed");
    expect(second.version).toMatchObject({ variant: "HOSPITAL", recordCount: 10, partsReceived: [1, 2] });
    expect(second.assembly).toEqual({
      received: 2,
      expected: 2,
      complete: true,
      partsReceived: [1, 2],
      partRowCounts: { 1: 5, 2: 5 },
    });

    await c.promoteVersion("NCCI_PTP", "HOSPITAL", "2024Q1");
    const rows = c.readCurrentRows("NCCI_PTP", "HOSPITAL");
    expect(rows).toHaveLength(10);
    expect(rows[0]).toEqual({
      comprehensive_code: "0001A",
      component_code: "A1",
      modifier_indicator: 1,
      effective_date: "2024-01-01",
      deletion_date: null,
      rationale: "Standards of medical practice",
      prior_1996_flag: false,
    });
    expect(c.readCurrentRows("NCCI_PTP", "PRACTITIONER")).toEqual([]);
  });

  it("accepts parts in any order", async () => {
    const c = makeCore();
    expect((await submitPtp(c, 2, codes("B", 3))).status).toBe("processing");
    expect((await submitPtp(c, 1, codes("A", 3))).status).toBe("completed");
  });

  it("assembles parts submitted at the same time", async () => {
    const c = makeCore();
    const results = await Promise.all([submitPtp(c, 1, codes("A", 1)), submitPtp(c, 2, codes("B", 1))]);
    expect(results.map((r) => r.status).sort()).toEqual(["completed", "processing"]);
    expect(c.listVersions("NCCI_PTP", "HOSPITAL")).toHaveLength(1);
    expect(c.getVersion("NCCI_PTP", "HOSPITAL", "2024Q1")).toMatchObject({
      status: "completed",
      recordCount: 2,
      partsReceived: [1, 2],
    });
  });

  it("replaces a resubmitted part instead of appending", async () => {
    const c = makeCore();
    await submitPtp(c, 1, codes("A", 5));
    const again = await submitPtp(c, 1, codes("A", 3));
    expect(again.assembly).toMatchObject({ received: 1, partRowCounts: { 1: 3 } });

    const done = await submitPtp(c, 2, codes("B", 5));
    expect(done.version.recordCount).toBe(8);
  });

  it("refuses to promote an incomplete version", async () => {
    const c = makeCore();
    await submitPtp(c, 1, codes("A", 5));
    await expect(c.promoteVersion("NCCI_PTP", "HOSPITAL", "2024Q1")).rejects.toBeInstanceOf(VersionNotCompletedError);
    expect(c.getVersion("NCCI_PTP", "HOSPITAL", "2024Q1")?.isCurrent).toBe(false);
    await expect(c.promoteVersion("NCCI_PTP", "HOSPITAL", "1999Q1")).rejects.toBeInstanceOf(VersionNotFoundError);
  });

  it("fails a version whose key repeats across parts", async () => {
    const c = makeCore();
    const rvu = c.registry.resolve("PFS_RVU");
    c.registerSource({ ...rvu, sourceCode: "PFS_RVU_SPLIT", multiPart: { enabled: true } });
    const submit = (partIndex: number, content: string) =>
      c.ingestFile({
        sourceCode: "PFS_RVU_SPLIT",
        variant: null,
        versionLabel: "2024A",
        partIndex,
        declaredPartCount: 2,
        content,
        fileName: `part${partIndex}.csv`,
      });

    await submit(1, rvuCsv("99213,,1.5", "99214,,2.0"));
    const res = await submit(2, rvuCsv("99213,,1.7"));

    expect(res.status).toBe("failed");
    expect(res.report.failed).toBe(true);
    expect(res.issues).toEqual([
      {
        ref: { fileName: "part2.csv", line: 2, partIndex: 2 },
        column: null,
        kind: "cross_part_duplicate",
        severity: "fatal",
        message: 'Unique key ["99213",null] also appears in part 1 line 2',
      },
    ]);
    expect(res.version.errorMessage).toBe("1 unique key(s) repeated across parts");
    expect(c.getVersionReport("PFS_RVU_SPLIT", null, "2024A")?.issues).toEqual(res.issues);
    await expect(submit(2, rvuCsv("99215,,1.7"))).rejects.toBeInstanceOf(VersionClosedError);
    await expect(c.promoteVersion("PFS_RVU_SPLIT", null, "2024A")).rejects.toBeInstanceOf(VersionNotCompletedError);
  });
});

describe("promotion", () => {
  const ingestRvu = (c: IngestionCore, label: string, ...lines: string[]) =>
    c.ingestFile({ sourceCode: "PFS_RVU", variant: null, versionLabel: label, content: rvuCsv(...lines), fileName: `${label}.csv` });

  it("keeps exactly one current version and lists newest first", async () => {
    const c = makeCore();
    await ingestRvu(c, "2024A", "99213,,1.5");
    await ingestRvu(c, "2024B", "99213,,1.6");
    await c.promoteVersion("PFS_RVU", null, "2024A");
    await c.promoteVersion("PFS_RVU", null, "2024B");

    const versions = c.listVersions("PFS_RVU", null);
    expect(versions.map((v) => [v.versionLabel, v.isCurrent])).toEqual([
      ["2024B", true],
      ["2024A", false],
    ]);
    expect(c.readCurrentRows("PFS_RVU", null).map((r) => r.work_rvu)).toEqual([1.6]);
  });

  it("leaves the previous version current when promotion fails partway", async () => {
    const c = makeCore();
    await ingestRvu(c, "2024A", "99213,,1.5");
    await c.promoteVersion("PFS_RVU", null, "2024A");
    await ingestRvu(c, "2024B", "99213,,1.6");

    db.exec(`CREATE TRIGGER block_promotion BEFORE UPDATE OF is_current ON data_versions
             WHEN NEW.is_current = 1
             BEGIN SELECT RAISE(ABORT, 'simulated'); END`);

    await expect(c.promoteVersion("PFS_RVU", null, "2024B")).rejects.toThrow("simulated");
    expect(c.getVersion("PFS_RVU", null, "2024A")?.isCurrent).toBe(true);
    expect(c.getVersion("PFS_RVU", null, "2024B")?.isCurrent).toBe(false);
    expect(c.readCurrentRows("PFS_RVU", null).map((r) => r.work_rvu)).toEqual([1.5]);
  });

  it("rejects further parts for completed versions", async () => {
    const c = makeCore();
    await ingestRvu(c, "2024A", "99213,,1.5");
    await expect(ingestRvu(c, "2024A", "99213,,1.6")).rejects.toBeInstanceOf(VersionClosedError);
  });

  it("warns about repeated files and sharp row count changes", async () => {
    const c = makeCore();
    await ingestRvu(c, "2024A", "99211,,0.2", "99212,,0.7", "99213,,1.5", "99214,,2.0");
    const same = await c.ingestFile({
      sourceCode: "PFS_RVU",
      variant: null,
      versionLabel: "2024B",
      content: rvuCsv("99211,,0.2", "99212,,0.7", "99213,,1.5", "99214,,2.0"),
      fileName: "copy.csv",
    });
    expect(same.status).toBe("completed");
    expect(same.issues.map((i) => [i.kind, i.severity])).toEqual([["duplicate_file", "warn"]]);

    const shrunk = await ingestRvu(c, "2024C", "99213,,1.5");
    expect(shrunk.status).toBe("completed");
    expect(shrunk.issues.map((i) => i.kind)).toEqual(["row_count_shift"]);
  });
});

describe("abort and timeouts", () => {
  const submitPart1 = (c: IngestionCore) =>
    c.ingestFile({
      sourceCode: "NCCI_PTP",
      variant: "PRACTITIONER",
      versionLabel: "2024Q1",
      partIndex: 1,
      declaredPartCount: 2,
      content: ptpCsv(codes("A", 2)),
      fileName: "ptp_1.txt",
    });

  it("aborts an open version", async () => {
    const c = makeCore();
    await submitPart1(c);
    const aborted = await c.abortVersion("NCCI_PTP", "PRACTITIONER", "2024Q1");
    expect(aborted).toMatchObject({ status: "failed", errorMessage: "Aborted by caller" });
    await expect(c.abortVersion("NCCI_PTP", "PRACTITIONER", "2024Q1")).rejects.toBeInstanceOf(VersionClosedError);
    await expect(c.abortVersion("NCCI_PTP", "PRACTITIONER", "2023Q4")).rejects.toBeInstanceOf(VersionNotFoundError);
  });

  it("expires versions that wait too long for parts", async () => {
    let now = new Date("2024-01-01T00:00:00.000Z");
    const c = makeCore({ now: () => now, config: { partTimeoutMs: 60_000 } });
    await submitPart1(c);

    now = new Date("2024-01-01T00:00:30.000Z");
    expect(await c.expireStaleVersions()).toEqual([]);

    now = new Date("2024-01-01T00:01:01.000Z");
    const expired = await c.expireStaleVersions();
    expect(expired.map((v) => [v.versionLabel, v.status])).toEqual([["2024Q1", "failed"]]);
    expect(expired[0].errorMessage).toBe("Timed out waiting for parts after 60000 ms");
  });

  it("closes a timed-out version on the next submission", async () => {
    let now = new Date("2024-01-01T00:00:00.000Z");
    const c = makeCore({ now: () => now, config: { partTimeoutMs: 60_000 } });
    await submitPart1(c);
    now = new Date("2024-01-02T00:00:00.000Z");
    await expect(
      c.ingestFile({
        sourceCode: "NCCI_PTP",
        variant: "PRACTITIONER",
        versionLabel: "2024Q1",
        partIndex: 2,
        declaredPartCount: 2,
        content: ptpCsv(codes("B", 2)),
        fileName: "ptp_2.txt",
      })
    ).rejects.toBeInstanceOf(VersionClosedError);
    expect(c.getVersion("NCCI_PTP", "PRACTITIONER", "2024Q1")?.status).toBe("failed");
  });
});

describe("version reports", () => {
  const submitSplit = (c: IngestionCore, partIndex: number, content: string) =>
    c.ingestFile({
      sourceCode: "PFS_RVU_SPLIT",
      variant: null,
      versionLabel: "2024A",
      partIndex,
      declaredPartCount: 2,
      content,
      fileName: `part${partIndex}.csv`,
    });
  const splitCore = () => {
    const c = makeCore();
    c.registerSource({ ...c.registry.resolve("PFS_RVU"), sourceCode: "PFS_RVU_SPLIT", multiPart: { enabled: true } });
    return c;
  };

  it("keeps the issues of earlier parts with the version", async () => {
    const c = splitCore();
    await submitSplit(c, 1, rvuCsv("99213,,1.5", "99214,,abc"));
    const done = await submitSplit(c, 2, rvuCsv("99215,,2.0"));
    expect(done.issues).toEqual([]);

    const kept = c.getVersionReport("PFS_RVU_SPLIT", null, "2024A");
    expect(kept?.version.status).toBe("completed");
    expect(kept?.issues.map((i) => [i.kind, i.column, i.ref])).toEqual([
      ["type_error", "work_rvu", { fileName: "part1.csv", line: 3, partIndex: 1 }],
    ]);
    expect(kept?.report).toMatchObject({
      rowsAttempted: 3,
      rowsAccepted: 2,
      rowsRejected: 1,
      rowsSkipped: 0,
      errors: 1,
      failed: false,
    });
    const stats = kept?.report.columnStats ?? [];
    expect(stats.find((s) => s.column === "hcpcs_code")).toEqual({
      column: "hcpcs_code",
      nullCount: 0,
      nullPercentage: 0,
      sampleValues: ["99213", "99215"],
    });
    expect(stats.find((s) => s.column === "modifier")).toMatchObject({ nullCount: 2, nullPercentage: 100 });
  });

  it("replaces a part's issues when the part is resubmitted", async () => {
    const c = splitCore();
    await submitSplit(c, 1, rvuCsv("99213,,1.5", "99214,,abc"));
    await submitSplit(c, 1, rvuCsv("99213,,1.5"));

    const kept = c.getVersionReport("PFS_RVU_SPLIT", null, "2024A");
    expect(kept?.version.status).toBe("processing");
    expect(kept?.issues).toEqual([]);
    expect(kept?.report).toMatchObject({ rowsAttempted: 1, rowsAccepted: 1, rowsRejected: 0 });
    expect(kept?.report.columnStats.find((s) => s.column === "hcpcs_code")?.sampleValues).toEqual(["99213"]);
  });

  it("returns nothing for unknown versions", () => {
    const c = splitCore();
    expect(c.getVersionReport("PFS_RVU_SPLIT", null, "1999A")).toBeUndefined();
  });
});

describe("logging", () => {
  it("logs at the configured level", () => {
    expect(makeCore({ config: { logLevel: "debug" } }).logger.level).toBe("debug");
  });

  it("uses a caller's logger as given", () => {
    const own = createLogger("error");
    expect(makeCore({ config: { logLevel: "debug" }, logger: own }).logger).toBe(own);
  });
});

describe("source configuration at runtime", () => {
  it("persists alias additions for the next core on the same database", () => {
    const c = makeCore();
    c.addAliases("PFS_RVU", "hcpcs_code", ["Proc Cd"]);
    const reopened = createIngestionCore({ database: db });
    expect(reopened.registry.resolve("PFS_RVU").aliases.hcpcs_code).toContain("Proc Cd");
  });

  it("locks source definitions once versions exist", async () => {
    const c = makeCore();
    await c.ingestFile({
      sourceCode: "PFS_RVU",
      variant: null,
      versionLabel: "2024A",
      content: rvuCsv("99213,,1.5"),
      fileName: "rvu.csv",
    });
    const rvu = c.registry.resolve("PFS_RVU");
    expect(() => c.registerSource({ ...rvu, name: "Renamed" })).toThrow(SourceInUseError);
    expect(c.addAliases("PFS_RVU", "work_rvu", ["RVU WORK"]).aliases.work_rvu).toContain("RVU WORK");
  });
});
