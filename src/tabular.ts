import type { TabularData } from "./types.js";
import { parseDelimitedText } from "./csv.js";
import { readXlsxTable } from "./xlsx.js";
import { StructuralError, fatalIssue } from "./errors.js";

export const SUPPORTED_EXTENSIONS = ["csv", "txt", "xlsx", "xls"] as const;
export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export function fileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  return dot >= 0 ? fileName.slice(dot + 1).toLowerCase() : "";
}

const isSupported = (ext: string): ext is SupportedExtension =>
  (SUPPORTED_EXTENSIONS as readonly string[]).includes(ext);

/**
 * Decode an uploaded file into a cell matrix with the file line of each row.
 * `.xlsx`/`.xls` go through the workbook reader; `.csv`/`.txt` are decoded as UTF-8
 * (falling back to latin-1 when the bytes are not valid UTF-8) and delimiter-sniffed.
 */
export function readTabular(content: string | Uint8Array, fileName: string): TabularData {
  const ext = fileExtension(fileName);
  if (!isSupported(ext)) {
    unreadable(
      fileName,
      ext
        ? `File type ".${ext}" not supported. Allowed: ${SUPPORTED_EXTENSIONS.join(", ")}`
        : `File "${fileName}" has no extension`
    );
  }
  if (ext === "xlsx" || ext === "xls") {
    if (typeof content === "string") unreadable(fileName, `Workbook "${fileName}" must be submitted as bytes`);
    return readXlsxTable(content);
  }
  return parseDelimitedText(typeof content === "string" ? content : decodeText(content));
}

function unreadable(fileName: string, message: string): never {
  throw new StructuralError(message, [fatalIssue("unreadable_file", message, { fileName, line: 0 })]);
}

function decodeText(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    return new TextDecoder("latin1").decode(bytes);
  }
}
