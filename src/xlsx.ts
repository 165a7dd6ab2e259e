import * as XLSX from "xlsx";
import type { TabularData } from "./types.js";

/**
 * Read an Excel workbook into an array-of-arrays of display strings.
 * - Chooses the main sheet (prefers `Data`, otherwise the first sheet).
 * - Keeps every row, including title rows above the header, so header
 *   detection can scan past them.
 * - Line numbers are worksheet row numbers.
 */
export function readXlsxTable(fileBytes: Uint8Array, sheetName?: string): TabularData {
  const workbook = XLSX.read(fileBytes, { type: "array", cellDates: false });
  const name = sheetName ?? chooseMainSheet(workbook.SheetNames);
  const sheet = name ? workbook.Sheets[name] : undefined;
  if (!sheet) return { rows: [], lines: [] };

  const json = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: false,
    defval: "",
    blankrows: true,
  });
  const rows = json.map((row) => row.map((cell) => (cell === null || cell === undefined ? "" : String(cell))));
  while (rows.length && rows[rows.length - 1].every((v) => v.trim() === "")) rows.pop();
  // sheet_to_json starts at the first row of the used range
  const firstRow = sheet["!ref"] ? XLSX.utils.decode_range(sheet["!ref"]).s.r + 1 : 1;
  return { rows, lines: rows.map((_, i) => firstRow + i) };
}

function chooseMainSheet(sheetNames: string[]): string | undefined {
  const preferred = sheetNames.find((name) => name.trim().toLowerCase() === "data");
  return preferred ?? sheetNames[0];
}
