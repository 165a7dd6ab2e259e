import type { TabularData } from "./types.js";

export type Delimiter = "," | ";" | "\t" | "|";

const DELIMITERS: Delimiter[] = [",", "\t", "|", ";"];

/**
 * Parse delimiter-separated text into an array-of-arrays using a small state machine
 * that handles quoted fields, doubled quotes and delimiters/newlines inside quotes.
 * Each row keeps the file line it starts on.
 * No header interpretation happens here; trailing blank lines are dropped.
 */
export function parseDsv(text: string, delim: Delimiter = ","): TabularData {
  const rows: string[][] = [];
  const lines: number[] = [];
  let current: string[] = [];
  let field = "";
  let inQuotes = false;
  let line = 1;
  let rowStart = 1;

  const pushField = () => {
    current.push(field);
    field = "";
  };
  const pushRow = () => {
    rows.push(current);
    lines.push(rowStart);
    current = [];
  };

  // Strip a UTF-8 BOM left by spreadsheet exports
  const src = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  for (let i = 0; i < src.length; i++) {
    const c = src[i];
    if (inQuotes) {
      if (c === `"`) {
        if (src[i + 1] === `"`) {
          field += `"`;
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += c;
        if (c === "\n") line++;
      }
    } else {
      if (c === `"` && field === "") {
        inQuotes = true;
      } else if (c === delim) {
        pushField();
      } else if (c === "\n") {
        pushField();
        pushRow();
        line++;
        rowStart = line;
      } else if (c === "\r") {
        // ignore CR
      } else {
        field += c;
      }
    }
  }
  pushField();
  pushRow();
  while (rows.length && rows[rows.length - 1].every((v) => v.trim() === "")) {
    rows.pop();
    lines.pop();
  }
  return { rows, lines };
}

export function parseDsvRaw(text: string, delim: Delimiter = ","): string[][] {
  return parseDsv(text, delim).rows;
}

/**
 * Sniff the delimiter of a text export from its first lines.
 * Prefers the candidate that yields the most columns with a stable count across lines.
 */
export function detectDelimiterFromText(text: string): Delimiter {
  const sample = text
    .slice(0, 8192)
    .split(/\r?\n/)
    .filter((l) => l.trim() !== "")
    .slice(0, 20);
  if (!sample.length) return ",";
  let best: { delim: Delimiter; score: number } = { delim: ",", score: 0 };
  for (const delim of DELIMITERS) {
    const counts = sample.map((line) => countOutsideQuotes(line, delim));
    const max = Math.max(...counts);
    if (max === 0) continue;
    const stable = counts.filter((n) => n === max).length / counts.length;
    const score = max * stable;
    if (score > best.score) best = { delim, score };
  }
  return best.delim;
}

function countOutsideQuotes(line: string, delim: Delimiter): number {
  let n = 0;
  let inQuotes = false;
  for (const c of line) {
    if (c === `"`) inQuotes = !inQuotes;
    else if (c === delim && !inQuotes) n++;
  }
  return n;
}

/**
 * Parse CSV or TXT text, sniffing the delimiter unless one is given.
 */
export function parseDelimitedText(text: string, delim?: Delimiter): TabularData {
  return parseDsv(text, delim ?? detectDelimiterFromText(text));
}
