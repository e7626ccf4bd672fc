import type { FileMeasurement } from "../application/line-counter.js";

export type SccCsvParseResult =
  | { ok: true; rows: readonly FileMeasurement[] }
  | { ok: false; reason: string };

const NUMERIC_COLUMNS = {
  lines: "Lines",
  code: "Code",
  comments: "Comments",
  blanks: "Blanks",
  bytes: "Bytes",
} as const;

// scc names the path column "Provider"; some releases call it "Location"
const PATH_COLUMNS = ["Provider", "Location"];

export const splitCsvLine = (line: string): readonly string[] => {
  const fields: string[] = [];
  let current = "";
  let quoted = false;

  for (let index = 0; index < line.length; index += 1) {
    const char = line.charAt(index);
    if (quoted) {
      if (char === '"' && line.charAt(index + 1) === '"') {
        current += '"';
        index += 1;
      } else if (char === '"') {
        quoted = false;
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === ",") {
      fields.push(current);
      current = "";
    } else {
      current += char;
    }
  }

  fields.push(current);
  return fields;
};

const parseCount = (value: string | undefined): number | null => {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return null;
  }

  return Number.parseInt(value.trim(), 10);
};

/** Parses `scc --format=csv --by-file` output. Paths are returned as scc printed them. */
export const parseSccCsv = (raw: string): SccCsvParseResult => {
  const lines = raw.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const [headerLine, ...dataLines] = lines;
  if (headerLine === undefined) {
    return { ok: true, rows: [] };
  }

  const header = splitCsvLine(headerLine).map((column) => column.trim());
  const languageIndex = header.indexOf("Language");
  const pathIndex = header.findIndex((column) => PATH_COLUMNS.includes(column));
  const numericIndices = {
    lines: header.indexOf(NUMERIC_COLUMNS.lines),
    code: header.indexOf(NUMERIC_COLUMNS.code),
    comments: header.indexOf(NUMERIC_COLUMNS.comments),
    blanks: header.indexOf(NUMERIC_COLUMNS.blanks),
    bytes: header.indexOf(NUMERIC_COLUMNS.bytes),
  };
  if (languageIndex < 0 || pathIndex < 0 || Object.values(numericIndices).some((index) => index < 0)) {
    return { ok: false, reason: `unexpected header: ${headerLine}` };
  }

  const rows: FileMeasurement[] = [];
  for (const line of dataLines) {
    const fields = splitCsvLine(line);
    const language = fields[languageIndex];
    const path = fields[pathIndex];
    const lineCount = parseCount(fields[numericIndices.lines]);
    const code = parseCount(fields[numericIndices.code]);
    const comments = parseCount(fields[numericIndices.comments]);
    const blanks = parseCount(fields[numericIndices.blanks]);
    const bytes = parseCount(fields[numericIndices.bytes]);
    if (
      language === undefined ||
      path === undefined ||
      lineCount === null ||
      code === null ||
      comments === null ||
      blanks === null ||
      bytes === null
    ) {
      return { ok: false, reason: `unparsable row: ${line}` };
    }

    rows.push({ language, path, lines: lineCount, code, comments, blanks, bytes });
  }

  return { ok: true, rows };
};
