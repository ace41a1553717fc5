import fs from "fs";
import zlib from "zlib";
import Papa from "papaparse";

export type Table = {
  columns: string[];
  rows: Record<string, string>[];
};

export type NumericMatrix = {
  rows: string[];
  columns: string[];
  values: number[][];
};

export function die(msg: string): never {
  throw new Error(msg);
}

export function readText(path: string): string {
  return fs.readFileSync(path, "utf8");
}

export function writeText(path: string, data: string): void {
  fs.writeFileSync(path, data, "utf8");
}

export function asNum(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}

export function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function readMaybeGzip(path: string): string {
  const buf = fs.readFileSync(path);
  return path.endsWith(".gz") ? zlib.gunzipSync(buf).toString("utf8") : buf.toString("utf8");
}

export function parseCsv(text: string, source = "<csv>"): Table {
  const res = Papa.parse<Record<string, string>>(text, {
    header: true,
    delimiter: ",",
    skipEmptyLines: true,
  });
  const err = res.errors[0];
  if (err) die(`Could not parse ${source} (row ${err.row}): ${err.message}`);
  return { columns: res.meta.fields ?? [], rows: res.data };
}

export function readCsv(path: string): Table {
  if (!fs.existsSync(path)) die(`Cannot find file '${path}'`);
  return parseCsv(readMaybeGzip(path), path);
}

export function readLines(path: string): string[] {
  if (!fs.existsSync(path)) die(`File not found: '${path}'`);
  const lines = readMaybeGzip(path).split("\n");
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  if (lines.length === 0) die(`No lines found in ${path}`);
  return lines;
}

export function requireColumn(table: Table, column: string, source: string): void {
  if (!table.columns.includes(column)) die(`Column '${column}' not found in header for ${source}`);
}

export function numericCell(row: Record<string, string>, column: string, source: string): number {
  const raw = row[column];
  const n = asNum(raw);
  if (n === undefined) die(`Non-numeric value '${raw ?? ""}' in column '${column}' of ${source}`);
  return n;
}

/** Square table whose first column holds the row ids, e.g. a distance matrix. */
export function readSquareMatrix(path: string): NumericMatrix {
  const table = readCsv(path);
  const [indexCol, ...columns] = table.columns;
  if (indexCol === undefined || columns.length === 0) die(`No columns found in ${path}`);
  const rows = table.rows.map((r) => r[indexCol] ?? "");
  if (rows.length !== columns.length) {
    die(`Matrix in ${path} is not square (${rows.length} rows, ${columns.length} columns)`);
  }
  const colSet = new Set(columns);
  const seen = new Set<string>();
  for (const id of rows) {
    if (!colSet.has(id)) die(`Row '${id}' in ${path} has no matching column`);
    if (seen.has(id)) die(`Row '${id}' appears more than once in ${path}`);
    seen.add(id);
  }
  // columns are realigned to the row order so that values[i][j] is d(rows[i], rows[j])
  const values = table.rows.map((row) => rows.map((c) => numericCell(row, c, path)));
  return { rows, columns: [...rows], values };
}

export function transposeMatrix(m: NumericMatrix): NumericMatrix {
  return {
    rows: m.columns,
    columns: m.rows,
    values: m.columns.map((_, j) => m.values.map((row) => row[j])),
  };
}

export function linspace(lo: number, hi: number, num: number): number[] {
  if (num <= 1) return [lo];
  const step = (hi - lo) / (num - 1);
  return Array.from({ length: num }, (_, i) => (i === num - 1 ? hi : lo + step * i));
}
