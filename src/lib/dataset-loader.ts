/*
  Dataset loader
  --------------
  Reads CSV/TSV/TXT (csv-parse) and XLSX/XLS/ODS (xlsx) into a Dataset.
  - encoding: UTF-8 (BOM stripped), UTF-16LE by BOM, else windows-1252 when
    the bytes are not valid UTF-8
  - delimiter sniffed over the first lines unless a hint is given
  - headerRow: 0-based line used as column labels; earlier lines are skipped
  - empty cells become null; header labels are made unique
*/

import * as crypto from 'crypto';
import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { parse as csvParse } from 'csv-parse/sync';
import * as XLSX from 'xlsx';
import * as logger from 'firebase-functions/logger';
import { Dataset } from './dataset';
import type { CellValue, DatasetMeta } from './types';

export interface LoadOptions {
  headerRow?: number;
  sheet?: string | number;
  encoding?: string;
  delimiter?: string;
}

export interface LoadedDataset {
  dataset: Dataset;
  meta: DatasetMeta;
}

const WORKBOOK_EXT = new Set(['.xlsx', '.xls', '.xlsm', '.ods']);
const FALLBACK_DELIMITERS = [';', ',', '\t', '|'];
const SNIFF_LINES = 20;

export function loadDataset(filePath: string, opts: LoadOptions = {}): LoadedDataset {
  const raw = readFileSync(filePath);
  const fingerprint = crypto.createHash('sha256').update(raw.subarray(0, 65536)).digest('hex');
  const ext = path.extname(filePath).toLowerCase();
  const headerRow = opts.headerRow ?? 0;

  if (WORKBOOK_EXT.has(ext)) {
    const { grid, sheetName } = readWorkbook(raw, opts.sheet ?? 0);
    const dataset = fromGrid(grid, headerRow);
    return {
      dataset,
      meta: buildMeta(filePath, dataset, { encoding: 'utf-8', delimiter: null, sheetName, headerRow, fingerprint }),
    };
  }

  const { text, encoding } = decode(raw, opts.encoding);
  const delimiter = opts.delimiter ?? sniffDelimiter(text, ext);
  const grid = parseDelimited(text, delimiter);
  const dataset = fromGrid(grid, headerRow);
  logger.debug('Loaded delimited file', { filePath, encoding, delimiter, rows: dataset.rowCount });
  return {
    dataset,
    meta: buildMeta(filePath, dataset, { encoding, delimiter, sheetName: null, headerRow, fingerprint }),
  };
}

/** Parse delimited text that is already in memory (uploads, tests). */
export function parseDelimitedText(text: string, opts: { delimiter?: string; headerRow?: number } = {}): Dataset {
  const delimiter = opts.delimiter ?? sniffDelimiter(text, '.csv');
  return fromGrid(parseDelimited(text, delimiter), opts.headerRow ?? 0);
}

// --------------------------
// Helpers
// --------------------------
function decode(raw: Buffer, hint?: string): { text: string; encoding: string } {
  if (hint) return { text: new TextDecoder(hint).decode(raw), encoding: hint };
  if (raw.length >= 2 && raw[0] === 0xff && raw[1] === 0xfe) {
    return { text: new TextDecoder('utf-16le').decode(raw), encoding: 'utf-16le' };
  }
  try {
    // TextDecoder drops a leading UTF-8 BOM by default
    return { text: new TextDecoder('utf-8', { fatal: true }).decode(raw), encoding: 'utf-8' };
  } catch {
    return { text: new TextDecoder('windows-1252').decode(raw), encoding: 'windows-1252' };
  }
}

export function sniffDelimiter(text: string, ext: string): string {
  if (ext === '.tsv') return '\t';
  const lines = text.split(/\r?\n/).filter((l) => l.trim() !== '').slice(0, SNIFF_LINES);
  if (lines.length === 0) return ',';

  let best: { delim: string; count: number } | null = null;
  for (const delim of FALLBACK_DELIMITERS) {
    const counts = lines.map((l) => countOutsideQuotes(l, delim));
    const first = counts[0];
    if (first === 0) continue;
    const consistent = counts.every((c) => c === first);
    if (consistent && (!best || first > best.count)) best = { delim, count: first };
  }
  if (best) return best.delim;
  // inconsistent lines (ragged rows): take the first candidate present at all
  return FALLBACK_DELIMITERS.find((d) => lines[0].includes(d)) ?? ',';
}

function countOutsideQuotes(line: string, delim: string): number {
  let n = 0;
  let quoted = false;
  for (const ch of line) {
    if (ch === '"') quoted = !quoted;
    else if (ch === delim && !quoted) n++;
  }
  return n;
}

function parseDelimited(text: string, delimiter: string): string[][] {
  const records: string[][] = csvParse(text, {
    delimiter,
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  });
  return records;
}

function readWorkbook(raw: Buffer, sheet: string | number): { grid: string[][]; sheetName: string } {
  const wb = XLSX.read(raw, { type: 'buffer', cellDates: false });
  const sheetName = typeof sheet === 'string' ? sheet : wb.SheetNames[sheet] ?? wb.SheetNames[0];
  const ws = wb.Sheets[sheetName];
  if (!ws) throw new Error(`Sheet not found: ${sheetName}`);
  const rows = XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1, raw: false, defval: '' });
  return { grid: rows.map((r) => r.map((v) => (v === null || v === undefined ? '' : String(v)))), sheetName };
}

/** First occurrence keeps its label; repeats get the lowest `_<n>` suffix not already in the header. */
export function uniqueHeader(raw: string[]): string[] {
  const bases = raw.map((h, i) => h.trim() || `col_${i + 1}`);
  const taken = new Set(bases);
  const seen = new Map<string, number>();
  return bases.map((base) => {
    const n = seen.get(base) ?? 0;
    seen.set(base, n + 1);
    if (n === 0) return base;
    let k = n + 1;
    while (taken.has(`${base}_${k}`)) k++;
    const label = `${base}_${k}`;
    taken.add(label);
    return label;
  });
}

function fromGrid(grid: string[][], headerRow: number): Dataset {
  if (grid.length <= headerRow) return new Dataset(uniqueHeader(grid[headerRow] ?? []));
  const columns = uniqueHeader(grid[headerRow]);
  const rows: CellValue[][] = grid
    .slice(headerRow + 1)
    .map((r) => columns.map((_, i) => (r[i] === undefined || r[i] === '' ? null : r[i])));
  return new Dataset(columns, rows);
}

function buildMeta(
  filePath: string,
  dataset: Dataset,
  p: { encoding: string; delimiter: string | null; sheetName: string | null; headerRow: number; fingerprint: string }
): DatasetMeta {
  return {
    filePath: path.resolve(filePath),
    encoding: p.encoding,
    delimiter: p.delimiter,
    sheetName: p.sheetName,
    headerRow: p.headerRow,
    skipRows: p.headerRow,
    shape: [dataset.rowCount, dataset.columns.length],
    columnOrder: [...dataset.columns],
    fingerprint: p.fingerprint,
  };
}
