import Papa from 'papaparse';
import type { Readable } from 'stream';
import { UnrecognizedFormatError, ValidationError } from '../errors';
import type { ColumnMapping, ColumnSelector, CsvDelimiter } from '../types';

export type ImportSource = string | Buffer | Readable;

export interface CsvRow {
  /** 1-based record number; the header is row 1. */
  rowNumber: number;
  fields: string[];
  /** Record text as uploaded, quotes included. */
  raw: string;
  quoteError: boolean;
}

export interface ParsedCsv {
  delimiter: CsvDelimiter;
  header: string[];
  rows: CsvRow[];
}

export interface ResolvedColumns {
  student: number;
  score: number;
  comment: number | null;
}

export const DEFAULT_MAPPING: ColumnMapping = {
  student: 'student',
  score: 'score',
  comment: 'comment',
};

const DELIMITERS: CsvDelimiter[] = [';', ','];
const SAMPLE_ROWS = 5;

export function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

export async function readSource(source: ImportSource): Promise<string> {
  if (typeof source === 'string') return stripBom(source);
  if (Buffer.isBuffer(source)) return stripBom(source.toString('utf8'));

  const chunks: Buffer[] = [];
  for await (const chunk of source) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8'));
  }
  return stripBom(Buffer.concat(chunks).toString('utf8'));
}

function countOutsideQuotes(line: string, delimiter: CsvDelimiter): number {
  let count = 0;
  let quoted = false;
  for (const ch of line) {
    if (ch === '"') quoted = !quoted;
    else if (ch === delimiter && !quoted) count++;
  }
  return count;
}

/**
 * Picks `;` or `,` from the header row. When both occur, the one that gives
 * the header the same width as the first data rows wins, then the one that
 * splits the header into more columns.
 */
export function detectDelimiter(text: string): CsvDelimiter {
  const lines = text.split(/\r?\n/).filter((l) => l.trim().length > 0);
  if (lines.length === 0) {
    throw new UnrecognizedFormatError('File is empty');
  }
  const [header, ...rest] = lines;
  const sample = rest.slice(0, SAMPLE_ROWS);

  const candidates = DELIMITERS
    .map((delimiter) => {
      const width = countOutsideQuotes(header, delimiter) + 1;
      const matches = sample.filter((l) => countOutsideQuotes(l, delimiter) + 1 === width).length;
      return { delimiter, width, matches };
    })
    .filter((c) => c.width > 1);

  if (candidates.length === 0) {
    throw new UnrecognizedFormatError('Header row contains neither "," nor ";"');
  }
  if (candidates.length === 1) return candidates[0].delimiter;

  const [a, b] = candidates;
  if (a.matches !== b.matches) return a.matches > b.matches ? a.delimiter : b.delimiter;
  if (a.width !== b.width) return a.width > b.width ? a.delimiter : b.delimiter;
  throw new UnrecognizedFormatError('Header row uses "," and ";" equally; delimiter is ambiguous');
}

/**
 * Splits text into records at line breaks outside quoted fields, keeping
 * each record's text as written. A quote opens a field only at its start;
 * an unterminated quote runs to the end of the text.
 */
export function splitRecords(text: string, delimiter: CsvDelimiter): string[] {
  const records: string[] = [];
  let start = 0;
  let quoted = false;
  let fieldStart = true;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') i++;
        else quoted = false;
      }
      continue;
    }
    if (ch === '"' && fieldStart) {
      quoted = true;
      fieldStart = false;
    } else if (ch === '\n') {
      records.push(text.slice(start, i).replace(/\r$/, ''));
      start = i + 1;
      fieldStart = true;
    } else {
      fieldStart = ch === delimiter;
    }
  }
  records.push(text.slice(start).replace(/\r$/, ''));
  return records;
}

function parseRecord(raw: string, delimiter: CsvDelimiter, rowNumber: number): CsvRow {
  const parsed = Papa.parse<string[]>(raw, {
    delimiter,
    newline: '\n',
    header: false,
    skipEmptyLines: false,
  });
  const fields = parsed.data.length > 0 ? parsed.data[0] : [''];
  return {
    rowNumber,
    fields,
    raw,
    quoteError: parsed.data.length > 1 || parsed.errors.some((err) => err.type === 'Quotes'),
  };
}

export function parseCsv(text: string): ParsedCsv {
  const delimiter = detectDelimiter(text);
  const records = splitRecords(text, delimiter).map((raw, idx) => parseRecord(raw, delimiter, idx + 1));

  const headerIdx = records.findIndex((r) => !isBlankRow(r));
  if (headerIdx === -1) {
    throw new UnrecognizedFormatError('File is empty');
  }

  return {
    delimiter,
    header: records[headerIdx].fields.map((h) => h.trim()),
    rows: records.slice(headerIdx + 1),
  };
}

export function isBlankRow(row: CsvRow): boolean {
  return row.fields.every((f) => f.trim().length === 0);
}

function findColumn(header: string[], selector: ColumnSelector): number {
  if (typeof selector === 'number') {
    return Number.isInteger(selector) && selector >= 0 && selector < header.length ? selector : -1;
  }
  const wanted = selector.trim().toLowerCase();
  return header.findIndex((h) => h.toLowerCase() === wanted);
}

export function resolveColumns(header: string[], mapping: ColumnMapping): ResolvedColumns {
  const student = findColumn(header, mapping.student);
  const score = findColumn(header, mapping.score);
  const comment = findColumn(header, mapping.comment);

  if (student === -1) {
    throw new UnrecognizedFormatError(`Header has no student column "${mapping.student}"`);
  }
  if (score === -1) {
    throw new UnrecognizedFormatError(`Header has no score column "${mapping.score}"`);
  }
  if (student === score) {
    throw new ValidationError('Student and score must map to different columns');
  }
  return { student, score, comment: comment === -1 ? null : comment };
}

/** Query or form values: digits select a column by index, anything else by name. */
export function readColumnMapping(values: Partial<Record<keyof ColumnMapping, unknown>>): ColumnMapping {
  const pick = (value: unknown, fallback: ColumnSelector): ColumnSelector => {
    if (typeof value === 'number') return value;
    if (typeof value !== 'string' || value.trim().length === 0) return fallback;
    return /^\d+$/.test(value.trim()) ? parseInt(value, 10) : value.trim();
  };
  return {
    student: pick(values.student, DEFAULT_MAPPING.student),
    score: pick(values.score, DEFAULT_MAPPING.score),
    comment: pick(values.comment, DEFAULT_MAPPING.comment),
  };
}
