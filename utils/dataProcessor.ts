import * as Papa from 'papaparse';
import * as XLSX from 'xlsx';
import type { CellValue, Column, ColumnDtype, Dataset, LoadedFile } from '../types';
import { MISSING_MARKERS, SUPPORTED_EXTENSIONS } from '../constants';
import { DataLoadError, UnsupportedFileError, errorMessage } from '../errors';

type SupportedExtension = typeof SUPPORTED_EXTENSIONS[number];

const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];

export const fileExtension = (fileName: string): string => {
  const dot = fileName.lastIndexOf('.');
  return dot === -1 ? '' : fileName.slice(dot).toLowerCase();
};

const isSupportedExtension = (extension: string): extension is SupportedExtension =>
  SUPPORTED_EXTENSIONS.some(supported => supported === extension);

export const isSupportedFile = (fileName: string): boolean =>
  isSupportedExtension(fileExtension(fileName));

/**
 * Infers the storage type of a column from its values.
 *
 * Integral numbers without gaps are `int64`; numbers with gaps (or a column
 * with nothing but gaps) are `float64`; booleans without gaps are `bool`;
 * anything else is `object`.
 */
export const inferDtype = (values: readonly CellValue[]): ColumnDtype => {
  if (values.length === 0) return 'object';

  let present = 0;
  let allNumbers = true;
  let allIntegers = true;
  let allBooleans = true;

  for (const value of values) {
    if (value === null) continue;
    present++;
    if (typeof value === 'number') {
      allBooleans = false;
      if (!Number.isInteger(value)) allIntegers = false;
    } else if (typeof value === 'boolean') {
      allNumbers = false;
    } else {
      allNumbers = false;
      allBooleans = false;
    }
  }

  const hasMissing = present < values.length;
  if (present === 0) return 'float64';
  if (allNumbers) return allIntegers && !hasMissing ? 'int64' : 'float64';
  if (allBooleans && !hasMissing) return 'bool';
  return 'object';
};

export const makeColumn = (name: string, values: readonly CellValue[], dtype = inferDtype(values)): Column => ({
  name,
  dtype,
  values,
});

// Blank names become "Unnamed: <i>", repeated names get a ".<n>" suffix
const normalizeHeader = (header: readonly CellValue[], width: number): string[] => {
  const names: string[] = [];

  for (let i = 0; i < width; i++) {
    const cell = header[i];
    const base = cell === null || cell === undefined || String(cell).trim() === ''
      ? `Unnamed: ${i}`
      : String(cell);

    let name = base;
    for (let n = 1; names.includes(name); n++) {
      name = `${base}.${n}`;
    }
    names.push(name);
  }
  return names;
};

// Decimal and scientific literals only; Number() would also take 0x1A or 0b101
const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const isNumericText = (text: string): boolean => NUMERIC_TEXT.test(text.trim());

const isBooleanText = (text: string): boolean => {
  const lowered = text.trim().toLowerCase();
  return lowered === 'true' || lowered === 'false';
};

const textColumn = (name: string, raw: readonly (string | undefined)[]): Column => {
  const cells = raw.map(text => (text === undefined || MISSING_MARKERS.has(text) ? null : text));
  const present = cells.filter((text): text is string => text !== null);

  let values: CellValue[];
  if (present.length > 0 && present.every(isNumericText)) {
    values = cells.map(text => (text === null ? null : Number(text)));
  } else if (present.length > 0 && present.every(isBooleanText)) {
    values = cells.map(text => (text === null ? null : text.trim().toLowerCase() === 'true'));
  } else {
    values = cells;
  }
  return makeColumn(name, values);
};

const parseCsv = (name: string, text: string): Dataset => {
  const result = Papa.parse<string[]>(text, { skipEmptyLines: true });

  const quoteError = result.errors.find(error => error.type === 'Quotes');
  if (quoteError) {
    throw new DataLoadError(`Error tokenizing data: ${quoteError.message}`);
  }

  const [header, ...rows] = result.data;
  if (!header || header.length === 0) {
    throw new DataLoadError("No columns to parse from file");
  }

  const width = header.length;
  rows.forEach((row, i) => {
    if (row.length > width) {
      // +2: one for the header line, one for 1-based numbering
      throw new DataLoadError(`Error tokenizing data. Expected ${width} fields in line ${i + 2}, saw ${row.length}`);
    }
  });

  const names = normalizeHeader(header, width);
  const columns = names.map((columnName, c) => textColumn(columnName, rows.map(row => row[c])));

  return { name, columns, rowCount: rows.length };
};

const toCellValue = (value: unknown): CellValue => {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isNaN(value) ? null : value;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return value === '' ? null : value;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  return String(value);
};

const hasZipSignature = (bytes: Uint8Array): boolean =>
  ZIP_SIGNATURE.every((byte, i) => bytes[i] === byte);

export const tableWidth = (rows: readonly (readonly unknown[])[]): number =>
  rows.reduce((width, row) => Math.max(width, row.length), 0);

const isDateColumn = (raw: readonly unknown[]): boolean => {
  const present = raw.filter(value => value !== null && value !== undefined && value !== '');
  return present.length > 0 && present.every(value => value instanceof Date);
};

const sheetToDataset = (sheetName: string, sheet: XLSX.WorkSheet): Dataset => {
  const raw = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, blankrows: false, raw: true });
  if (raw.length === 0) return { name: sheetName, columns: [], rowCount: 0 };

  const width = tableWidth(raw);
  const [header, ...body] = raw;
  const names = normalizeHeader(header.map(toCellValue), width);

  const columns = names.map((columnName, c) => {
    const cells = body.map(row => row[c] ?? null);
    const values = cells.map(toCellValue);
    return isDateColumn(cells) ? makeColumn(columnName, values, 'datetime64[ns]') : makeColumn(columnName, values);
  });
  return { name: sheetName, columns, rowCount: body.length };
};

const parseWorkbook = (bytes: Uint8Array): Map<string, Dataset> => {
  if (!hasZipSignature(bytes)) throw new DataLoadError("File is not a zip file");

  const workbook = XLSX.read(bytes, { type: 'array', cellDates: true });
  const sheets = new Map<string, Dataset>();
  workbook.SheetNames.forEach(sheetName => {
    sheets.set(sheetName, sheetToDataset(sheetName, workbook.Sheets[sheetName]));
  });
  return sheets;
};

/**
 * Parses raw file bytes by extension. `.csv` yields a single table and
 * `.xlsx` yields every sheet of the workbook, in workbook order.
 *
 * @throws UnsupportedFileError for any other extension, before reading the bytes
 * @throws DataLoadError when the content cannot be parsed
 */
export const parseFileContent = (fileName: string, content: Uint8Array): LoadedFile => {
  const extension = fileExtension(fileName);
  if (!isSupportedExtension(extension)) throw new UnsupportedFileError(fileName);

  try {
    if (extension === '.csv') {
      return { kind: 'table', dataset: parseCsv(fileName, new TextDecoder('utf-8').decode(content)) };
    }
    return { kind: 'workbook', sheets: parseWorkbook(content) };
  } catch (error) {
    if (error instanceof DataLoadError) throw error;
    throw new DataLoadError(errorMessage(error, "Unreadable file content"));
  }
};

export const parseFile = async (file: File): Promise<LoadedFile> => {
  if (!isSupportedFile(file.name)) throw new UnsupportedFileError(file.name);

  return new Promise((resolve, reject) => {
    const reader = new FileReader();

    reader.onload = (e) => {
      const data = e.target?.result;
      if (data === null || data === undefined || typeof data === 'string') {
        return reject(new DataLoadError("No data read"));
      }
      try {
        resolve(parseFileContent(file.name, new Uint8Array(data)));
      } catch (error) {
        reject(error);
      }
    };

    reader.onerror = () => reject(new DataLoadError(reader.error?.message ?? "Could not read file"));

    reader.readAsArrayBuffer(file);
  });
};

export const fileIdentity = (file: Pick<File, 'name' | 'size' | 'lastModified'>): string =>
  `${file.name}|${file.size}|${file.lastModified}`;

/**
 * Single-entry cache for the last successful load. A different key replaces
 * the entry; failed loads never reach it.
 */
export class DatasetCache {
  private entry: { key: string; value: LoadedFile } | null = null;

  get(key: string): LoadedFile | undefined {
    return this.entry?.key === key ? this.entry.value : undefined;
  }

  async getOrLoad(key: string, load: () => Promise<LoadedFile>): Promise<LoadedFile> {
    const cached = this.get(key);
    if (cached) {
      console.info(`Serving ${key} from the load cache`);
      return cached;
    }
    const value = await load();
    this.entry = { key, value };
    return value;
  }

  clear(): void {
    this.entry = null;
  }
}

export const sheetNames = (loaded: LoadedFile): string[] =>
  loaded.kind === 'workbook' ? Array.from(loaded.sheets.keys()) : [];

/**
 * Picks the active table. A single table passes through; for a workbook an
 * unknown or missing name falls back to the first sheet.
 */
export const selectDataset = (loaded: LoadedFile, sheetName?: string | null): Dataset | null => {
  if (loaded.kind === 'table') return loaded.dataset;
  if (sheetName) {
    const selected = loaded.sheets.get(sheetName);
    if (selected) return selected;
  }
  const first = loaded.sheets.values().next();
  return first.done ? null : first.value;
};
