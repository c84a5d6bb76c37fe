import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { ParsedFile } from '../types/schema';
import { normalizeColumnName } from '../utils/columns';

export const DATA_FILE_PATTERN = /\.(csv|xlsx|xls)$/i;

export const stripExt = (name: string) => name.replace(DATA_FILE_PATTERN, '');
export const isDataFile = (name: string) => DATA_FILE_PATTERN.test(name);
export const isCsvFile = (name: string) => /\.csv$/i.test(name);

const cellText = (value: unknown) => (value === null || value === undefined ? '' : String(value));

const readGrid = (buffer: Buffer, filename: string) => {
  const lower = filename.toLowerCase();
  if (lower.endsWith('.xlsx') || lower.endsWith('.xls')) {
    const workbook = XLSX.read(buffer, { type: 'buffer' });
    const sheetName = workbook.SheetNames[0];
    const worksheet = sheetName ? workbook.Sheets[sheetName] : undefined;
    if (!worksheet) return { grid: [], source: 'excel' as const };
    const grid = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
      header: 1,
      defval: '',
      raw: false,
      dateNF: 'yyyy-mm-dd',
      blankrows: false
    });
    return { grid: grid.map(row => row.map(cellText)), source: 'excel' as const };
  }

  const text = buffer.toString('utf-8').replace(/^\uFEFF/, '');
  // Headers are read by hand so duplicate names reach validation untouched.
  const parsed = Papa.parse<string[]>(text, {
    header: false,
    skipEmptyLines: 'greedy',
    dynamicTyping: false
  });

  if (parsed.errors?.length) {
    throw new Error(`CSV parse error: ${parsed.errors[0].message}`);
  }

  return { grid: parsed.data || [], source: 'csv' as const };
};

/** Parses a CSV or spreadsheet into normalized column names and string rows. */
export const parseDataFile = (buffer: Buffer, filename: string): ParsedFile => {
  const { grid, source } = readGrid(buffer, filename);
  const [header = [], ...body] = grid;
  const columns = header.map(normalizeColumnName);

  const rows = body.map(cells => {
    const row: Record<string, string> = {};
    columns.forEach((column, i) => {
      row[column] = cellText(cells[i]).trim();
    });
    return row;
  });

  return { columns, rows, source };
};

export const serializeCsv = (columns: string[], rows: Record<string, string>[]) =>
  Papa.unparse({ fields: columns, data: rows.map(row => columns.map(c => row[c] ?? '')) });
