import type { CellValue, NormalizationConfig, DataType, ColumnDef, Dataset, DataTable, ParsedTable, Row } from './types';
import * as XLSX from 'xlsx';
import Papa from 'papaparse';

// --- Normalization ---

// Digit runs may be grouped with single underscores, as in "1_000"
const DECIMAL_PATTERN = /^([+-]?)((?:\d+(?:_\d+)*)?)(?:\.((?:\d+(?:_\d+)*)?))?(?:[eE]([+-]?\d+(?:_\d+)*))?$/;

// Plain rendering of huge exponents ("1e999999") would allocate that many zeros
const MAX_PLAIN_DIGITS = 400;

/**
 * Renders a decimal literal in plain notation with no insignificant zeros,
 * e.g. "3.1400" -> "3.14", "5.0" -> "5", "1.5e3" -> "1500", ".5" -> "0.5".
 * Zero keeps its sign ("-0.00" -> "-0"). Returns null when the value is not a
 * finite decimal.
 */
export const canonicalizeDecimal = (value: string): string | null => {
  const match = DECIMAL_PATTERN.exec(value);
  if (!match) return null;

  const [, sign, intGroup = '', fracGroup = '', expGroup] = match;
  const intPart = intGroup.replace(/_/g, '');
  const fracPart = fracGroup.replace(/_/g, '');
  if (intPart.length === 0 && fracPart.length === 0) return null;

  let digits = (intPart + fracPart).replace(/^0+/, '');
  if (digits === '') return sign === '-' ? '-0' : '0';

  let exponent = (expGroup ? parseInt(expGroup.replace(/_/g, ''), 10) : 0) - fracPart.length;
  const trailingZeros = digits.length - digits.replace(/0+$/, '').length;
  digits = digits.slice(0, digits.length - trailingZeros);
  exponent += trailingZeros;

  const pointPos = digits.length + exponent;
  if (exponent > MAX_PLAIN_DIGITS || pointPos < -MAX_PLAIN_DIGITS) return null;

  let plain: string;
  if (exponent >= 0) {
    plain = digits + '0'.repeat(exponent);
  } else if (pointPos > 0) {
    plain = `${digits.slice(0, pointPos)}.${digits.slice(pointPos)}`;
  } else {
    plain = `0.${'0'.repeat(-pointPos)}${digits}`;
  }
  return sign === '-' ? `-${plain}` : plain;
};

export const normalizeValue = (value: CellValue | null | undefined, config: NormalizationConfig): string => {
  if (value === null || value === undefined || value === '') return '';
  let str = value;

  if (!config.strictDecimal) {
    str = canonicalizeDecimal(str.trim()) ?? str;
  }
  str = str.replace(/\r\n/g, '\n').trim();
  // Folding runs after numeric parsing, never before
  if (config.caseInsensitive) {
    str = str.toLowerCase();
  }

  return str;
};

/** Own cell of a record; inherited names such as "constructor" read as blank. */
export const cellOf = (row: Row, column: string): CellValue =>
  Object.hasOwn(row, column) ? row[column] : '';

// Object.fromEntries defines own properties, so a "__proto__" column stays a cell
export const normalizeRow = (row: Row, columns: string[], config: NormalizationConfig): Row =>
  Object.fromEntries(columns.map((col): [string, CellValue] => [col, normalizeValue(cellOf(row, col), config)]));

// --- Type Inference ---

const inferType = (value: string): DataType => {
  if (!value) return 'text';
  if (!isNaN(Number(value)) && value.trim() !== '') return 'number';
  if (value.match(/^\d{4}-\d{2}-\d{2}$/) || value.match(/^\d{1,2}\/\d{1,2}\/\d{4}$/)) return 'date';
  if (value.toLowerCase() === 'true' || value.toLowerCase() === 'false') return 'boolean';
  return 'text';
};

// --- Parsers ---

/** Blank header cells become "Unnamed: <index>", repeats get ".1", ".2" suffixes. */
export const dedupeHeaders = (rawHeaders: string[]): string[] => {
  const seen = new Map<string, number>();
  const taken = new Set<string>();
  return rawHeaders.map((raw, idx) => {
    const base = raw.trim() === '' ? `Unnamed: ${idx}` : raw;
    let name = base;
    let count = seen.get(base) ?? 0;
    while (taken.has(name)) {
      count += 1;
      name = `${base}.${count}`;
    }
    seen.set(base, count);
    taken.add(name);
    return name;
  });
};

const buildTable = (matrix: string[][]): ParsedTable => {
  if (matrix.length === 0) return { columns: [], data: [] };

  const names = dedupeHeaders(matrix[0]);
  const rawData = matrix.slice(1);

  rawData.forEach((values, idx) => {
    if (values.length > names.length) {
      throw new Error(`Expected ${names.length} fields in line ${idx + 2}, saw ${values.length}`);
    }
  });

  const sampleRow = rawData.find(r => r.length === names.length) || rawData[0] || [];
  const columns: ColumnDef[] = names.map((name, idx) => ({
    name,
    type: inferType(sampleRow[idx] || '')
  }));

  const data = rawData.map(values =>
    Object.fromEntries(names.map((name, i): [string, CellValue] => [name, values[i] ?? '']))
  );

  return { columns, data };
};

export const parseCSV = (content: string): ParsedTable => {
  const result = Papa.parse<string[]>(content.replace(/^\uFEFF/, ''), {
    delimiter: ',',
    skipEmptyLines: true,
  });

  const quoteError = result.errors.find(e => e.type === 'Quotes');
  if (quoteError) {
    throw new Error(`${quoteError.message} (row ${quoteError.row ?? '?'})`);
  }

  return buildTable(result.data);
};

export const parseExcel = (buffer: ArrayBuffer): ParsedTable => {
  const workbook = XLSX.read(buffer, { type: 'array' });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) return { columns: [], data: [] };
  const worksheet = workbook.Sheets[sheetName];

  // Formatted text of every cell, padded to the sheet's width
  const rawData = XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, raw: false, defval: '', blankrows: false });
  const matrix = rawData.map(r => r.map(v => (v === null || v === undefined ? '' : String(v))));

  return buildTable(matrix);
};

const isBlankRow = (row: Row): boolean => Object.values(row).every(v => v.trim() === '');

export const dropTrailingBlankRows = (data: Row[]): Row[] => {
  let end = data.length;
  while (end > 0 && isBlankRow(data[end - 1])) {
    end -= 1;
  }
  return end === data.length ? data : data.slice(0, end);
};

export const toDataTable = (dataset: Dataset, dropBlankRows: boolean): DataTable => ({
  columns: dataset.columns.map(c => c.name),
  rows: dropBlankRows ? dropTrailingBlankRows(dataset.data) : dataset.data,
});

export const formatSize = (bytes: number): string => {
  const sizeMB = bytes / (1024 * 1024);
  return sizeMB < 1 ? `${(bytes / 1024).toFixed(1)} KB` : `${sizeMB.toFixed(1)} MB`;
};

export const MAX_FILE_SIZE_MB = 100;

export const readTabularFile = async (file: File): Promise<Dataset> => {
  const sizeMB = file.size / (1024 * 1024);
  if (sizeMB > MAX_FILE_SIZE_MB) {
    throw new Error(`File size (${sizeMB.toFixed(1)}MB) exceeds the ${MAX_FILE_SIZE_MB}MB limit.`);
  }

  const name = file.name.toLowerCase();
  const common = { name: file.name, size: formatSize(file.size), rawSize: file.size };

  if (name.endsWith('.csv')) {
    const { columns, data } = parseCSV(await file.text());
    return { ...common, type: 'csv', columns, data, rowCount: data.length };
  }
  if (name.endsWith('.xlsx') || name.endsWith('.xls')) {
    const { columns, data } = parseExcel(await file.arrayBuffer());
    return { ...common, type: 'excel', columns, data, rowCount: data.length };
  }
  throw new Error("Unsupported file type");
};

// --- Export Utils ---

export const downloadBlob = (blob: Blob, filename: string) => {
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = filename;
  document.body.appendChild(a);
  a.click();
  document.body.removeChild(a);
  URL.revokeObjectURL(url);
};

export const rowsToCSV = (data: Row[], columns: string[]): string =>
  Papa.unparse({ fields: columns, data: data.map(row => columns.map(col => cellOf(row, col))) });

export const exportToCSV = (data: Row[], columns: string[], filename: string) => {
  if (!columns.length) return;
  downloadBlob(new Blob([rowsToCSV(data, columns)], { type: 'text/csv' }), filename);
};
