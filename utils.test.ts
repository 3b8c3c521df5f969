import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import {
  canonicalizeDecimal,
  dedupeHeaders,
  dropTrailingBlankRows,
  formatSize,
  normalizeRow,
  normalizeValue,
  parseCSV,
  parseExcel,
  readTabularFile,
  rowsToCSV,
  toDataTable,
} from './utils';
import type { Dataset, NormalizationConfig } from './types';

const loose: NormalizationConfig = { strictDecimal: false, caseInsensitive: true };
const strict: NormalizationConfig = { strictDecimal: true, caseInsensitive: true };
const caseSensitive: NormalizationConfig = { strictDecimal: false, caseInsensitive: false };

describe('canonicalizeDecimal', () => {
  it.each([
    ['3.1400', '3.14'],
    ['5.00', '5'],
    ['5.0', '5'],
    ['5.', '5'],
    ['.5', '0.5'],
    ['0.0500', '0.05'],
    ['007', '7'],
    ['100', '100'],
    ['+12', '12'],
    ['-0.00', '-0'],
    ['+0', '0'],
    ['1_000', '1000'],
    ['1_000.2_5', '1000.25'],
    ['-1.250', '-1.25'],
    ['1e3', '1000'],
    ['1.5E-3', '0.0015'],
    ['12345678901234567890.10', '12345678901234567890.1'],
  ])('renders %s as %s', (input, expected) => {
    expect(canonicalizeDecimal(input)).toBe(expected);
  });

  it.each(['', '.', '-', '1e', 'e5', '12abc', '1,000', '1__0', '_1', '1_', 'NaN', '1e999'])('rejects %j', (input) => {
    expect(canonicalizeDecimal(input)).toBeNull();
  });
});

describe('normalizeValue', () => {
  it('maps empty and missing values to an empty string', () => {
    expect(normalizeValue('', loose)).toBe('');
    expect(normalizeValue(null, strict)).toBe('');
    expect(normalizeValue(undefined, caseSensitive)).toBe('');
  });

  it('treats equivalent decimals as equal unless strict', () => {
    expect(normalizeValue('5.00', loose)).toBe('5');
    expect(normalizeValue('5.0', loose)).toBe('5');
    expect(normalizeValue('5', loose)).toBe('5');

    expect(new Set(['5.00', '5.0', '5'].map(v => normalizeValue(v, strict))).size).toBe(3);
  });

  it('parses numbers surrounded by whitespace', () => {
    expect(normalizeValue('  12.50  ', loose)).toBe('12.5');
    expect(normalizeValue('  12.50  ', strict)).toBe('12.50');
  });

  it('normalizes line endings, trims and folds case', () => {
    expect(normalizeValue(' Hello\r\nWorld ', loose)).toBe('hello\nworld');
    expect(normalizeValue(' Hello\r\nWorld ', caseSensitive)).toBe('Hello\nWorld');
  });

  it('leaves non-numeric text as text', () => {
    expect(normalizeValue('1E999', loose)).toBe('1e999');
    expect(normalizeValue('ABC-001', caseSensitive)).toBe('ABC-001');
  });

  it('is idempotent for numeric strings', () => {
    for (const value of ['3.1400', '1e3', '-0.050', '.5', '42', '1.5E-3']) {
      const once = normalizeValue(value, loose);
      expect(normalizeValue(once, loose)).toBe(once);
    }
  });

  it('gives the same result whether trimmed or folded first', () => {
    for (const value of ['  Abc ', 'XYZ', ' q ', 'MiXeD\t']) {
      expect(normalizeValue(value.trim().toLowerCase(), loose)).toBe(normalizeValue(value.toLowerCase().trim(), loose));
      expect(normalizeValue(value, loose)).toBe(normalizeValue(value.trim(), loose));
    }
  });

  it('normalizes every header column of a row', () => {
    expect(normalizeRow({ a: ' X ', b: '2.50' }, ['a', 'b', 'c'], loose)).toEqual({ a: 'x', b: '2.5', c: '' });
  });

  it('reads inherited property names as blank cells', () => {
    expect(normalizeRow({ a: '1' }, ['a', 'constructor'], loose)).toEqual({ a: '1', constructor: '' });
  });
});

describe('parseCSV', () => {
  it('reads every cell as a string and keeps blanks', () => {
    const { columns, data } = parseCSV('id,amount,note\n1,0,\n2,3.50,ok\n');
    expect(columns.map(c => c.name)).toEqual(['id', 'amount', 'note']);
    expect(data).toEqual([
      { id: '1', amount: '0', note: '' },
      { id: '2', amount: '3.50', note: 'ok' },
    ]);
  });

  it('handles quoted commas and newlines', () => {
    const { data } = parseCSV('id,name\n1,"Smith, J"\n2,"line1\nline2"\n');
    expect(data).toEqual([
      { id: '1', name: 'Smith, J' },
      { id: '2', name: 'line1\nline2' },
    ]);
  });

  it('strips a byte order mark', () => {
    expect(parseCSV('\uFEFFid,v\n1,a').columns.map(c => c.name)).toEqual(['id', 'v']);
  });

  it('skips empty lines', () => {
    expect(parseCSV('a\n1\n\n2\n').data).toEqual([{ a: '1' }, { a: '2' }]);
  });

  it('pads short rows', () => {
    expect(parseCSV('a,b,c\n1\n').data).toEqual([{ a: '1', b: '', c: '' }]);
  });

  it('rejects rows longer than the header', () => {
    expect(() => parseCSV('a,b\n1,2,3')).toThrow('Expected 2 fields in line 2, saw 3');
  });

  it('rejects unterminated quotes', () => {
    expect(() => parseCSV('a,b\n"open,1')).toThrow();
  });

  it('infers a display type per column', () => {
    expect(parseCSV('n,t,d,b\n1.5,abc,2024-01-31,TRUE').columns.map(c => c.type)).toEqual(['number', 'text', 'date', 'boolean']);
  });

  it('returns nothing for empty input', () => {
    expect(parseCSV('')).toEqual({ columns: [], data: [] });
  });

  it('keeps a __proto__ header as an ordinary column', () => {
    const { data } = parseCSV('id,__proto__\n1,x\n');
    expect(Object.keys(data[0])).toEqual(['id', '__proto__']);
    expect(data[0]['__proto__']).toBe('x');
    expect(normalizeRow(data[0], ['id', '__proto__'], loose)['__proto__']).toBe('x');
  });
});

describe('dedupeHeaders', () => {
  it('names blank headers and suffixes repeats', () => {
    expect(dedupeHeaders(['id', 'id', '', 'x', 'id'])).toEqual(['id', 'id.1', 'Unnamed: 2', 'x', 'id.2']);
  });

  it('skips suffixes that are already taken', () => {
    expect(dedupeHeaders(['a', 'a.1', 'a'])).toEqual(['a', 'a.1', 'a.2']);
  });
});

describe('parseExcel', () => {
  it('reads the first sheet as text', () => {
    const wb = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet([['id', 'amount'], ['1', 5.5], ['2', 'x']]), 'Data');
    XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet([['ignored']]), 'Other');
    const buffer: ArrayBuffer = XLSX.write(wb, { bookType: 'xlsx', type: 'array' });

    const { columns, data } = parseExcel(buffer);
    expect(columns.map(c => c.name)).toEqual(['id', 'amount']);
    expect(data).toEqual([
      { id: '1', amount: '5.5' },
      { id: '2', amount: 'x' },
    ]);
  });
});

describe('dropTrailingBlankRows', () => {
  it('removes only the blank rows at the end', () => {
    expect(dropTrailingBlankRows([{ a: '' }, { a: '1' }, { a: ' ' }, { a: '' }])).toEqual([{ a: '' }, { a: '1' }]);
  });

  it('empties an all-blank table', () => {
    expect(dropTrailingBlankRows([{ a: '', b: ' ' }])).toEqual([]);
  });

  it('returns the same array when nothing is dropped', () => {
    const rows = [{ a: '1' }];
    expect(dropTrailingBlankRows(rows)).toBe(rows);
  });
});

describe('toDataTable', () => {
  const dataset: Dataset = {
    name: 'left.csv',
    type: 'csv',
    columns: [{ name: 'id', type: 'number' }, { name: 'v', type: 'text' }],
    data: [{ id: '1', v: 'a' }, { id: '', v: '' }],
    rowCount: 2,
  };

  it('keeps header order and optionally drops trailing blank rows', () => {
    expect(toDataTable(dataset, true)).toEqual({ columns: ['id', 'v'], rows: [{ id: '1', v: 'a' }] });
    expect(toDataTable(dataset, false).rows).toHaveLength(2);
  });
});

describe('readTabularFile', () => {
  it('loads a CSV file into a dataset', async () => {
    const dataset = await readTabularFile(new File(['id,v\n1,a\n'], 'left.csv'));
    expect(dataset.name).toBe('left.csv');
    expect(dataset.type).toBe('csv');
    expect(dataset.rowCount).toBe(1);
    expect(dataset.data).toEqual([{ id: '1', v: 'a' }]);
  });

  it('rejects files over the size limit before reading them', async () => {
    const file = Object.defineProperty(new File(['id\n1\n'], 'big.csv'), 'size', { value: 101 * 1024 * 1024 });
    await expect(readTabularFile(file)).rejects.toThrow('File size (101.0MB) exceeds the 100MB limit.');
  });

  it('rejects unsupported extensions', async () => {
    await expect(readTabularFile(new File(['x'], 'notes.txt'))).rejects.toThrow('Unsupported file type');
  });
});

describe('formatting helpers', () => {
  it('formats sizes in KB below one megabyte', () => {
    expect(formatSize(2048)).toBe('2.0 KB');
    expect(formatSize(3 * 1024 * 1024)).toBe('3.0 MB');
  });

  it('writes rows as CSV with quoting', () => {
    expect(rowsToCSV([{ a: '1', b: 'x,y' }, { a: '2' }], ['a', 'b'])).toBe('a,b\r\n1,"x,y"\r\n2,');
  });
});
