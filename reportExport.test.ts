import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { buildReportWorkbook, SHEET_NAMES } from './reportExport';
import { compareDatasets } from './comparator';
import type { NormalizationConfig } from './types';

const caseSensitive: NormalizationConfig = { strictDecimal: false, caseInsensitive: false };

const left = {
  columns: ['id', 'v', 'name'],
  rows: [{ id: '1', v: 'a', name: 'n1' }, { id: '2', v: 'b', name: 'n2' }],
};
const right = {
  columns: ['id', 'v', 'email'],
  rows: [{ id: '2', v: 'B', email: 'e2' }, { id: '3', v: 'c', email: 'e3' }],
};

const sheetRows = (wb: XLSX.WorkBook, name: string): unknown[][] =>
  XLSX.utils.sheet_to_json<unknown[]>(wb.Sheets[name], { header: 1 });

describe('buildReportWorkbook', () => {
  it('writes every sheet for a keyed comparison with cell diffs', () => {
    const report = compareDatasets(left, right, 'id', caseSensitive);
    const wb = buildReportWorkbook(report);

    expect(wb.SheetNames).toEqual([
      'Summary',
      'MissingColumnsInRight',
      'NewColumnsInRight',
      'OnlyInLeft',
      'OnlyInRight',
      'CellDiffs',
    ]);
    expect(sheetRows(wb, SHEET_NAMES.summary)).toEqual([
      ['left_rows', 'right_rows', 'only_left_count', 'only_right_count', 'cell_diff_count'],
      [2, 2, 1, 1, 1],
    ]);
    expect(sheetRows(wb, SHEET_NAMES.missingColumns)).toEqual([['Missing in Right'], ['name']]);
    expect(sheetRows(wb, SHEET_NAMES.newColumns)).toEqual([['New in Right'], ['email']]);
    expect(sheetRows(wb, SHEET_NAMES.onlyLeft)).toEqual([['id', 'v', 'name'], ['1', 'a', 'n1']]);
    expect(sheetRows(wb, SHEET_NAMES.onlyRight)).toEqual([['id', 'v', 'email'], ['3', 'c', 'e3']]);
    expect(sheetRows(wb, SHEET_NAMES.cellDiffs)).toEqual([['row_key', 'column', 'left', 'right'], ['2', 'v', 'b', 'B']]);
  });

  it('leaves out the cell diff sheet when there are no cell diffs', () => {
    const report = compareDatasets(left, right, '', caseSensitive);
    const wb = buildReportWorkbook(report);

    expect(wb.SheetNames).not.toContain('CellDiffs');
    expect(wb.SheetNames).toHaveLength(5);
    expect(sheetRows(wb, SHEET_NAMES.summary)[1]).toEqual([2, 2, 2, 2, 0]);
  });

  it('keeps the header row of empty tables', () => {
    const same = { columns: ['id'], rows: [{ id: '1' }] };
    const wb = buildReportWorkbook(compareDatasets(same, same, 'id', caseSensitive));

    expect(sheetRows(wb, SHEET_NAMES.missingColumns)).toEqual([['Missing in Right']]);
    expect(sheetRows(wb, SHEET_NAMES.onlyLeft)).toEqual([['id']]);
    expect(wb.SheetNames).not.toContain('CellDiffs');
  });
});
