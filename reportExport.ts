import * as XLSX from 'xlsx';
import type { ComparisonReport, Row } from './types';
import { downloadBlob } from './utils';

export const REPORT_FILENAME = 'Comparison_Report.xlsx';

export const SHEET_NAMES = {
  summary: 'Summary',
  missingColumns: 'MissingColumnsInRight',
  newColumns: 'NewColumnsInRight',
  onlyLeft: 'OnlyInLeft',
  onlyRight: 'OnlyInRight',
  cellDiffs: 'CellDiffs',
} as const;

const rowsSheet = (rows: Row[], columns: string[]): XLSX.WorkSheet =>
  XLSX.utils.aoa_to_sheet([columns, ...rows.map(row => columns.map(col => row[col] ?? ''))]);

const listSheet = (header: string, values: string[]): XLSX.WorkSheet =>
  XLSX.utils.aoa_to_sheet([[header], ...values.map(v => [v])]);

export const buildReportWorkbook = (report: ComparisonReport): XLSX.WorkBook => {
  const wb = XLSX.utils.book_new();

  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet([
    ['left_rows', 'right_rows', 'only_left_count', 'only_right_count', 'cell_diff_count'],
    [report.leftRows, report.rightRows, report.onlyLeftCount, report.onlyRightCount, report.cellDiffCount],
  ]), SHEET_NAMES.summary);
  XLSX.utils.book_append_sheet(wb, listSheet('Missing in Right', report.missingColumnsInRight), SHEET_NAMES.missingColumns);
  XLSX.utils.book_append_sheet(wb, listSheet('New in Right', report.newColumnsInRight), SHEET_NAMES.newColumns);
  XLSX.utils.book_append_sheet(wb, rowsSheet(report.onlyLeft, report.leftColumns), SHEET_NAMES.onlyLeft);
  XLSX.utils.book_append_sheet(wb, rowsSheet(report.onlyRight, report.rightColumns), SHEET_NAMES.onlyRight);

  if (report.cellDiffs && report.cellDiffs.length > 0) {
    XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet([
      ['row_key', 'column', 'left', 'right'],
      ...report.cellDiffs.map(d => [d.rowKey, d.column, d.left, d.right]),
    ]), SHEET_NAMES.cellDiffs);
  }

  return wb;
};

export const exportReportWorkbook = (report: ComparisonReport, filename = REPORT_FILENAME) => {
  const bytes: ArrayBuffer = XLSX.write(buildReportWorkbook(report), { bookType: 'xlsx', type: 'array' });
  downloadBlob(
    new Blob([bytes], { type: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet' }),
    filename
  );
};
