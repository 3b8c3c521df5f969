export type CellValue = string;

// Blank and missing cells are both stored as ''
export type Row = Record<string, CellValue>;

export type DataType = 'text' | 'number' | 'date' | 'boolean';

export interface ColumnDef {
  name: string;
  type: DataType; // display hint only, comparison treats every cell as text
}

export interface Dataset {
  name: string;
  type: 'csv' | 'excel';
  columns: ColumnDef[];
  data: Row[];
  rowCount: number;
  size?: string;
  rawSize?: number; // bytes
}

// What the comparator sees of one side: header order plus records
export interface DataTable {
  columns: string[];
  rows: Row[];
}

export interface ParsedTable {
  columns: ColumnDef[];
  data: Row[];
}

export interface NormalizationConfig {
  strictDecimal: boolean; // compare numbers by their exact text
  caseInsensitive: boolean;
}

export interface CompareOptions extends NormalizationConfig {
  keyColumns: string; // comma-separated, may be empty
  dropBlankRows: boolean;
  showSamples: boolean;
}

export interface CellDiff {
  rowKey: string;
  column: string;
  left: string;
  right: string;
}

export interface DuplicateKeys {
  left: string[];
  right: string[];
}

export interface ComparisonReport {
  leftRows: number;
  rightRows: number;
  leftColumns: string[];
  rightColumns: string[];
  missingColumnsInRight: string[];
  newColumnsInRight: string[];
  /** Resolved key columns, or null when rows were aligned by content hash. */
  keyColumns: string[] | null;
  onlyLeft: Row[];
  onlyRight: Row[];
  onlyLeftCount: number;
  onlyRightCount: number;
  commonKeyCount: number;
  /** Null in content-hash mode, where no cell-level attribution exists. */
  cellDiffs: CellDiff[] | null;
  cellDiffCount: number;
  duplicateKeys: DuplicateKeys;
}
