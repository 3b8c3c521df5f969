import type { CellDiff, CompareOptions, ComparisonReport, DataTable, NormalizationConfig, Row } from './types';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';
import { cellOf, normalizeRow } from './utils';

export const KEY_DELIMITER = '||';

export const DEFAULT_COMPARE_OPTIONS: CompareOptions = {
  strictDecimal: false,
  caseInsensitive: true,
  keyColumns: '',
  dropBlankRows: true,
  showSamples: true,
};

// --- Keys ---

/**
 * Keeps the requested key columns that exist on both sides, in the order they
 * were asked for. Null means "align by content hash instead".
 */
export const resolveKeys = (
  leftColumns: string[],
  rightColumns: string[],
  requested: string | string[]
): string[] | null => {
  const names = (typeof requested === 'string' ? requested.split(',') : requested).map(k => k.trim());
  if (names.every(k => k === '')) return null;

  const leftSet = new Set(leftColumns);
  const rightSet = new Set(rightColumns);
  const resolved = names.filter(k => leftSet.has(k) && rightSet.has(k));

  return resolved.length > 0 ? resolved : null;
};

export const sha256Hex = (input: string): string => bytesToHex(sha256(utf8ToBytes(input)));

/** One key per normalized row, index-parallel with the input. */
export const deriveRowKeys = (rows: Row[], columns: string[], keys: string[] | null): string[] => {
  if (keys) {
    return rows.map(row => keys.map(k => cellOf(row, k)).join(KEY_DELIMITER));
  }
  return rows.map(row => sha256Hex(columns.map(c => cellOf(row, c)).join(KEY_DELIMITER)));
};

const findDuplicates = (keys: string[]): string[] => {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const key of keys) {
    if (seen.has(key)) dupes.add(key);
    seen.add(key);
  }
  return Array.from(dupes);
};

// First record wins when a key repeats on one side
const indexByKey = (keys: string[], rows: Row[]): Map<string, Row> => {
  const index = new Map<string, Row>();
  keys.forEach((key, i) => {
    if (!index.has(key)) index.set(key, rows[i]);
  });
  return index;
};

// --- Cell Diff ---

const diffCells = (
  leftIndex: Map<string, Row>,
  rightIndex: Map<string, Row>,
  sharedColumns: string[]
): CellDiff[] => {
  const diffs: CellDiff[] = [];
  for (const [rowKey, leftRow] of leftIndex) {
    const rightRow = rightIndex.get(rowKey);
    if (!rightRow) continue;
    for (const column of sharedColumns) {
      const left = cellOf(leftRow, column);
      const right = cellOf(rightRow, column);
      if (left !== right) {
        diffs.push({ rowKey, column, left, right });
      }
    }
  }
  return diffs;
};

// --- Compare ---

export const compareDatasets = (
  left: DataTable,
  right: DataTable,
  keyColumns: string | string[],
  config: NormalizationConfig
): ComparisonReport => {
  const leftColumnSet = new Set(left.columns);
  const rightColumnSet = new Set(right.columns);
  const missingColumnsInRight = left.columns.filter(c => !rightColumnSet.has(c));
  const newColumnsInRight = right.columns.filter(c => !leftColumnSet.has(c));
  const sharedColumns = left.columns.filter(c => rightColumnSet.has(c));

  const normalizedLeft = left.rows.map(row => normalizeRow(row, left.columns, config));
  const normalizedRight = right.rows.map(row => normalizeRow(row, right.columns, config));

  const keys = resolveKeys(left.columns, right.columns, keyColumns);
  const leftKeys = deriveRowKeys(normalizedLeft, left.columns, keys);
  const rightKeys = deriveRowKeys(normalizedRight, right.columns, keys);

  const leftKeySet = new Set(leftKeys);
  const rightKeySet = new Set(rightKeys);

  const onlyLeft = left.rows.filter((_, i) => !rightKeySet.has(leftKeys[i]));
  const onlyRight = right.rows.filter((_, i) => !leftKeySet.has(rightKeys[i]));
  const commonKeyCount = Array.from(leftKeySet).filter(k => rightKeySet.has(k)).length;

  const cellDiffs = keys
    ? diffCells(indexByKey(leftKeys, normalizedLeft), indexByKey(rightKeys, normalizedRight), sharedColumns)
    : null;

  return {
    leftRows: left.rows.length,
    rightRows: right.rows.length,
    leftColumns: [...left.columns],
    rightColumns: [...right.columns],
    missingColumnsInRight,
    newColumnsInRight,
    keyColumns: keys,
    onlyLeft,
    onlyRight,
    onlyLeftCount: onlyLeft.length,
    onlyRightCount: onlyRight.length,
    commonKeyCount,
    cellDiffs,
    cellDiffCount: cellDiffs ? cellDiffs.length : 0,
    duplicateKeys: keys
      ? { left: findDuplicates(leftKeys), right: findDuplicates(rightKeys) }
      : { left: [], right: [] },
  };
};
