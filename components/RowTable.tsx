import React, { useEffect, useState } from 'react';
import { ChevronDown, Download } from 'lucide-react';
import type { Row } from '../types';
import { Button } from './ui/Components';
import { exportToCSV } from '../utils';

interface RowTableProps {
  rows: Row[];
  columns: string[];
  pageSize: number;
  keyColumns?: string[];
  exportName?: string;
  emptyMessage?: string;
}

export const RowTable: React.FC<RowTableProps> = ({ rows, columns, pageSize, keyColumns = [], exportName, emptyMessage = 'No rows.' }) => {
  const [visibleRows, setVisibleRows] = useState(pageSize);

  useEffect(() => {
    setVisibleRows(pageSize);
  }, [rows, pageSize]);

  if (rows.length === 0) {
    return <p className="p-6 text-center text-sm text-slate-400 italic">{emptyMessage}</p>;
  }

  return (
    <div>
      {exportName && (
        <div className="p-3 flex justify-end bg-white border-b border-slate-100">
          <Button variant="outline" size="sm" onClick={() => exportToCSV(rows, columns, exportName)}>
            <Download size={14} className="mr-1" /> CSV
          </Button>
        </div>
      )}

      <div className="overflow-x-auto custom-scrollbar max-h-[600px]">
        <table className="w-full text-sm text-left border-collapse">
          <thead className="bg-white sticky top-0 z-10 shadow-sm">
            <tr>
              <th className="p-3 border-b text-xs font-bold text-slate-400 uppercase w-10">#</th>
              {columns.map(col => (
                <th key={col} className="p-3 border-b font-semibold text-slate-700 bg-slate-50">
                  {col}
                  {keyColumns.includes(col) && <span className="ml-1 text-xs font-normal text-slate-400">(Key)</span>}
                </th>
              ))}
            </tr>
          </thead>
          <tbody className="divide-y divide-slate-100 bg-white">
            {rows.slice(0, visibleRows).map((row, i) => (
              <tr key={i} className="hover:bg-slate-50">
                <td className="p-3 text-slate-400 text-xs font-mono">{i + 1}</td>
                {columns.map(col => (
                  <td key={col} className="p-3 text-slate-700 max-w-[240px] truncate whitespace-pre">
                    {row[col] ?? ''}
                  </td>
                ))}
              </tr>
            ))}
          </tbody>
        </table>
      </div>

      <div className="p-3 bg-slate-50 border-t border-slate-200 text-center">
        <p className="text-xs text-slate-500 mb-2">
          Showing {Math.min(visibleRows, rows.length)} of {rows.length} rows
        </p>
        {visibleRows < rows.length && (
          <Button variant="outline" size="sm" onClick={() => setVisibleRows(prev => prev + 100)}>
            <ChevronDown size={14} className="mr-1" /> Load 100 More
          </Button>
        )}
      </div>
    </div>
  );
};
