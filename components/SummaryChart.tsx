import React from 'react';
import { BarChart, Bar, XAxis, YAxis, Tooltip, ResponsiveContainer, Cell } from 'recharts';
import type { ComparisonReport } from '../types';

const chartData = (report: ComparisonReport) => [
  { name: 'Left rows', value: report.leftRows, color: '#0f172a' },
  { name: 'Right rows', value: report.rightRows, color: '#475569' },
  { name: 'Only left', value: report.onlyLeftCount, color: '#dc2626' },
  { name: 'Only right', value: report.onlyRightCount, color: '#d97706' },
  { name: 'Cell diffs', value: report.cellDiffCount, color: '#2563eb' },
];

export const SummaryChart = ({ report }: { report: ComparisonReport }) => {
  const data = chartData(report);
  return (
    <div className="h-56 w-full">
      <ResponsiveContainer width="100%" height="100%">
        <BarChart data={data} margin={{ top: 8, right: 8, bottom: 0, left: 0 }}>
          <XAxis dataKey="name" tick={{ fontSize: 11 }} />
          <YAxis allowDecimals={false} tick={{ fontSize: 11 }} />
          <Tooltip />
          <Bar dataKey="value" radius={[4, 4, 0, 0]}>
            {data.map(entry => (
              <Cell key={entry.name} fill={entry.color} />
            ))}
          </Bar>
        </BarChart>
      </ResponsiveContainer>
    </div>
  );
};
