import React, { useMemo } from 'react';
import { Database } from 'lucide-react';
import type { DataPreview, Dataset, StatisticsTable } from '../types';
import { PREVIEW_ROWS } from '../constants';
import { formatShape } from '../utils/columns';
import { describe, missingCounts, previewRows, renderInfo } from '../utils/inspector';
import { Card, Expander } from './Card';

const PreviewTable: React.FC<{ preview: DataPreview }> = ({ preview }) => {
  if (preview.columns.length === 0) {
    return <p className="text-sm text-slate-400 italic">No columns to show.</p>;
  }

  return (
    <div className="overflow-auto border rounded-lg">
      <table className="w-full text-sm text-left border-collapse">
        <thead className="bg-slate-50 border-b">
          <tr>
            {preview.columns.map(column => (
              <th key={column} className="px-4 py-3 font-semibold text-slate-700 whitespace-nowrap">
                {column}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {preview.rows.map((row, i) => (
            <tr key={i} className="border-b last:border-0 hover:bg-slate-50/50 transition-colors">
              {row.map((cell, c) => (
                <td key={preview.columns[c]} className="px-4 py-3 text-slate-600 font-mono text-xs max-w-xs truncate">
                  {cell ?? '-'}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
};

const formatCell = (value: number | string | null, fixed: boolean) => {
  if (value === null) return 'NaN';
  if (typeof value === 'number') return fixed ? value.toFixed(4) : String(value);
  return value;
};

const StatisticsGrid: React.FC<{ table: StatisticsTable }> = ({ table }) => {
  if (table.kind === 'empty') {
    return <p className="text-sm text-slate-400 italic">No columns to describe.</p>;
  }

  const fixed = table.kind === 'numeric';
  return (
    <div className="overflow-auto border rounded-lg">
      <table className="w-full text-sm text-left border-collapse">
        <thead className="bg-slate-50 border-b">
          <tr>
            <th className="px-4 py-2" />
            {table.columns.map(column => (
              <th key={column} className="px-4 py-2 font-semibold text-slate-700 whitespace-nowrap text-right">{column}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {table.statistics.map((statistic, s) => (
            <tr key={statistic} className="border-b last:border-0">
              <td className="px-4 py-2 font-medium text-slate-500">{statistic}</td>
              {table.values[s].map((value, c) => (
                <td key={table.columns[c]} className="px-4 py-2 text-right font-mono text-xs text-slate-600">
                  {formatCell(value, fixed)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
};

interface DataExplorerProps {
  original: Dataset;
  working: Dataset | null;
}

export const DataExplorer: React.FC<DataExplorerProps> = ({ original, working }) => {
  const rawPreview = useMemo(() => previewRows(original), [original]);
  const processedPreview = useMemo(() => (working ? previewRows(working) : null), [working]);
  const statistics = useMemo(() => (working ? describe(working) : null), [working]);
  const counts = useMemo(() => (working ? missingCounts(working) : []), [working]);

  return (
    <Card title="Data Exploration" icon={Database}>
      <div className="space-y-3">
        <Expander title={`Show Raw Data Preview (First ${PREVIEW_ROWS} Rows)`}>
          <PreviewTable preview={rawPreview} />
        </Expander>

        {working && processedPreview && statistics ? (
          <>
            <Expander title={`Show Processed Data Preview (First ${PREVIEW_ROWS} Rows)`}>
              <PreviewTable preview={processedPreview} />
            </Expander>

            <Expander title="Show Data Summary">
              <div className="space-y-4">
                <p className="text-sm text-slate-700">
                  Shape of Processed Data: <span className="font-mono">{formatShape(working)}</span>
                </p>
                <pre className="text-xs bg-slate-50 border rounded-lg p-3 overflow-auto">{renderInfo(working)}</pre>
                <p className="text-sm text-slate-700">Descriptive Statistics:</p>
                <StatisticsGrid table={statistics} />
              </div>
            </Expander>

            <Expander title="Show Missing Value Counts">
              {counts.length === 0 ? (
                <p className="text-sm text-slate-400 italic">No columns.</p>
              ) : (
                <ul className="divide-y divide-slate-100">
                  {counts.map(({ name, missing }) => (
                    <li key={name} className="flex justify-between py-1.5 text-sm">
                      <span className="font-medium text-slate-700">{name}</span>
                      <span className={missing > 0 ? 'text-amber-600 font-semibold' : 'text-slate-500'}>{missing}</span>
                    </li>
                  ))}
                </ul>
              )}
            </Expander>
          </>
        ) : (
          <p className="text-sm text-slate-400 italic">The processed data is unavailable until the cleaning error is resolved.</p>
        )}
      </div>
    </Card>
  );
};
