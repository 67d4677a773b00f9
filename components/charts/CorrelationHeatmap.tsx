import React from 'react';
import type { HeatmapPlot } from '../../types';
import { formatCorrelation, heatmapColor } from '../../utils/visualizer';

export const CorrelationHeatmap: React.FC<{ plot: HeatmapPlot }> = ({ plot }) => (
  <div className="overflow-x-auto">
    <table className="text-sm mx-auto">
      <thead>
        <tr>
          <th className="p-2"></th>
          {plot.columns.map(col => (
            <th key={col} className="p-2 text-slate-500 font-medium text-xs truncate max-w-[80px]">
              {col}
            </th>
          ))}
        </tr>
      </thead>
      <tbody>
        {plot.columns.map((row, r) => (
          <tr key={row}>
            <td className="p-2 text-slate-500 font-medium text-xs truncate max-w-[80px]">{row}</td>
            {plot.columns.map((col, c) => {
              const value = plot.matrix[r][c];
              return (
                <td key={col} className="p-1">
                  <div
                    data-testid={`corr-${row}-${col}`}
                    className={`w-14 h-14 rounded flex items-center justify-center text-xs font-medium ${
                      value !== null && Math.abs(value) > 0.5 ? 'text-white' : 'text-slate-800'
                    }`}
                    style={{ backgroundColor: heatmapColor(value) }}
                  >
                    {formatCorrelation(value)}
                  </div>
                </td>
              );
            })}
          </tr>
        ))}
      </tbody>
    </table>
    <div className="flex items-center justify-center gap-2 mt-4 text-xs text-slate-500">
      <span>-1</span>
      <div
        className="h-2 w-48 rounded"
        style={{ background: `linear-gradient(to right, ${heatmapColor(-1)}, ${heatmapColor(0)}, ${heatmapColor(1)})` }}
      />
      <span>+1</span>
    </div>
  </div>
);
