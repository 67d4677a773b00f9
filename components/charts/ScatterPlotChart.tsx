import React from 'react';
import { ScatterChart, Scatter, XAxis, YAxis, CartesianGrid, Tooltip, Legend, ResponsiveContainer } from 'recharts';
import type { ScatterPlot } from '../../types';
import { CHART_PALETTE } from '../../constants';

export const ScatterPlotChart: React.FC<{ plot: ScatterPlot }> = ({ plot }) => (
  <ResponsiveContainer width="100%" height="100%">
    <ScatterChart margin={{ top: 10, right: 20, bottom: 20, left: 10 }}>
      <CartesianGrid strokeDasharray="3 3" />
      <XAxis type="number" dataKey="x" name={plot.x} label={{ value: plot.x, position: 'insideBottom', offset: -10 }} />
      <YAxis type="number" dataKey="y" name={plot.y} label={{ value: plot.y, angle: -90, position: 'insideLeft' }} />
      <Tooltip cursor={{ strokeDasharray: '3 3' }} />
      {plot.hue && <Legend verticalAlign="top" />}
      {plot.series.map((series, i) => (
        <Scatter
          key={series.name}
          name={series.name}
          data={series.points}
          fill={CHART_PALETTE[i % CHART_PALETTE.length]}
        />
      ))}
    </ScatterChart>
  </ResponsiveContainer>
);
