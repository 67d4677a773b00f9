import React from 'react';
import { ComposedChart, Bar, Line, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer } from 'recharts';
import type { HistogramPlot } from '../../types';

export const HistogramChart: React.FC<{ plot: HistogramPlot }> = ({ plot }) => {
  const data = plot.bins.map(bin => ({
    label: bin.midpoint.toFixed(2),
    range: `${bin.start.toFixed(2)} – ${bin.end.toFixed(2)}`,
    count: bin.count,
    density: bin.density,
  }));

  return (
    <ResponsiveContainer width="100%" height="100%">
      <ComposedChart data={data} barCategoryGap={1}>
        <CartesianGrid strokeDasharray="3 3" vertical={false} />
        <XAxis dataKey="label" tick={{ fontSize: 11 }} />
        <YAxis allowDecimals={false} label={{ value: 'Count', angle: -90, position: 'insideLeft' }} />
        <Tooltip labelFormatter={(_, payload) => payload?.[0]?.payload?.range ?? ''} />
        <Bar dataKey="count" fill="#4f46e5" fillOpacity={0.7} />
        <Line type="monotone" dataKey="density" name="density" stroke="#f59e0b" strokeWidth={2} dot={false} />
      </ComposedChart>
    </ResponsiveContainer>
  );
};
