import React from 'react';
import { BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer } from 'recharts';
import type { BarPlot } from '../../types';

export const MeanBarChart: React.FC<{ plot: BarPlot }> = ({ plot }) => (
  <ResponsiveContainer width="100%" height="100%">
    <BarChart data={plot.groups} margin={{ bottom: 40 }}>
      <CartesianGrid strokeDasharray="3 3" vertical={false} />
      <XAxis dataKey="category" angle={-45} textAnchor="end" interval={0} height={70} tick={{ fontSize: 11 }} />
      <YAxis />
      <Tooltip formatter={(value) => (typeof value === 'number' ? value.toFixed(2) : value)} />
      <Bar dataKey="value" name={`Average ${plot.value}`} fill="#4f46e5" radius={[4, 4, 0, 0]} />
    </BarChart>
  </ResponsiveContainer>
);
