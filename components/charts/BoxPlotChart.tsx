import React from 'react';
import type { BoxPlot } from '../../types';

const WIDTH = 320;
const HEIGHT = 360;
const PADDING = { top: 20, bottom: 20, left: 60 };
const BOX_WIDTH = 90;
const TICKS = 5;

// Single vertical box: whiskers at the furthest points inside 1.5 IQR, outliers as dots
export const BoxPlotChart: React.FC<{ plot: BoxPlot }> = ({ plot }) => {
  const { stats } = plot;
  let low = stats.min;
  let high = stats.max;
  if (low === high) {
    low -= 0.5;
    high += 0.5;
  }

  const plotHeight = HEIGHT - PADDING.top - PADDING.bottom;
  const y = (value: number) => PADDING.top + ((high - value) / (high - low)) * plotHeight;
  const centerX = PADDING.left + (WIDTH - PADDING.left) / 2;
  const boxLeft = centerX - BOX_WIDTH / 2;
  const ticks = Array.from({ length: TICKS }, (_, i) => low + ((high - low) * i) / (TICKS - 1));

  return (
    <svg viewBox={`0 0 ${WIDTH} ${HEIGHT}`} className="w-full h-full" role="img" aria-label={plot.title}>
      <line x1={PADDING.left} x2={PADDING.left} y1={PADDING.top} y2={HEIGHT - PADDING.bottom} stroke="#94a3b8" />
      {ticks.map(tick => (
        <g key={tick}>
          <line x1={PADDING.left - 4} x2={PADDING.left} y1={y(tick)} y2={y(tick)} stroke="#94a3b8" />
          <text x={PADDING.left - 8} y={y(tick)} textAnchor="end" dominantBaseline="middle" fontSize={11} fill="#64748b">
            {tick.toFixed(2)}
          </text>
        </g>
      ))}

      <line x1={centerX} x2={centerX} y1={y(stats.upperWhisker)} y2={y(stats.q3)} stroke="#334155" />
      <line x1={centerX} x2={centerX} y1={y(stats.q1)} y2={y(stats.lowerWhisker)} stroke="#334155" />
      <line x1={centerX - 20} x2={centerX + 20} y1={y(stats.upperWhisker)} y2={y(stats.upperWhisker)} stroke="#334155" />
      <line x1={centerX - 20} x2={centerX + 20} y1={y(stats.lowerWhisker)} y2={y(stats.lowerWhisker)} stroke="#334155" />

      <rect
        x={boxLeft}
        y={y(stats.q3)}
        width={BOX_WIDTH}
        height={Math.max(1, y(stats.q1) - y(stats.q3))}
        fill="#4f46e5"
        fillOpacity={0.6}
        stroke="#334155"
      />
      <line x1={boxLeft} x2={boxLeft + BOX_WIDTH} y1={y(stats.median)} y2={y(stats.median)} stroke="#f59e0b" strokeWidth={2} />

      {stats.outliers.map((value, i) => (
        <circle key={i} cx={centerX} cy={y(value)} r={3} fill="none" stroke="#334155" />
      ))}
    </svg>
  );
};
