import type { MissingValueStrategy, PlotKind } from './types';

export const SUPPORTED_EXTENSIONS = ['.csv', '.xlsx'] as const;

// Cells that read as missing in CSV input
export const MISSING_MARKERS: ReadonlySet<string> = new Set([
  '', '#N/A', '#NA', '<NA>', 'N/A', 'NA', 'NULL', 'NaN', '-NaN', 'nan', '-nan', 'n/a', 'null', 'None',
]);

export const PREVIEW_ROWS = 5;

export const HISTOGRAM_BINS = { min: 5, max: 100, default: 20 } as const;

export const BOX_WHISKER_IQR = 1.5;

export const REPORT_FILE_NAME = 'data_summary.txt';
export const REPORT_MIME_TYPE = 'text/plain';

export const STRATEGY_OPTIONS: { id: MissingValueStrategy; label: string }[] = [
  { id: 'none', label: 'None' },
  { id: 'drop-rows', label: 'Drop Rows with Missing Values' },
  { id: 'fill', label: 'Fill with Mean/Median/Mode' },
];

export const PLOT_KINDS: { id: PlotKind; label: string }[] = [
  { id: 'histogram', label: 'Histogram' },
  { id: 'box', label: 'Box Plot' },
  { id: 'scatter', label: 'Scatter Plot' },
  { id: 'bar', label: 'Bar Chart' },
  { id: 'heatmap', label: 'Correlation Heatmap' },
];

// Diverging scale endpoints for correlations: -1, 0, +1
export const HEATMAP_COLORS = {
  negative: [59, 76, 192],
  neutral: [221, 221, 221],
  positive: [180, 4, 38],
} as const;

export const CHART_PALETTE = [
  '#4f46e5',
  '#10b981',
  '#f59e0b',
  '#ec4899',
  '#3b82f6',
  '#8b5cf6',
  '#f43f5e',
  '#06b6d4',
  '#84cc16',
];
