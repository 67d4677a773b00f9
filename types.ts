
export type CellValue = number | string | boolean | null;

// datetime64[ns] only comes from workbook date cells; values are ISO strings
export type ColumnDtype = 'int64' | 'float64' | 'bool' | 'datetime64[ns]' | 'object';

export interface Column {
  name: string;
  dtype: ColumnDtype;
  values: readonly CellValue[];
}

export interface Dataset {
  name: string;
  columns: readonly Column[];
  rowCount: number;
}

export type LoadedFile =
  | { kind: 'table'; dataset: Dataset }
  | { kind: 'workbook'; sheets: ReadonlyMap<string, Dataset> };

export type MissingValueStrategy = 'none' | 'drop-rows' | 'fill';

export interface CleaningConfig {
  strategy: MissingValueStrategy;
  dropColumns: readonly string[];
}

export interface WorkingCopy {
  dataset: Dataset;
  messages: string[];
}

// Preview cells: numeric columns keep numbers, everything else is text
export type DisplayCell = number | string | null;

export interface DataPreview {
  columns: string[];
  rows: DisplayCell[][];
}

export interface ColumnInfo {
  index: number;
  name: string;
  nonNullCount: number;
  dtype: ColumnDtype;
}

export type StatisticValue = number | string | null;

export interface StatisticsTable {
  // numeric: count/mean/std/quartiles; categorical: count/unique/top/freq
  kind: 'numeric' | 'categorical' | 'empty';
  statistics: string[];
  columns: string[];
  // values[statisticIndex][columnIndex]
  values: StatisticValue[][];
}

export interface MissingCount {
  name: string;
  missing: number;
}

export type PlotKind = 'histogram' | 'box' | 'scatter' | 'bar' | 'heatmap';

export type PlotRequest =
  | { kind: 'histogram'; column: string; bins: number }
  | { kind: 'box'; column: string }
  | { kind: 'scatter'; x: string; y: string; hue: string | null }
  | { kind: 'bar'; category: string; value: string }
  | { kind: 'heatmap' };

export interface HistogramBin {
  start: number;
  end: number;
  midpoint: number;
  count: number;
  density: number | null;
}

export interface HistogramPlot {
  kind: 'histogram';
  title: string;
  column: string;
  bins: HistogramBin[];
}

export interface BoxStats {
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
  lowerWhisker: number;
  upperWhisker: number;
  outliers: number[];
}

export interface BoxPlot {
  kind: 'box';
  title: string;
  column: string;
  stats: BoxStats;
}

export interface ScatterPoint {
  x: number;
  y: number;
}

export interface ScatterSeries {
  name: string;
  points: ScatterPoint[];
}

export interface ScatterPlot {
  kind: 'scatter';
  title: string;
  x: string;
  y: string;
  hue: string | null;
  series: ScatterSeries[];
}

export interface BarGroup {
  category: string;
  value: number;
}

export interface BarPlot {
  kind: 'bar';
  title: string;
  category: string;
  value: string;
  groups: BarGroup[];
}

export interface HeatmapPlot {
  kind: 'heatmap';
  title: string;
  columns: string[];
  // matrix[row][col], null where the coefficient is undefined
  matrix: (number | null)[][];
}

export type PlotData = HistogramPlot | BoxPlot | ScatterPlot | BarPlot | HeatmapPlot;

export type PlotResult =
  | { status: 'ok'; plot: PlotData }
  | { status: 'warning'; message: string }
  | { status: 'error'; message: string };

export interface SummaryReport {
  fileName: string;
  mimeType: string;
  content: string;
}
