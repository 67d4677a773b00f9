import type {
  BarGroup,
  BoxStats,
  CellValue,
  Column,
  Dataset,
  HistogramBin,
  PlotData,
  PlotKind,
  PlotRequest,
  PlotResult,
  ScatterSeries,
} from '../types';
import { BOX_WHISKER_IQR, HEATMAP_COLORS, HISTOGRAM_BINS } from '../constants';
import { errorMessage } from '../errors';
import { categoricalColumns, findColumn, isNumericColumn, numericColumns } from './columns';
import { gaussianKde, pearson, presentNumbers, quantile, sortAscending } from './statistics';

// Expected "nothing to draw" conditions; reported as warnings rather than errors
class PlotWarning extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PlotWarning';
  }
}

export interface PlotColumns {
  numeric: string[];
  categorical: string[];
}

export const plotColumns = (dataset: Dataset): PlotColumns => ({
  numeric: numericColumns(dataset),
  categorical: categoricalColumns(dataset),
});

// Y defaults away from X, but X === Y is still accepted by buildPlot
export const scatterYOptions = (numeric: readonly string[], x: string | null): string[] =>
  numeric.filter(name => name !== x);

export const clampBins = (bins: number): number => {
  if (!Number.isFinite(bins)) return HISTOGRAM_BINS.default;
  return Math.min(HISTOGRAM_BINS.max, Math.max(HISTOGRAM_BINS.min, Math.round(bins)));
};

export const missingColumnsWarning = (kind: PlotKind): string => {
  switch (kind) {
    case 'histogram':
      return "No numerical columns available to create a histogram.";
    case 'box':
      return "No numerical columns available to create a box plot.";
    case 'scatter':
      return "At least two numerical columns are needed for a scatter plot.";
    case 'bar':
      return "A bar chart needs one categorical and one numerical column.";
    case 'heatmap':
      return "No numerical columns available to create a heatmap.";
  }
};

/**
 * First eligible parameters for a plot kind, or null when the dataset has no
 * columns the kind can use.
 */
export const defaultPlotRequest = (kind: PlotKind, dataset: Dataset): PlotRequest | null => {
  const { numeric, categorical } = plotColumns(dataset);

  switch (kind) {
    case 'histogram':
      return numeric.length > 0 ? { kind, column: numeric[0], bins: HISTOGRAM_BINS.default } : null;
    case 'box':
      return numeric.length > 0 ? { kind, column: numeric[0] } : null;
    case 'scatter': {
      const y = scatterYOptions(numeric, numeric[0] ?? null)[0];
      return numeric.length > 0 && y !== undefined ? { kind, x: numeric[0], y, hue: null } : null;
    }
    case 'bar':
      return categorical.length > 0 && numeric.length > 0
        ? { kind, category: categorical[0], value: numeric[0] }
        : null;
    case 'heatmap':
      return numeric.length > 0 ? { kind } : null;
  }
};

const fitsColumns = (request: PlotRequest, { numeric, categorical }: PlotColumns): boolean => {
  switch (request.kind) {
    case 'histogram':
    case 'box':
      return numeric.includes(request.column);
    case 'scatter':
      return numeric.includes(request.x)
        && numeric.includes(request.y)
        && (request.hue === null || categorical.includes(request.hue));
    case 'bar':
      return categorical.includes(request.category) && numeric.includes(request.value);
    case 'heatmap':
      return numeric.length > 0;
  }
};

/**
 * Keeps the previous selection while it still fits the dataset's columns
 * (after a drop it may not) and falls back to the defaults otherwise.
 */
export const resolvePlotRequest = (
  kind: PlotKind,
  dataset: Dataset,
  previous: PlotRequest | null,
): PlotRequest | null => {
  if (previous && previous.kind === kind && fitsColumns(previous, plotColumns(dataset))) return previous;
  return defaultPlotRequest(kind, dataset);
};

const requireColumn = (dataset: Dataset, name: string): Column => {
  const column = findColumn(dataset, name);
  if (!column) throw new PlotWarning(`Column '${name}' is not in the data.`);
  return column;
};

const requireNumeric = (dataset: Dataset, name: string): Column => {
  const column = requireColumn(dataset, name);
  if (!isNumericColumn(column)) throw new PlotWarning(`Column '${name}' is not numerical.`);
  return column;
};

const requireValues = (column: Column): number[] => {
  const values = presentNumbers(column.values);
  if (values.length === 0) throw new PlotWarning(`Column '${column.name}' has no values to plot.`);
  return values;
};

const labelOf = (value: CellValue): string => (value === null ? 'nan' : String(value));

/**
 * Equal-width bins over [min, max], the last one closed on the right. A
 * constant column gets the range value ± 0.5. Each bin carries the kernel
 * density at its midpoint, scaled to the bar counts.
 */
export const histogramBins = (values: readonly number[], binCount: number): HistogramBin[] => {
  const sorted = sortAscending(values);
  let low = sorted[0];
  let high = sorted[sorted.length - 1];
  if (low === high) {
    low -= 0.5;
    high += 0.5;
  }

  const width = (high - low) / binCount;
  const counts = new Array<number>(binCount).fill(0);
  for (const value of sorted) {
    counts[Math.min(binCount - 1, Math.floor((value - low) / width))]++;
  }

  const kde = gaussianKde(sorted);
  const scale = sorted.length * width;

  return counts.map((count, i) => {
    const start = low + i * width;
    const end = i === binCount - 1 ? high : low + (i + 1) * width;
    const midpoint = (start + end) / 2;
    return { start, end, midpoint, count, density: kde ? kde(midpoint) * scale : null };
  });
};

export const boxStats = (values: readonly number[]): BoxStats => {
  const sorted = sortAscending(values);
  const q1 = quantile(sorted, 0.25) ?? sorted[0];
  const median = quantile(sorted, 0.5) ?? sorted[0];
  const q3 = quantile(sorted, 0.75) ?? sorted[0];
  const reach = (q3 - q1) * BOX_WHISKER_IQR;
  const inside = sorted.filter(v => v >= q1 - reach && v <= q3 + reach);

  return {
    min: sorted[0],
    q1,
    median,
    q3,
    max: sorted[sorted.length - 1],
    lowerWhisker: inside[0],
    upperWhisker: inside[inside.length - 1],
    outliers: sorted.filter(v => v < q1 - reach || v > q3 + reach),
  };
};

export const groupMeans = (categories: readonly CellValue[], values: readonly CellValue[]): BarGroup[] => {
  const totals = new Map<string, { sum: number; count: number }>();
  categories.forEach((category, row) => {
    const value = values[row];
    if (category === null || typeof value !== 'number') return;
    const key = String(category);
    const total = totals.get(key) ?? { sum: 0, count: 0 };
    total.sum += value;
    total.count++;
    totals.set(key, total);
  });

  // sort is stable, so equal means keep first-appearance order
  return Array.from(totals, ([category, { sum, count }]) => ({ category, value: sum / count }))
    .sort((a, b) => b.value - a.value);
};

const scatterSeries = (x: Column, y: Column, hue: Column | null): ScatterSeries[] => {
  const series = new Map<string, ScatterSeries>();
  x.values.forEach((xValue, row) => {
    const yValue = y.values[row];
    if (typeof xValue !== 'number' || typeof yValue !== 'number') return;
    const name = hue ? labelOf(hue.values[row]) : y.name;
    const entry = series.get(name) ?? { name, points: [] };
    entry.points.push({ x: xValue, y: yValue });
    series.set(name, entry);
  });
  return Array.from(series.values());
};

export const correlationMatrix = (columns: readonly Column[]): (number | null)[][] =>
  columns.map(a => columns.map(b => pearson(a.values, b.values)));

const buildPlotData = (dataset: Dataset, request: PlotRequest): PlotData => {
  switch (request.kind) {
    case 'histogram': {
      const column = requireNumeric(dataset, request.column);
      const bins = histogramBins(requireValues(column), clampBins(request.bins));
      return { kind: 'histogram', title: `Histogram of ${column.name}`, column: column.name, bins };
    }
    case 'box': {
      const column = requireNumeric(dataset, request.column);
      return { kind: 'box', title: `Box Plot of ${column.name}`, column: column.name, stats: boxStats(requireValues(column)) };
    }
    case 'scatter': {
      const x = requireNumeric(dataset, request.x);
      const y = requireNumeric(dataset, request.y);
      const hue = request.hue ? requireColumn(dataset, request.hue) : null;
      const series = scatterSeries(x, y, hue);
      if (series.length === 0) throw new PlotWarning(`No rows have both '${x.name}' and '${y.name}'.`);
      return {
        kind: 'scatter',
        title: `Scatter Plot of ${x.name} vs ${y.name}`,
        x: x.name,
        y: y.name,
        hue: hue ? hue.name : null,
        series,
      };
    }
    case 'bar': {
      const category = requireColumn(dataset, request.category);
      const value = requireNumeric(dataset, request.value);
      const groups = groupMeans(category.values, value.values);
      if (groups.length === 0) throw new PlotWarning(`No rows have both '${category.name}' and '${value.name}'.`);
      return {
        kind: 'bar',
        title: `Average ${value.name} by ${category.name}`,
        category: category.name,
        value: value.name,
        groups,
      };
    }
    case 'heatmap': {
      const numeric = dataset.columns.filter(isNumericColumn);
      if (numeric.length === 0) throw new PlotWarning(missingColumnsWarning('heatmap'));
      return {
        kind: 'heatmap',
        title: "Correlation Matrix of Numerical Columns",
        columns: numeric.map(c => c.name),
        matrix: correlationMatrix(numeric),
      };
    }
  }
};

/**
 * Computes everything a chart needs for one plot request. Never throws:
 * unusable selections come back as warnings and anything unexpected as an
 * error message.
 */
export const buildPlot = (dataset: Dataset, request: PlotRequest): PlotResult => {
  try {
    return { status: 'ok', plot: buildPlotData(dataset, request) };
  } catch (error) {
    if (error instanceof PlotWarning) return { status: 'warning', message: error.message };
    console.error(`Failed to build ${request.kind} plot`, error);
    return { status: 'error', message: errorMessage(error, "Could not draw this plot.") };
  }
};

const mix = (from: readonly number[], to: readonly number[], t: number): string => {
  const channel = (i: number) => Math.round(from[i] + (to[i] - from[i]) * t);
  return `rgb(${channel(0)}, ${channel(1)}, ${channel(2)})`;
};

// Fixed diverging scale: -1 blue, 0 grey, +1 red
export const heatmapColor = (value: number | null): string => {
  if (value === null) return mix(HEATMAP_COLORS.neutral, HEATMAP_COLORS.neutral, 0);
  const t = Math.max(-1, Math.min(1, value));
  return t < 0
    ? mix(HEATMAP_COLORS.neutral, HEATMAP_COLORS.negative, -t)
    : mix(HEATMAP_COLORS.neutral, HEATMAP_COLORS.positive, t);
};

export const formatCorrelation = (value: number | null): string =>
  value === null ? 'NaN' : value.toFixed(2);
