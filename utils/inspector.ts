import type {
  CellValue,
  ColumnDtype,
  ColumnInfo,
  DataPreview,
  Dataset,
  DisplayCell,
  MissingCount,
  StatisticValue,
  StatisticsTable,
} from '../types';
import { PREVIEW_ROWS } from '../constants';
import { isNumericColumn } from './columns';
import {
  isMissing,
  mean,
  mostFrequent,
  presentNumbers,
  quantile,
  sampleStd,
  sortAscending,
  uniqueCount,
} from './statistics';
import { renderTextTable, type Alignment } from './textTable';

const NUMERIC_STATISTICS = ['count', 'mean', 'std', 'min', '25%', '50%', '75%', 'max'];
const CATEGORICAL_STATISTICS = ['count', 'unique', 'top', 'freq'];
const DTYPE_ORDER: ColumnDtype[] = ['bool', 'datetime64[ns]', 'float64', 'int64', 'object'];

const toText = (value: CellValue): string => (value === null ? 'nan' : String(value));

/**
 * First rows of a dataset for display. Non-numeric columns are turned into
 * text so the table never has to render mixed types.
 */
export const previewRows = (dataset: Dataset, count: number = PREVIEW_ROWS): DataPreview => {
  const rowCount = Math.min(count, dataset.rowCount);
  const rows: DisplayCell[][] = [];

  for (let row = 0; row < rowCount; row++) {
    rows.push(dataset.columns.map(column => {
      const value = column.values[row];
      if (isNumericColumn(column)) return typeof value === 'number' ? value : null;
      return toText(value);
    }));
  }

  return { columns: dataset.columns.map(c => c.name), rows };
};

export const columnInfo = (dataset: Dataset): ColumnInfo[] =>
  dataset.columns.map((column, index) => ({
    index,
    name: column.name,
    nonNullCount: column.values.filter(value => !isMissing(value)).length,
    dtype: column.dtype,
  }));

export const renderInfo = (dataset: Dataset): string => {
  const info = columnInfo(dataset);
  const lines = [`${dataset.rowCount} entries, ${info.length} columns`];

  if (info.length > 0) {
    const headers = ['#', 'Column', 'Non-Null Count', 'Dtype'];
    lines.push(renderTextTable([
      headers,
      headers.map(header => '-'.repeat(header.length)),
      ...info.map(c => [String(c.index), c.name, `${c.nonNullCount} non-null`, c.dtype]),
    ]));
  }

  const tally = DTYPE_ORDER
    .map(dtype => ({ dtype, count: info.filter(c => c.dtype === dtype).length }))
    .filter(({ count }) => count > 0)
    .map(({ dtype, count }) => `${dtype}(${count})`);
  lines.push(`dtypes: ${tally.length > 0 ? tally.join(', ') : 'none'}`);

  return lines.join('\n');
};

const numericSummary = (values: readonly CellValue[]): StatisticValue[] => {
  const numbers = presentNumbers(values);
  const sorted = sortAscending(numbers);
  return [
    numbers.length,
    mean(numbers),
    sampleStd(numbers),
    sorted.length > 0 ? sorted[0] : null,
    quantile(sorted, 0.25),
    quantile(sorted, 0.5),
    quantile(sorted, 0.75),
    sorted.length > 0 ? sorted[sorted.length - 1] : null,
  ];
};

const categoricalSummary = (values: readonly CellValue[]): StatisticValue[] => {
  const top = mostFrequent(values);
  return [
    values.filter(value => !isMissing(value)).length,
    uniqueCount(values),
    top ? String(top.value) : null,
    top ? top.count : null,
  ];
};

/**
 * Descriptive statistics. When the dataset has numeric columns only those are
 * described (count, mean, std, min, quartiles, max); otherwise every column
 * gets count, unique, top and freq.
 */
export const describe = (dataset: Dataset): StatisticsTable => {
  if (dataset.columns.length === 0) {
    return { kind: 'empty', statistics: [], columns: [], values: [] };
  }

  const numeric = dataset.columns.filter(isNumericColumn);
  const numericMode = numeric.length > 0;
  const described = numericMode ? numeric : dataset.columns;
  const statistics = numericMode ? NUMERIC_STATISTICS : CATEGORICAL_STATISTICS;
  const perColumn = described.map(column =>
    numericMode ? numericSummary(column.values) : categoricalSummary(column.values)
  );

  return {
    kind: numericMode ? 'numeric' : 'categorical',
    statistics,
    columns: described.map(c => c.name),
    values: statistics.map((_, s) => perColumn.map(column => column[s])),
  };
};

const formatStatistic = (value: StatisticValue, fixed: boolean): string => {
  if (value === null) return 'NaN';
  if (typeof value === 'number') return fixed ? value.toFixed(6) : String(value);
  return value;
};

export const renderStatistics = (table: StatisticsTable): string => {
  if (table.kind === 'empty') return 'No columns to describe';

  const fixed = table.kind === 'numeric';
  const rows = [
    ['', ...table.columns],
    ...table.statistics.map((statistic, s) => [
      statistic,
      ...table.values[s].map(value => formatStatistic(value, fixed)),
    ]),
  ];
  const align: Alignment[] = ['left', ...table.columns.map(() => 'right' as const)];
  return renderTextTable(rows, align);
};

export const missingCounts = (dataset: Dataset): MissingCount[] =>
  dataset.columns.map(column => ({
    name: column.name,
    missing: column.values.filter(isMissing).length,
  }));

export const renderMissingCounts = (counts: readonly MissingCount[]): string => {
  if (counts.length === 0) return 'No columns';
  return renderTextTable(
    counts.map(({ name, missing }) => [name, String(missing)]),
    ['left', 'right'],
  );
};
