import type { CellValue, CleaningConfig, Column, Dataset, MissingValueStrategy, WorkingCopy } from '../types';
import { CleaningError } from '../errors';
import { isMissing, mean, mostFrequent, presentNumbers } from './statistics';
import { formatShape, isNumericColumn } from './columns';

export const copyDataset = (dataset: Dataset): Dataset => ({
  name: dataset.name,
  rowCount: dataset.rowCount,
  columns: dataset.columns.map(column => ({ ...column, values: [...column.values] })),
});

const dropRowsWithMissing = (dataset: Dataset): Dataset => {
  const kept: number[] = [];
  for (let row = 0; row < dataset.rowCount; row++) {
    if (dataset.columns.every(column => !isMissing(column.values[row]))) kept.push(row);
  }

  return {
    name: dataset.name,
    rowCount: kept.length,
    columns: dataset.columns.map(column => ({
      ...column,
      values: kept.map(row => column.values[row]),
    })),
  };
};

const fillValueFor = (column: Column): CellValue => {
  if (isNumericColumn(column)) return mean(presentNumbers(column.values));
  return mostFrequent(column.values)?.value ?? null;
};

const fillColumn = (column: Column): Column => {
  if (!column.values.some(isMissing)) return { ...column, values: [...column.values] };

  const fill = fillValueFor(column);
  return {
    ...column,
    values: column.values.map(value => (isMissing(value) ? fill : value)),
  };
};

/**
 * Applies one missing-value strategy and returns a new dataset; the input is
 * left untouched.
 *
 * `fill` replaces gaps with the column mean for numeric columns and with the
 * most frequent value (first in row order on ties) for the others. A column
 * without any observed value has nothing to fill with and keeps its gaps.
 */
export const handleMissingValues = (dataset: Dataset, strategy: MissingValueStrategy): Dataset => {
  switch (strategy) {
    case 'none':
      return copyDataset(dataset);
    case 'drop-rows':
      return dropRowsWithMissing(dataset);
    case 'fill':
      return { ...dataset, columns: dataset.columns.map(fillColumn) };
  }
};

export const dropColumns = (dataset: Dataset, names: readonly string[]): Dataset => {
  if (names.length === 0) return dataset;

  const present = new Set(dataset.columns.map(c => c.name));
  const unknown = names.filter(name => !present.has(name));
  if (unknown.length > 0) {
    throw new CleaningError(`[${unknown.map(name => `'${name}'`).join(', ')}] not found in columns`);
  }

  const dropped = new Set(names);
  return { ...dataset, columns: dataset.columns.filter(column => !dropped.has(column.name)) };
};

/**
 * Derives the working copy: missing-value strategy first, then the column
 * drop on that same result.
 */
export const buildWorkingCopy = (dataset: Dataset, config: CleaningConfig): WorkingCopy => {
  const messages: string[] = [];

  let working = handleMissingValues(dataset, config.strategy);
  if (config.strategy === 'drop-rows') {
    messages.push(`Data shape after dropping missing values: ${formatShape(working)}`);
  } else if (config.strategy === 'fill') {
    messages.push("Missing values have been filled.");
  }

  if (config.dropColumns.length > 0) {
    working = dropColumns(working, config.dropColumns);
    messages.push(`Dropped columns: ${config.dropColumns.join(', ')}`);
    messages.push(`Data shape after dropping columns: ${formatShape(working)}`);
  }

  return { dataset: working, messages };
};
