import type { Column, Dataset } from '../types';

export const isNumericColumn = (column: Column): boolean =>
  column.dtype === 'int64' || column.dtype === 'float64';

export const isCategoricalColumn = (column: Column): boolean => column.dtype === 'object';

// Both lists are derived from the columns as they are now; never cache them across drops
export const numericColumns = (dataset: Dataset): string[] =>
  dataset.columns.filter(isNumericColumn).map(c => c.name);

export const categoricalColumns = (dataset: Dataset): string[] =>
  dataset.columns.filter(isCategoricalColumn).map(c => c.name);

export const findColumn = (dataset: Dataset, name: string): Column | undefined =>
  dataset.columns.find(c => c.name === name);

export const datasetShape = (dataset: Dataset): [rows: number, columns: number] =>
  [dataset.rowCount, dataset.columns.length];

export const formatShape = (dataset: Dataset): string => {
  const [rows, columns] = datasetShape(dataset);
  return `(${rows}, ${columns})`;
};
