import type { CellValue, Dataset } from "../types";
import { makeColumn } from "../utils/dataProcessor";

// Builds a dataset with inferred dtypes from column-major values
export const datasetOf = (columns: Record<string, CellValue[]>, name = "people.csv"): Dataset => {
  const entries = Object.entries(columns);
  return {
    name,
    columns: entries.map(([columnName, values]) => makeColumn(columnName, values)),
    rowCount: entries[0]?.[1].length ?? 0,
  };
};

export const peopleWithGap = (): Dataset =>
  datasetOf({ age: [25, null, 31], city: ["NY", "NY", "LA"] });
