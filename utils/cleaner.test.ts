// @vitest-environment node
import { describe, it, expect } from "vitest";
import { CleaningError } from "../errors";
import { datasetOf, peopleWithGap } from "../test/fixtures";
import { buildWorkingCopy, dropColumns, handleMissingValues } from "./cleaner";
import { categoricalColumns, numericColumns } from "./columns";

describe("handleMissingValues", () => {
  it("returns an equal copy for 'none'", () => {
    const original = peopleWithGap();
    const result = handleMissingValues(original, "none");

    expect(result).toEqual(original);
    expect(result).not.toBe(original);
    expect(result.columns[0].values).not.toBe(original.columns[0].values);
  });

  it("drops every row with a gap", () => {
    const result = handleMissingValues(peopleWithGap(), "drop-rows");

    expect(result.rowCount).toBe(2);
    expect(result.columns[0].values).toEqual([25, 31]);
    expect(result.columns[1].values).toEqual(["NY", "LA"]);
  });

  it("changes nothing when dropping rows from complete data", () => {
    const complete = datasetOf({ a: [1, 2], b: ["x", "y"] });
    expect(handleMissingValues(complete, "drop-rows")).toEqual(complete);
  });

  it("fills numeric gaps with the mean and keeps the dtype", () => {
    const result = handleMissingValues(peopleWithGap(), "fill");

    expect(result.columns[0]).toEqual({ name: "age", dtype: "float64", values: [25, 28, 31] });
    expect(result.columns[1].values).toEqual(["NY", "NY", "LA"]);
  });

  it("fills other gaps with the most frequent value, first seen on ties", () => {
    const dataset = datasetOf({ city: ["LA", null, "NY", "NY", "LA", null] });
    expect(handleMissingValues(dataset, "fill").columns[0].values).toEqual(["LA", "LA", "NY", "NY", "LA", "LA"]);
  });

  it("leaves a column without observed values unfilled", () => {
    const dataset = datasetOf({ empty: [null, null], n: [1, null] });
    const result = handleMissingValues(dataset, "fill");

    expect(result.columns[0].values).toEqual([null, null]);
    expect(result.columns[1].values).toEqual([1, 1]);
  });

  it("never mutates its input", () => {
    const original = peopleWithGap();
    handleMissingValues(original, "fill");
    handleMissingValues(original, "drop-rows");
    expect(original.columns[0].values).toEqual([25, null, 31]);
    expect(original.rowCount).toBe(3);
  });
});

describe("dropColumns", () => {
  it("removes the named columns and keeps the rest in order", () => {
    const result = dropColumns(peopleWithGap(), ["city"]);

    expect(result.columns.map(c => c.name)).toEqual(["age"]);
    expect(result.rowCount).toBe(3);
    expect(numericColumns(result)).toEqual(["age"]);
    expect(categoricalColumns(result)).toEqual([]);
  });

  it("keeps the row count when every column is dropped", () => {
    const result = dropColumns(peopleWithGap(), ["age", "city"]);

    expect(result.columns).toHaveLength(0);
    expect(result.rowCount).toBe(3);
  });

  it("returns the dataset unchanged for an empty selection", () => {
    const dataset = peopleWithGap();
    expect(dropColumns(dataset, [])).toBe(dataset);
  });

  it("rejects names that are not columns", () => {
    expect(() => dropColumns(peopleWithGap(), ["age", "zip"])).toThrow(CleaningError);
    expect(() => dropColumns(peopleWithGap(), ["zip"])).toThrow("['zip'] not found in columns");
  });
});

describe("buildWorkingCopy", () => {
  it("applies the strategy before the column drop", () => {
    const { dataset, messages } = buildWorkingCopy(peopleWithGap(), { strategy: "drop-rows", dropColumns: ["city"] });

    expect(dataset.rowCount).toBe(2);
    expect(dataset.columns.map(c => c.name)).toEqual(["age"]);
    expect(messages).toEqual([
      "Data shape after dropping missing values: (2, 2)",
      "Dropped columns: city",
      "Data shape after dropping columns: (2, 1)",
    ]);
  });

  it("fills then drops on the filled data", () => {
    const { dataset: working } = buildWorkingCopy(peopleWithGap(), { strategy: "fill", dropColumns: ["city"] });

    expect(working.columns).toEqual([{ name: "age", dtype: "float64", values: [25, 28, 31] }]);
    expect(working.rowCount).toBe(3);
  });

  it("reports a fill", () => {
    const { dataset, messages } = buildWorkingCopy(peopleWithGap(), { strategy: "fill", dropColumns: [] });

    expect(dataset.columns[0].values).toEqual([25, 28, 31]);
    expect(messages).toEqual(["Missing values have been filled."]);
  });

  it("has nothing to report without cleaning", () => {
    expect(buildWorkingCopy(peopleWithGap(), { strategy: "none", dropColumns: [] }).messages).toEqual([]);
  });
});
