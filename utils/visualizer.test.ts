// @vitest-environment node
import { describe, it, expect } from "vitest";
import type { PlotRequest } from "../types";
import { datasetOf } from "../test/fixtures";
import { dropColumns } from "./cleaner";
import {
  boxStats,
  buildPlot,
  clampBins,
  defaultPlotRequest,
  formatCorrelation,
  groupMeans,
  heatmapColor,
  histogramBins,
  missingColumnsWarning,
  plotColumns,
  resolvePlotRequest,
} from "./visualizer";

const survey = () =>
  datasetOf({
    age: [20, 30, 40, 50],
    income: [100, 200, 300, 400],
    city: ["NY", "LA", "NY", "SF"],
  });

describe("plot options", () => {
  it("splits columns into numeric and categorical", () => {
    expect(plotColumns(survey())).toEqual({ numeric: ["age", "income"], categorical: ["city"] });
  });

  it("no longer offers a dropped column", () => {
    const dataset = dropColumns(survey(), ["income"]);
    expect(plotColumns(dataset).numeric).toEqual(["age"]);
  });

  it("keeps a selection that still fits", () => {
    const previous: PlotRequest = { kind: "histogram", column: "income", bins: 30 };
    expect(resolvePlotRequest("histogram", survey(), previous)).toBe(previous);
  });

  it("falls back to defaults once the selected column is dropped", () => {
    const previous: PlotRequest = { kind: "histogram", column: "income", bins: 30 };
    const dataset = dropColumns(survey(), ["income"]);
    expect(resolvePlotRequest("histogram", dataset, previous)).toEqual({ kind: "histogram", column: "age", bins: 20 });
  });

  it("needs two numeric columns for a scatter plot", () => {
    const dataset = dropColumns(survey(), ["income"]);
    expect(defaultPlotRequest("scatter", dataset)).toBeNull();
    expect(defaultPlotRequest("scatter", survey())).toEqual({ kind: "scatter", x: "age", y: "income", hue: null });
  });

  it("clamps the bin count", () => {
    expect(clampBins(3)).toBe(5);
    expect(clampBins(500)).toBe(100);
    expect(clampBins(12.4)).toBe(12);
    expect(clampBins(Number.NaN)).toBe(20);
  });
});

describe("histogramBins", () => {
  it("splits the range into equal bins, last one closed", () => {
    const bins = histogramBins([0, 1, 2, 3, 4, 10], 5);

    expect(bins.map(b => b.count)).toEqual([2, 2, 1, 0, 1]);
    expect(bins.map(b => [b.start, b.end])).toEqual([[0, 2], [2, 4], [4, 6], [6, 8], [8, 10]]);
    expect(bins[0].midpoint).toBe(1);
    expect(bins.every(b => b.density !== null)).toBe(true);
  });

  it("widens a constant column and skips the density", () => {
    const bins = histogramBins([3, 3], 5);

    expect(bins.map(b => b.count)).toEqual([0, 0, 2, 0, 0]);
    expect(bins[0].start).toBe(2.5);
    expect(bins[4].end).toBe(3.5);
    expect(bins.every(b => b.density === null)).toBe(true);
  });
});

describe("boxStats", () => {
  it("puts whiskers at the last points inside 1.5 IQR", () => {
    expect(boxStats([100, 1, 3, 2, 4])).toEqual({
      min: 1,
      q1: 2,
      median: 3,
      q3: 4,
      max: 100,
      lowerWhisker: 1,
      upperWhisker: 4,
      outliers: [100],
    });
  });
});

describe("groupMeans", () => {
  it("averages per category, highest first", () => {
    expect(groupMeans(["A", "B", "A", "B"], [10, 20, 20, 40])).toEqual([
      { category: "B", value: 30 },
      { category: "A", value: 15 },
    ]);
  });

  it("ranks a higher mean first regardless of row order", () => {
    expect(groupMeans(["A", "A", "B"], [10, 20, 30])).toEqual([
      { category: "B", value: 30 },
      { category: "A", value: 15 },
    ]);
  });

  it("skips rows with a gap on either side", () => {
    expect(groupMeans(["A", null, "A"], [1, 5, null])).toEqual([{ category: "A", value: 1 }]);
  });
});

describe("buildPlot", () => {
  it("builds a bar chart of means", () => {
    const dataset = datasetOf({ group: ["A", "B", "A", "B"], value: [10, 20, 20, 40] });
    const result = buildPlot(dataset, { kind: "bar", category: "group", value: "value" });

    expect(result).toEqual({
      status: "ok",
      plot: {
        kind: "bar",
        title: "Average value by group",
        category: "group",
        value: "value",
        groups: [
          { category: "B", value: 30 },
          { category: "A", value: 15 },
        ],
      },
    });
  });

  it("groups scatter points by hue", () => {
    const dataset = datasetOf({ x: [1, 2, 3], y: [4, 5, 6], g: ["a", "b", null] });
    const result = buildPlot(dataset, { kind: "scatter", x: "x", y: "y", hue: "g" });

    if (result.status !== "ok" || result.plot.kind !== "scatter") throw new Error("expected a scatter plot");
    expect(result.plot.title).toBe("Scatter Plot of x vs y");
    expect(result.plot.series).toEqual([
      { name: "a", points: [{ x: 1, y: 4 }] },
      { name: "b", points: [{ x: 2, y: 5 }] },
      { name: "nan", points: [{ x: 3, y: 6 }] },
    ]);
  });

  it("correlates every pair of numeric columns", () => {
    const dataset = datasetOf({ a: [1, 2, 3], b: [2, 4, 6], c: [3, 2, 1], k: [5, 5, 5], label: ["x", "y", "z"] });
    const result = buildPlot(dataset, { kind: "heatmap" });

    if (result.status !== "ok" || result.plot.kind !== "heatmap") throw new Error("expected a heatmap");
    expect(result.plot.title).toBe("Correlation Matrix of Numerical Columns");
    expect(result.plot.columns).toEqual(["a", "b", "c", "k"]);
    const [aRow, , , kRow] = result.plot.matrix;
    expect(aRow[0]).toBeCloseTo(1);
    expect(aRow[1]).toBeCloseTo(1);
    expect(aRow[2]).toBeCloseTo(-1);
    expect(aRow[3]).toBeNull();
    expect(kRow).toEqual([null, null, null, null]);
  });

  it("warns when there is nothing numeric to correlate", () => {
    const dataset = datasetOf({ city: ["NY", "LA"] });

    expect(defaultPlotRequest("heatmap", dataset)).toBeNull();
    expect(buildPlot(dataset, { kind: "heatmap" })).toEqual({
      status: "warning",
      message: "No numerical columns available to create a heatmap.",
    });
    expect(missingColumnsWarning("heatmap")).toBe("No numerical columns available to create a heatmap.");
  });

  it("warns about unusable columns instead of throwing", () => {
    const dataset = datasetOf({ city: ["NY"], empty: [null] });

    expect(buildPlot(dataset, { kind: "box", column: "zip" })).toEqual({
      status: "warning",
      message: "Column 'zip' is not in the data.",
    });
    expect(buildPlot(dataset, { kind: "histogram", column: "city", bins: 10 })).toEqual({
      status: "warning",
      message: "Column 'city' is not numerical.",
    });
    expect(buildPlot(dataset, { kind: "histogram", column: "empty", bins: 10 })).toEqual({
      status: "warning",
      message: "Column 'empty' has no values to plot.",
    });
  });
});

describe("heatmap colors", () => {
  it("runs from blue through grey to red", () => {
    expect(heatmapColor(-1)).toBe("rgb(59, 76, 192)");
    expect(heatmapColor(0)).toBe("rgb(221, 221, 221)");
    expect(heatmapColor(1)).toBe("rgb(180, 4, 38)");
    expect(heatmapColor(0.5)).toBe("rgb(201, 113, 130)");
    expect(heatmapColor(null)).toBe("rgb(221, 221, 221)");
  });

  it("formats coefficients with two decimals", () => {
    expect(formatCorrelation(0.123)).toBe("0.12");
    expect(formatCorrelation(null)).toBe("NaN");
  });
});
