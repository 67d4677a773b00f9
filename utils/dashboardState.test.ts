// @vitest-environment node
import { describe, it, expect, vi, afterEach } from "vitest";
import type { LoadedFile } from "../types";
import { datasetOf, peopleWithGap } from "../test/fixtures";
import { dashboardReducer, deriveView, initialDashboardState, type DashboardState } from "./dashboardState";

const workbook = (): LoadedFile => ({
  kind: "workbook",
  sheets: new Map([
    ["People", peopleWithGap()],
    ["Sales", datasetOf({ region: ["N", "S"], amount: [5, 7] }, "Sales")],
  ]),
});

const loaded = (file: LoadedFile, fileName = "book.xlsx"): DashboardState =>
  dashboardReducer(initialDashboardState, { type: "file-loaded", fileName, loaded: file });

describe("dashboardReducer", () => {
  it("selects the first sheet of a new workbook", () => {
    const state = loaded(workbook());

    expect(state.fileName).toBe("book.xlsx");
    expect(state.sheetName).toBe("People");
  });

  it("has no sheet for a single table", () => {
    const state = loaded({ kind: "table", dataset: peopleWithGap() }, "people.csv");
    expect(state.sheetName).toBeNull();
  });

  it("clears the column drop on a new file or sheet but keeps the strategy", () => {
    let state = loaded(workbook());
    state = dashboardReducer(state, { type: "set-strategy", strategy: "fill" });
    state = dashboardReducer(state, { type: "set-drop-columns", columns: ["city"] });
    expect(state.dropColumns).toEqual(["city"]);

    const switched = dashboardReducer(state, { type: "select-sheet", sheetName: "Sales" });
    expect(switched.dropColumns).toEqual([]);
    expect(switched.strategy).toBe("fill");

    const reloaded = dashboardReducer(state, { type: "file-loaded", fileName: "other.xlsx", loaded: workbook() });
    expect(reloaded.dropColumns).toEqual([]);
  });

  it("returns to the initial state on reset", () => {
    const state = dashboardReducer(loaded(workbook()), { type: "set-plot-kind", plotKind: "heatmap" });
    expect(dashboardReducer(state, { type: "reset" })).toBe(initialDashboardState);
  });
});

describe("deriveView", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("is empty before a file is loaded", () => {
    expect(deriveView(initialDashboardState)).toEqual({ original: null, working: null, cleaningError: null });
  });

  it("cleans the selected sheet", () => {
    let state = dashboardReducer(loaded(workbook()), { type: "select-sheet", sheetName: "Sales" });
    state = dashboardReducer(state, { type: "set-drop-columns", columns: ["region"] });

    const view = deriveView(state);
    expect(view.original?.name).toBe("Sales");
    expect(view.working?.dataset.columns.map(c => c.name)).toEqual(["amount"]);
    expect(view.working?.messages).toEqual(["Dropped columns: region", "Data shape after dropping columns: (2, 1)"]);
  });

  it("reports a failed drop instead of throwing", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const state = dashboardReducer(loaded(workbook()), { type: "set-drop-columns", columns: ["zip"] });

    const view = deriveView(state);
    expect(view.original?.name).toBe("people.csv");
    expect(view.working).toBeNull();
    expect(view.cleaningError).toBe("['zip'] not found in columns");
  });
});
