import type { Dataset, LoadedFile, MissingValueStrategy, PlotKind, WorkingCopy } from '../types';
import { errorMessage } from '../errors';
import { buildWorkingCopy } from './cleaner';
import { selectDataset, sheetNames } from './dataProcessor';

export interface DashboardState {
  fileName: string | null;
  loaded: LoadedFile | null;
  sheetName: string | null;
  strategy: MissingValueStrategy;
  dropColumns: string[];
  plotKind: PlotKind;
}

export const initialDashboardState: DashboardState = {
  fileName: null,
  loaded: null,
  sheetName: null,
  strategy: 'none',
  dropColumns: [],
  plotKind: 'histogram',
};

export type DashboardAction =
  | { type: 'file-loaded'; fileName: string; loaded: LoadedFile }
  | { type: 'reset' }
  | { type: 'select-sheet'; sheetName: string }
  | { type: 'set-strategy'; strategy: MissingValueStrategy }
  | { type: 'set-drop-columns'; columns: string[] }
  | { type: 'set-plot-kind'; plotKind: PlotKind };

export const dashboardReducer = (state: DashboardState, action: DashboardAction): DashboardState => {
  switch (action.type) {
    case 'file-loaded':
      return {
        ...state,
        fileName: action.fileName,
        loaded: action.loaded,
        sheetName: sheetNames(action.loaded)[0] ?? null,
        dropColumns: [],
      };
    case 'reset':
      return initialDashboardState;
    case 'select-sheet':
      // column names belong to the previous sheet
      return { ...state, sheetName: action.sheetName, dropColumns: [] };
    case 'set-strategy':
      return { ...state, strategy: action.strategy };
    case 'set-drop-columns':
      return { ...state, dropColumns: action.columns };
    case 'set-plot-kind':
      return { ...state, plotKind: action.plotKind };
  }
};

export interface DashboardView {
  original: Dataset | null;
  working: WorkingCopy | null;
  cleaningError: string | null;
}

/**
 * Recomputes everything downstream of the loaded file from the state alone.
 * A cleaning failure is reported in `cleaningError` instead of thrown.
 */
export const deriveView = (state: DashboardState): DashboardView => {
  const original = state.loaded ? selectDataset(state.loaded, state.sheetName) : null;
  if (!original) return { original: null, working: null, cleaningError: null };

  try {
    const working = buildWorkingCopy(original, { strategy: state.strategy, dropColumns: state.dropColumns });
    return { original, working, cleaningError: null };
  } catch (error) {
    console.error("Cleaning failed", error);
    return { original, working: null, cleaningError: errorMessage(error, "Cleaning failed") };
  }
};
