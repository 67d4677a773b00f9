import React, { useMemo, useReducer, useState } from 'react';
import { BarChart3, FileSpreadsheet, RefreshCw } from 'lucide-react';
import type { MissingValueStrategy, PlotKind } from './types';
import { errorMessage } from './errors';
import { DatasetCache, fileIdentity, parseFile, sheetNames } from './utils/dataProcessor';
import { dashboardReducer, deriveView, initialDashboardState } from './utils/dashboardState';
import { Sidebar } from './components/Sidebar';
import { DataExplorer } from './components/DataExplorer';
import { Visualizer } from './components/Visualizer';
import { ReportExport } from './components/ReportExport';

export default function App() {
  const [state, dispatch] = useReducer(dashboardReducer, initialDashboardState);
  const [isUploading, setIsUploading] = useState(false);
  const [loadError, setLoadError] = useState<string | null>(null);
  const [cache] = useState(() => new DatasetCache());

  // everything below the loader is re-derived from state on each change
  const view = useMemo(() => deriveView(state), [state]);
  const sheetOptions = useMemo(() => (state.loaded ? sheetNames(state.loaded) : []), [state.loaded]);
  const columnOptions = useMemo(() => view.original?.columns.map(c => c.name) ?? [], [view.original]);

  const handleFileSelected = async (file: File) => {
    setIsUploading(true);
    setLoadError(null);
    try {
      const loaded = await cache.getOrLoad(fileIdentity(file), () => parseFile(file));
      dispatch({ type: 'file-loaded', fileName: file.name, loaded });
    } catch (error) {
      console.error("Upload failed", error);
      dispatch({ type: 'reset' });
      setLoadError(`Error loading data: ${errorMessage(error)}`);
    } finally {
      setIsUploading(false);
    }
  };

  const reset = () => {
    cache.clear();
    setLoadError(null);
    dispatch({ type: 'reset' });
  };

  return (
    <div className="min-h-screen flex flex-col">
      <header className="bg-white border-b border-slate-200 sticky top-0 z-10">
        <div className="px-4 sm:px-6 lg:px-8 h-16 flex items-center justify-between">
          <div className="flex items-center gap-2">
            <div className="w-8 h-8 bg-indigo-600 rounded-lg flex items-center justify-center">
              <BarChart3 className="w-5 h-5 text-white" />
            </div>
            <h1 className="text-xl font-bold tracking-tight text-slate-900">Interactive Data Analysis Dashboard</h1>
          </div>
          {state.loaded && (
            <button
              onClick={reset}
              className="text-slate-400 hover:text-slate-600 transition-transform active:rotate-180"
              title="Clear Data"
            >
              <RefreshCw className="w-5 h-5" />
            </button>
          )}
        </div>
      </header>

      <div className="flex-1 flex flex-col lg:flex-row">
        <Sidebar
          fileName={state.fileName}
          isUploading={isUploading}
          loadError={loadError}
          onFileSelected={(file) => {
            void handleFileSelected(file);
          }}
          sheetOptions={sheetOptions}
          sheetName={state.sheetName}
          onSelectSheet={(sheetName) => dispatch({ type: 'select-sheet', sheetName })}
          strategy={state.strategy}
          onStrategyChange={(strategy: MissingValueStrategy) => dispatch({ type: 'set-strategy', strategy })}
          columnOptions={columnOptions}
          dropColumns={state.dropColumns}
          onDropColumnsChange={(columns) => dispatch({ type: 'set-drop-columns', columns })}
          messages={view.working?.messages ?? []}
          cleaningError={view.cleaningError}
        />

        <main className="flex-1 min-w-0 px-4 sm:px-6 lg:px-8 py-8 space-y-8">
          {!view.original ? (
            <div className="max-w-2xl mx-auto mt-20 text-center">
              <div className="w-16 h-16 bg-indigo-50 rounded-full flex items-center justify-center text-indigo-600 mx-auto mb-6">
                <FileSpreadsheet className="w-8 h-8" />
              </div>
              <p className="text-lg text-slate-500 leading-relaxed">
                Upload your CSV or Excel file to begin exploring your data.
              </p>
            </div>
          ) : (
            <>
              <DataExplorer original={view.original} working={view.working?.dataset ?? null} />
              {view.working && (
                <>
                  <Visualizer
                    dataset={view.working.dataset}
                    plotKind={state.plotKind}
                    onPlotKindChange={(plotKind: PlotKind) => dispatch({ type: 'set-plot-kind', plotKind })}
                  />
                  <ReportExport dataset={view.working.dataset} />
                </>
              )}
            </>
          )}
        </main>
      </div>
    </div>
  );
}
