import React from 'react';
import { FileUp, Loader2, Layers, Settings2, Trash2 } from 'lucide-react';
import type { MissingValueStrategy } from '../types';
import { STRATEGY_OPTIONS, SUPPORTED_EXTENSIONS } from '../constants';
import { Alert } from './Card';

interface SidebarProps {
  fileName: string | null;
  isUploading: boolean;
  loadError: string | null;
  onFileSelected: (file: File) => void;
  sheetOptions: string[];
  sheetName: string | null;
  onSelectSheet: (sheetName: string) => void;
  strategy: MissingValueStrategy;
  onStrategyChange: (strategy: MissingValueStrategy) => void;
  columnOptions: string[];
  dropColumns: string[];
  onDropColumnsChange: (columns: string[]) => void;
  messages: string[];
  cleaningError: string | null;
}

const SectionHeader = ({ icon: Icon, children }: { icon: React.ElementType; children?: React.ReactNode }) => (
  <h2 className="flex items-center gap-2 text-sm font-semibold uppercase tracking-wide text-slate-500 mb-3">
    <Icon className="w-4 h-4 text-indigo-600" />
    {children}
  </h2>
);

export const Sidebar: React.FC<SidebarProps> = ({
  fileName,
  isUploading,
  loadError,
  onFileSelected,
  sheetOptions,
  sheetName,
  onSelectSheet,
  strategy,
  onStrategyChange,
  columnOptions,
  dropColumns,
  onDropColumnsChange,
  messages,
  cleaningError,
}) => {
  const handleFileChange = (event: React.ChangeEvent<HTMLInputElement>) => {
    const file = event.target.files?.[0];
    if (file) onFileSelected(file);
    // allow picking the same file again
    event.target.value = '';
  };

  const toggleColumn = (column: string) => {
    onDropColumnsChange(
      dropColumns.includes(column)
        ? dropColumns.filter(c => c !== column)
        : columnOptions.filter(c => c === column || dropColumns.includes(c))
    );
  };

  return (
    <aside className="w-full lg:w-80 shrink-0 space-y-8 bg-white border-r border-slate-200 p-6">
      <section>
        <SectionHeader icon={FileUp}>1. Upload Your Data</SectionHeader>
        <label htmlFor="file-upload" className="block text-sm text-slate-600 mb-2">
          Choose a CSV or Excel file
        </label>
        <input
          id="file-upload"
          type="file"
          accept={SUPPORTED_EXTENSIONS.join(',')}
          onChange={handleFileChange}
          disabled={isUploading}
          className="block w-full text-sm text-slate-600 file:mr-3 file:px-3 file:py-1.5 file:rounded-lg file:border-0 file:bg-indigo-600 file:text-white hover:file:bg-indigo-700"
        />
        <div className="mt-3">
          {isUploading ? (
            <p className="flex items-center gap-2 text-sm text-slate-500">
              <Loader2 className="w-4 h-4 animate-spin" /> Reading file...
            </p>
          ) : loadError ? (
            <Alert tone="error">{loadError}</Alert>
          ) : fileName ? (
            <Alert tone="success">File uploaded successfully!</Alert>
          ) : (
            <Alert tone="info">Awaiting file upload.</Alert>
          )}
        </div>
      </section>

      {sheetOptions.length > 0 && (
        <section>
          <SectionHeader icon={Layers}>Sheet</SectionHeader>
          <label htmlFor="sheet-select" className="block text-sm text-slate-600 mb-2">Select a sheet</label>
          <select
            id="sheet-select"
            value={sheetName ?? ''}
            onChange={(e) => onSelectSheet(e.target.value)}
            className="w-full px-3 py-2 bg-slate-50 border border-slate-200 rounded-lg text-sm"
          >
            {sheetOptions.map(name => (
              <option key={name} value={name}>{name}</option>
            ))}
          </select>
        </section>
      )}

      {fileName && !loadError && (
        <section className="space-y-6">
          <SectionHeader icon={Settings2}>2. Data Cleaning &amp; Preprocessing</SectionHeader>

          <fieldset>
            <legend className="text-sm font-medium text-slate-700 mb-2">Handle Missing Values</legend>
            <div className="space-y-1">
              {STRATEGY_OPTIONS.map(option => (
                <label key={option.id} className="flex items-center gap-2 text-sm text-slate-600">
                  <input
                    type="radio"
                    name="missing-value-strategy"
                    value={option.id}
                    checked={strategy === option.id}
                    onChange={() => onStrategyChange(option.id)}
                  />
                  {option.label}
                </label>
              ))}
            </div>
          </fieldset>

          <fieldset>
            <legend className="flex items-center gap-2 text-sm font-medium text-slate-700 mb-2">
              <Trash2 className="w-4 h-4" /> Drop Columns
            </legend>
            {columnOptions.length === 0 ? (
              <p className="text-xs text-slate-400">No columns left.</p>
            ) : (
              <div className="max-h-48 overflow-y-auto space-y-1">
                {columnOptions.map(column => (
                  <label key={column} className="flex items-center gap-2 text-sm text-slate-600">
                    <input
                      type="checkbox"
                      checked={dropColumns.includes(column)}
                      onChange={() => toggleColumn(column)}
                    />
                    <span className="truncate">{column}</span>
                  </label>
                ))}
              </div>
            )}
          </fieldset>

          {messages.length > 0 && (
            <ul className="space-y-1 text-xs text-slate-500">
              {messages.map(message => <li key={message}>{message}</li>)}
            </ul>
          )}
          {cleaningError && <Alert tone="error">{cleaningError}</Alert>}
        </section>
      )}
    </aside>
  );
};
