import React, { useMemo, useState } from 'react';
import { PieChart as ChartIcon } from 'lucide-react';
import type { Dataset, PlotData, PlotKind, PlotRequest, PlotResult } from '../types';
import { HISTOGRAM_BINS, PLOT_KINDS } from '../constants';
import {
  buildPlot,
  missingColumnsWarning,
  plotColumns,
  resolvePlotRequest,
  scatterYOptions,
} from '../utils/visualizer';
import { Alert, Card } from './Card';
import { HistogramChart } from './charts/HistogramChart';
import { BoxPlotChart } from './charts/BoxPlotChart';
import { ScatterPlotChart } from './charts/ScatterPlotChart';
import { MeanBarChart } from './charts/MeanBarChart';
import { CorrelationHeatmap } from './charts/CorrelationHeatmap';

interface SelectProps {
  id: string;
  label: string;
  value: string;
  options: string[];
  onChange: (value: string) => void;
  emptyLabel?: string;
}

const Select = ({ id, label, value, options, onChange, emptyLabel }: SelectProps) => (
  <div className="space-y-1">
    <label htmlFor={id} className="block text-sm text-slate-600">{label}</label>
    <select
      id={id}
      value={value}
      onChange={(e) => onChange(e.target.value)}
      className="w-full px-3 py-2 bg-slate-50 border border-slate-200 rounded-lg text-sm"
    >
      {emptyLabel !== undefined && <option value="">{emptyLabel}</option>}
      {options.map(option => (
        <option key={option} value={option}>{option}</option>
      ))}
    </select>
  </div>
);

const PlotControls: React.FC<{
  request: PlotRequest;
  numeric: string[];
  categorical: string[];
  onChange: (request: PlotRequest) => void;
}> = ({ request, numeric, categorical, onChange }) => {
  switch (request.kind) {
    case 'histogram':
      return (
        <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
          <Select
            id="histogram-column"
            label="Select a numerical column"
            value={request.column}
            options={numeric}
            onChange={column => onChange({ ...request, column })}
          />
          <div className="space-y-1">
            <label htmlFor="histogram-bins" className="block text-sm text-slate-600">
              Number of bins: <span className="font-semibold">{request.bins}</span>
            </label>
            <input
              id="histogram-bins"
              type="range"
              min={HISTOGRAM_BINS.min}
              max={HISTOGRAM_BINS.max}
              value={request.bins}
              onChange={(e) => onChange({ ...request, bins: Number(e.target.value) })}
              className="w-full"
            />
          </div>
        </div>
      );
    case 'box':
      return (
        <Select
          id="box-column"
          label="Select a numerical column"
          value={request.column}
          options={numeric}
          onChange={column => onChange({ ...request, column })}
        />
      );
    case 'scatter': {
      const yOptions = scatterYOptions(numeric, request.x);
      return (
        <div className="grid grid-cols-1 md:grid-cols-3 gap-4">
          <Select
            id="scatter-x"
            label="Select the X-axis (numerical)"
            value={request.x}
            options={numeric}
            onChange={x => {
              const options = scatterYOptions(numeric, x);
              onChange({ ...request, x, y: options.includes(request.y) ? request.y : options[0] ?? request.y });
            }}
          />
          <Select
            id="scatter-y"
            label="Select the Y-axis (numerical)"
            value={request.y}
            options={yOptions}
            onChange={y => onChange({ ...request, y })}
          />
          <Select
            id="scatter-hue"
            label="Select column for color (categorical, optional)"
            value={request.hue ?? ''}
            options={categorical}
            emptyLabel="None"
            onChange={hue => onChange({ ...request, hue: hue === '' ? null : hue })}
          />
        </div>
      );
    }
    case 'bar':
      return (
        <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
          <Select
            id="bar-category"
            label="Select a categorical column"
            value={request.category}
            options={categorical}
            onChange={category => onChange({ ...request, category })}
          />
          <Select
            id="bar-value"
            label="Select a numerical column for the value"
            value={request.value}
            options={numeric}
            onChange={value => onChange({ ...request, value })}
          />
        </div>
      );
    case 'heatmap':
      return null;
  }
};

const PlotView: React.FC<{ plot: PlotData }> = ({ plot }) => {
  switch (plot.kind) {
    case 'histogram':
      return <HistogramChart plot={plot} />;
    case 'box':
      return <BoxPlotChart plot={plot} />;
    case 'scatter':
      return <ScatterPlotChart plot={plot} />;
    case 'bar':
      return <MeanBarChart plot={plot} />;
    case 'heatmap':
      return <CorrelationHeatmap plot={plot} />;
  }
};

interface VisualizerProps {
  dataset: Dataset;
  plotKind: PlotKind;
  onPlotKindChange: (kind: PlotKind) => void;
}

export const Visualizer: React.FC<VisualizerProps> = ({ dataset, plotKind, onPlotKindChange }) => {
  const [selection, setSelection] = useState<PlotRequest | null>(null);

  // options follow the working copy, so dropped columns disappear from them
  const { numeric, categorical } = useMemo(() => plotColumns(dataset), [dataset]);
  const request = useMemo(
    () => resolvePlotRequest(plotKind, dataset, selection),
    [plotKind, dataset, selection],
  );

  const result = useMemo<PlotResult>(
    () => (request ? buildPlot(dataset, request) : { status: 'warning', message: missingColumnsWarning(plotKind) }),
    [dataset, request, plotKind],
  );
  const plotTitle = PLOT_KINDS.find(kind => kind.id === plotKind)?.label ?? plotKind;

  return (
    <Card title="Data Visualization" icon={ChartIcon}>
      <div className="space-y-6">
        <div className="max-w-xs">
          <label htmlFor="plot-type" className="block text-sm text-slate-600 mb-1">Select a type of plot</label>
          <select
            id="plot-type"
            value={plotKind}
            onChange={(e) => {
              const kind = PLOT_KINDS.find(k => k.id === e.target.value);
              if (kind) onPlotKindChange(kind.id);
            }}
            className="w-full px-3 py-2 bg-slate-50 border border-slate-200 rounded-lg text-sm"
          >
            {PLOT_KINDS.map(kind => (
              <option key={kind.id} value={kind.id}>{kind.label}</option>
            ))}
          </select>
        </div>

        <h4 className="font-semibold text-slate-800">{plotTitle}</h4>

        {request && (
          <PlotControls request={request} numeric={numeric} categorical={categorical} onChange={setSelection} />
        )}

        {result.status === 'ok' ? (
          <div>
            <p className="text-sm font-medium text-slate-700 text-center mb-2">{result.plot.title}</p>
            <div className={result.plot.kind === 'heatmap' ? '' : 'h-[400px] w-full'}>
              <PlotView plot={result.plot} />
            </div>
          </div>
        ) : (
          <Alert tone={result.status}>{result.message}</Alert>
        )}
      </div>
    </Card>
  );
};
