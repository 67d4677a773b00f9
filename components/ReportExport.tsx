import React from 'react';
import { Download, FileText } from 'lucide-react';
import type { Dataset } from '../types';
import { createSummaryReport } from '../utils/reporter';
import { downloadReport } from '../services/reportExport';
import { Card } from './Card';

export const ReportExport: React.FC<{ dataset: Dataset }> = ({ dataset }) => {
  const handleDownload = () => downloadReport(createSummaryReport(dataset));

  return (
    <Card title="Export Summary Report" icon={FileText}>
      <p className="text-sm text-slate-600 mb-4">Download a text file with a summary of the processed data.</p>
      <button
        type="button"
        onClick={handleDownload}
        className="flex items-center gap-2 px-4 py-2 bg-indigo-600 text-white rounded-lg hover:bg-indigo-700 transition-colors text-sm font-medium"
      >
        <Download className="w-4 h-4" />
        Download Summary Report
      </button>
    </Card>
  );
};
