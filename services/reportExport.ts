import type { SummaryReport } from '../types';

// Saves the report through a temporary object URL
export const downloadReport = (report: SummaryReport): void => {
  const blob = new Blob([report.content], { type: report.mimeType });
  const url = URL.createObjectURL(blob);
  const a = document.createElement("a");
  a.href = url;
  a.download = report.fileName;
  a.click();
  URL.revokeObjectURL(url);
};
