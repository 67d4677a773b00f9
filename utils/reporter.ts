import type { Dataset, SummaryReport } from '../types';
import { REPORT_FILE_NAME, REPORT_MIME_TYPE } from '../constants';
import { datasetShape } from './columns';
import { describe, missingCounts, renderInfo, renderMissingCounts, renderStatistics } from './inspector';

/**
 * Plain-text summary of a dataset: shape, column info, descriptive
 * statistics and missing-value counts, in that order.
 */
export const generateSummary = (dataset: Dataset): string => {
  const [rows, columns] = datasetShape(dataset);

  let content = "Data Analysis Summary Report\n";
  content += "=".repeat(30) + "\n\n";

  content += "1. Data Shape\n";
  content += `Number of Rows: ${rows}\n`;
  content += `Number of Columns: ${columns}\n\n`;

  content += "2. Data Info\n";
  content += renderInfo(dataset);

  content += "\n\n3. Descriptive Statistics\n";
  content += renderStatistics(describe(dataset));

  content += "\n\n4. Missing Values Count\n";
  content += renderMissingCounts(missingCounts(dataset));

  return content;
};

export const createSummaryReport = (dataset: Dataset): SummaryReport => ({
  fileName: REPORT_FILE_NAME,
  mimeType: REPORT_MIME_TYPE,
  content: generateSummary(dataset),
});
