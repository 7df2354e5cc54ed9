/**
 * Reads and writes the promotion channel report file
 */

import * as fs from 'node:fs';
import { type PromotionChannelReport, PromotionChannelReportSchema } from '../types';
import { describeError, ExportError } from '../utils/errors';
import { getLogger } from '../utils/logger';

export const DEFAULT_REPORT_FILE = 'promotion_channels.json';

export type ExportResult =
  | { success: true; filePath: string }
  | { success: false; filePath: string; error: ExportError };

/**
 * Write the report as 4-space indented JSON, replacing any existing file.
 * Write failures are logged and returned, never thrown.
 */
export function exportReport(
  report: PromotionChannelReport,
  filePath: string = DEFAULT_REPORT_FILE
): ExportResult {
  const logger = getLogger().child({ service: 'report-writer' });

  try {
    fs.writeFileSync(filePath, JSON.stringify(report, null, 4), 'utf8');
    logger.info('Report written', { filePath });
    console.log(`Results exported to ${filePath}`);
    return { success: true, filePath };
  } catch (error) {
    const exportError = new ExportError(filePath, describeError(error), error);
    logger.error('Error exporting results', exportError, { filePath });
    console.error(`Error exporting results: ${describeError(error)}`);
    return { success: false, filePath, error: exportError };
  }
}

/**
 * Read a previously exported report and check its shape
 */
export function loadReport(filePath: string): PromotionChannelReport {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ExportError(filePath, `cannot read report: ${describeError(error)}`, error);
  }

  const result = PromotionChannelReportSchema.safeParse(parsed);
  if (!result.success) {
    const problems = result.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ExportError(filePath, `invalid report: ${problems.join('; ')}`);
  }

  return result.data;
}
