import { CHANNEL_CATEGORIES, type PromotionChannelReport } from '../types';
import { toTitleLabel } from '../utils/text';

/**
 * Console lines listing every non-empty category and its channels
 */
export function formatReportSummary(report: PromotionChannelReport): string[] {
  const lines = ['', '--- Promotion Channels Found ---'];

  for (const category of CHANNEL_CATEGORIES) {
    const channels = report[category];
    if (channels.length === 0) {
      continue;
    }

    lines.push('', `${toTitleLabel(category)}:`);
    for (const channel of channels) {
      lines.push(`  - ${channel}`);
    }
  }

  return lines;
}
