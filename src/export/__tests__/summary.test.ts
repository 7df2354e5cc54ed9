/**
 * Tests for the console summary
 */

import { createEmptyReport } from '../../types';
import { formatReportSummary } from '../summary';

describe('formatReportSummary', () => {
  it('should list non-empty categories with their channels', () => {
    const report = {
      ...createEmptyReport(),
      subreddits: ['chess'],
      reddit_communities: ['chesscommunity', 'chesshub'],
      medium_topics: ['All About chess']
    };

    expect(formatReportSummary(report)).toEqual([
      '',
      '--- Promotion Channels Found ---',
      '',
      'Subreddits:',
      '  - chess',
      '',
      'Reddit Communities:',
      '  - chesscommunity',
      '  - chesshub',
      '',
      'Medium Topics:',
      '  - All About chess'
    ]);
  });

  it('should print only the header for an empty report', () => {
    expect(formatReportSummary(createEmptyReport())).toEqual(['', '--- Promotion Channels Found ---']);
  });
});
