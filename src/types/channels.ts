/**
 * Promotion channel report type definitions
 */

import { z } from 'zod';

// ============================================================================
// CATEGORIES
// ============================================================================

/**
 * Report categories, in the order they appear in the exported file
 */
export const CHANNEL_CATEGORIES = [
  'subreddits',
  'reddit_communities',
  'github_topics',
  'twitter_hashtags',
  'dev_communities',
  'youtube_channels',
  'quora_topics',
  'medium_topics'
] as const;

export type ChannelCategory = (typeof CHANNEL_CATEGORIES)[number];

// ============================================================================
// REPORT
// ============================================================================

/**
 * Every category mapped to the channel names found for it
 */
export type PromotionChannelReport = Record<ChannelCategory, string[]>;

/**
 * Output of a single channel source: only the categories it fills
 */
export type ChannelFindings = Partial<PromotionChannelReport>;

const channelList = z.array(z.string());

export const PromotionChannelReportSchema = z
  .object({
    subreddits: channelList,
    reddit_communities: channelList,
    github_topics: channelList,
    twitter_hashtags: channelList,
    dev_communities: channelList,
    youtube_channels: channelList,
    quora_topics: channelList,
    medium_topics: channelList
  })
  .strict() satisfies z.ZodType<PromotionChannelReport>;

/**
 * A report with every category present and empty
 */
export function createEmptyReport(): PromotionChannelReport {
  return {
    subreddits: [],
    reddit_communities: [],
    github_topics: [],
    twitter_hashtags: [],
    dev_communities: [],
    youtube_channels: [],
    quora_topics: [],
    medium_topics: []
  };
}

/**
 * Total number of channel names across all categories
 */
export function countChannels(findings: ChannelFindings): number {
  return CHANNEL_CATEGORIES.reduce((total, category) => total + (findings[category]?.length ?? 0), 0);
}
