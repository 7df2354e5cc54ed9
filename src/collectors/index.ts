/**
 * Central export point for all channel sources
 */

export { RedditCollector, REDDIT_AUTH_URL, type RedditCollectorConfig } from './reddit';
export { GitHubCollector, type GitHubCollectorConfig } from './github';
export { TwitterCollector, type TwitterCollectorConfig } from './twitter';
export { DevCommunitySource, OnlineCommunitySource } from './communities';

import { CHANNEL_SOURCE_ORDER, type ChannelSource, ChannelSourceName } from '../types';
import { DevCommunitySource, OnlineCommunitySource } from './communities';
import { GitHubCollector } from './github';
import { RedditCollector } from './reddit';
import { TwitterCollector } from './twitter';

/**
 * Settings the source factory needs from the application configuration
 */
export interface ChannelSourceOptions {
  /** Sources to run; the rest are created disabled */
  enabledSources?: readonly string[];
  userAgent?: string;
  timeoutMs?: number;
  reddit?: { clientId?: string; clientSecret?: string };
  github?: { token?: string; maxPages?: number };
  twitter?: { bearerToken?: string };
}

/**
 * Create every source, in the order the finder runs them
 */
export function createChannelSources(options: ChannelSourceOptions = {}): ChannelSource[] {
  const enabledSources: readonly string[] = options.enabledSources ?? CHANNEL_SOURCE_ORDER;
  const shared = (name: ChannelSourceName) => ({
    enabled: enabledSources.includes(name),
    userAgent: options.userAgent,
    timeoutMs: options.timeoutMs,
  });

  return [
    new RedditCollector({
      ...shared(ChannelSourceName.REDDIT),
      clientId: options.reddit?.clientId,
      clientSecret: options.reddit?.clientSecret,
    }),
    new GitHubCollector({
      ...shared(ChannelSourceName.GITHUB),
      token: options.github?.token,
      maxPages: options.github?.maxPages,
    }),
    new TwitterCollector({
      ...shared(ChannelSourceName.TWITTER),
      bearerToken: options.twitter?.bearerToken,
    }),
    new DevCommunitySource(shared(ChannelSourceName.DEV_COMMUNITIES)),
    new OnlineCommunitySource(shared(ChannelSourceName.ONLINE_COMMUNITIES)),
  ];
}
