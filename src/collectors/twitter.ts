/**
 * Twitter collector for hashtags used alongside the niche
 * Reads hashtag entities from the recent-search endpoint (API v2)
 */

import axios from 'axios';
import { z } from 'zod';
import { generatedHashtags } from '../generators';
import {
  ChannelSource,
  ChannelSourceName,
  type ChannelSourceConfig,
  type ChannelFindings,
  resolveSourceConfig,
} from '../types';
import { ChannelSourceError, describeError } from '../utils/errors';
import { getLogger, type Logger } from '../utils/logger';
import { uniqueInOrder } from '../utils/text';

/**
 * Recent-search response, reduced to what the collector reads.
 * `data` is absent when nothing matched.
 */
const RecentSearchSchema = z.object({
  data: z
    .array(
      z.object({
        entities: z
          .object({
            hashtags: z.array(z.object({ tag: z.string() })).optional(),
          })
          .optional(),
      })
    )
    .optional(),
});

/**
 * Configuration specific to Twitter
 */
export interface TwitterCollectorConfig extends ChannelSourceConfig {
  bearerToken: string;
  maxTweets: number;
  maxResults: number;
}

/**
 * Twitter collector implementation
 */
export class TwitterCollector extends ChannelSource {
  readonly name = ChannelSourceName.TWITTER;
  readonly type = 'api' as const;
  readonly categories = ['twitter_hashtags'] as const;

  private readonly bearerToken: string;
  private readonly maxTweets: number;
  private readonly maxResults: number;
  private readonly logger: Logger;

  constructor(config?: Partial<TwitterCollectorConfig>) {
    super(resolveSourceConfig(ChannelSourceName.TWITTER, config));

    this.bearerToken = config?.bearerToken ?? 'TWITTER_BEARER_TOKEN';
    this.maxTweets = config?.maxTweets ?? 100;
    this.maxResults = config?.maxResults ?? 20;
    this.logger = getLogger().child({ service: this.name });
  }

  async collect(niche: string): Promise<ChannelFindings> {
    try {
      const found = await this.searchHashtags(niche);
      const hashtags = uniqueInOrder([...found, ...generatedHashtags(niche)]).slice(0, this.maxResults);

      return { twitter_hashtags: hashtags };
    } catch (error) {
      throw new ChannelSourceError(this.name, `Error finding Twitter hashtags: ${describeError(error)}`, error);
    }
  }

  /**
   * Hashtags of recent tweets mentioning the niche, `#`-prefixed, in tweet order
   */
  async searchHashtags(niche: string): Promise<string[]> {
    const url = `${this.config.baseUrl}/tweets/search/recent`;

    const start = Date.now();
    const response = await axios.get<unknown>(url, {
      params: {
        query: niche,
        max_results: this.maxTweets,
        'tweet.fields': 'entities',
      },
      headers: {
        Authorization: `Bearer ${this.bearerToken}`,
        'User-Agent': this.config.userAgent,
      },
      timeout: this.config.timeoutMs,
    });
    this.logger.logApiCall('twitter-search', 'GET', url, Date.now() - start, response.status);

    const { data: tweets = [] } = RecentSearchSchema.parse(response.data);
    return tweets.flatMap((tweet) => (tweet.entities?.hashtags ?? []).map((hashtag) => `#${hashtag.tag}`));
  }
}
