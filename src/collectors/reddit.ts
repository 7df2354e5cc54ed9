/**
 * Reddit collector for subreddits matching a niche
 * Exchanges app credentials for a token, then searches subreddits
 */

import axios from 'axios';
import { z } from 'zod';
import { redditCommunityNames } from '../generators';
import {
  ChannelSource,
  ChannelSourceName,
  type ChannelSourceConfig,
  type ChannelFindings,
  resolveSourceConfig,
} from '../types';
import { ChannelSourceError, describeError } from '../utils/errors';
import { getLogger, type Logger } from '../utils/logger';

/**
 * Reddit API response shapes
 */
const RedditTokenSchema = z.object({
  access_token: z.string().min(1),
});

const SubredditSearchSchema = z.object({
  data: z.object({
    children: z.array(
      z.object({
        data: z.object({
          display_name: z.string(),
        }),
      })
    ),
  }),
});

/**
 * Configuration specific to Reddit
 */
export interface RedditCollectorConfig extends ChannelSourceConfig {
  clientId: string;
  clientSecret: string;
  authUrl: string;
  searchLimit: number;
}

export const REDDIT_AUTH_URL = 'https://www.reddit.com/api/v1/access_token';

/**
 * Reddit collector implementation
 */
export class RedditCollector extends ChannelSource {
  readonly name = ChannelSourceName.REDDIT;
  readonly type = 'api' as const;
  readonly categories = ['subreddits', 'reddit_communities'] as const;

  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly authUrl: string;
  private readonly searchLimit: number;
  private readonly logger: Logger;

  constructor(config?: Partial<RedditCollectorConfig>) {
    super(resolveSourceConfig(ChannelSourceName.REDDIT, config));

    this.clientId = config?.clientId ?? 'REDDIT_CLIENT_ID';
    this.clientSecret = config?.clientSecret ?? 'REDDIT_CLIENT_SECRET';
    this.authUrl = config?.authUrl ?? REDDIT_AUTH_URL;
    this.searchLimit = config?.searchLimit ?? 20;
    this.logger = getLogger().child({ service: this.name });
  }

  /**
   * Fetch subreddits and community suggestions for the niche
   */
  async collect(niche: string): Promise<ChannelFindings> {
    try {
      const token = await this.fetchAccessToken();
      const subreddits = await this.searchSubreddits(niche, token);

      return {
        subreddits,
        reddit_communities: redditCommunityNames(niche),
      };
    } catch (error) {
      throw new ChannelSourceError(
        this.name,
        `Error finding Reddit opportunities: ${describeError(error)}`,
        error
      );
    }
  }

  /**
   * Client-credentials grant against the Reddit token endpoint
   */
  async fetchAccessToken(): Promise<string> {
    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      device_id: 'DO_NOT_TRACK_THIS_DEVICE',
    });

    const start = Date.now();
    const response = await axios.post<unknown>(this.authUrl, body.toString(), {
      auth: { username: this.clientId, password: this.clientSecret },
      headers: {
        'User-Agent': this.config.userAgent,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      timeout: this.config.timeoutMs,
    });
    this.logger.logApiCall('reddit-auth', 'POST', this.authUrl, Date.now() - start, response.status);

    return RedditTokenSchema.parse(response.data).access_token;
  }

  /**
   * Search subreddits by name and description
   */
  async searchSubreddits(niche: string, token: string): Promise<string[]> {
    const url = `${this.config.baseUrl}/subreddits/search`;

    const start = Date.now();
    const response = await axios.get<unknown>(url, {
      params: { q: niche, limit: this.searchLimit },
      headers: {
        'User-Agent': this.config.userAgent,
        Authorization: `bearer ${token}`,
      },
      timeout: this.config.timeoutMs,
    });
    this.logger.logApiCall('reddit-search', 'GET', url, Date.now() - start, response.status);

    const listing = SubredditSearchSchema.parse(response.data);
    return listing.data.children.map((child) => child.data.display_name);
  }
}
