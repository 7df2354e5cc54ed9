/**
 * GitHub collector for repositories tagged with the niche as a topic
 * Uses the public search API; a token only raises the rate limit
 */

import { Octokit } from '@octokit/rest';
import {
  ChannelSource,
  ChannelSourceName,
  type ChannelSourceConfig,
  type ChannelFindings,
  resolveSourceConfig,
} from '../types';
import { ChannelSourceError, describeError, getResponseStatus } from '../utils/errors';
import { getLogger, type Logger } from '../utils/logger';
import { cleanText, uniqueInOrder } from '../utils/text';

/**
 * Configuration specific to GitHub
 */
export interface GitHubCollectorConfig extends ChannelSourceConfig {
  token?: string;
  maxResults: number;
  /** Upper bound on result pages requested per search */
  maxPages: number;
}

/**
 * GitHub collector implementation
 */
export class GitHubCollector extends ChannelSource {
  readonly name = ChannelSourceName.GITHUB;
  readonly type = 'api' as const;
  readonly categories = ['github_topics'] as const;

  private readonly octokit: Octokit;
  private readonly maxResults: number;
  private readonly maxPages: number;
  private readonly logger: Logger;

  constructor(config?: Partial<GitHubCollectorConfig>) {
    super(resolveSourceConfig(ChannelSourceName.GITHUB, config));

    this.maxResults = config?.maxResults ?? 20;
    this.maxPages = config?.maxPages ?? 10;
    this.logger = getLogger().child({ service: this.name });

    this.octokit = new Octokit({
      auth: config?.token || undefined,
      baseUrl: this.config.baseUrl,
      userAgent: this.config.userAgent,
    });
  }

  async collect(niche: string): Promise<ChannelFindings> {
    try {
      return { github_topics: await this.findTopicRepositories(niche) };
    } catch (error) {
      throw new ChannelSourceError(this.name, `Error finding GitHub topics: ${describeError(error)}`, error);
    }
  }

  /**
   * Page through repositories tagged with the niche, most starred first.
   * An HTTP error status ends the paging and keeps what was collected.
   */
  async findTopicRepositories(niche: string): Promise<string[]> {
    const query = `topic:${cleanText(niche)}`;
    const names: string[] = [];

    for (let page = 1; names.length < this.maxResults && page <= this.maxPages; page++) {
      const items = await this.searchPage(query, page);
      if (items === null) {
        break;
      }

      names.push(...items.map((repository) => repositoryName(repository.full_name)));

      if (items.length === 0) {
        break;
      }
    }

    return uniqueInOrder(names).slice(0, this.maxResults);
  }

  /**
   * Fetch one page of search results, or null when GitHub answered with an error status.
   * Failures without a response (DNS, aborts) propagate.
   */
  private async searchPage(query: string, page: number): Promise<Array<{ full_name: string }> | null> {
    const start = Date.now();
    try {
      const response = await this.octokit.search.repos({
        q: query,
        sort: 'stars',
        order: 'desc',
        page,
        request: { signal: AbortSignal.timeout(this.config.timeoutMs) },
      });
      this.logger.logApiCall('github-search', 'GET', `/search/repositories?page=${page}`, Date.now() - start, response.status);

      return response.data.items;
    } catch (error) {
      const status = getResponseStatus(error);
      if (status === undefined) {
        throw error;
      }

      this.logger.logApiCall('github-search', 'GET', `/search/repositories?page=${page}`, Date.now() - start, status);
      return null;
    }
  }
}

/**
 * `owner/name` -> `name`
 */
function repositoryName(fullName: string): string {
  const slash = fullName.indexOf('/');
  return slash === -1 ? fullName : fullName.slice(slash + 1);
}
