/**
 * Generator sources: community names templated from the niche, no network
 */

import { devCommunityNames, mediumTopics, quoraTopics } from '../generators';
import {
  ChannelSource,
  ChannelSourceName,
  type ChannelSourceConfig,
  type ChannelFindings,
  resolveSourceConfig,
} from '../types';

export class DevCommunitySource extends ChannelSource {
  readonly name = ChannelSourceName.DEV_COMMUNITIES;
  readonly type = 'generator' as const;
  readonly categories = ['dev_communities'] as const;

  constructor(config?: Partial<ChannelSourceConfig>) {
    super(resolveSourceConfig(ChannelSourceName.DEV_COMMUNITIES, config));
  }

  async collect(niche: string): Promise<ChannelFindings> {
    return { dev_communities: devCommunityNames(niche) };
  }
}

/**
 * Quora and Medium topic suggestions
 */
export class OnlineCommunitySource extends ChannelSource {
  readonly name = ChannelSourceName.ONLINE_COMMUNITIES;
  readonly type = 'generator' as const;
  readonly categories = ['quora_topics', 'medium_topics'] as const;

  constructor(config?: Partial<ChannelSourceConfig>) {
    super(resolveSourceConfig(ChannelSourceName.ONLINE_COMMUNITIES, config));
  }

  async collect(niche: string): Promise<ChannelFindings> {
    return {
      quora_topics: quoraTopics(niche),
      medium_topics: mediumTopics(niche),
    };
  }
}
