/**
 * Tests for the channel source factory and generator sources
 */

import { createChannelSources, DevCommunitySource, OnlineCommunitySource } from '..';

describe('createChannelSources', () => {
  it('should create every source in run order, all enabled by default', () => {
    const sources = createChannelSources();

    expect(sources.map((source) => source.name)).toEqual(['reddit', 'github', 'twitter', 'dev', 'online']);
    expect(sources.every((source) => source.isEnabled())).toBe(true);
  });

  it('should disable sources left out of the enabled list', () => {
    const sources = createChannelSources({ enabledSources: ['github', 'dev'] });

    expect(sources.filter((source) => source.isEnabled()).map((source) => source.name)).toEqual([
      'github',
      'dev'
    ]);
  });

  it('should cover every report category except YouTube', () => {
    const categories = createChannelSources().flatMap((source) => [...source.categories]);

    expect(categories).toEqual([
      'subreddits',
      'reddit_communities',
      'github_topics',
      'twitter_hashtags',
      'dev_communities',
      'quora_topics',
      'medium_topics'
    ]);
  });
});

describe('generator sources', () => {
  it('should fill dev communities', async () => {
    await expect(new DevCommunitySource().collect('Svelte')).resolves.toEqual({
      dev_communities: ['dev.to/svelte', 'sveltedevelopers', 'community.svelte.org']
    });
  });

  it('should fill Quora and Medium topics', async () => {
    await expect(new OnlineCommunitySource().collect('Svelte')).resolves.toEqual({
      quora_topics: ['Svelte Community', 'Svelte Discussions', 'Experts in Svelte'],
      medium_topics: ['Svelte Insights', 'Svelte Community', 'All About Svelte']
    });
  });

  it('should be generators', () => {
    expect(new DevCommunitySource().type).toBe('generator');
    expect(new OnlineCommunitySource({ enabled: false }).isEnabled()).toBe(false);
  });
});
