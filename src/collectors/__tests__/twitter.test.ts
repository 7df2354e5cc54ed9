/**
 * Tests for Twitter collector
 */

import axios from 'axios';
import { ChannelSourceError } from '../../utils/errors';
import { TwitterCollector } from '../twitter';

// Mock axios
jest.mock('axios');
const mockedAxios = axios as jest.Mocked<typeof axios>;

const tweetsWithTags = (...tagLists: string[][]) => ({
  data: {
    data: tagLists.map((tags, i) => ({
      id: String(i + 1),
      text: `tweet ${i + 1}`,
      entities: { hashtags: tags.map((tag) => ({ start: 0, end: tag.length + 1, tag })) }
    })),
    meta: { result_count: tagLists.length }
  }
});

describe('TwitterCollector', () => {
  let collector: TwitterCollector;

  beforeEach(() => {
    collector = new TwitterCollector({ bearerToken: 'test-bearer' });
    jest.clearAllMocks();
  });

  it('should union tweet hashtags with generated ones', async () => {
    mockedAxios.get.mockResolvedValueOnce(tweetsWithTags(['vegan', 'plantbased'], [], ['vegan']));

    const findings = await collector.collect('Vegan Recipes');

    expect(findings).toEqual({
      twitter_hashtags: [
        '#vegan',
        '#plantbased',
        '#vegan recipescommunity',
        '#vegan recipeshub',
        '#vegan recipeslovers'
      ]
    });
  });

  it('should query recent tweets with the bearer token', async () => {
    mockedAxios.get.mockResolvedValueOnce(tweetsWithTags());

    await collector.collect('Vegan Recipes');

    expect(mockedAxios.get).toHaveBeenCalledWith('https://api.twitter.com/2/tweets/search/recent', {
      params: {
        query: 'Vegan Recipes',
        max_results: 100,
        'tweet.fields': 'entities'
      },
      headers: {
        Authorization: 'Bearer test-bearer',
        'User-Agent': 'NichePromotionTool/1.0'
      },
      timeout: 30000
    });
  });

  it('should return only generated hashtags when nothing matched', async () => {
    mockedAxios.get.mockResolvedValueOnce({ data: { meta: { result_count: 0 } } });

    const findings = await collector.collect('chess');

    expect(findings.twitter_hashtags).toEqual(['#chesscommunity', '#chesshub', '#chesslovers']);
  });

  it('should skip tweets without hashtag entities', async () => {
    mockedAxios.get.mockResolvedValueOnce({
      data: { data: [{ id: '1', text: 'plain' }, { id: '2', text: 'urls only', entities: { urls: [] } }] }
    });

    const findings = await collector.collect('chess');

    expect(findings.twitter_hashtags).toEqual(['#chesscommunity', '#chesshub', '#chesslovers']);
  });

  it('should cap the result at 20 hashtags', async () => {
    const tags = Array.from({ length: 25 }, (_, i) => `tag${i + 1}`);
    mockedAxios.get.mockResolvedValueOnce(tweetsWithTags(tags));

    const findings = await collector.collect('chess');

    expect(findings.twitter_hashtags).toHaveLength(20);
    expect(findings.twitter_hashtags?.[0]).toBe('#tag1');
    expect(findings.twitter_hashtags?.[19]).toBe('#tag20');
  });

  it('should fail on an error status', async () => {
    mockedAxios.get.mockRejectedValueOnce(
      Object.assign(new Error('Request failed with status code 401'), { response: { status: 401 } })
    );

    await expect(collector.collect('chess')).rejects.toThrow(
      'Channel source twitter error: Error finding Twitter hashtags: Request failed with status code 401 (HTTP 401)'
    );
  });

  it('should fail on a malformed response', async () => {
    mockedAxios.get.mockResolvedValueOnce({ data: { data: 'not a list' } });

    await expect(collector.collect('chess')).rejects.toBeInstanceOf(ChannelSourceError);
  });
});
