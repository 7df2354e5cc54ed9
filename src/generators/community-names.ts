/**
 * Templated community names derived from a niche.
 * None of these touch the network.
 */

import { cleanText } from '../utils/text';

/**
 * Reddit-style community names appended after a successful subreddit search
 */
export function redditCommunityNames(niche: string): string[] {
  return [`${cleanText(niche)}community`, `${niche}discussions`, `${niche}hub`];
}

/**
 * Hashtags added to whatever the tweet search returns
 */
export function generatedHashtags(niche: string): string[] {
  const slug = cleanText(niche);
  return [`#${slug}community`, `#${slug}hub`, `#${slug}lovers`];
}

export function devCommunityNames(niche: string): string[] {
  const slug = cleanText(niche);
  return [`dev.to/${slug}`, `${slug}developers`, `community.${slug}.org`];
}

export function quoraTopics(niche: string): string[] {
  return [`${niche} Community`, `${niche} Discussions`, `Experts in ${niche}`];
}

export function mediumTopics(niche: string): string[] {
  return [`${niche} Insights`, `${niche} Community`, `All About ${niche}`];
}
