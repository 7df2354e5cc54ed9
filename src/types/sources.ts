/**
 * Channel source type definitions and interfaces
 * Defines the contract for every fetcher and generator
 */

import { z } from 'zod';
import type { ChannelCategory, ChannelFindings } from './channels';

// ============================================================================
// SOURCE TYPES AND ENUMS
// ============================================================================

/**
 * `api` sources call a third-party service, `generator` sources only template strings
 */
export type ChannelSourceType = 'api' | 'generator';

/**
 * Supported channel sources, in the order the finder runs them
 */
export enum ChannelSourceName {
  REDDIT = 'reddit',
  GITHUB = 'github',
  TWITTER = 'twitter',
  DEV_COMMUNITIES = 'dev',
  ONLINE_COMMUNITIES = 'online',
}

export const CHANNEL_SOURCE_ORDER: readonly ChannelSourceName[] = [
  ChannelSourceName.REDDIT,
  ChannelSourceName.GITHUB,
  ChannelSourceName.TWITTER,
  ChannelSourceName.DEV_COMMUNITIES,
  ChannelSourceName.ONLINE_COMMUNITIES,
];

// ============================================================================
// CONFIGURATION SCHEMAS
// ============================================================================

/**
 * Configuration shared by every channel source
 */
export interface ChannelSourceConfig {
  /** Whether this source is enabled */
  enabled: boolean;
  /** Base URL of the API, empty for generators */
  baseUrl: string;
  /** User-Agent header sent with every request */
  userAgent: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
}

/**
 * Zod schema for ChannelSourceConfig validation
 */
export const ChannelSourceConfigSchema = z.object({
  enabled: z.boolean(),
  baseUrl: z.union([z.string().url(), z.literal('')]),
  userAgent: z.string().min(1),
  timeoutMs: z.number().int().positive(),
});

export const DEFAULT_USER_AGENT = 'NichePromotionTool/1.0';
export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Default configurations for known sources
 */
export const DEFAULT_SOURCE_CONFIGS: Record<ChannelSourceName, ChannelSourceConfig> = {
  [ChannelSourceName.REDDIT]: {
    enabled: true,
    baseUrl: 'https://oauth.reddit.com',
    userAgent: DEFAULT_USER_AGENT,
    timeoutMs: DEFAULT_TIMEOUT_MS,
  },
  [ChannelSourceName.GITHUB]: {
    enabled: true,
    baseUrl: 'https://api.github.com',
    userAgent: DEFAULT_USER_AGENT,
    timeoutMs: DEFAULT_TIMEOUT_MS,
  },
  [ChannelSourceName.TWITTER]: {
    enabled: true,
    baseUrl: 'https://api.twitter.com/2',
    userAgent: DEFAULT_USER_AGENT,
    timeoutMs: DEFAULT_TIMEOUT_MS,
  },
  [ChannelSourceName.DEV_COMMUNITIES]: {
    enabled: true,
    baseUrl: '',
    userAgent: DEFAULT_USER_AGENT,
    timeoutMs: DEFAULT_TIMEOUT_MS,
  },
  [ChannelSourceName.ONLINE_COMMUNITIES]: {
    enabled: true,
    baseUrl: '',
    userAgent: DEFAULT_USER_AGENT,
    timeoutMs: DEFAULT_TIMEOUT_MS,
  },
};

/**
 * Merge partial overrides onto a source's defaults and validate the result
 */
export function resolveSourceConfig(
  name: ChannelSourceName,
  overrides?: Partial<ChannelSourceConfig>
): ChannelSourceConfig {
  const defaults = DEFAULT_SOURCE_CONFIGS[name];
  return ChannelSourceConfigSchema.parse({
    enabled: overrides?.enabled ?? defaults.enabled,
    baseUrl: overrides?.baseUrl ?? defaults.baseUrl,
    userAgent: overrides?.userAgent ?? defaults.userAgent,
    timeoutMs: overrides?.timeoutMs ?? defaults.timeoutMs,
  });
}

// ============================================================================
// CHANNEL SOURCE
// ============================================================================

/**
 * Abstract base class for all channel sources
 */
export abstract class ChannelSource {
  /** Unique name identifier for this source */
  abstract readonly name: ChannelSourceName | string;

  /** Type of channel source */
  abstract readonly type: ChannelSourceType;

  /** Report categories this source fills */
  abstract readonly categories: readonly ChannelCategory[];

  /** Configuration for this source */
  protected config: ChannelSourceConfig;

  constructor(config: ChannelSourceConfig) {
    this.config = config;
  }

  /**
   * Find channels for the niche.
   * Throws a ChannelSourceError on failure; never returns partial findings.
   */
  abstract collect(niche: string): Promise<ChannelFindings>;

  /**
   * Check if this source is enabled
   */
  isEnabled(): boolean {
    return this.config.enabled;
  }
}
