/**
 * Central export point for all type definitions
 */

// Report types
export {
  CHANNEL_CATEGORIES,
  type ChannelCategory,
  type ChannelFindings,
  countChannels,
  createEmptyReport,
  type PromotionChannelReport,
  PromotionChannelReportSchema
} from './channels';

// Source types
export {
  CHANNEL_SOURCE_ORDER,
  ChannelSource,
  type ChannelSourceConfig,
  ChannelSourceConfigSchema,
  ChannelSourceName,
  type ChannelSourceType,
  DEFAULT_SOURCE_CONFIGS,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  resolveSourceConfig
} from './sources';
