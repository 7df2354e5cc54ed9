/**
 * Central export point for orchestrator modules
 */

export {
  type FinderConfig,
  type FinderResult,
  PromotionChannelFinder,
  type SourceRunSummary
} from './promotion-finder';
