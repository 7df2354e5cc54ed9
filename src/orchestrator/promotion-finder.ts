/**
 * PromotionChannelFinder - Runs every channel source for a niche and builds the report
 */

import { createChannelSources } from '../collectors';
import {
  type ChannelCategory,
  type ChannelSource,
  countChannels,
  createEmptyReport,
  type PromotionChannelReport,
} from '../types';
import { getLogger, type Logger, toError } from '../utils';

export interface FinderConfig {
  niche: string;
}

export interface SourceRunSummary {
  name: string;
  categories: readonly ChannelCategory[];
  itemCount: number;
  durationMs: number;
  success: boolean;
}

export interface FinderResult {
  niche: string;
  report: PromotionChannelReport;
  sources: SourceRunSummary[];
  errors: Error[];
  durationMs: number;
}

export class PromotionChannelFinder {
  private readonly sources: ChannelSource[];
  private readonly logger: Logger;

  constructor(
    private readonly config: FinderConfig,
    sources?: ChannelSource[],
    logger?: Logger
  ) {
    this.sources = sources ?? createChannelSources();
    this.logger = (logger ?? getLogger()).child({ service: 'promotion-finder' });
  }

  /**
   * Run each enabled source once, in order.
   * A failing source leaves its categories empty and never stops the run.
   */
  async run(): Promise<FinderResult> {
    const start = Date.now();
    const { niche } = this.config;
    const report = createEmptyReport();
    const summaries: SourceRunSummary[] = [];
    const errors: Error[] = [];

    this.logger.info('Searching promotion channels', {
      niche,
      sources: this.sources.filter((source) => source.isEnabled()).map((source) => source.name),
    });

    for (const source of this.sources) {
      if (!source.isEnabled()) {
        this.logger.debug(`Skipping disabled source: ${source.name}`);
        continue;
      }

      const stopTimer = this.logger.startTimer(`collect:${source.name}`);
      try {
        const findings = await source.collect(niche);

        let itemCount = 0;
        for (const category of source.categories) {
          const channels = findings[category];
          if (channels) {
            report[category] = [...channels];
            itemCount += channels.length;
          }
        }

        summaries.push({
          name: source.name,
          categories: source.categories,
          itemCount,
          durationMs: stopTimer(),
          success: true,
        });
        this.logger.info(`Collected channels from ${source.name}`, { itemCount });
      } catch (error) {
        const failure = toError(error);
        errors.push(failure);
        summaries.push({
          name: source.name,
          categories: source.categories,
          itemCount: 0,
          durationMs: stopTimer(),
          success: false,
        });
        this.logger.error(failure.message, failure, { source: source.name });
      }
    }

    const durationMs = Date.now() - start;
    this.logger.info('Promotion channel search finished', {
      totalChannels: countChannels(report),
      failedSources: errors.length,
      durationMs,
    });

    return { niche, report, sources: summaries, errors, durationMs };
  }
}
