#!/usr/bin/env node

/**
 * Command-line entry point: find promotion channels for a niche
 */

import { createInterface } from 'node:readline/promises';
import { type AppConfig, config, loadConfig } from './config';
import { createChannelSources } from './collectors';
import { exportReport, formatReportSummary } from './export';
import { type FinderResult, PromotionChannelFinder } from './orchestrator';
import { getLogger, Logger } from './utils/logger';

export const NICHE_PROMPT = 'Enter your niche/topic for promotion research: ';

/**
 * Load configuration; invalid variables surface as a ConfigurationError naming them
 */
function initializeConfiguration(): AppConfig {
  const appConfig = loadConfig();
  const logger = getLogger();
  logger.setLogLevel(Logger.parseLogLevel(appConfig.logLevel));
  logger.debug('Configuration loaded', config.redacted());

  return appConfig;
}

/**
 * Niche from the positional arguments joined by spaces, otherwise asked for on stdin.
 * Rejects when stdin ends before a line is read.
 */
async function readNiche(argv: readonly string[]): Promise<string> {
  const fromArgs = argv.join(' ').trim();
  if (fromArgs) {
    return fromArgs;
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await new Promise<string>((resolve, reject) => {
      rl.once('close', () => reject(new Error('Standard input closed before a niche was entered')));
      rl.question(NICHE_PROMPT).then(resolve, reject);
    });
    return answer.trim();
  } finally {
    rl.close();
  }
}

function printSummary(result: FinderResult): void {
  for (const line of formatReportSummary(result.report)) {
    console.log(line);
  }
}

/**
 * Main execution function
 */
async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let appConfig: AppConfig;
  try {
    appConfig = initializeConfiguration();
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  const logger = getLogger();
  let niche: string;
  try {
    niche = await readNiche(argv);
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
  if (!niche) {
    logger.warn('Empty niche; only generic channel names will be produced');
  }

  const finder = new PromotionChannelFinder(
    { niche },
    createChannelSources({
      enabledSources: appConfig.channelSources,
      userAgent: appConfig.userAgent,
      timeoutMs: appConfig.requestTimeoutMs,
      reddit: appConfig.reddit,
      github: { token: appConfig.githubToken, maxPages: appConfig.githubMaxPages },
      twitter: { bearerToken: appConfig.twitterBearerToken },
    })
  );

  const result = await finder.run();
  printSummary(result);
  exportReport(result.report, appConfig.outputFile);

  return 0;
}

// Run if this is the main module
if (require.main === module) {
  process.on('unhandledRejection', (reason) => {
    console.error('❌ Unhandled Rejection:', reason);
    process.exit(1);
  });

  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('❌ Unexpected error:', error);
      process.exitCode = 1;
    });
}

export { main };
