/**
 * Configuration management with environment variable validation
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';
import { DEFAULT_REPORT_FILE } from '../export/report-writer';
import { CHANNEL_SOURCE_ORDER, DEFAULT_USER_AGENT } from '../types';
import { ConfigurationError } from '../utils/errors';

// Load .env file if it exists
dotenv.config();

/**
 * Unset or blank credentials fall back to the placeholder
 */
const credential = (placeholder: string) =>
  z
    .string()
    .optional()
    .transform((value) => value?.trim() || placeholder);

/**
 * Environment variable schema
 */
const EnvSchema = z.object({
  // Credentials; the placeholders only get as far as an auth error
  REDDIT_CLIENT_ID: credential('REDDIT_CLIENT_ID'),
  REDDIT_CLIENT_SECRET: credential('REDDIT_CLIENT_SECRET'),
  TWITTER_BEARER_TOKEN: credential('TWITTER_BEARER_TOKEN'),
  GITHUB_TOKEN: z
    .string()
    .optional()
    .transform((value) => value?.trim() || undefined),

  // HTTP settings
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  REQUEST_TIMEOUT_MS: z
    .string()
    .transform(Number)
    .pipe(z.number().int().positive())
    .default('30000'),
  GITHUB_MAX_PAGES: z
    .string()
    .transform(Number)
    .pipe(z.number().int().min(1).max(34))
    .default('10'),

  // Output
  OUTPUT_FILE: z.string().min(1).default(DEFAULT_REPORT_FILE),
  CHANNEL_SOURCES: z.string().default(CHANNEL_SOURCE_ORDER.join(',')),
  LOG_LEVEL: z
    .enum(['error', 'warn', 'info', 'debug'])
    .default('info'),

  // Node environment
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default('production'),
});

type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Application configuration
 */
export interface AppConfig {
  // Credentials
  reddit: {
    clientId: string;
    clientSecret: string;
  };
  twitterBearerToken: string;
  githubToken?: string;

  // HTTP settings
  userAgent: string;
  requestTimeoutMs: number;
  githubMaxPages: number;

  // Workflow settings
  outputFile: string;
  channelSources: string[];

  // System settings
  logLevel: 'error' | 'warn' | 'info' | 'debug';
  nodeEnv: 'development' | 'test' | 'production';
  isDevelopment: boolean;
  isProduction: boolean;
  isTest: boolean;
}

class Configuration {
  private config?: AppConfig;
  private env?: EnvConfig;

  /**
   * Load and validate configuration
   */
  load(): AppConfig {
    if (this.config) {
      return this.config;
    }

    const result = EnvSchema.safeParse(process.env);

    if (!result.success) {
      const missing = result.error.errors
        .filter((err) => err.message === 'Required')
        .map((err) => err.path.join('.'));

      const invalid = result.error.errors
        .filter((err) => err.message !== 'Required')
        .map((err) => `${err.path.join('.')}: ${err.message}`);

      let message = 'Invalid configuration:';
      if (missing.length > 0) {
        message += `\nMissing required variables: ${missing.join(', ')}`;
      }
      if (invalid.length > 0) {
        message += `\nInvalid variables: ${invalid.join('; ')}`;
      }

      throw new ConfigurationError(message, missing);
    }

    this.env = result.data;

    const channelSources = this.env.CHANNEL_SOURCES.split(',')
      .map((s) => s.trim().toLowerCase())
      .filter(Boolean);
    const knownSources: readonly string[] = CHANNEL_SOURCE_ORDER;
    const unknown = channelSources.filter((s) => !knownSources.includes(s));
    if (unknown.length > 0) {
      throw new ConfigurationError(
        `CHANNEL_SOURCES contains unknown sources: ${unknown.join(', ')} (expected any of ${knownSources.join(', ')})`
      );
    }

    this.config = {
      reddit: {
        clientId: this.env.REDDIT_CLIENT_ID,
        clientSecret: this.env.REDDIT_CLIENT_SECRET,
      },
      twitterBearerToken: this.env.TWITTER_BEARER_TOKEN,
      githubToken: this.env.GITHUB_TOKEN,
      userAgent: this.env.USER_AGENT,
      requestTimeoutMs: this.env.REQUEST_TIMEOUT_MS,
      githubMaxPages: this.env.GITHUB_MAX_PAGES,
      outputFile: this.env.OUTPUT_FILE,
      channelSources,
      logLevel: this.env.LOG_LEVEL,
      nodeEnv: this.env.NODE_ENV,
      isDevelopment: this.env.NODE_ENV === 'development',
      isProduction: this.env.NODE_ENV === 'production',
      isTest: this.env.NODE_ENV === 'test',
    };

    return this.config;
  }

  /**
   * Get a specific configuration value
   */
  get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    const config = this.load();
    return config[key];
  }

  /**
   * Reload configuration (useful for testing)
   */
  reload(): AppConfig {
    this.config = undefined;
    this.env = undefined;
    return this.load();
  }

  /**
   * Validate configuration without throwing
   */
  validate(): { valid: boolean; errors?: string[] } {
    try {
      this.load();
      return { valid: true };
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return {
          valid: false,
          errors: [error.message, ...(error.missingFields || [])],
        };
      }
      return { valid: false, errors: [String(error)] };
    }
  }

  /**
   * Configuration with secrets redacted, for logging
   */
  redacted(): Record<string, unknown> {
    const config = this.load();
    return {
      ...config,
      reddit: {
        clientId: this.redactSecret(config.reddit.clientId),
        clientSecret: this.redactSecret(config.reddit.clientSecret),
      },
      twitterBearerToken: this.redactSecret(config.twitterBearerToken),
      githubToken: config.githubToken ? this.redactSecret(config.githubToken) : undefined,
    };
  }

  private redactSecret(secret: string): string {
    if (secret.length <= 8) {
      return '***';
    }
    return `${secret.substring(0, 4)}...${secret.substring(secret.length - 4)}`;
  }
}

// Export singleton instance
export const config = new Configuration();

// Export convenience functions
export function loadConfig(): AppConfig {
  return config.load();
}

export function getConfig<K extends keyof AppConfig>(key: K): AppConfig[K] {
  return config.get(key);
}

export function validateConfig(): {
  valid: boolean;
  errors?: string[];
} {
  return config.validate();
}
