/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

const isoDate = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'must be a parseable date' });

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'production']).default('development'),
      name: z.string().default('featurekit'),
      version: z.string().default('0.1.0'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),

  provider: z
    .object({
      type: z.enum(['yahoo']).default('yahoo'),
      /** Directory of `<SYMBOL>-1d.json` files; the provider's bundled fixtures when unset */
      fixturePath: z.string().optional(),
    })
    .default({}),

  defaults: z
    .object({
      symbol: z.string().min(1).default('DEMO'),
      from: isoDate.default('2024-01-01'),
      to: isoDate.optional(),
    })
    .default({}),

  /** Overrides for the standard feature set, validated by @featurekit/features */
  features: z.record(z.string(), z.unknown()).default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  PROVIDER_TYPE: 'provider.type',
  FIXTURE_PATH: 'provider.fixturePath',
  DEFAULT_SYMBOL: 'defaults.symbol',
  DEFAULT_FROM: 'defaults.from',
  DEFAULT_TO: 'defaults.to',
  FEATURE_MA_WINDOWS: 'features.maWindows',
  FEATURE_EMA_SPAN: 'features.emaSpan',
  FEATURE_VOLATILITY_WINDOW: 'features.volatilityWindow',
  FEATURE_DISTANCE_MA_WINDOW: 'features.distanceMaWindow',
  FEATURE_DISTANCE_EMA_SPAN: 'features.distanceEmaSpan',
  FEATURE_CUMULATED_PERIOD: 'features.cumulatedPeriod',
  FEATURE_RSI_PERIOD: 'features.rsiPeriod',
};

/** Config paths whose env value is a comma-separated list */
export const listPaths: ReadonlySet<string> = new Set(['features.maWindows']);

/** Config paths whose env value is a single number; every other path stays a string */
export const numericPaths: ReadonlySet<string> = new Set([
  'features.emaSpan',
  'features.volatilityWindow',
  'features.distanceMaWindow',
  'features.distanceEmaSpan',
  'features.cumulatedPeriod',
  'features.rsiPeriod',
]);
