/**
 * @fileoverview Named defaults for the standard feature set.
 *
 * One parameterized transform exists per indicator; the parameters the
 * standard feature set uses live here as configuration instead of as
 * separate functions per variant.
 *
 * @module @featurekit/features/config
 */

import { z } from 'zod';
import { ParameterError } from '@featurekit/contracts';
import type { FeatureTransform } from './transform.js';
import { ema, sma } from './moving-average.js';
import { cumulatedReturn, returns } from './returns.js';
import { volatility } from './volatility.js';
import { distance } from './distance.js';
import { rsi } from './rsi.js';

const positiveInt = z.number().int().positive();

/**
 * Feature configuration schema. Unknown keys are rejected so a typo does not
 * silently fall back to a default.
 */
export const featureConfigSchema = z
  .object({
    maWindows: z.array(positiveInt).min(1).default([10, 50]),
    emaSpan: positiveInt.default(20),
    volatilityWindow: positiveInt.default(20),
    distanceMaWindow: positiveInt.default(50),
    distanceEmaSpan: positiveInt.default(20),
    cumulatedPeriod: positiveInt.default(5),
    rsiPeriod: positiveInt.default(14),
  })
  .strict()
  .superRefine((config, ctx) => {
    const seen = new Set<number>();
    config.maWindows.forEach((window, index) => {
      if (seen.has(window)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['maWindows', index],
          message: `duplicate moving-average window ${window}`,
        });
      }
      seen.add(window);
    });
  });

export type FeatureConfig = z.output<typeof featureConfigSchema>;

/**
 * Defaults of the standard feature set:
 * MA10, MA50, EMA20, 20-day volatility, distance to MA50 and EMA20,
 * 5-day cumulated return and RSI14.
 */
export const DEFAULT_FEATURE_CONFIG: Readonly<FeatureConfig> = Object.freeze(
  featureConfigSchema.parse({})
);

/**
 * Merges overrides into the defaults and validates the result.
 *
 * @throws {ParameterError} Naming the first offending option (e.g. 'rsiPeriod')
 *
 * @example
 * ```typescript
 * resolveFeatureConfig({ rsiPeriod: 7 }).rsiPeriod; // 7
 * resolveFeatureConfig({ emaSpan: 0 }); // throws ParameterError (parameter: 'emaSpan')
 * ```
 */
export function resolveFeatureConfig(overrides: unknown = {}): FeatureConfig {
  const result = featureConfigSchema.safeParse(overrides);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    const first = result.error.issues[0];
    const parameter = first ? first.path.map(String).join('.') : 'config';
    throw new ParameterError(`Invalid feature configuration:\n${issues.join('\n')}`, {
      parameter: parameter.length > 0 ? parameter : 'config',
      issues,
    });
  }

  return result.data;
}

/**
 * Transforms for the standard feature set, in output order:
 * MA<w> for each window, EMA<span>, Return, Log Return, Volatility,
 * Distance_MA<w>, Distance_EMA<span>, Cumulated_Return_<p>d, RSI<p>.
 *
 * Distance features read the average columns; when the distance window or
 * span is not already produced, its average is added just before the
 * distances.
 */
export function defaultTransforms(config: FeatureConfig = DEFAULT_FEATURE_CONFIG): FeatureTransform[] {
  const transforms: FeatureTransform[] = config.maWindows.map((window) => sma({ window }));
  transforms.push(ema({ span: config.emaSpan }));
  transforms.push(returns());
  transforms.push(volatility({ window: config.volatilityWindow }));

  if (!config.maWindows.includes(config.distanceMaWindow)) {
    transforms.push(sma({ window: config.distanceMaWindow }));
  }
  if (config.distanceEmaSpan !== config.emaSpan) {
    transforms.push(ema({ span: config.distanceEmaSpan }));
  }
  transforms.push(distance({ average: `MA${config.distanceMaWindow}` }));
  transforms.push(distance({ average: `EMA${config.distanceEmaSpan}` }));

  transforms.push(cumulatedReturn({ period: config.cumulatedPeriod }));
  transforms.push(rsi({ period: config.rsiPeriod }));
  return transforms;
}
