/**
 * @fileoverview Main entry point for @featurekit/features package.
 *
 * Causal feature transforms, the append-only feature table, the pipeline
 * that composes them, and the forward-looking label constructors.
 *
 * @module @featurekit/features
 */

// Series and table
export { createPriceSeries, priceColumn } from './series.js';
export { FeatureTable } from './table.js';
export type { FeatureTransform } from './transform.js';

// Missing-value arithmetic
export {
  isMissing,
  finiteOrMissing,
  add,
  sub,
  mul,
  div,
  ln,
  mean,
  sampleStd,
  completeWindow,
  zipColumns,
  countMissing,
} from './missing.js';

// Transforms
export { simpleMovingAverage, exponentialMovingAverage, sma, ema } from './moving-average.js';
export type { SmaOptions, EmaOptions } from './moving-average.js';

export { simpleReturns, logReturns, cumulatedReturns, returns, cumulatedReturn } from './returns.js';
export type { ReturnsOptions, CumulatedReturnOptions } from './returns.js';

export { rollingStd, volatility } from './volatility.js';
export type { VolatilityOptions } from './volatility.js';

export { relativeDistance, distance } from './distance.js';
export type { DistanceOptions } from './distance.js';

export { relativeStrengthIndex, rsi, RSI_NO_LOSS, RSI_FLAT } from './rsi.js';
export type { RsiOptions } from './rsi.js';

// Pipeline
export { createFeaturePipeline, buildFeatureTable } from './pipeline.js';
export type { FeaturePipeline, PipelineRunOptions, TransformEvent } from './pipeline.js';

// Standard feature set
export {
  featureConfigSchema,
  DEFAULT_FEATURE_CONFIG,
  resolveFeatureConfig,
  defaultTransforms,
} from './config.js';
export type { FeatureConfig } from './config.js';

// Labels
export { forwardReturns, thresholdHorizonLabeler, crossoverLabeler, summarizeLabels } from './labels.js';
export type {
  RegimePolicy,
  LabelConstructor,
  ThresholdHorizonOptions,
  CrossoverOptions,
} from './labels.js';
