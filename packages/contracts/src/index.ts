/**
 * @fileoverview Main entry point for @featurekit/contracts package.
 *
 * Exports the shared types and the error taxonomy used by every featurekit
 * package.
 *
 * @module @featurekit/contracts
 */

// Price data types
export type { PriceBar, PriceSeries, PriceField, GetSeriesParams, ProviderCapabilities } from './market.js';

export { PRICE_FIELDS } from './market.js';

// Feature types
export type { FeatureValue, FeatureColumn, FeatureRecord } from './features.js';

// Label types
export type { BinaryLabel, TernaryLabel, RegimeLabel, LabelColumn, LabelSummary } from './labels.js';

export { BINARY_LABELS, TERNARY_LABELS } from './labels.js';

// Error classes and guards
export {
  FeatureKitError,
  StructuralError,
  ParameterError,
  ColumnNotFoundError,
  ColumnCollisionError,
  NoDataError,
  SymbolResolutionError,
  isFeatureKitError,
  isStructuralError,
  isParameterError,
  isColumnNotFoundError,
  isColumnCollisionError,
  isNoDataError,
  isSymbolResolutionError,
} from './errors.js';
