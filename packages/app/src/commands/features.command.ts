/**
 * Feature table command implementation
 */

import { Chalk, type ChalkInstance } from 'chalk';
import {
  isFeatureKitError,
  type FeatureRecord,
  type LabelColumn,
  type LabelSummary,
  type PriceSeries,
  type RegimeLabel,
} from '@featurekit/contracts';
import {
  createFeaturePipeline,
  crossoverLabeler,
  defaultTransforms,
  resolveFeatureConfig,
  summarizeLabels,
  thresholdHorizonLabeler,
  type FeaturePipeline,
  type FeatureTable,
  type LabelConstructor,
} from '@featurekit/features';
import type { PriceProvider } from '@featurekit/provider-yahoo';
import { createChildLogger, measureAsync, measureSync, startTimer, type Logger } from '@featurekit/logger';
import type { Command, CommandOptions, CommandResult } from './types.js';

export type LabelMode = 'none' | 'threshold' | 'crossover';

export interface FeaturesCommandOptions extends CommandOptions {
  symbol?: string;
  from?: string;
  to?: string;
  label?: LabelMode;
  /** Threshold labeler: rows to look ahead */
  horizon?: number;
  /** Threshold labeler: bullish cut-off */
  threshold?: number;
  /** Threshold labeler: use log forward returns */
  log?: boolean;
  /** Threshold labeler: BULL/BEAR/RANGE instead of BULLISH/NON_BULLISH */
  ternary?: boolean;
  /** Crossover labeler: fast window */
  short?: number;
  /** Crossover labeler: slow window */
  long?: number;
}

export interface FeaturesCommandConfig {
  provider: PriceProvider;
  logger: Logger;
  defaults: { symbol: string; from: string; to?: string };
  /** Overrides for the standard feature set */
  features?: Record<string, unknown>;
  /** Colour text output; chalk's detection when unset */
  color?: boolean;
}

const DEFAULT_HORIZON = 10;
const DEFAULT_THRESHOLD = 0.05;
const DEFAULT_SHORT_WINDOW = 10;
const DEFAULT_LONG_WINDOW = 50;

interface FeaturesReport {
  symbol: string;
  table: FeatureTable;
  labels?: LabelColumn<RegimeLabel>;
}

/**
 * `features` command - builds the standard feature table for a symbol,
 * optionally with a label column
 */
export class FeaturesCommand implements Command<FeaturesCommandOptions> {
  name = 'features';
  description = 'Build the technical-analysis feature table for a symbol';
  aliases = ['build'];

  private provider: PriceProvider;
  private logger: Logger;
  private defaults: FeaturesCommandConfig['defaults'];
  private featureOverrides: Record<string, unknown>;
  private chalk: ChalkInstance;

  constructor(config: FeaturesCommandConfig) {
    this.provider = config.provider;
    this.logger = config.logger;
    this.defaults = config.defaults;
    this.featureOverrides = config.features ?? {};
    this.chalk = config.color === undefined ? new Chalk() : new Chalk({ level: config.color ? 1 : 0 });
  }

  async execute(args: string[], options: FeaturesCommandOptions): Promise<CommandResult> {
    const timer = startTimer();
    const symbol = (options.symbol ?? args[0] ?? this.defaults.symbol).toUpperCase();
    const from = options.from ?? this.defaults.from;
    const to = options.to ?? this.defaults.to;
    const log = createChildLogger(this.logger, { component: 'features', symbol });

    try {
      log.info('Executing features command', { from, to, label: options.label ?? 'none' });

      // Configuration and plan errors surface before any data is loaded
      const featureConfig = resolveFeatureConfig(this.featureOverrides);
      const pipeline = createFeaturePipeline(defaultTransforms(featureConfig));
      const labeler = this.buildLabeler(options);

      const { result: series, duration_ms: fetchMs } = await measureAsync(() =>
        this.provider.getSeries({ symbol, from, to })
      );
      log.info('Series loaded', { rows: series.length, duration_ms: fetchMs });

      const table = this.runPipeline(pipeline, series, log);

      for (const name of pipeline.outputs) {
        if (table.missingCount(name) === table.length) {
          log.warn('Column is entirely missing', { column: name, rows: table.length });
        }
      }

      let labels: LabelColumn<RegimeLabel> | undefined;
      if (labeler) {
        const { result, duration_ms } = measureSync(() => labeler.label(series));
        labels = result;
        log.info('Labels built', {
          column: labeler.name,
          lookahead: labeler.lookahead,
          duration_ms,
        });
      }

      const report: FeaturesReport = { symbol, table, labels };
      const output =
        options.format === 'json' ? this.formatAsJson(report) : this.formatAsText(report);

      const duration = timer.stop();
      log.info('Features command complete', { rows: table.length, duration_ms: duration });

      return {
        success: true,
        output,
        duration,
        metadata: {
          symbol,
          rows: table.length,
          columns: table.columnNames(),
          label: labels?.name,
        },
      };
    } catch (error) {
      log.error('Features command failed', {
        error_code: isFeatureKitError(error) ? error.code : 'INTERNAL_ERROR',
        error: error instanceof Error ? error.message : String(error),
      });

      return {
        success: false,
        output: '',
        error: error instanceof Error ? error : new Error(String(error)),
        duration: timer.stop(),
      };
    }
  }

  private buildLabeler(options: FeaturesCommandOptions): LabelConstructor<RegimeLabel> | undefined {
    switch (options.label ?? 'none') {
      case 'threshold':
        return thresholdHorizonLabeler({
          horizon: options.horizon ?? DEFAULT_HORIZON,
          threshold: options.threshold ?? DEFAULT_THRESHOLD,
          useLog: options.log ?? false,
          policy: options.ternary ? 'ternary' : 'binary',
        });

      case 'crossover':
        return crossoverLabeler({
          shortWindow: options.short ?? DEFAULT_SHORT_WINDOW,
          longWindow: options.long ?? DEFAULT_LONG_WINDOW,
        });

      case 'none':
      default:
        return undefined;
    }
  }

  private runPipeline(
    pipeline: FeaturePipeline,
    series: PriceSeries,
    log: Logger
  ): FeatureTable {
    const stepTimer = { last: startTimer() };

    const { result: table, duration_ms } = measureSync(() =>
      pipeline.run(series, {
        onTransform: ({ index, transform }) => {
          log.debug('Step complete', {
            step: index,
            transform: transform.name,
            columns: transform.outputs,
            duration_ms: stepTimer.last.stop(),
          });
          stepTimer.last = startTimer();
        },
      })
    );

    log.info('Pipeline complete', {
      steps: pipeline.transforms.length,
      columns: pipeline.outputs.length,
      duration_ms,
    });
    return table;
  }

  private formatAsJson(report: FeaturesReport): string {
    const records: FeatureRecord[] = report.table.toRecords();
    const { labels } = report;

    if (labels) {
      records.forEach((record, index) => {
        record[labels.name] = labels.values[index] ?? null;
      });
    }

    return JSON.stringify(records, null, 2);
  }

  private formatAsText(report: FeaturesReport): string {
    const { table, labels } = report;
    const c = this.chalk;
    const lines: string[] = [];

    const first = table.series[0];
    const last = table.series[table.length - 1];
    lines.push(
      c.bold(`Features for ${report.symbol}`) +
        ` (${table.length} rows, ${first?.timestamp.slice(0, 10)} to ${last?.timestamp.slice(0, 10)})`
    );
    lines.push('');

    const names = table.columnNames();
    const width = Math.max(...names.map((name) => name.length));

    lines.push(c.bold('Columns:'));
    for (const name of names) {
      const missing = table.missingCount(name);
      const status = missing === 0 ? c.green('complete') : c.yellow(`missing ${missing}`);
      lines.push(`  ${name.padEnd(width)}  ${status}`);
    }

    lines.push('');
    lines.push(c.bold(`Last row (${last?.timestamp ?? 'n/a'}):`));
    const lastRow = table.row(table.length - 1);
    for (const name of names) {
      lines.push(`  ${name.padEnd(width)}  ${formatValue(lastRow[name])}`);
    }

    if (labels) {
      lines.push('');
      lines.push(c.bold(`Labels (${labels.name}):`));
      lines.push(...formatSummary(summarizeLabels(labels)));
    }

    return lines.join('\n');
  }
}

function formatValue(value: FeatureRecord[string] | undefined): string {
  if (value === null || value === undefined) return 'missing';
  if (typeof value === 'string') return value;
  return Number.isInteger(value) ? String(value) : value.toFixed(4);
}

function formatSummary(summary: LabelSummary<RegimeLabel>): string[] {
  const lines: string[] = [];
  for (const [label, count] of summary.counts) {
    lines.push(`  ${label.padEnd(12)}${count}`);
  }
  lines.push(`  ${'missing'.padEnd(12)}${summary.missing}`);
  return lines;
}
