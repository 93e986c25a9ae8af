/**
 * Command-line program: parses arguments, wires configuration, logger and
 * provider, and runs the requested command
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { Chalk } from 'chalk';
import { isFeatureKitError } from '@featurekit/contracts';
import { YahooProvider } from '@featurekit/provider-yahoo';
import { createLogger, type Logger } from '@featurekit/logger';
import { loadConfig, type Config, type Environment } from './config/index.js';
import { FeaturesCommand, type FeaturesCommandOptions } from './commands/features.command.js';
import type { OutputFormat } from './commands/types.js';

export interface ProgramIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface ProgramContext {
  /** Environment variables; process.env when unset */
  env?: Environment;
  io?: ProgramIO;
  /** Logger to use instead of one built from configuration */
  logger?: Logger;
  /** Colour output; chalk's detection when unset */
  color?: boolean;
}

interface FeaturesCliOptions {
  symbol?: string;
  from?: string;
  to?: string;
  label: 'none' | 'threshold' | 'crossover';
  horizon?: number;
  threshold?: number;
  log: boolean;
  ternary: boolean;
  short?: number;
  long?: number;
  format: OutputFormat;
  fixtures?: string;
}

const processIO: ProgramIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function loggerFromConfig(config: Config): Logger {
  return createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
  });
}

/**
 * Runs the CLI with the given arguments (without the node and script entries).
 *
 * @returns Process exit code
 *
 * @example
 * ```typescript
 * const code = await runCli(['features', '--symbol', 'DEMO', '--label', 'threshold']);
 * ```
 */
export async function runCli(args: string[], context: ProgramContext = {}): Promise<number> {
  const io = context.io ?? processIO;
  const chalk = context.color === undefined ? new Chalk() : new Chalk({ level: context.color ? 1 : 0 });
  let exitCode = 0;

  const program = new Command();
  program
    .name('featurekit')
    .description('Technical-analysis features and labels for daily price series')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    });

  program
    .command('features')
    .description('Build the feature table for a symbol')
    .argument('[symbol]', 'ticker (same as --symbol)')
    .option('-s, --symbol <symbol>', 'ticker to load')
    .option('--from <date>', 'first date (inclusive)')
    .option('--to <date>', 'last date (inclusive)')
    .addOption(
      new Option('--label <mode>', 'label column to add')
        .choices(['none', 'threshold', 'crossover'])
        .default('none')
    )
    .option('--horizon <n>', 'threshold labeler: rows to look ahead', parseNumber)
    .option('--threshold <x>', 'threshold labeler: bullish cut-off', parseNumber)
    .option('--log', 'threshold labeler: use log forward returns', false)
    .option('--ternary', 'threshold labeler: BULL/BEAR/RANGE classes', false)
    .option('--short <n>', 'crossover labeler: fast window', parseNumber)
    .option('--long <n>', 'crossover labeler: slow window', parseNumber)
    .addOption(
      new Option('--format <format>', 'output format').choices(['text', 'json']).default('text')
    )
    .option('--fixtures <dir>', 'directory of <SYMBOL>-1d.json files')
    .action(async (symbolArg: string | undefined, options: FeaturesCliOptions) => {
      const config = loadConfig(context.env ?? process.env);
      const logger = context.logger ?? loggerFromConfig(config);

      const command = new FeaturesCommand({
        provider: new YahooProvider({
          fixturePath: options.fixtures ?? config.provider.fixturePath,
        }),
        logger,
        defaults: config.defaults,
        features: config.features,
        color: context.color,
      });

      const commandOptions: FeaturesCommandOptions = {
        symbol: options.symbol,
        from: options.from,
        to: options.to,
        label: options.label,
        horizon: options.horizon,
        threshold: options.threshold,
        log: options.log,
        ternary: options.ternary,
        short: options.short,
        long: options.long,
        format: options.format,
      };

      const result = await command.execute(symbolArg ? [symbolArg] : [], commandOptions);

      if (result.success) {
        io.stdout(result.output);
        return;
      }

      const error = result.error;
      const code = isFeatureKitError(error) ? error.code : 'INTERNAL_ERROR';
      io.stderr(chalk.red(`Error [${code}]: ${error?.message ?? 'unknown error'}`));
      exitCode = 1;
    });

  try {
    await program.parseAsync(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (isFeatureKitError(error)) {
      io.stderr(chalk.red(`Error [${error.code}]: ${error.message}`));
      return 1;
    }
    throw error;
  }

  return exitCode;
}
