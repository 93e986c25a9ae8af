/**
 * @fileoverview Public API for @featurekit/app
 *
 * @module @featurekit/app
 */

export { runCli } from './program.js';
export type { ProgramContext, ProgramIO } from './program.js';

export { FeaturesCommand } from './commands/features.command.js';
export type {
  FeaturesCommandConfig,
  FeaturesCommandOptions,
  LabelMode,
} from './commands/features.command.js';
export type { Command, CommandOptions, CommandResult, OutputFormat } from './commands/types.js';

export { loadConfig, getConfigSummary, parseEnvValue, parseEnvList } from './config/index.js';
export { configSchema, envMapping } from './config/schema.js';
export type { Config, Environment } from './config/index.js';
