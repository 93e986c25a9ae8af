/**
 * Command types and interfaces
 */

export type OutputFormat = 'text' | 'json';

/**
 * Base command interface
 */
export interface Command<O extends CommandOptions = CommandOptions> {
  name: string;
  description: string;
  aliases?: string[];
  execute(args: string[], options: O): Promise<CommandResult>;
}

/**
 * Command execution options
 */
export interface CommandOptions {
  verbose?: boolean;
  format?: OutputFormat;
}

/**
 * Command execution result
 */
export interface CommandResult {
  success: boolean;
  /** Text to print on stdout; empty on failure */
  output: string;
  error?: Error;
  duration?: number;
  metadata?: Record<string, unknown>;
}
