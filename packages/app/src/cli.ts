/**
 * CLI entry point for the featurekit command
 */

// Load environment variables from .env file
import 'dotenv/config';

import { createLogger, attachGlobalHandlers } from '@featurekit/logger';
import { runCli } from './program.js';

attachGlobalHandlers(createLogger({ level: 'error' }));

process.exitCode = await runCli(process.argv.slice(2));
