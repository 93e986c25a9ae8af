/**
 * @fileoverview Tests for logger creation and basic functionality
 */

import { describe, it, expect } from 'vitest';
import { createLogger, createChildLogger } from '../src/createLogger.js';
import type { LoggerConfig } from '../src/types.js';
import { captureStream, parseLine, settle } from './capture.js';

describe('createLogger', () => {
  it('should create a logger with basic configuration', () => {
    const logger = createLogger({ level: 'info', json: true, console: false });

    expect(logger.level).toBe('info');
  });

  it('should create a logger with all log levels', () => {
    const levels: LoggerConfig['level'][] = ['error', 'warn', 'info', 'debug'];

    for (const level of levels) {
      expect(createLogger({ level, console: false }).level).toBe(level);
    }
  });

  it('should write JSON entries with a timestamp', async () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ level: 'info', json: true, console: false, stream });

    logger.info('Series loaded', { symbol: 'DEMO', rows: 120 });
    await settle();

    expect(lines).toHaveLength(1);
    const entry = parseLine(lines[0]);
    expect(entry['level']).toBe('info');
    expect(entry['message']).toBe('Series loaded');
    expect(entry['symbol']).toBe('DEMO');
    expect(entry['rows']).toBe(120);
    expect(entry['timestamp']).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}/);
  });

  it('should respect log level filtering', async () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ level: 'warn', json: true, console: false, stream });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');
    await settle();

    expect(lines.map((line) => parseLine(line)['message'])).toEqual(['shown', 'shown too']);
  });

  it('should create child logger with context', async () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ level: 'info', json: true, console: false, stream });

    const child = createChildLogger(logger, { component: 'pipeline', symbol: 'DEMO' });
    child.info('Step complete', { transform: 'sma' });
    await settle();

    const entry = parseLine(lines[0]);
    expect(entry['component']).toBe('pipeline');
    expect(entry['symbol']).toBe('DEMO');
    expect(entry['transform']).toBe('sma');
  });

  it('should pretty-print context fields after the message', async () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ level: 'info', json: false, console: false, stream });

    logger.info('Step complete', { transform: 'sma', columns: ['MA10'], duration_ms: 3 });
    await settle();

    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T/);
    expect(lines[0]).toContain('Step complete transform=sma columns=["MA10"] duration_ms=3');
  });

  it('should stay quiet without any transport', () => {
    const logger = createLogger({ level: 'info', console: false });

    expect(logger.silent).toBe(true);
  });
});
