/**
 * @fileoverview Custom Winston formats for @featurekit/logger
 * Includes sensitive-field redaction, standard fields and pretty-print output.
 */

import { format } from 'winston';

/**
 * Sensitive field patterns that should be redacted from logs.
 * Matches are case-insensitive to catch common variations.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /pwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
  /cookie/i,
];

/**
 * Replacement value for redacted sensitive data.
 */
export const REDACTED = '[REDACTED]';

/** Core Winston fields, never redacted. */
const CORE_FIELDS = ['level', 'message', 'timestamp', 'label'];

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of a value with every sensitive key replaced, at any depth.
 *
 * @example
 * ```typescript
 * redactValue({ username: 'alice', password: 'test-secret' });
 * // { username: 'alice', password: '[REDACTED]' }
 * ```
 */
export function redactValue(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactValue(item));
  }

  // Errors keep their prototype so format.errors can still read the stack
  if (value instanceof Error) {
    return value;
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    redacted[key] = isSensitiveKey(key) ? REDACTED : redactValue(nested);
  }
  return redacted;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Must run before any output format.
 *
 * @example
 * ```typescript
 * logger.info('Provider configured', { provider: 'yahoo', apiKey: 'test-secret' });
 * // {"level":"info","message":"Provider configured","provider":"yahoo","apiKey":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.includes(key)) {
      continue;
    }
    info[key] = isSensitiveKey(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * Winston format that adds an ISO timestamp and expands Error objects
 * into message and stack.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Renders a context value for the pretty printer. Strings stay bare.
 */
function renderValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Winston format for human-readable output.
 *
 * @example
 * ```typescript
 * // [2024-06-17T12:34:56.789Z] info: Step complete component=pipeline symbol=DEMO transform=sma duration_ms=1
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, symbol, transform, ...rest } = info;

    const context: string[] = [];
    if (component !== undefined) context.push(`component=${renderValue(component)}`);
    if (symbol !== undefined) context.push(`symbol=${renderValue(symbol)}`);
    if (transform !== undefined) context.push(`transform=${renderValue(transform)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (['stack', 'splat'].includes(key)) {
        continue;
      }
      context.push(`${key}=${renderValue(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${renderValue(timestamp)}] ${level}: ${renderValue(message)}${contextStr}`;

    const stack = info['stack'];
    if (typeof stack === 'string') {
      return `${baseMsg}\n${stack}`;
    }

    return baseMsg;
  })
);
