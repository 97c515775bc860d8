/**
 * Safe JSON Parser - Prototype Pollution Protection
 *
 * Every payload this process reads (API bodies, checkpoint files, credential files) is parsed
 * through secure-json-parse, and results are returned as `unknown` for the caller to validate.
 *
 * @see https://github.com/fastify/secure-json-parse
 */

import sjson from 'secure-json-parse';

export interface SafeParseOptions {
  protoAction?: 'remove' | 'error' | 'ignore';
  constructorAction?: 'remove' | 'error' | 'ignore';
}

const DEFAULT_OPTIONS: SafeParseOptions = {
  protoAction: 'remove',
  constructorAction: 'remove',
};

/**
 * Parse JSON with `__proto__` and `constructor.prototype` keys stripped.
 * Throws SyntaxError on malformed input.
 *
 * @example
 * ```typescript
 * const data = safeJsonParse('{"__proto__": {"polluted": true}, "name": "test"}');
 * // { name: "test" }
 * ```
 */
export function safeJsonParse(text: string, options: SafeParseOptions = DEFAULT_OPTIONS): unknown {
  const parsed: unknown = sjson.parse(text, undefined, {
    protoAction: options.protoAction || 'remove',
    constructorAction: options.constructorAction || 'remove',
  });
  return parsed;
}

/**
 * Same as {@link safeJsonParse} but returns null instead of throwing.
 */
export function safeJsonParseSafe(text: string, options: SafeParseOptions = DEFAULT_OPTIONS): unknown {
  try {
    return safeJsonParse(text, options);
  } catch {
    return null;
  }
}

export function isJsonRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
