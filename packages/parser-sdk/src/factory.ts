import type { Parser } from './types.js';

/**
 * Identity helper that pins a driver object to the Parser contract.
 */
export function defineParser<T extends Parser>(parser: T): T {
  return parser;
}
