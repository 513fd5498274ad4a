/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import { formatValue, toNative, type AnyLuaValue } from './runtime/index.js';
import {
  ConfigError,
  ExecutionError,
  LuaBridgeError,
  LuaSyntaxError,
} from './types.js';

/**
 * Format evaluation results for display, tab-separated.
 * No results produce an empty string.
 */
export function formatOutput(values: readonly AnyLuaValue[]): string {
  return values.map(formatValue).join('\t');
}

/**
 * Format evaluation results as JSON.
 * A single result is printed on its own; several become an array.
 */
export function formatJson(values: readonly AnyLuaValue[]): string {
  const [first] = values;
  const data =
    values.length === 1 && first !== undefined
      ? toNative(first)
      : values.map(toNative);
  return JSON.stringify(data, null, 2);
}

/**
 * Format error for stderr output
 */
export function formatError(err: Error): string {
  if (err instanceof LuaSyntaxError || err instanceof ExecutionError) {
    return err.message;
  }

  if (err instanceof ConfigError) {
    return `Config error: ${err.message.replace(/^Invalid config: /, '')}`;
  }

  if (err instanceof LuaBridgeError) {
    return `${err.code}: ${err.message}`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}
