/**
 * CLI Config Loader
 *
 * Reads a YAML file describing how to set up a Lua state:
 *
 *   libs: [base, string, table]   # or "all"
 *   chunkName: script
 *   globals:
 *     greeting: hello
 *     limits: { retries: 3 }
 */

import * as fs from 'fs';
import * as yaml from 'yaml';
import {
  isLuaLibName,
  LIBRARY_NAMES,
  type LuaLibName,
  type Pushable,
} from './runtime/index.js';
import { ConfigError } from './types.js';

/** Validated configuration; a subset of LuaOptions */
export interface LuaConfig {
  libs?: 'all' | LuaLibName[];
  globals?: Record<string, Pushable>;
  chunkName?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseLibs(value: unknown): 'all' | LuaLibName[] {
  if (value === 'all') return 'all';
  if (!Array.isArray(value)) {
    throw new ConfigError('libs must be "all" or a list of library names');
  }
  return value.map((name: unknown) => {
    if (typeof name !== 'string' || !isLuaLibName(name)) {
      throw new ConfigError(
        `unknown library "${String(name)}" (expected one of: ${LIBRARY_NAMES.join(', ')})`,
        { library: name }
      );
    }
    return name;
  });
}

/** Convert plain YAML data into a value that can be pushed as a global */
function toGlobalValue(value: unknown, path: string): Pushable {
  if (
    value === null ||
    typeof value === 'boolean' ||
    typeof value === 'number' ||
    typeof value === 'string'
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown, i) => toGlobalValue(item, `${path}[${i}]`));
  }
  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [
        key,
        toGlobalValue(item, `${path}.${key}`),
      ])
    );
  }
  throw new ConfigError(`unsupported value at ${path}`, { path });
}

function parseGlobals(value: unknown): Record<string, Pushable> {
  if (!isRecord(value)) {
    throw new ConfigError('globals must be a mapping');
  }
  const globals: Record<string, Pushable> = {};
  for (const [name, item] of Object.entries(value)) {
    globals[name] = toGlobalValue(item, name);
  }
  return globals;
}

/**
 * Parse and validate config text.
 * An empty document is an empty config.
 */
export function parseConfig(source: string): LuaConfig {
  let document: unknown;
  try {
    document = yaml.parse(source);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`YAML parse error: ${detail}`);
  }

  // yaml.parse returns null for empty content
  if (document === null || document === undefined) return {};
  if (!isRecord(document)) {
    throw new ConfigError('expected a mapping at the top level');
  }

  const config: LuaConfig = {};
  for (const [key, value] of Object.entries(document)) {
    switch (key) {
      case 'libs':
        config.libs = parseLibs(value);
        break;
      case 'globals':
        config.globals = parseGlobals(value);
        break;
      case 'chunkName':
        if (typeof value !== 'string' || value === '') {
          throw new ConfigError('chunkName must be a non-empty string');
        }
        config.chunkName = value;
        break;
      default:
        throw new ConfigError(`unknown key "${key}"`, { key });
    }
  }
  return config;
}

/** Read and validate a config file */
export function loadConfig(path: string): LuaConfig {
  return parseConfig(fs.readFileSync(path, 'utf-8'));
}
