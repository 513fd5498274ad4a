#!/usr/bin/env node
/**
 * lua-eval - Evaluate Lua code from the command line
 *
 * Usage:
 *   lua-eval '1 + 2'
 *   lua-eval --config lua.yaml 'greeting .. "!"'
 *   lua-eval --json '{1, 2, 3}'
 *   lua-eval --help
 *   lua-eval --version
 */

import * as fs from 'fs';
import { loadConfig } from './cli-config.js';
import { formatError, formatJson, formatOutput } from './cli-shared.js';
import {
  Lua,
  LuaFunction,
  LuaSyntaxError,
  Read,
  type AnyLuaValue,
  type LuaOptions,
} from './index.js';

export type Command =
  | { mode: 'eval'; code: string; config: string | undefined; json: boolean }
  | { mode: 'help' }
  | { mode: 'version' };

/**
 * Parse command-line arguments into structured command
 */
export function parseArgs(argv: string[]): Command {
  // Check for --help and --version in any position
  if (argv.includes('--help')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version')) {
    return { mode: 'version' };
  }

  let config: string | undefined;
  let json = false;
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) break;

    if (arg === '--config') {
      const path = argv[i + 1];
      if (path === undefined) {
        throw new Error('Option --config requires a file path');
      }
      config = path;
      i++;
    } else if (arg === '--json') {
      json = true;
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [code, ...extra] = positional;
  // If no code, default to help
  if (code === undefined) {
    return { mode: 'help' };
  }
  if (extra.length > 0) {
    throw new Error(`Unexpected argument: ${extra.join(' ')}`);
  }
  return { mode: 'eval', code, config, json };
}

/**
 * Compile `code` as an expression when it is one, as a chunk otherwise
 */
function compile(lua: Lua, code: string): LuaFunction {
  try {
    return LuaFunction.load(lua, `return ${code}`);
  } catch (err) {
    if (!(err instanceof LuaSyntaxError)) throw err;
  }
  return LuaFunction.load(lua, code);
}

/**
 * Evaluate Lua code in a fresh state and return every result
 */
export function evaluateCode(
  code: string,
  options: LuaOptions = {}
): AnyLuaValue[] {
  const lua = Lua.create(options);
  try {
    return compile(lua, code).intoCall(Read.rest(Read.anyValue));
  } finally {
    lua.close();
  }
}

/**
 * Display help information
 */
function showHelp(): void {
  console.log(`Lua Evaluator

Usage:
  lua-eval [options] <code>   Evaluate a Lua expression or chunk
  lua-eval --help             Show this help message
  lua-eval --version          Show version information

Options:
  --config <file>   YAML file with libs, globals and chunkName
  --json            Print results as JSON

Examples:
  lua-eval '1 + 2'
  lua-eval 'string.rep("ab", 3)'
  lua-eval --json '{1, 2, x = 3}'`);
}

/**
 * Display version information
 */
function showVersion(): void {
  // Read version from package.json
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8')) as {
    version: string;
  };
  console.log(`lua-eval ${packageJson.version}`);
}

/**
 * Entry point for lua-eval binary
 */
function main(): void {
  try {
    const command = parseArgs(process.argv.slice(2));

    if (command.mode === 'help') {
      showHelp();
      return;
    }

    if (command.mode === 'version') {
      showVersion();
      return;
    }

    const config =
      command.config !== undefined ? loadConfig(command.config) : {};
    const values = evaluateCode(command.code, {
      ...config,
      callbacks: { onLog: (message) => console.log(message) },
    });

    const output = command.json ? formatJson(values) : formatOutput(values);
    if (output !== '') console.log(output);
    process.exit(0);
  } catch (err) {
    console.error(
      formatError(err instanceof Error ? err : new Error(String(err)))
    );
    process.exit(1);
  }
}

const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
