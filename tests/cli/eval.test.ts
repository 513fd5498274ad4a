/**
 * Lua Bridge CLI Tests: lua-eval command
 */

import { describe, expect, it } from 'vitest';

import {
  ConfigError,
  ExecutionError,
  LuaSyntaxError,
  NoSuchMethodError,
} from '../../src/index.js';
import { evaluateCode, parseArgs } from '../../src/cli-eval.js';
import {
  formatError,
  formatJson,
  formatOutput,
} from '../../src/cli-shared.js';
import { createLogCollector } from '../helpers/runtime.js';

describe('lua-eval', () => {
  describe('parseArgs', () => {
    it('parses code', () => {
      expect(parseArgs(['1 + 2'])).toEqual({
        mode: 'eval',
        code: '1 + 2',
        config: undefined,
        json: false,
      });
    });

    it('parses options', () => {
      expect(parseArgs(['--json', '--config', 'lua.yaml', 'x'])).toEqual({
        mode: 'eval',
        code: 'x',
        config: 'lua.yaml',
        json: true,
      });
    });

    it('finds --help and --version anywhere', () => {
      expect(parseArgs(['x', '--help'])).toEqual({ mode: 'help' });
      expect(parseArgs(['--json', '--version'])).toEqual({ mode: 'version' });
    });

    it('shows help without code', () => {
      expect(parseArgs([])).toEqual({ mode: 'help' });
    });

    it('rejects bad arguments', () => {
      expect(() => parseArgs(['--config'])).toThrow(
        'Option --config requires a file path'
      );
      expect(() => parseArgs(['--fast', 'x'])).toThrow('Unknown option: --fast');
      expect(() => parseArgs(['a', 'b'])).toThrow('Unexpected argument: b');
    });
  });

  describe('evaluateCode', () => {
    it('evaluates expressions', () => {
      expect(formatOutput(evaluateCode('1 + 2'))).toBe('3');
      expect(formatOutput(evaluateCode('string.rep("ab", 3)'))).toBe('ababab');
    });

    it('prints every result tab-separated', () => {
      expect(formatOutput(evaluateCode('1, "a", nil'))).toBe('1\ta\tnil');
    });

    it('runs statements that return nothing', () => {
      expect(evaluateCode('x = 1')).toEqual([]);
      expect(formatOutput(evaluateCode('local y = 2'))).toBe('');
    });

    it('runs chunks with return statements', () => {
      expect(formatOutput(evaluateCode('local a = 4; return a * a'))).toBe(
        '16'
      );
    });

    it('uses globals from options', () => {
      expect(
        formatOutput(
          evaluateCode('greeting .. "!"', { globals: { greeting: 'hi' } })
        )
      ).toBe('hi!');
    });

    it('sends print output to onLog', () => {
      const { logs, callbacks } = createLogCollector();
      expect(evaluateCode('print("side effect")', { callbacks })).toEqual([]);
      expect(logs).toEqual(['side effect']);
    });

    it('throws execution errors', () => {
      expect(() => evaluateCode('error("boom", 0)')).toThrow(ExecutionError);
      expect(() => evaluateCode('error("boom", 0)')).toThrow(
        'Execution error: boom'
      );
    });

    it('throws syntax errors', () => {
      expect(() => evaluateCode('1 +')).toThrow(LuaSyntaxError);
    });
  });

  describe('formatJson', () => {
    it('prints a single result on its own', () => {
      expect(formatJson(evaluateCode('{1, 2, 3}'))).toBe(
        '[\n  1,\n  2,\n  3\n]'
      );
      expect(formatJson(evaluateCode('"s"'))).toBe('"s"');
    });

    it('prints several results as an array', () => {
      expect(formatJson(evaluateCode('1, true'))).toBe('[\n  1,\n  true\n]');
      expect(formatJson([])).toBe('[]');
    });
  });

  describe('formatError', () => {
    it('prints Lua errors as they are', () => {
      expect(formatError(new ExecutionError('boom'))).toBe(
        'Execution error: boom'
      );
      expect(formatError(new LuaSyntaxError('bad'))).toBe('Syntax error: bad');
    });

    it('prints config errors', () => {
      expect(formatError(new ConfigError('unknown key "x"'))).toBe(
        'Config error: unknown key "x"'
      );
    });

    it('prefixes other bridge errors with their code', () => {
      expect(formatError(new NoSuchMethodError('x'))).toBe(
        'LUA_NO_SUCH_METHOD: No such method: x'
      );
    });

    it('reports missing files', () => {
      const err = Object.assign(new Error('ENOENT: no such file'), {
        code: 'ENOENT',
        path: 'lua.yaml',
      });
      expect(formatError(err)).toBe('File not found: lua.yaml');
    });

    it('prints other errors by message', () => {
      expect(formatError(new Error('plain'))).toBe('plain');
    });
  });
});
