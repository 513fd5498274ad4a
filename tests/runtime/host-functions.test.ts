/**
 * Lua Bridge Tests: Host Functions
 * Host code exposed to Lua, argument decoding and error propagation
 */

import { describe, expect, it } from 'vitest';

import {
  ExecutionError,
  hostFunction,
  multi,
  Read,
  WRONG_PARAMETERS_MESSAGE,
} from '../../src/index.js';
import { withLua } from '../helpers/runtime.js';

describe('Lua Bridge: Host Functions', () => {
  it('passes decoded arguments and pushes the result', () => {
    withLua((lua) => {
      lua.set(
        'add',
        hostFunction([Read.int32, Read.int32], (a, b) => a + b, 'add')
      );
      expect(lua.eval(Read.int32, 'return add(2, 3)')).toBe(5);
      expect(lua.top()).toBe(0);
    });
  });

  it('raises a Lua error for arguments of the wrong type', () => {
    withLua((lua) => {
      lua.set(
        'add',
        hostFunction([Read.int32, Read.int32], (a, b) => a + b, 'add')
      );

      expect(
        lua.eval(
          Read.tuple(Read.falseValue, Read.string),
          'return pcall(add, "x", 1)'
        )
      ).toEqual([false, WRONG_PARAMETERS_MESSAGE]);
      expect(() => lua.exec('add(1)')).toThrow(
        'Execution error: wrong parameter types for callback function'
      );
    });
  });

  it('turns thrown host errors into Lua errors', () => {
    withLua((lua) => {
      lua.set(
        'fail',
        hostFunction(
          [],
          () => {
            throw new Error('host failure');
          },
          'fail'
        )
      );

      expect(
        lua.eval(Read.tuple(Read.falseValue, Read.string), 'return pcall(fail)')
      ).toEqual([false, 'host failure']);
      expect(() => lua.exec('fail()')).toThrow(ExecutionError);
      expect(lua.top()).toBe(0);
    });
  });

  it('returning nothing produces no results', () => {
    withLua((lua) => {
      const seen: string[] = [];
      lua.set(
        'record',
        hostFunction([Read.string], (value) => {
          seen.push(value);
        })
      );

      expect(lua.eval(Read.int32, 'return select("#", record("a"))')).toBe(0);
      expect(seen).toEqual(['a']);
    });
  });

  it('returns several results with multi', () => {
    withLua((lua) => {
      lua.set('pair', hostFunction([Read.int32], (n) => multi(n, n * 2)));
      expect(
        lua.eval(Read.tuple(Read.int32, Read.int32), 'return pair(4)')
      ).toEqual([4, 8]);
    });
  });

  it('returns tables', () => {
    withLua((lua) => {
      lua.set(
        'info',
        hostFunction([], () => ({ name: 'test', tags: ['a', 'b'] }))
      );
      expect(
        lua.eval(
          Read.tuple(Read.string, Read.int32),
          'local i = info(); return i.name, #i.tags'
        )
      ).toEqual(['test', 2]);
    });
  });

  it('accepts a variable number of arguments', () => {
    withLua((lua) => {
      lua.set(
        'sum',
        hostFunction([Read.rest(Read.number)], (values) =>
          values.reduce((total, value) => total + value, 0)
        )
      );
      expect(lua.eval(Read.number, 'return sum(1, 2, 3.5)')).toBe(6.5);
      expect(lua.eval(Read.number, 'return sum()')).toBe(0);
    });
  });

  it('optional parameters accept missing arguments', () => {
    withLua((lua) => {
      lua.set(
        'greet',
        hostFunction(
          [Read.string, Read.optional(Read.string)],
          (name, greeting) => `${greeting ?? 'hello'}, ${name}`
        )
      );
      expect(lua.eval(Read.string, 'return greet("lua")')).toBe('hello, lua');
      expect(lua.eval(Read.string, 'return greet("lua", "hi")')).toBe(
        'hi, lua'
      );
    });
  });

  it('receives tables as handles', () => {
    withLua((lua) => {
      lua.set(
        'getX',
        hostFunction([Read.table], (table) => table.get(Read.int32, 'x'))
      );
      expect(lua.eval(Read.int32, 'return getX({x = 9})')).toBe(9);
      expect(lua.eval(Read.nil, 'return getX({})')).toBeNull();
    });
  });

  it('can call back into Lua', () => {
    withLua((lua) => {
      lua.set(
        'twice',
        hostFunction([Read.func], (fn) => fn.call(Read.int32) * 2, 'twice')
      );
      expect(
        lua.eval(Read.int32, 'return twice(function() return 21 end)')
      ).toBe(42);
      expect(lua.top()).toBe(0);
    });
  });

  it('can catch errors raised by the Lua it calls', () => {
    withLua((lua) => {
      lua.set(
        'guarded',
        hostFunction([Read.func], (fn) => {
          try {
            fn.call(Read.nothing);
            return 'ok';
          } catch (err) {
            return err instanceof ExecutionError ? err.diagnostic : 'other';
          }
        })
      );
      expect(
        lua.eval(
          Read.string,
          'return guarded(function() error("inner", 0) end)'
        )
      ).toBe('inner');
      expect(
        lua.eval(Read.string, 'return guarded(function() end)')
      ).toBe('ok');
    });
  });

  it('host functions can be stored in tables', () => {
    withLua((lua) => {
      lua.set('api', {
        upper: hostFunction([Read.string], (s) => s.toUpperCase()),
        version: '1.0',
      });
      expect(
        lua.eval(Read.string, 'return api.upper(api.version .. "x")')
      ).toBe('1.0X');
    });
  });
});
