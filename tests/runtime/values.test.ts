/**
 * Lua Bridge Tests: Any-Value Snapshots
 * Snapshotting, formatting and pushing arbitrary values
 */

import { describe, expect, it } from 'vitest';

import {
  formatValue,
  pushAny,
  Read,
  toNative,
  WrongTypeError,
  type AnyLuaValue,
} from '../../src/index.js';
import { expectValue, withLua } from '../helpers/runtime.js';

/** Evaluate `code` and format its single result */
function show(code: string): string {
  return withLua((lua) => formatValue(lua.eval(Read.anyValue, code)));
}

describe('Lua Bridge: Any Values', () => {
  describe('snapshot', () => {
    it('captures scalars', () => {
      withLua((lua) => {
        expect(lua.eval(Read.anyValue, 'return nil')).toEqual({ kind: 'nil' });
        expect(lua.eval(Read.anyValue, 'return false')).toEqual({
          kind: 'boolean',
          value: false,
        });
        expect(lua.eval(Read.anyValue, 'return 3')).toEqual({
          kind: 'number',
          value: 3,
          integer: true,
        });
        expect(lua.eval(Read.anyValue, 'return 3.0')).toEqual({
          kind: 'number',
          value: 3,
          integer: false,
        });
        expect(lua.eval(Read.anyValue, 'return "s"')).toEqual({
          kind: 'string',
          value: 's',
        });
      });
    });

    it('keeps strings that are not UTF-8 as bytes', () => {
      withLua((lua) => {
        expect(lua.eval(Read.anyValue, 'return "\\255"')).toEqual({
          kind: 'bytes',
          value: new Uint8Array([255]),
        });
      });
    });

    it('captures tables as entry lists', () => {
      withLua((lua) => {
        const value = lua.eval(Read.anyValue, 'return {x = true}');
        expect(value).toEqual({
          kind: 'table',
          entries: [
            [
              { kind: 'string', value: 'x' },
              { kind: 'boolean', value: true },
            ],
          ],
        });
      });
    });

    it('names values without a host representation', () => {
      withLua((lua) => {
        expect(lua.eval(Read.anyValue, 'return print')).toEqual({
          kind: 'other',
          typeName: 'function',
        });
      });
    });

    it('rejects tables that contain themselves', () => {
      withLua((lua) => {
        expect(() =>
          lua.eval(Read.anyValue, 'local t = {}; t.self = t; return t')
        ).toThrow(WrongTypeError);
        expect(lua.top()).toBe(0);
      });
    });

    it('accepts the same table reached twice', () => {
      expect(show('local shared = {1}; return {a = shared, b = shared}')).toBe(
        '{a = {1}, b = {1}}'
      );
    });
  });

  describe('formatValue', () => {
    it('formats scalars', () => {
      expect(show('return nil')).toBe('nil');
      expect(show('return true')).toBe('true');
      expect(show('return 10')).toBe('10');
      expect(show('return 3.0')).toBe('3.0');
      expect(show('return 2.5')).toBe('2.5');
      expect(show('return "a b"')).toBe('a b');
    });

    it('formats special numbers', () => {
      expect(show('return 1/0')).toBe('inf');
      expect(show('return -1/0')).toBe('-inf');
      expect(show('return 0/0')).toBe('nan');
    });

    it('formats sequences and keyed entries', () => {
      expect(show('return {1, 2, x = "y"}')).toBe('{1, 2, x = "y"}');
      expect(show('return {}')).toBe('{}');
      expect(show('return {["a b"] = 1, [10] = 2}')).toBe(
        '{[10] = 2, ["a b"] = 1}'
      );
    });

    it('quotes strings nested in tables', () => {
      expect(show('return {"x", {y = "z"}}')).toBe('{"x", {y = "z"}}');
    });

    it('replaces bytes that are not UTF-8', () => {
      expect(show('return "a\\255"')).toBe('a\uFFFD');
    });
  });

  describe('toNative', () => {
    it('converts sequences to arrays', () => {
      withLua((lua) => {
        const value = lua.eval(Read.anyValue, 'return {1, "two", {3}}');
        expect(toNative(value)).toEqual([1, 'two', [3]]);
      });
    });

    it('converts other tables to objects', () => {
      withLua((lua) => {
        expect(
          toNative(lua.eval(Read.anyValue, 'return {1, 2, x = 3}'))
        ).toEqual({ '1': 1, '2': 2, x: 3 });
        expect(toNative(lua.eval(Read.anyValue, 'return {}'))).toEqual({});
      });
    });

    it('converts values JSON cannot hold to strings', () => {
      const values: AnyLuaValue[] = [
        { kind: 'number', value: Infinity, integer: false },
        { kind: 'other', typeName: 'thread' },
        { kind: 'nil' },
      ];
      expect(values.map(toNative)).toEqual(['inf', '<thread>', null]);
    });
  });

  describe('pushAny', () => {
    it('pushes a snapshot back as an equivalent value', () => {
      withLua((lua) => {
        const value = lua.eval(
          Read.anyValue,
          'return {1, 2.0, "s", t = {true}}'
        );
        lua.set('copy', pushAny(value));

        expect(
          lua.eval(
            Read.boolean,
            `return copy[1] == 1 and math.type(copy[1]) == "integer"
               and math.type(copy[2]) == "float"
               and copy[3] == "s" and copy.t[1] == true`
          )
        ).toBe(true);
      });
    });

    it('pushes values without a host representation as nil', () => {
      withLua((lua) => {
        lua.set('fn', pushAny({ kind: 'other', typeName: 'function' }));
        expect(lua.eval(Read.boolean, 'return fn == nil')).toBe(true);
      });
    });

    it('leaves out entries keyed by values without a host representation', () => {
      withLua((lua) => {
        const value = lua.eval(
          Read.anyValue,
          'local t = {kept = 1}; t[print] = 2; return t'
        );
        lua.set('copy', pushAny(value));

        expect(
          lua.eval(
            Read.tuple(Read.int32, Read.nil),
            'return copy.kept, next(copy, "kept")'
          )
        ).toEqual([1, null]);
        expect(lua.top()).toBe(0);
      });
    });

    it('leaves out entries keyed by nil or NaN', () => {
      withLua((lua) => {
        const value: AnyLuaValue = {
          kind: 'table',
          entries: [
            [{ kind: 'nil' }, { kind: 'boolean', value: true }],
            [
              { kind: 'number', value: NaN, integer: false },
              { kind: 'boolean', value: true },
            ],
            [
              { kind: 'string', value: 'x' },
              { kind: 'boolean', value: false },
            ],
          ],
        };
        lua.set('copy', pushAny(value));
        expect(formatValue(expectValue(lua.get(Read.anyValue, 'copy')))).toBe(
          '{x = false}'
        );
      });
    });
  });
});
