/**
 * Lua Bridge Tests: Table Accessor
 */

import { describe, expect, it } from 'vitest';

import {
  LuaCode,
  LuaSyntaxError,
  LuaTable,
  NoSuchMethodError,
  read,
  Read,
} from '../../src/index.js';
import { expectValue, withLua } from '../helpers/runtime.js';

describe('Lua Bridge: LuaTable', () => {
  describe('get and set', () => {
    it('stores and fetches values', () => {
      withLua((lua) => {
        lua.exec('t = {}');
        const table = expectValue(lua.get(Read.table, 't'));
        table.set('name', 'test');
        table.set(1, 'first');

        expect(table.get(Read.string, 'name')).toBe('test');
        expect(table.get(Read.string, 1)).toBe('first');
        expect(lua.eval(Read.string, 'return t.name')).toBe('test');

        table.release();
        expect(lua.top()).toBe(0);
      });
    });

    it('returns null when the value does not decode', () => {
      withLua((lua) => {
        const table = lua.eval(Read.table, 'return {a = 1}');
        const height = lua.top();

        expect(table.get(Read.string, 'a')).toBeNull();
        expect(table.get(Read.int32, 'missing')).toBeNull();
        expect(lua.top()).toBe(height);
        table.release();
      });
    });

    it('tryGet hands back the fetched slot for another attempt', () => {
      withLua((lua) => {
        const table = lua.eval(Read.table, 'return {a = 1}');
        const height = lua.top();

        const first = table.tryGet(Read.string, 'a');
        if (first.ok) throw new Error('expected a mismatch');
        expect(lua.top()).toBe(height + 1);

        expect(read(first.context, Read.int32)).toEqual({ ok: true, value: 1 });
        expect(lua.top()).toBe(height);
        table.release();
      });
    });

    it('bypasses metamethods', () => {
      withLua((lua) => {
        lua.exec(`
          t = setmetatable({}, {
            __index = function() return "fallback" end,
            __newindex = function() error("blocked") end,
          })
        `);
        const table = expectValue(lua.get(Read.table, 't'));
        table.set('k', 1);

        expect(table.get(Read.int32, 'k')).toBe(1);
        expect(table.get(Read.string, 'other')).toBeNull();
        expect(lua.eval(Read.string, 'return t.other')).toBe('fallback');
        table.release();
      });
    });

    it('rejects nil keys without changing the table', () => {
      withLua((lua) => {
        const table = lua.eval(Read.table, 'return {}');
        const height = lua.top();

        expect(() => table.set(null, 1)).toThrow(
          'Table keys cannot be nil or NaN'
        );
        expect(lua.top()).toBe(height);
        expect(table.length()).toBe(0);
        table.release();
      });
    });

    it('looks up nil and NaN keys as missing', () => {
      withLua((lua) => {
        const table = lua.eval(Read.table, 'return {1}');
        const height = lua.top();

        expect(table.get(Read.anyValue, null)).toEqual({ kind: 'nil' });
        expect(table.get(Read.anyValue, NaN)).toEqual({ kind: 'nil' });
        expect(table.get(Read.int32, null)).toBeNull();
        expect(lua.top()).toBe(height);
        table.release();
      });
    });
  });

  describe('checkedSet', () => {
    it('stores values whose push can fail', () => {
      withLua((lua) => {
        lua.exec('t = {}');
        const table = expectValue(lua.get(Read.table, 't'));
        expect(table.checkedSet('f', new LuaCode('return 7'))).toEqual({
          ok: true,
        });
        table.release();

        expect(lua.eval(Read.int32, 'return t.f()')).toBe(7);
      });
    });

    it('stores nothing when the value fails to push', () => {
      withLua((lua) => {
        lua.exec('t = {}');
        const table = expectValue(lua.get(Read.table, 't'));
        const result = table.checkedSet('f', new LuaCode('return +'));
        if (result.ok) throw new Error('expected failure');

        expect(result.error.kind).toBe('value');
        expect(result.error.error).toBeInstanceOf(LuaSyntaxError);
        expect(lua.top()).toBe(1);
        table.release();

        expect(lua.eval(Read.boolean, 'return next(t) == nil')).toBe(true);
      });
    });

    it('reports key failures', () => {
      withLua((lua) => {
        const table = lua.eval(Read.table, 'return {}');
        const result = table.checkedSet(new LuaCode('!!'), 1);
        if (result.ok) throw new Error('expected failure');
        expect(result.error.kind).toBe('key');
        table.release();
      });
    });

    it('restores the stack when a nested value throws', () => {
      withLua((lua) => {
        lua.exec('t = {}');
        const table = expectValue(lua.get(Read.table, 't'));
        expect(() =>
          table.checkedSet('f', { inner: new Map([[null, 1]]) })
        ).toThrow('Table keys cannot be nil or NaN');
        expect(lua.top()).toBe(1);
        table.release();

        expect(lua.eval(Read.boolean, 'return next(t) == nil')).toBe(true);
      });
    });

    it('tables can hold handles to themselves', () => {
      withLua((lua) => {
        lua.exec('t = {}');
        const table = expectValue(lua.get(Read.table, 't'));
        table.set('self', table);
        table.set('pair', [table, table]);
        table.release();

        expect(
          lua.eval(Read.boolean, 'return t.self == t and t.pair[2] == t')
        ).toBe(true);
      });
    });
  });

  describe('structure', () => {
    it('length returns the raw sequence length', () => {
      withLua((lua) => {
        const table = lua.eval(Read.table, 'return {1, 2, 3, x = 4}');
        expect(table.length()).toBe(3);
        table.release();
      });
    });

    it('getOrCreateMetatable creates a metatable once', () => {
      withLua((lua) => {
        lua.exec('t = {}');
        const table = expectValue(lua.get(Read.table, 't'));

        const first = table.getOrCreateMetatable();
        first.set('__index', { x: 5 });
        first.release();

        const second = table.getOrCreateMetatable();
        second.set('marker', true);
        second.release();
        table.release();

        expect(lua.eval(Read.int32, 'return t.x')).toBe(5);
        expect(lua.eval(Read.boolean, 'return getmetatable(t).marker')).toBe(
          true
        );
        expect(lua.top()).toBe(0);
      });
    });

    it('getOrCreateMetatable returns an existing metatable', () => {
      withLua((lua) => {
        lua.exec('mt = {}; t = setmetatable({}, mt)');
        const table = expectValue(lua.get(Read.table, 't'));
        const meta = table.getOrCreateMetatable();
        meta.set('tag', 'existing');
        meta.release();
        table.release();

        expect(lua.eval(Read.string, 'return mt.tag')).toBe('existing');
      });
    });

    it('emptyArray stores a new table under a key', () => {
      withLua((lua) => {
        lua.exec('t = {}');
        const table = expectValue(lua.get(Read.table, 't'));
        const items = table.emptyArray('items');
        items.set(1, 'a');
        items.set(2, 'b');
        items.release();
        table.release();

        expect(lua.eval(Read.array(Read.string), 'return t.items')).toEqual([
          'a',
          'b',
        ]);
        expect(lua.top()).toBe(0);
      });
    });

    it('registry gives access to the registry table', () => {
      withLua((lua) => {
        const registry = LuaTable.registry(lua);
        registry.set('bridge.test', 'stored');
        expect(registry.get(Read.string, 'bridge.test')).toBe('stored');
        expect(lua.top()).toBe(0);
      });
    });
  });

  describe('callMethod', () => {
    it('calls a function field with the table as self', () => {
      withLua((lua) => {
        lua.exec(`
          counter = { n = 0 }
          function counter.add(self, k)
            self.n = self.n + k
            return self.n
          end
        `);
        const counter = expectValue(lua.get(Read.table, 'counter'));

        expect(counter.callMethod('add', Read.int32, 5)).toBe(5);
        expect(counter.callMethod('add', Read.int32, 2)).toBe(7);
        expect(lua.top()).toBe(1);

        counter.release();
        expect(lua.top()).toBe(0);
      });
    });

    it('throws NoSuchMethodError for missing or non-function fields', () => {
      withLua((lua) => {
        const table = lua.eval(Read.table, 'return {n = 1}');
        const height = lua.top();

        expect(() => table.callMethod('missing', Read.nothing)).toThrow(
          'No such method: missing'
        );
        expect(() => table.callMethod('n', Read.nothing)).toThrow(
          NoSuchMethodError
        );
        expect(lua.top()).toBe(height);
        table.release();
      });
    });
  });
});
