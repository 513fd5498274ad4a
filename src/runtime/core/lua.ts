/**
 * Lua Instance
 *
 * Owns an interpreter state and offers the top-level entry points:
 * evaluation, globals and library loading.
 */

import { PushError } from '../../types.js';
import { BUILTIN_FUNCTIONS } from '../ext/builtins.js';
import {
  AbsoluteIndex,
  borrow,
  createRuntime,
  type LuaContext,
} from './context.js';
import {
  lauxlib,
  lua,
  lualib,
  to_luastring,
  type LuaNativeFunction,
  type LuaState,
} from './ffi.js';
import { LuaFunction, type ChunkReader } from './functions.js';
import { PushGuard } from './guard.js';
import {
  requireSingleSlot,
  tryPush,
  type InfallibleCheck,
  type Pushable,
  type PushErrorOf,
} from './push.js';
import { readAt, type LuaRead } from './read.js';
import { nothing } from './readers.js';
import { LuaTable } from './tables.js';
import type { LuaLibName, LuaOptions, LuaRuntime } from './types.js';

/** Module name and opener for each standard library */
const LIBRARIES: Record<LuaLibName, readonly [string, LuaNativeFunction]> = {
  base: ['_G', lualib.luaopen_base],
  coroutine: ['coroutine', lualib.luaopen_coroutine],
  table: ['table', lualib.luaopen_table],
  os: ['os', lualib.luaopen_os],
  string: ['string', lualib.luaopen_string],
  utf8: ['utf8', lualib.luaopen_utf8],
  math: ['math', lualib.luaopen_math],
  debug: ['debug', lualib.luaopen_debug],
  package: ['package', lualib.luaopen_package],
};

/** Names accepted by openLib() */
export const LIBRARY_NAMES: readonly string[] = Object.keys(LIBRARIES);

export function isLuaLibName(name: string): name is LuaLibName {
  return Object.prototype.hasOwnProperty.call(LIBRARIES, name);
}

export type CheckedGlobalResult<E> =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: E };

/**
 * An interpreter state.
 * Releasing it as a context does nothing; close() destroys the state.
 */
export class Lua implements LuaContext {
  private constructor(
    readonly state: LuaState,
    readonly runtime: LuaRuntime
  ) {}

  /**
   * Create a state, open the requested libraries, install the built-in
   * functions and set the initial globals.
   */
  static create(options: LuaOptions = {}): Lua {
    const instance = new Lua(lauxlib.luaL_newstate(), createRuntime(options));
    const libs = options.libs ?? 'all';
    if (libs === 'all') {
      instance.openLibs();
    } else {
      for (const name of libs) instance.openLib(name);
      instance.installBuiltins();
    }

    for (const [name, value] of Object.entries(options.globals ?? {})) {
      const result = instance.checkedSet(name, value);
      if (!result.ok) {
        instance.close();
        throw new PushError('global', result.error);
      }
    }
    return instance;
  }

  release(): void {
    // The state lives until close()
  }

  /** Destroy the state; every handle into it becomes invalid */
  close(): void {
    lua.lua_close(this.state);
  }

  /** Current stack height */
  top(): number {
    return lua.lua_gettop(this.state);
  }

  /** Open every standard library */
  openLibs(): void {
    lualib.luaL_openlibs(this.state);
    this.installBuiltins();
  }

  /** Open one standard library and register it as a global */
  openLib(name: LuaLibName): void {
    const [module, open] = LIBRARIES[name];
    lauxlib.luaL_requiref(this.state, to_luastring(module), open, true);
    lua.lua_pop(this.state, 1);
    if (name === 'base') this.installBuiltins();
  }

  private installBuiltins(): void {
    for (const [name, create] of Object.entries(BUILTIN_FUNCTIONS)) {
      lua.lua_pushjsfunction(this.state, create(this.runtime));
      lua.lua_setglobal(this.state, to_luastring(name));
    }
  }

  /** Compile and run `code`, decoding its results with `reader` */
  eval<T>(reader: LuaRead<T>, code: string | Uint8Array): T {
    return LuaFunction.load(this, code).intoCall(reader);
  }

  /** Compile and run `code`, discarding its results */
  exec(code: string | Uint8Array): void {
    this.eval(nothing, code);
  }

  /** Like eval() with code supplied by a reader */
  evalFrom<T>(reader: LuaRead<T>, source: ChunkReader): T {
    return LuaFunction.loadFromReader(this, source).intoCall(reader);
  }

  execFrom(source: ChunkReader): void {
    this.evalFrom(nothing, source);
  }

  /** Read a global; null when it does not decode with `reader` */
  get<T>(reader: LuaRead<T>, name: string): T | null {
    lua.lua_getglobal(this.state, to_luastring(name));
    const slot = new PushGuard(borrow(this), 1);
    const result = readAt(slot, reader, -1);
    if (result.ok) return result.value;
    result.context.release();
    return null;
  }

  /** Set a global whose push cannot fail */
  set<V extends Pushable>(name: string, value: V & InfallibleCheck<V>): void {
    const result = this.checkedSet<V>(name, value);
    if (!result.ok) throw new PushError('global', result.error);
  }

  /** Set a global; nothing is assigned when the push fails */
  checkedSet<V extends Pushable>(
    name: string,
    value: V
  ): CheckedGlobalResult<PushErrorOf<V>> {
    const pushed = tryPush(borrow(this), value);
    if (!pushed.ok) return { ok: false, error: pushed.error };
    requireSingleSlot(pushed.guard, 'Global value');
    pushed.guard.forget();
    lua.lua_setglobal(this.state, to_luastring(name));
    return { ok: true };
  }

  /** The globals table, owning one slot */
  globalsTable(): LuaTable {
    lua.lua_pushglobaltable(this.state);
    const slot = new PushGuard(borrow(this), 1);
    return new LuaTable(slot, AbsoluteIndex.resolve(slot, -1));
  }

  /** Create an empty table as global `name` and return it */
  emptyArray(name: string): LuaTable {
    lua.lua_createtable(this.state, 0, 0);
    lua.lua_pushvalue(this.state, -1);
    lua.lua_setglobal(this.state, to_luastring(name));
    const slot = new PushGuard(borrow(this), 1);
    return new LuaTable(slot, AbsoluteIndex.resolve(slot, -1));
  }
}
