/**
 * Table Accessor
 *
 * Raw get/set on a table held at a fixed stack position, metatable access
 * and entry iteration.
 */

import {
  NoSuchMethodError,
  PushError,
  StackCorruptionError,
} from '../../types.js';
import {
  AbsoluteIndex,
  borrow,
  type LuaContext,
  type StateRef,
} from './context.js';
import { lua, to_luastring } from './ffi.js';
import { LuaFunction } from './functions.js';
import { PushGuard } from './guard.js';
import {
  isInvalidKey,
  requireSingleSlot,
  requireValidKey,
  tryPush,
  type InfallibleCheck,
  type LuaPush,
  type Pushable,
  type PushErrorOf,
  type PushOutcome,
  type PushResult,
  type TablePushError,
} from './push.js';
import { readAt, type LuaRead, type ReadResult } from './read.js';

export type CheckedSetResult<K, V> =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: TablePushError<K, V> };

/**
 * Handle to a table on the stack.
 * Owns its context the same way LuaFunction does.
 */
export class LuaTable implements LuaContext, LuaPush<never> {
  constructor(
    private readonly context: LuaContext,
    readonly index: AbsoluteIndex
  ) {}

  /** The registry table of the state behind `context` */
  static registry(context: LuaContext): LuaTable {
    return new LuaTable(
      borrow(context),
      AbsoluteIndex.resolve(context, lua.LUA_REGISTRYINDEX)
    );
  }

  get state() {
    return this.context.state;
  }

  get runtime() {
    return this.context.runtime;
  }

  release(): void {
    this.context.release();
  }

  pushToLua(context: LuaContext): PushOutcome<never> {
    lua.lua_pushvalue(context.state, this.index.get());
    return { ok: true, size: 1 };
  }

  /** Raw lookup; null when the value does not decode with `reader` */
  get<T, K extends Pushable>(
    reader: LuaRead<T>,
    key: K & InfallibleCheck<K>
  ): T | null {
    const result = this.tryGet<T, K>(reader, key);
    if (result.ok) return result.value;
    result.context.release();
    return null;
  }

  /**
   * Raw lookup that hands back the guard over the fetched slot when the
   * value does not decode, so it can be read again.
   */
  tryGet<T, K extends Pushable>(
    reader: LuaRead<T>,
    key: K & InfallibleCheck<K>
  ): ReadResult<T, PushGuard<StateRef>> {
    const state = this.state;
    this.pushKey(key).forget();
    if (isInvalidKey(state)) {
      // nil and NaN are never present as keys
      lua.lua_pop(state, 1);
      lua.lua_pushnil(state);
    } else {
      lua.lua_rawget(state, this.index.get());
    }
    const slot = new PushGuard(borrow(this), 1);
    return readAt(slot, reader, -1);
  }

  /** Raw assignment of a value whose push cannot fail */
  set<K extends Pushable, V extends Pushable>(
    key: K & InfallibleCheck<K>,
    value: V & InfallibleCheck<V>
  ): void {
    const result = this.checkedSet<K, V>(key, value);
    if (!result.ok) throw new PushError(result.error.kind, result.error.error);
  }

  /** Raw assignment; nothing is stored when either push fails */
  checkedSet<K extends Pushable, V extends Pushable>(
    key: K,
    value: V
  ): CheckedSetResult<PushErrorOf<K>, PushErrorOf<V>> {
    const keyResult = tryPush(borrow(this), key);
    if (!keyResult.ok) {
      return { ok: false, error: { kind: 'key', error: keyResult.error } };
    }
    const keyGuard = keyResult.guard;
    requireSingleSlot(keyGuard, 'Table key');
    requireValidKey(keyGuard);

    let valueResult: PushResult<StateRef, PushErrorOf<V>>;
    try {
      valueResult = tryPush(borrow(this), value);
    } catch (err) {
      keyGuard.release();
      throw err;
    }
    if (!valueResult.ok) {
      keyGuard.release();
      return { ok: false, error: { kind: 'value', error: valueResult.error } };
    }
    requireSingleSlot(valueResult.guard, 'Table value', keyGuard);

    keyGuard.absorb(valueResult.guard);
    keyGuard.forget();
    lua.lua_rawset(this.state, this.index.get());
    return { ok: true };
  }

  /** Raw length (border of the sequence part) */
  length(): number {
    return lua.lua_rawlen(this.state, this.index.get());
  }

  /** Iterate entries; the iterator must be drained or closed before the table is used again */
  iter<K, V>(
    keyReader: LuaRead<K>,
    valueReader: LuaRead<V>
  ): LuaTableIterator<K, V> {
    return new LuaTableIterator(this, keyReader, valueReader);
  }

  /**
   * The table's metatable, created empty if it has none.
   * The returned table owns one slot and must be released before this one.
   */
  getOrCreateMetatable(): LuaTable {
    const state = this.state;
    const index = this.index.get();
    if (!lua.lua_getmetatable(state, index)) {
      lua.lua_createtable(state, 0, 0);
      lua.lua_setmetatable(state, index);
      lua.lua_getmetatable(state, index);
    }
    const slot = new PushGuard(borrow(this), 1);
    return new LuaTable(slot, AbsoluteIndex.resolve(slot, -1));
  }

  /** Store a new empty table at `key` and return it */
  emptyArray<K extends Pushable>(key: K & InfallibleCheck<K>): LuaTable {
    const state = this.state;
    lua.lua_createtable(state, 0, 0);
    const slot = new PushGuard(borrow(this), 1);

    let keyGuard: PushGuard<StateRef>;
    try {
      keyGuard = this.pushKey(key);
      requireValidKey(keyGuard);
    } catch (err) {
      slot.release();
      throw err;
    }
    lua.lua_pushvalue(state, -2);
    keyGuard.forget();
    lua.lua_rawset(state, this.index.get());
    return new LuaTable(slot, AbsoluteIndex.resolve(slot, -1));
  }

  /**
   * Call `table[name](table, ...args)`.
   * The method is looked up raw; a missing or non-function entry throws.
   */
  callMethod<T, A extends readonly Pushable[]>(
    name: string,
    reader: LuaRead<T>,
    ...args: A
  ): T {
    const state = this.state;
    const nameBytes = to_luastring(name);
    lua.lua_pushlstring(state, nameBytes, nameBytes.length);
    lua.lua_rawget(state, this.index.get());
    if (lua.lua_type(state, -1) !== lua.LUA_TFUNCTION) {
      lua.lua_pop(state, 1);
      throw new NoSuchMethodError(name);
    }
    const slot = new PushGuard(borrow(this), 1);
    const method = new LuaFunction(slot, AbsoluteIndex.resolve(slot, -1));
    return method.intoCallWith(reader, this, ...args);
  }

  private pushKey<K extends Pushable>(key: K): PushGuard<StateRef> {
    const result = tryPush(borrow(this), key);
    if (!result.ok) throw new PushError('key', result.error);
    requireSingleSlot(result.guard, 'Table key');
    return result.guard;
  }
}

/** One step of a table iteration */
export type TableEntry<K, V> =
  | { readonly decoded: true; readonly key: K; readonly value: V }
  | { readonly decoded: false };

/**
 * Stateful walk over a table with lua_next.
 *
 * While an iteration is in progress the current key sits on top of the
 * stack. Values decoded by retaining readers hold one more slot above it and
 * must be released before the next step.
 */
export class LuaTableIterator<K, V>
  implements IterableIterator<TableEntry<K, V>>
{
  private finished = false;
  private readonly lastTop: number;

  constructor(
    private readonly table: LuaTable,
    private readonly keyReader: LuaRead<K>,
    private readonly valueReader: LuaRead<V>
  ) {
    lua.lua_pushnil(table.state);
    this.lastTop = lua.lua_gettop(table.state);
  }

  [Symbol.iterator](): this {
    return this;
  }

  next(): IteratorResult<TableEntry<K, V>, undefined> {
    if (this.finished) return { done: true, value: undefined };

    const state = this.table.state;
    this.checkTop();

    if (!lua.lua_next(state, this.table.index.get())) {
      this.finished = true;
      return { done: true, value: undefined };
    }

    const valueSlot = new PushGuard(borrow(this.table), 1);
    const key = readAt(borrow(this.table), this.keyReader, -2);
    if (!key.ok) {
      valueSlot.release();
      return { done: false, value: { decoded: false } };
    }

    const value = readAt(valueSlot, this.valueReader, -1);
    if (!value.ok) {
      value.context.release();
      return { done: false, value: { decoded: false } };
    }
    return {
      done: false,
      value: { decoded: true, key: key.value, value: value.value },
    };
  }

  /** Stop early; pops the pending key */
  return(): IteratorResult<TableEntry<K, V>, undefined> {
    this.close();
    return { done: true, value: undefined };
  }

  close(): void {
    if (this.finished) return;
    this.checkTop();
    this.finished = true;
    lua.lua_pop(this.table.state, 1);
  }

  private checkTop(): void {
    const top = lua.lua_gettop(this.table.state);
    if (top !== this.lastTop) {
      throw new StackCorruptionError(this.lastTop, top);
    }
  }
}
