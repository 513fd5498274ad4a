/**
 * Push Capability (host → stack)
 *
 * Host values are written to the stack through tryPush/push. Failures are
 * returned as values with the stack left at its original height; the error
 * type of a push is computed from the value's type, so pushes that cannot
 * fail have the error type `never`.
 */

import { PushError } from '../../types.js';
import { borrow, type LuaContext } from './context.js';
import { lua, to_luastring, type LuaState } from './ffi.js';
import { PushGuard } from './guard.js';

// ============================================================
// CONTRACT
// ============================================================

/** What a LuaPush implementation reports back */
export type PushOutcome<E> =
  | { readonly ok: true; readonly size: number }
  | { readonly ok: false; readonly error: E };

/**
 * Custom push behaviour.
 * On success exactly `size` slots have been pushed; on failure the stack is
 * as it was before the call.
 */
export interface LuaPush<E = never> {
  pushToLua(context: LuaContext): PushOutcome<E>;
}

/** Host values that can be written to the stack */
export type Pushable =
  | null
  | undefined
  | boolean
  | number
  | string
  | Uint8Array
  | LuaPush<unknown>
  | readonly Pushable[]
  | ReadonlyMap<Pushable, Pushable>
  | { readonly [key: string]: Pushable };

/** Failure while building a table: which half of an entry failed */
export type TablePushError<K, V = K> =
  | { readonly kind: 'key'; readonly error: K }
  | { readonly kind: 'value'; readonly error: V };

/** Failure in one of several values pushed together */
export interface MultiPushError<E> {
  /** 0-based position of the value that failed */
  readonly position: number;
  readonly error: E;
}

type Wrapped<E> = [E] extends [never] ? never : TablePushError<E>;

type PushErrorOfValue<T> = T extends
  | null
  | undefined
  | boolean
  | number
  | string
  | Uint8Array
  ? never
  : T extends LuaPush<infer E>
    ? E
    : T extends ReadonlyMap<infer K, infer V>
      ? Wrapped<PushErrorOf<K> | PushErrorOf<V>>
      : T extends readonly (infer U)[]
        ? Wrapped<PushErrorOf<U>>
        : T extends { readonly [key: string]: infer U }
          ? Wrapped<PushErrorOf<U>>
          : unknown;

/**
 * Error type of pushing a T.
 * The open Pushable type itself can fail in any way.
 */
export type PushErrorOf<T> = Pushable extends T
  ? unknown
  : PushErrorOfValue<T>;

/** Resolves to `never` for values whose push can fail */
export type InfallibleCheck<T> = [PushErrorOf<T>] extends [never]
  ? unknown
  : never;

export type PushResult<C extends LuaContext, E> =
  | { readonly ok: true; readonly guard: PushGuard<C> }
  | { readonly ok: false; readonly error: E; readonly context: C };

// ============================================================
// ENTRY POINTS
// ============================================================

/**
 * Push a value, returning a guard over the written slots or the error
 * together with the untouched context.
 */
export function tryPush<C extends LuaContext, T extends Pushable>(
  context: C,
  value: T
): PushResult<C, PushErrorOf<T>> {
  const outcome = pushValue(context, value);
  if (!outcome.ok) {
    // The error's static type is derived from T; pushValue works on the open type
    return { ok: false, error: outcome.error as PushErrorOf<T>, context };
  }
  return { ok: true, guard: new PushGuard(context, outcome.size) };
}

/** Push a value whose type cannot fail */
export function push<C extends LuaContext, T extends Pushable>(
  context: C,
  value: T & InfallibleCheck<T>
): PushGuard<C> {
  const result = tryPush<C, T>(context, value);
  if (!result.ok) throw new PushError('value', result.error);
  return result.guard;
}

/** tryPush for values that must occupy exactly one slot */
export function tryPushOne<C extends LuaContext, T extends Pushable>(
  context: C,
  value: T
): PushResult<C, PushErrorOf<T>> {
  const result = tryPush(context, value);
  if (result.ok) requireSingleSlot(result.guard, 'Value');
  return result;
}

/** push for values that must occupy exactly one slot */
export function pushOne<C extends LuaContext, T extends Pushable>(
  context: C,
  value: T & InfallibleCheck<T>
): PushGuard<C> {
  const guard = push<C, T>(context, value);
  requireSingleSlot(guard, 'Value');
  return guard;
}

export function isLuaPush(value: unknown): value is LuaPush<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'pushToLua' in value &&
    typeof value.pushToLua === 'function'
  );
}

// ============================================================
// MULTIPLE VALUES
// ============================================================

type MultiErrorOf<T extends readonly Pushable[]> = [
  PushErrorOf<T[number]>,
] extends [never]
  ? never
  : MultiPushError<PushErrorOf<T[number]>>;

/**
 * Several values pushed as consecutive slots.
 * Used for call arguments and for host function results.
 */
export class MultiValue<T extends readonly Pushable[]>
  implements LuaPush<MultiErrorOf<T>>
{
  constructor(readonly values: T) {}

  pushToLua(context: LuaContext): PushOutcome<MultiErrorOf<T>> {
    const all = new PushGuard(borrow(context), 0);
    for (const [position, value] of this.values.entries()) {
      const result = tryPush(borrow(context), value);
      if (!result.ok) {
        all.release();
        const error: MultiPushError<unknown> = {
          position,
          error: result.error,
        };
        // A failure can only occur when some element's error type is not never
        return { ok: false, error: error as MultiErrorOf<T> };
      }
      all.absorb(result.guard);
    }
    return { ok: true, size: all.forget() };
  }
}

export function multi<T extends readonly Pushable[]>(
  ...values: T
): MultiValue<T> {
  return new MultiValue(values);
}

// ============================================================
// TABLE HELPERS
// ============================================================

/**
 * Throw when a guard does not hold exactly one slot.
 * The guard and then each of `outer` are released first, innermost first.
 * @internal
 */
export function requireSingleSlot(
  guard: PushGuard,
  role: string,
  ...outer: PushGuard[]
): void {
  if (guard.size === 1) return;
  const size = guard.size;
  guard.release();
  for (const owner of outer) owner.release();
  throw new TypeError(`${role} must occupy exactly one stack slot, got ${size}`);
}

/**
 * Whether the value on top of the stack is nil or NaN, which Lua does not
 * accept as a table key.
 * @internal
 */
export function isInvalidKey(state: LuaState): boolean {
  const type = lua.lua_type(state, -1);
  return (
    type === lua.LUA_TNIL ||
    (type === lua.LUA_TNUMBER && Number.isNaN(lua.lua_tonumber(state, -1)))
  );
}

/**
 * Throw when the key on top of the stack is nil or NaN.
 * @internal
 */
export function requireValidKey(key: PushGuard, ...outer: PushGuard[]): void {
  if (!isInvalidKey(key.state)) return;

  key.release();
  for (const owner of outer) owner.release();
  throw new TypeError('Table keys cannot be nil or NaN');
}

// ============================================================
// VALUE DISPATCH
// ============================================================

const ONE_SLOT: PushOutcome<never> = { ok: true, size: 1 };

function isInt32(value: number): boolean {
  return (value | 0) === value && !Object.is(value, -0);
}

function isSequence(value: Pushable): value is readonly Pushable[] {
  return Array.isArray(value);
}

function isMapping(value: Pushable): value is ReadonlyMap<Pushable, Pushable> {
  return value instanceof Map;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function pushValue(context: LuaContext, value: Pushable): PushOutcome<unknown> {
  const state = context.state;

  if (value === null || value === undefined) {
    lua.lua_pushnil(state);
    return ONE_SLOT;
  }
  if (typeof value === 'boolean') {
    lua.lua_pushboolean(state, value);
    return ONE_SLOT;
  }
  if (typeof value === 'number') {
    if (isInt32(value)) {
      lua.lua_pushinteger(state, value);
    } else {
      lua.lua_pushnumber(state, value);
    }
    return ONE_SLOT;
  }
  if (typeof value === 'string') {
    const bytes = to_luastring(value);
    lua.lua_pushlstring(state, bytes, bytes.length);
    return ONE_SLOT;
  }
  if (value instanceof Uint8Array) {
    lua.lua_pushlstring(state, value, value.length);
    return ONE_SLOT;
  }
  if (isLuaPush(value)) {
    return value.pushToLua(context);
  }
  if (isSequence(value)) {
    return pushSequence(context, value);
  }
  if (isMapping(value)) {
    return pushEntries(context, value.entries(), value.size);
  }
  if (!isPlainObject(value)) {
    throw new TypeError(
      `Cannot push ${Object.prototype.toString.call(value)} to Lua`
    );
  }
  const entries = Object.entries(value);
  return pushEntries(context, entries, entries.length);
}

type TableOutcome = PushOutcome<TablePushError<unknown>>;

/**
 * Run the steps of a composite push. A throw from any nesting level
 * truncates the stack back to `base` before it propagates.
 */
function unwindOnThrow<T>(state: LuaState, base: number, steps: () => T): T {
  try {
    return steps();
  } catch (err) {
    lua.lua_settop(state, base);
    throw err;
  }
}

function pushSequence(
  context: LuaContext,
  items: readonly Pushable[]
): TableOutcome {
  const state = context.state;
  const base = lua.lua_gettop(state);
  lua.lua_createtable(state, items.length, 0);
  const table = new PushGuard(borrow(context), 1);

  return unwindOnThrow<TableOutcome>(state, base, () => {
    for (const [i, item] of items.entries()) {
      const element = tryPush(borrow(context), item);
      if (!element.ok) {
        table.release();
        return { ok: false, error: { kind: 'value', error: element.error } };
      }
      requireSingleSlot(element.guard, 'Table element');
      element.guard.forget();
      lua.lua_rawseti(state, -2, i + 1);
    }
    return { ok: true, size: table.forget() };
  });
}

function pushEntries(
  context: LuaContext,
  entries: Iterable<readonly [Pushable, Pushable]>,
  count: number
): TableOutcome {
  const state = context.state;
  const base = lua.lua_gettop(state);
  lua.lua_createtable(state, 0, count);
  const table = new PushGuard(borrow(context), 1);

  return unwindOnThrow<TableOutcome>(state, base, () => {
    for (const [k, v] of entries) {
      const key = tryPush(borrow(context), k);
      if (!key.ok) {
        table.release();
        return { ok: false, error: { kind: 'key', error: key.error } };
      }
      requireSingleSlot(key.guard, 'Table key');
      requireValidKey(key.guard);

      const value = tryPush(borrow(context), v);
      if (!value.ok) {
        key.guard.release();
        table.release();
        return { ok: false, error: { kind: 'value', error: value.error } };
      }
      requireSingleSlot(value.guard, 'Table value');

      key.guard.absorb(value.guard);
      key.guard.forget();
      lua.lua_rawset(state, -3);
    }
    return { ok: true, size: table.forget() };
  });
}
