/**
 * Any-Value Variant
 *
 * A host-side snapshot of an arbitrary Lua value, plus formatting helpers
 * used by the CLI.
 */

import type { AbsoluteIndex, LuaContext } from './context.js';
import {
  decodeUtf8,
  lua,
  to_jsstring,
  typeAt,
  typeName,
  type LuaState,
} from './ffi.js';
import {
  tryPush,
  type LuaPush,
  type Pushable,
  type PushOutcome,
} from './push.js';
import { decoded, NOT_DECODED, type LuaRead } from './read.js';

export type AnyLuaValue =
  | { readonly kind: 'nil' }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | {
      readonly kind: 'number';
      readonly value: number;
      readonly integer: boolean;
    }
  | { readonly kind: 'string'; readonly value: string }
  /** Strings that are not valid UTF-8 */
  | { readonly kind: 'bytes'; readonly value: Uint8Array }
  | {
      readonly kind: 'table';
      readonly entries: ReadonlyArray<readonly [AnyLuaValue, AnyLuaValue]>;
    }
  /** Functions, userdata and threads, which have no host representation */
  | { readonly kind: 'other'; readonly typeName: string };

export const NIL: AnyLuaValue = { kind: 'nil' };

// ============================================================
// READ
// ============================================================

/**
 * Snapshot the value at `index`.
 * Returns undefined for tables that contain themselves.
 */
function snapshot(
  state: LuaState,
  index: number,
  visiting: Set<unknown>
): AnyLuaValue | undefined {
  const type = typeAt(state, index);
  switch (type) {
    case lua.LUA_TNIL:
    case lua.LUA_TNONE:
      return NIL;
    case lua.LUA_TBOOLEAN:
      return { kind: 'boolean', value: lua.lua_toboolean(state, index) };
    case lua.LUA_TNUMBER:
      return {
        kind: 'number',
        value: lua.lua_tonumber(state, index),
        integer: lua.lua_isinteger(state, index),
      };
    case lua.LUA_TSTRING: {
      const bytes = lua.lua_tolstring(state, index);
      if (bytes === null) return undefined;
      const text = decodeUtf8(bytes);
      return text === undefined
        ? { kind: 'bytes', value: bytes.slice() }
        : { kind: 'string', value: text };
    }
    case lua.LUA_TTABLE:
      return snapshotTable(state, index, visiting);
    default:
      return { kind: 'other', typeName: typeName(state, index) };
  }
}

function snapshotTable(
  state: LuaState,
  index: number,
  visiting: Set<unknown>
): AnyLuaValue | undefined {
  const identity = lua.lua_topointer(state, index);
  if (visiting.has(identity)) return undefined;
  visiting.add(identity);

  const entries: (readonly [AnyLuaValue, AnyLuaValue])[] = [];
  lua.lua_pushnil(state);
  while (lua.lua_next(state, index)) {
    const top = lua.lua_gettop(state);
    const key = snapshot(state, top - 1, visiting);
    const value = snapshot(state, top, visiting);
    if (key === undefined || value === undefined) {
      lua.lua_pop(state, 2);
      return undefined;
    }
    entries.push([key, value]);
    lua.lua_pop(state, 1);
  }

  visiting.delete(identity);
  return { kind: 'table', entries };
}

/** Any value; fails only for self-referencing tables */
export const anyValue: LuaRead<AnyLuaValue> = {
  expected: 'any',
  nValues: 1,
  decode(context: LuaContext, index: AbsoluteIndex) {
    const value = snapshot(context.state, index.get(), new Set());
    return value === undefined ? NOT_DECODED : decoded(value);
  },
};

// ============================================================
// PUSH
// ============================================================

function toPushable(value: AnyLuaValue): Pushable {
  switch (value.kind) {
    case 'nil':
    case 'other':
      return null;
    case 'boolean':
    case 'string':
    case 'bytes':
      return value.value;
    case 'number':
      return value.integer ? value.value : new FloatValue(value.value);
    case 'table':
      return new Map(
        value.entries
          .filter(([k]) => isPushableKey(k))
          .map(([k, v]): [Pushable, Pushable] => [
            toPushable(k),
            toPushable(v),
          ])
      );
  }
}

/** Keys that would push as nil or NaN have no place in a table */
function isPushableKey(key: AnyLuaValue): boolean {
  switch (key.kind) {
    case 'nil':
    case 'other':
      return false;
    case 'number':
      return !Number.isNaN(key.value);
    default:
      return true;
  }
}

/** Number pushed as a float even when it is integral */
class FloatValue implements LuaPush<never> {
  constructor(readonly value: number) {}

  pushToLua(context: LuaContext): PushOutcome<never> {
    lua.lua_pushnumber(context.state, this.value);
    return { ok: true, size: 1 };
  }
}

/**
 * Push a snapshot back as a fresh value.
 * Variants without a host representation are pushed as nil; table entries
 * keyed by one are left out.
 */
export function pushAny(value: AnyLuaValue): LuaPush<never> {
  return {
    pushToLua(context: LuaContext): PushOutcome<never> {
      const result = tryPush(context, toPushable(value));
      if (!result.ok) {
        throw new TypeError('Snapshot values always push');
      }
      return { ok: true, size: result.guard.forget() };
    },
  };
}

// ============================================================
// FORMATTING
// ============================================================

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function formatNumber(value: number, integer: boolean): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  if (integer) return String(value);
  return Number.isInteger(value) ? `${value}.0` : String(value);
}

function formatBytes(value: Uint8Array): string {
  return to_jsstring(value, undefined, undefined, true);
}

/** Sort order: numbers ascending, then strings, then everything else */
function keyRank(key: AnyLuaValue): number {
  if (key.kind === 'number') return 0;
  if (key.kind === 'string') return 1;
  return 2;
}

function compareKeys(a: AnyLuaValue, b: AnyLuaValue): number {
  const rank = keyRank(a) - keyRank(b);
  if (rank !== 0) return rank;
  if (a.kind === 'number' && b.kind === 'number') return a.value - b.value;
  if (a.kind === 'string' && b.kind === 'string') {
    return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  }
  return 0;
}

function formatNested(value: AnyLuaValue): string {
  return value.kind === 'string'
    ? JSON.stringify(value.value)
    : formatValue(value);
}

function formatKey(key: AnyLuaValue): string {
  if (key.kind === 'string' && IDENTIFIER.test(key.value)) return key.value;
  return `[${formatNested(key)}]`;
}

/**
 * Format a value for display.
 * Top-level strings are printed raw; tables list their sequence part in order
 * followed by the remaining keys, numbers first.
 */
export function formatValue(value: AnyLuaValue): string {
  switch (value.kind) {
    case 'nil':
      return 'nil';
    case 'boolean':
      return String(value.value);
    case 'number':
      return formatNumber(value.value, value.integer);
    case 'string':
      return value.value;
    case 'bytes':
      return formatBytes(value.value);
    case 'other':
      return value.typeName;
    case 'table': {
      const sorted = [...value.entries].sort(([a], [b]) => compareKeys(a, b));
      const parts: string[] = [];
      let next = 1;
      for (const [key, item] of sorted) {
        if (key.kind === 'number' && key.value === next) {
          parts.push(formatNested(item));
          next++;
        } else {
          parts.push(`${formatKey(key)} = ${formatNested(item)}`);
        }
      }
      return parts.length === 0 ? '{}' : `{${parts.join(', ')}}`;
    }
  }
}

export type NativeValue =
  | null
  | boolean
  | number
  | string
  | NativeValue[]
  | { [key: string]: NativeValue };

/**
 * Convert to plain JSON-compatible data.
 * Tables whose keys are exactly 1..n become arrays, others objects.
 */
export function toNative(value: AnyLuaValue): NativeValue {
  switch (value.kind) {
    case 'nil':
      return null;
    case 'boolean':
    case 'string':
      return value.value;
    case 'number':
      return Number.isFinite(value.value)
        ? value.value
        : formatNumber(value.value, value.integer);
    case 'bytes':
      return formatBytes(value.value);
    case 'other':
      return `<${value.typeName}>`;
    case 'table': {
      const isSequence = value.entries.every(
        ([key]) =>
          key.kind === 'number' &&
          Number.isInteger(key.value) &&
          key.value >= 1 &&
          key.value <= value.entries.length
      );
      if (isSequence && value.entries.length > 0) {
        const items: NativeValue[] = new Array<NativeValue>(
          value.entries.length
        ).fill(null);
        for (const [key, item] of value.entries) {
          if (key.kind === 'number') items[key.value - 1] = toNative(item);
        }
        return items;
      }
      const result: { [key: string]: NativeValue } = {};
      for (const [key, item] of value.entries) {
        result[formatValue(key)] = toNative(item);
      }
      return result;
    }
  }
}
