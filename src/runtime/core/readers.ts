/**
 * Built-in Readers
 *
 * Decoders for scalars, text, handles and the combinators built from them.
 * Numbers are never coerced from strings and strings never from numbers.
 */

import { AbsoluteIndex, borrow, type LuaContext } from './context.js';
import { decodeUtf8, lua, typeAt, type LuaState } from './ffi.js';
import { LuaFunction } from './functions.js';
import {
  decoded,
  NOT_DECODED,
  type Decoded,
  type LuaRead,
  type ReadType,
} from './read.js';
import { LuaTable } from './tables.js';

export { anyValue } from './values.js';

// ============================================================
// SCALARS
// ============================================================

/** Reader over a single slot that never retains its context */
function scalar<T>(
  expected: string,
  decodeSlot: (state: LuaState, index: number) => T | undefined
): LuaRead<T> {
  return {
    expected,
    nValues: 1,
    decode(context: LuaContext, index: AbsoluteIndex): Decoded<T> {
      const value = decodeSlot(context.state, index.get());
      return value === undefined ? NOT_DECODED : decoded(value);
    },
  };
}

function numeric(
  expected: string,
  accept: (value: number) => boolean
): LuaRead<number> {
  return scalar(expected, (state, index) => {
    if (typeAt(state, index) !== lua.LUA_TNUMBER) return undefined;
    const value = lua.lua_tonumber(state, index);
    return accept(value) ? value : undefined;
  });
}

function integral(min: number, max: number): (value: number) => boolean {
  return (value) => Number.isInteger(value) && value >= min && value <= max;
}

export const number = numeric('number', () => true);
export const float32 = numeric(
  'float32',
  (value) => Number.isNaN(value) || Math.fround(value) === value
);
export const int8 = numeric('int8', integral(-0x80, 0x7f));
export const int16 = numeric('int16', integral(-0x8000, 0x7fff));
export const int32 = numeric('int32', integral(-0x80000000, 0x7fffffff));
export const uint8 = numeric('uint8', integral(0, 0xff));
export const uint16 = numeric('uint16', integral(0, 0xffff));
export const uint32 = numeric('uint32', integral(0, 0xffffffff));
/** Any integral number a double holds exactly */
export const integer = numeric('integer', Number.isSafeInteger);

export const boolean = scalar('boolean', (state, index) =>
  typeAt(state, index) === lua.LUA_TBOOLEAN
    ? lua.lua_toboolean(state, index)
    : undefined
);

export const trueValue = scalar<true>('true', (state, index) =>
  typeAt(state, index) === lua.LUA_TBOOLEAN && lua.lua_toboolean(state, index)
    ? true
    : undefined
);

export const falseValue = scalar<false>('false', (state, index) =>
  typeAt(state, index) === lua.LUA_TBOOLEAN && !lua.lua_toboolean(state, index)
    ? false
    : undefined
);

/** Lua strings holding valid UTF-8 */
export const string = scalar('string', (state, index) => {
  if (typeAt(state, index) !== lua.LUA_TSTRING) return undefined;
  const bytes = lua.lua_tolstring(state, index);
  return bytes === null ? undefined : decodeUtf8(bytes);
});

/** Lua strings as raw bytes (copied) */
export const bytes = scalar('bytes', (state, index) => {
  if (typeAt(state, index) !== lua.LUA_TSTRING) return undefined;
  const value = lua.lua_tolstring(state, index);
  return value === null ? undefined : value.slice();
});

/** nil or an absent value */
export const nil = scalar<null>('nil', (state, index) => {
  const type = typeAt(state, index);
  return type === lua.LUA_TNIL || type === lua.LUA_TNONE ? null : undefined;
});

/** Consumes nothing and always succeeds */
export const nothing: LuaRead<void> = {
  expected: '()',
  nValues: 0,
  decode: () => decoded(undefined),
};

// ============================================================
// HANDLES
// ============================================================

export const table: LuaRead<LuaTable> = {
  expected: 'table',
  nValues: 1,
  decode(context, index) {
    if (typeAt(context.state, index.get()) !== lua.LUA_TTABLE) {
      return NOT_DECODED;
    }
    return { ok: true, value: new LuaTable(context, index), retained: true };
  },
};

export const func: LuaRead<LuaFunction> = {
  expected: 'function',
  nValues: 1,
  decode(context, index) {
    if (typeAt(context.state, index.get()) !== lua.LUA_TFUNCTION) {
      return NOT_DECODED;
    }
    return {
      ok: true,
      value: new LuaFunction(context, index),
      retained: true,
    };
  },
};

// ============================================================
// COMBINATORS
// ============================================================

/** Value or null when `reader` does not match */
export function optional<T>(reader: LuaRead<T>): LuaRead<T | null> {
  return {
    expected: `${reader.expected} | null`,
    nValues: reader.nValues,
    decode(context, index) {
      const result = reader.decode(context, index);
      return result.ok ? result : decoded(null);
    },
  };
}

export type Either<A, B> =
  | { readonly side: 'left'; readonly value: A }
  | { readonly side: 'right'; readonly value: B };

/** First reader that matches, tagged with the side it came from */
export function either<A, B>(
  left: LuaRead<A>,
  right: LuaRead<B>
): LuaRead<Either<A, B>> {
  return {
    expected: `either<${left.expected}, ${right.expected}>`,
    nValues: Math.max(left.nValues, right.nValues),
    decode(context, index) {
      const first = left.decode(context, index);
      if (first.ok) {
        return {
          ok: true,
          value: { side: 'left', value: first.value },
          retained: first.retained,
        };
      }
      const second = right.decode(context, index);
      if (second.ok) {
        return {
          ok: true,
          value: { side: 'right', value: second.value },
          retained: second.retained,
        };
      }
      return NOT_DECODED;
    },
  };
}

/** Host values produced by a list of readers */
export type ReadValues<P extends readonly LuaRead<unknown>[]> = {
  -readonly [K in keyof P]: ReadType<P[K]>;
};

/**
 * Consecutive values, each read at its own offset from the first position.
 * Components are decoded over borrowed views; if any of them retains, the
 * first retaining component is decoded again over the real context so that
 * it owns it.
 */
export function tuple<const P extends readonly LuaRead<unknown>[]>(
  ...readers: P
): LuaRead<ReadValues<P>> {
  const nValues = readers.reduce((sum, reader) => sum + reader.nValues, 0);
  return {
    expected: `(${readers.map((reader) => reader.expected).join(', ')})`,
    nValues,
    decode(context, index) {
      const values: unknown[] = [];
      let owner: { position: number; at: AbsoluteIndex } | null = null;
      let offset = 0;

      for (const [position, reader] of readers.entries()) {
        const at = index.offset(offset);
        const result = reader.decode(borrow(context), at);
        if (!result.ok) return NOT_DECODED;
        if (result.retained && owner === null) owner = { position, at };
        values.push(result.value);
        offset += reader.nValues;
      }

      if (owner !== null) {
        const result = readers[owner.position]?.decode(context, owner.at);
        if (result === undefined || !result.ok) return NOT_DECODED;
        values[owner.position] = result.value;
      }

      // Each element was produced by the reader at the same position in P
      return {
        ok: true,
        value: values as ReadValues<P>,
        retained: owner !== null,
      };
    },
  };
}

/**
 * Walk the entries of the table at `index`, calling `visit` with the key at
 * -2 and the value at -1. Stops early when `visit` returns false. The stack
 * is restored either way.
 */
function eachEntry(
  state: LuaState,
  index: number,
  visit: () => boolean
): boolean {
  lua.lua_pushnil(state);
  while (lua.lua_next(state, index)) {
    if (!visit()) {
      lua.lua_pop(state, 2);
      return false;
    }
    lua.lua_pop(state, 1);
  }
  return true;
}

/** Decode the value on top of the stack; retaining readers do not match */
function decodeTop<T>(context: LuaContext, reader: LuaRead<T>): Decoded<T> {
  const result = reader.decode(
    borrow(context),
    AbsoluteIndex.resolve(context, -1)
  );
  return result.ok && !result.retained ? result : NOT_DECODED;
}

/** Tables whose keys are exactly 1..n, every element decoding with `reader` */
export function array<T>(reader: LuaRead<T>): LuaRead<T[]> {
  return {
    expected: `${reader.expected}[]`,
    nValues: 1,
    decode(context, index) {
      const state = context.state;
      const at = index.get();
      if (typeAt(state, at) !== lua.LUA_TTABLE) return NOT_DECODED;

      let count = 0;
      eachEntry(state, at, () => {
        count++;
        return true;
      });

      const items: T[] = [];
      for (let i = 1; i <= count; i++) {
        const present = lua.lua_rawgeti(state, at, i) !== lua.LUA_TNIL;
        const item = present ? decodeTop(context, reader) : NOT_DECODED;
        lua.lua_pop(state, 1);
        if (!item.ok) return NOT_DECODED;
        items.push(item.value);
      }
      return decoded(items);
    },
  };
}

/** Tables with string keys, every value decoding with `reader` */
export function record<T>(reader: LuaRead<T>): LuaRead<Map<string, T>> {
  return {
    expected: `record<${reader.expected}>`,
    nValues: 1,
    decode(context, index) {
      const state = context.state;
      const at = index.get();
      if (typeAt(state, at) !== lua.LUA_TTABLE) return NOT_DECODED;

      const entries = new Map<string, T>();
      const complete = eachEntry(state, at, () => {
        if (lua.lua_type(state, -2) !== lua.LUA_TSTRING) return false;
        const keyBytes = lua.lua_tolstring(state, -2);
        const key = keyBytes === null ? undefined : decodeUtf8(keyBytes);
        const value = decodeTop(context, reader);
        if (key === undefined || !value.ok) return false;
        entries.set(key, value.value);
        return true;
      });
      return complete ? decoded(entries) : NOT_DECODED;
    },
  };
}

/**
 * Every value from the position up to the top of the stack.
 * Consumes a variable number of slots, so it is meant for call results and
 * the tail of host function arguments.
 */
export function rest<T>(reader: LuaRead<T>): LuaRead<T[]> {
  return {
    expected: `${reader.expected}...`,
    nValues: 0,
    decode(context, index) {
      const values: T[] = [];
      const top = lua.lua_gettop(context.state);
      if (index.get() < 0) return NOT_DECODED;
      for (let at = index; at.get() <= top; at = at.offset(reader.nValues)) {
        const result = reader.decode(borrow(context), at);
        if (!result.ok || result.retained) return NOT_DECODED;
        values.push(result.value);
        if (reader.nValues === 0) break;
      }
      return decoded(values);
    },
  };
}
