/**
 * Read Capability (stack → host)
 *
 * A LuaRead<T> inspects one or more slots starting at a resolved position
 * and produces a T without changing the stack height. Readers that hand out
 * handles into the stack (tables, functions) keep the context alive; all
 * others let it go as soon as the value is decoded.
 */

import { AbsoluteIndex, type LuaContext } from './context.js';
import { lua } from './ffi.js';

/** Outcome of a single decode attempt */
export type Decoded<T> =
  | {
      readonly ok: true;
      readonly value: T;
      /** The value took over the context passed to decode() */
      readonly retained: boolean;
    }
  | { readonly ok: false };

export interface LuaRead<T> {
  /** Type descriptor used in WrongTypeError messages */
  readonly expected: string;
  /** Number of consecutive slots the reader consumes */
  readonly nValues: number;
  decode(context: LuaContext, index: AbsoluteIndex): Decoded<T>;
}

/** Host type produced by a reader */
export type ReadType<R> = R extends LuaRead<infer T> ? T : never;

export type ReadResult<T, C> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly context: C };

/**
 * Decode the value(s) at `index`.
 * On success the context is released unless the value retains it; on failure
 * the context comes back unchanged so another reader can be tried.
 */
export function readAt<T, C extends LuaContext>(
  context: C,
  reader: LuaRead<T>,
  index: number | AbsoluteIndex
): ReadResult<T, C> {
  const position =
    index instanceof AbsoluteIndex
      ? index
      : AbsoluteIndex.tryResolve(context, index);
  if (position === null) return { ok: false, context };

  const decoded = reader.decode(context, position);
  if (!decoded.ok) return { ok: false, context };
  if (!decoded.retained) context.release();
  return { ok: true, value: decoded.value };
}

/** Decode the top `reader.nValues` slots */
export function read<T, C extends LuaContext>(
  context: C,
  reader: LuaRead<T>
): ReadResult<T, C> {
  if (reader.nValues === 0) {
    return readAt(context, reader, lua.lua_gettop(context.state) + 1);
  }
  return readAt(context, reader, -reader.nValues);
}

/** A successful decode that does not hold on to the context */
export function decoded<T>(value: T): Decoded<T> {
  return { ok: true, value, retained: false };
}

export const NOT_DECODED: Decoded<never> = { ok: false };
