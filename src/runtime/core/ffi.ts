/**
 * Interpreter Boundary
 *
 * The only module that touches fengari directly for stack inspection helpers.
 * Everything above this layer talks in terms of contexts, guards and positions.
 */

import fengari from 'fengari';
import type { lua_JSFunction, lua_State } from 'fengari';

export const { lua, lauxlib, lualib, to_luastring, to_jsstring } = fengari;

/** Raw interpreter state handle */
export type LuaState = lua_State;

/** Native function callable from Lua; returns the number of results pushed */
export type LuaNativeFunction = lua_JSFunction;

/**
 * True for negative indices counted from the top of the stack.
 * Pseudo-indices (registry, upvalues) are not relative.
 */
export function isRelativeIndex(index: number): boolean {
  return index < 0 && index > lua.LUA_REGISTRYINDEX;
}

/**
 * Dynamic type tag at a position.
 * Positions above the current top report LUA_TNONE without touching the VM.
 */
export function typeAt(state: LuaState, index: number): number {
  if (index > 0 && index > lua.lua_gettop(state)) {
    return lua.LUA_TNONE;
  }
  return lua.lua_type(state, index);
}

/** Lua type name of the value at a position ("number", "no value", ...) */
export function typeName(state: LuaState, index: number): string {
  return to_jsstring(lua.lua_typename(state, typeAt(state, index)));
}

/**
 * Join the type names of `count` consecutive values starting at an absolute
 * position: "()" for none, the bare name for one, "(a, b, c)" otherwise.
 */
export function typeNames(
  state: LuaState,
  start: number,
  count: number
): string {
  if (count === 0) return '()';
  if (count === 1) return typeName(state, start);

  const names: string[] = [];
  for (let i = start; i < start + count; i++) {
    names.push(typeName(state, i));
  }
  return `(${names.join(', ')})`;
}

/**
 * Decode Lua string bytes as UTF-8.
 * Returns undefined for byte sequences that are not valid UTF-8.
 */
export function decodeUtf8(bytes: Uint8Array): string | undefined {
  try {
    return to_jsstring(bytes);
  } catch (err) {
    if (err instanceof RangeError) return undefined;
    throw err;
  }
}

/**
 * Convert the value at a position to its display string (honours __tostring)
 * and leave the stack unchanged.
 */
export function displayString(state: LuaState, index: number): string {
  const text = to_jsstring(
    lauxlib.luaL_tolstring(state, index),
    undefined,
    undefined,
    true
  );
  lua.lua_pop(state, 1);
  return text;
}
