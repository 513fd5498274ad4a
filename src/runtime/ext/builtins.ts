/**
 * Built-in Functions
 *
 * Globals installed on every state, replacing the standard library versions
 * that write to stdout directly.
 */

import { displayString, lua, type LuaNativeFunction } from '../core/ffi.js';
import type { LuaRuntime } from '../core/types.js';

export const BUILTIN_FUNCTIONS: Record<
  string,
  (runtime: LuaRuntime) => LuaNativeFunction
> = {
  /** print(...): tostring() each argument and pass the tab-joined line to onLog */
  print: (runtime) => (state) => {
    const parts: string[] = [];
    const top = lua.lua_gettop(state);
    for (let i = 1; i <= top; i++) {
      parts.push(displayString(state, i));
    }
    runtime.callbacks.onLog(parts.join('\t'));
    return 0;
  },
};
