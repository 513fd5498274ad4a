/**
 * Context Handles
 *
 * Every operation on the stack goes through a LuaContext. Borrowed handles
 * (Lua, StateRef) release nothing; owned handles (guards, tables, functions)
 * pop their own slots and then release the context they wrap.
 */

import { isRelativeIndex, lua, type LuaState } from './ffi.js';
import type { LuaOptions, LuaRuntime, RuntimeCallbacks } from './types.js';

const defaultCallbacks: RuntimeCallbacks = {
  onLog: (message) => {
    console.log(message);
  },
};

/**
 * Resolve runtime settings from options.
 * Missing callbacks fall back to the defaults.
 */
export function createRuntime(options: LuaOptions = {}): LuaRuntime {
  return {
    callbacks: { ...defaultCallbacks, ...options.callbacks },
    observability: options.observability ?? {},
    chunkName: options.chunkName ?? 'chunk',
  };
}

/** Notify onError and hand the error back for throwing */
export function reportError<E extends Error>(runtime: LuaRuntime, error: E): E {
  runtime.observability.onError?.({ error });
  return error;
}

/** Access to one interpreter state */
export interface LuaContext {
  readonly state: LuaState;
  readonly runtime: LuaRuntime;
  /** Give back whatever this handle owns. Safe to call more than once. */
  release(): void;
}

/**
 * Non-owning view over a state.
 * Used for host callback frames and for sharing a context with a sub-operation.
 */
export class StateRef implements LuaContext {
  constructor(
    readonly state: LuaState,
    readonly runtime: LuaRuntime
  ) {}

  release(): void {
    // Borrowed: the owner keeps the stack
  }
}

/** View over the same state as `context` that releases nothing */
export function borrow(context: LuaContext): StateRef {
  return new StateRef(context.state, context.runtime);
}

/**
 * Stack position fixed at creation.
 * Relative indices are resolved against the top once, so later pushes do not
 * move what the position refers to. Pseudo-indices are kept as-is.
 */
export class AbsoluteIndex {
  private constructor(private readonly value: number) {}

  /** Resolve an index, throwing RangeError for 0 or a relative index below the bottom */
  static resolve(context: LuaContext, index: number): AbsoluteIndex {
    const resolved = AbsoluteIndex.tryResolve(context, index);
    if (resolved === null) {
      throw new RangeError(`Stack index ${index} cannot be resolved`);
    }
    return resolved;
  }

  static tryResolve(context: LuaContext, index: number): AbsoluteIndex | null {
    if (index === 0) return null;
    if (!isRelativeIndex(index)) return new AbsoluteIndex(index);

    const absolute = lua.lua_gettop(context.state) + index + 1;
    return absolute > 0 ? new AbsoluteIndex(absolute) : null;
  }

  get(): number {
    return this.value;
  }

  /** Position `count` slots above this one */
  offset(count: number): AbsoluteIndex {
    return count === 0 ? this : new AbsoluteIndex(this.value + count);
  }
}
