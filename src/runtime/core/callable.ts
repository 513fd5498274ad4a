/**
 * Host Callables
 *
 * Host functions exposed to Lua. Arguments are decoded with typed readers,
 * results are pushed back, and failures surface in Lua as ordinary errors
 * that protected calls can catch.
 */

import { StackCorruptionError } from '../../types.js';
import {
  AbsoluteIndex,
  StateRef,
  type LuaContext,
} from './context.js';
import type { LuaRuntime } from './types.js';
import { lua, to_luastring, typeName, type LuaState } from './ffi.js';
import {
  tryPush,
  type LuaPush,
  type Pushable,
  type PushOutcome,
} from './push.js';
import { readAt, type LuaRead } from './read.js';
import { tuple, type ReadValues } from './readers.js';

/** Message raised when arguments do not match the declared parameters */
export const WRONG_PARAMETERS_MESSAGE =
  'wrong parameter types for callback function';

/**
 * Host function body.
 * Returning undefined produces no results; use multi() for several.
 */
export type HostFunctionBody<P extends readonly LuaRead<unknown>[]> = (
  ...args: ReadValues<P>
) => Pushable | void;

function hasResults(value: Pushable | void): value is Pushable {
  return value !== undefined;
}

function argumentTypes(state: LuaState): string[] {
  const names: string[] = [];
  const top = lua.lua_gettop(state);
  for (let i = 1; i <= top; i++) names.push(typeName(state, i));
  return names;
}

/** A host function that can be pushed as a Lua closure */
export class HostFunction<P extends readonly LuaRead<unknown>[]>
  implements LuaPush<never>
{
  private readonly reader: LuaRead<ReadValues<P>>;

  constructor(
    params: P,
    private readonly fn: HostFunctionBody<P>,
    readonly name: string
  ) {
    this.reader = tuple<P>(...params);
  }

  pushToLua(context: LuaContext): PushOutcome<never> {
    const runtime = context.runtime;
    lua.lua_pushjsfunction(context.state, (state) =>
      this.invoke(state, runtime)
    );
    return { ok: true, size: 1 };
  }

  /**
   * Body of the Lua closure. Runs inside a Lua call frame whose arguments
   * start at position 1; returns the number of results pushed.
   */
  private invoke(state: LuaState, runtime: LuaRuntime): number {
    const frame = new StateRef(state, runtime);
    const { observability } = runtime;
    let failure: string | null = null;
    let results = 0;

    observability.onHostCall?.({ name: this.name, args: argumentTypes(state) });
    const startTime = performance.now();

    const args = readAt(frame, this.reader, AbsoluteIndex.resolve(frame, 1));
    if (!args.ok) {
      failure = WRONG_PARAMETERS_MESSAGE;
    } else {
      try {
        const result = this.fn(...args.value);
        if (hasResults(result)) {
          const pushed = tryPush(frame, result);
          if (pushed.ok) {
            results = pushed.guard.forget();
          } else {
            failure = `${this.name}: result could not be pushed`;
          }
        }
      } catch (err) {
        if (err instanceof StackCorruptionError) throw err;
        const error = err instanceof Error ? err : new Error(String(err));
        observability.onError?.({ error });
        failure = error.message;
      }
    }

    observability.onHostReturn?.({
      name: this.name,
      durationMs: performance.now() - startTime,
    });

    if (failure !== null) {
      // Raised outside the try block: lua_error unwinds by throwing
      const message = to_luastring(failure);
      lua.lua_pushlstring(state, message, message.length);
      return lua.lua_error(state);
    }
    return results;
  }
}

/**
 * Wrap a host function for pushing to Lua.
 *
 * @example
 * lua.set('add', hostFunction([int32, int32], (a, b) => a + b, 'add'));
 */
export function hostFunction<const P extends readonly LuaRead<unknown>[]>(
  params: P,
  fn: HostFunctionBody<P>,
  name = 'anonymous'
): HostFunction<P> {
  return new HostFunction(params, fn, name);
}
