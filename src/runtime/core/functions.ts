/**
 * Callable Invocation
 *
 * Compiling chunks and calling Lua functions in protected mode.
 */

import {
  ExecutionError,
  LuaSyntaxError,
  PushError,
  ReadError,
  WrongTypeError,
} from '../../types.js';
import {
  AbsoluteIndex,
  borrow,
  reportError,
  type LuaContext,
} from './context.js';
import {
  displayString,
  lauxlib,
  lua,
  to_luastring,
  typeNames,
  type LuaState,
} from './ffi.js';
import { PushGuard } from './guard.js';
import {
  multi,
  tryPush,
  type LuaPush,
  type Pushable,
  type PushOutcome,
} from './push.js';
import { readAt, type LuaRead } from './read.js';

/**
 * Source of chunk text delivered piece by piece.
 * `read()` returns null at the end of the input.
 */
export interface ChunkReader {
  read(): string | Uint8Array | null;
}

function compileError(state: LuaState): LuaSyntaxError {
  const message = displayString(state, -1);
  lua.lua_pop(state, 1);
  return new LuaSyntaxError(message);
}

/** Source text that compiles to a function when pushed */
export class LuaCode implements LuaPush<LuaSyntaxError> {
  constructor(readonly source: string | Uint8Array) {}

  pushToLua(context: LuaContext): PushOutcome<LuaSyntaxError> {
    const state = context.state;
    const bytes =
      typeof this.source === 'string'
        ? to_luastring(this.source)
        : this.source;
    const status = lauxlib.luaL_loadbuffer(
      state,
      bytes,
      bytes.length,
      to_luastring(context.runtime.chunkName)
    );
    if (status !== lua.LUA_OK) {
      return { ok: false, error: compileError(state) };
    }
    return { ok: true, size: 1 };
  }
}

/** Chunk read incrementally from a ChunkReader */
export class LuaCodeFromReader
  implements LuaPush<LuaSyntaxError | ReadError>
{
  constructor(readonly reader: ChunkReader) {}

  pushToLua(context: LuaContext): PushOutcome<LuaSyntaxError | ReadError> {
    const state = context.state;
    const failures: ReadError[] = [];

    const status = lua.lua_load(
      state,
      () => {
        if (failures.length > 0) return null;
        try {
          const piece = this.reader.read();
          if (piece === null) return null;
          return typeof piece === 'string' ? to_luastring(piece) : piece;
        } catch (err) {
          failures.push(new ReadError(err));
          return null;
        }
      },
      null,
      to_luastring(context.runtime.chunkName),
      null
    );

    const failure = failures[0];
    if (failure !== undefined) {
      // Either the truncated chunk or its compile error is on the stack
      lua.lua_pop(state, 1);
      return { ok: false, error: failure };
    }
    if (status !== lua.LUA_OK) {
      return { ok: false, error: compileError(state) };
    }
    return { ok: true, size: 1 };
  }
}

/**
 * Handle to a function on the stack.
 * Owns its context: releasing the function releases whatever slots the
 * context holds (typically the function's own slot).
 */
export class LuaFunction implements LuaContext, LuaPush<never> {
  constructor(
    private readonly context: LuaContext,
    readonly index: AbsoluteIndex
  ) {}

  /** Compile source text into a function owning one slot on `context` */
  static load(context: LuaContext, code: string | Uint8Array): LuaFunction {
    return LuaFunction.compile(context, new LuaCode(code));
  }

  /** Compile a chunk supplied by a reader */
  static loadFromReader(
    context: LuaContext,
    reader: ChunkReader
  ): LuaFunction {
    return LuaFunction.compile(context, new LuaCodeFromReader(reader));
  }

  private static compile(
    context: LuaContext,
    code: LuaPush<LuaSyntaxError | ReadError>
  ): LuaFunction {
    const result = tryPush(context, code);
    if (!result.ok) throw reportError(context.runtime, result.error);
    return new LuaFunction(
      result.guard,
      AbsoluteIndex.resolve(result.guard, -1)
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

  /** Call without arguments; the handle stays usable */
  call<T>(reader: LuaRead<T>): T {
    return this.invoke(borrow(this), reader, []);
  }

  /** Call with arguments; the handle stays usable */
  callWith<T, A extends readonly Pushable[]>(
    reader: LuaRead<T>,
    ...args: A
  ): T {
    return this.invoke(borrow(this), reader, args);
  }

  /**
   * Call without arguments, consuming the handle.
   * A retained result keeps the function's slot until it is released.
   */
  intoCall<T>(reader: LuaRead<T>): T {
    return this.invoke(this, reader, []);
  }

  /** Call with arguments, consuming the handle */
  intoCallWith<T, A extends readonly Pushable[]>(
    reader: LuaRead<T>,
    ...args: A
  ): T {
    return this.invoke(this, reader, args);
  }

  /**
   * Protected call. `owner` ends up owned by the result slots: it is released
   * with them, on error, or when a retained result is released.
   */
  private invoke<T>(
    owner: LuaContext,
    reader: LuaRead<T>,
    args: readonly Pushable[]
  ): T {
    const state = this.state;
    const runtime = this.runtime;
    const startTime = performance.now();
    const base = lua.lua_gettop(state);

    lua.lua_pushvalue(state, this.index.get());
    const callee = new PushGuard(borrow(this), 1);

    const pushed = tryPush(borrow(this), multi(...args));
    if (!pushed.ok) {
      callee.release();
      owner.release();
      throw reportError(runtime, new PushError('argument', pushed.error));
    }
    const nargs = pushed.guard.forget();
    callee.forget();

    const status = lua.lua_pcall(state, nargs, lua.LUA_MULTRET, 0);
    if (status !== lua.LUA_OK) {
      const diagnostic = displayString(state, -1);
      lua.lua_pop(state, 1);
      owner.release();
      throw reportError(runtime, new ExecutionError(diagnostic));
    }

    const count = lua.lua_gettop(state) - base;
    const results = new PushGuard(owner, count);
    const result = readAt(results, reader, base + 1);
    if (!result.ok) {
      const actual = typeNames(state, base + 1, count);
      result.context.release();
      throw reportError(runtime, new WrongTypeError(reader.expected, actual));
    }

    runtime.observability.onCall?.({
      arguments: nargs,
      results: count,
      durationMs: performance.now() - startTime,
    });
    return result.value;
  }
}
