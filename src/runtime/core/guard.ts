/**
 * Stack Guard
 *
 * Owns a number of slots at the top of the stack and pops them on release.
 */

import { StackCorruptionError } from '../../types.js';
import type { LuaContext } from './context.js';
import { lua } from './ffi.js';

/**
 * Ownership of `size` slots pushed onto `context`.
 *
 * The stack must be at the height recorded when the guard was created (or
 * last extended by `absorb`) when it is released; anything pushed above it
 * has to be released first.
 */
export class PushGuard<C extends LuaContext = LuaContext>
  implements LuaContext
{
  private readonly inner: C;
  private count: number;
  private expectedTop: number;
  private released = false;

  constructor(context: C, size: number) {
    this.inner = context;
    this.count = size;
    this.expectedTop = lua.lua_gettop(context.state);
  }

  get state() {
    return this.inner.state;
  }

  get runtime() {
    return this.inner.runtime;
  }

  /** The wrapped context */
  get context(): C {
    return this.inner;
  }

  /** Number of slots still owned */
  get size(): number {
    return this.count;
  }

  /** Stack height the guard expects to find on release */
  get top(): number {
    return this.expectedTop;
  }

  /**
   * Stop owning the slots and return how many there were.
   * The slots stay on the stack; releasing afterwards only releases the
   * wrapped context.
   */
  forget(): number {
    const size = this.count;
    this.count = 0;
    return size;
  }

  /** Forget exactly one slot; anything else is a programming error */
  assertOneAndForget(): void {
    if (this.count !== 1) {
      throw new TypeError(
        `Expected a single stack slot, guard holds ${this.count}`
      );
    }
    this.count = 0;
  }

  /**
   * Take over the slots of a guard pushed directly above this one.
   * `other` keeps its own context, which the caller still releases.
   */
  absorb(other: PushGuard): void {
    const top = other.top;
    this.count += other.forget();
    this.expectedTop = top;
  }

  /** Pop the owned slots, then release the wrapped context */
  release(): void {
    if (this.released) return;
    this.released = true;

    if (this.count > 0) {
      const actual = lua.lua_gettop(this.inner.state);
      if (actual !== this.expectedTop) {
        throw new StackCorruptionError(this.expectedTop, actual);
      }
      lua.lua_pop(this.inner.state, this.count);
      this.count = 0;
    }
    this.inner.release();
  }
}
