/**
 * Runtime Types
 *
 * Public types for runtime configuration, logging and observability.
 * These types are the primary interface for host applications.
 */

import type { Pushable } from './push.js';

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called when Lua code invokes print() */
  onLog: (message: string) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called after a Lua function returns successfully */
  onCall?: (event: CallEvent) => void;
  /** Called before a host function is invoked from Lua */
  onHostCall?: (event: HostCallEvent) => void;
  /** Called after a host function returns */
  onHostReturn?: (event: HostReturnEvent) => void;
  /** Called when an error occurs */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted after a Lua function returns */
export interface CallEvent {
  /** Number of argument slots pushed */
  arguments: number;
  /** Number of result slots produced */
  results: number;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted before a host function call */
export interface HostCallEvent {
  /** Function name */
  name: string;
  /** Lua type names of the arguments */
  args: string[];
}

/** Event emitted after a host function returns */
export interface HostReturnEvent {
  /** Function name */
  name: string;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted on error */
export interface ErrorEvent {
  /** The error that occurred */
  error: Error;
}

/** Standard libraries that can be opened on a state */
export type LuaLibName =
  | 'base'
  | 'coroutine'
  | 'table'
  | 'os'
  | 'string'
  | 'utf8'
  | 'math'
  | 'debug'
  | 'package';

/** Per-state settings shared by every context over that state */
export interface LuaRuntime {
  /** I/O callbacks */
  readonly callbacks: RuntimeCallbacks;
  /** Observability callbacks */
  readonly observability: ObservabilityCallbacks;
  /** Name given to chunks compiled from source text */
  readonly chunkName: string;
}

/** Options for creating a Lua instance */
export interface LuaOptions {
  /** Libraries to open ('all' by default) */
  libs?: 'all' | readonly LuaLibName[];
  /** Initial global variables */
  globals?: Record<string, Pushable>;
  /** I/O callbacks */
  callbacks?: Partial<RuntimeCallbacks>;
  /** Observability callbacks for monitoring execution */
  observability?: ObservabilityCallbacks;
  /** Chunk name used in diagnostics (default: "chunk") */
  chunkName?: string;
}
