/**
 * Lua Runtime
 *
 * Public API for exchanging values with an embedded Lua state.
 *
 * Module Structure:
 * - core/: Marshalling layer
 *   - types.ts: Public types (LuaOptions, callbacks, events)
 *   - ffi.ts: fengari access and stack inspection helpers (internal)
 *   - context.ts: Context handles, positions, runtime factory
 *   - guard.ts: Stack guard
 *   - push.ts: Push capability and composite pushes
 *   - read.ts: Read capability
 *   - readers.ts: Built-in readers and combinators
 *   - values.ts: Any-value variant and formatting
 *   - tables.ts: Table accessor and iteration
 *   - functions.ts: Chunk loading and protected calls
 *   - callable.ts: Host functions exposed to Lua
 *   - lua.ts: The Lua instance
 * - ext/: Self-contained extensions
 *   - builtins.ts: Built-in functions (print)
 *   - chunk-readers.ts: File and string chunk readers
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  CallEvent,
  ErrorEvent,
  HostCallEvent,
  HostReturnEvent,
  LuaLibName,
  LuaOptions,
  LuaRuntime,
  ObservabilityCallbacks,
  RuntimeCallbacks,
} from './core/types.js';

// ============================================================
// CONTEXTS
// ============================================================

export type { LuaContext } from './core/context.js';
export {
  AbsoluteIndex,
  borrow,
  createRuntime,
  StateRef,
} from './core/context.js';
export type { LuaState } from './core/ffi.js';
export { PushGuard } from './core/guard.js';
export {
  Lua,
  isLuaLibName,
  LIBRARY_NAMES,
  type CheckedGlobalResult,
} from './core/lua.js';

// ============================================================
// PUSH
// ============================================================

export type {
  InfallibleCheck,
  LuaPush,
  MultiPushError,
  Pushable,
  PushErrorOf,
  PushOutcome,
  PushResult,
  TablePushError,
} from './core/push.js';
export {
  isLuaPush,
  multi,
  MultiValue,
  push,
  pushOne,
  tryPush,
  tryPushOne,
} from './core/push.js';

// ============================================================
// READ
// ============================================================

export type {
  Decoded,
  LuaRead,
  ReadResult,
  ReadType,
} from './core/read.js';
export { read, readAt } from './core/read.js';
export type { Either, ReadValues } from './core/readers.js';
export * as Read from './core/readers.js';

// ============================================================
// VALUES
// ============================================================

export type { AnyLuaValue, NativeValue } from './core/values.js';
export { formatValue, pushAny, toNative } from './core/values.js';

// ============================================================
// TABLES AND FUNCTIONS
// ============================================================

export type { CheckedSetResult, TableEntry } from './core/tables.js';
export { LuaTable, LuaTableIterator } from './core/tables.js';
export type { ChunkReader } from './core/functions.js';
export { LuaCode, LuaCodeFromReader, LuaFunction } from './core/functions.js';
export type { HostFunctionBody } from './core/callable.js';
export {
  HostFunction,
  hostFunction,
  WRONG_PARAMETERS_MESSAGE,
} from './core/callable.js';

// ============================================================
// EXTENSIONS
// ============================================================

export { FileChunkReader, stringChunks } from './ext/chunk-readers.js';
