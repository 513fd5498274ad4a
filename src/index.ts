/**
 * lua-stack-bridge
 * Typed marshalling between TypeScript and an embedded Lua state
 */

export * from './runtime/index.js';

export type { LuaErrorCode, LuaErrorData, PushTarget } from './types.js';
export {
  ConfigError,
  ExecutionError,
  LUA_ERROR_CODES,
  LuaBridgeError,
  LuaSyntaxError,
  NoSuchMethodError,
  PushError,
  ReadError,
  StackCorruptionError,
  WrongTypeError,
} from './types.js';
