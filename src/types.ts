/**
 * Bridge Error Types
 *
 * Errors raised by evaluation, function calls and configuration loading.
 * Push and read operations report failure as values instead (see push.ts, read.ts).
 */

// ============================================================
// ERROR HIERARCHY
// ============================================================

/** Error codes for programmatic handling */
export const LUA_ERROR_CODES = {
  // Interpreter errors
  SYNTAX: 'LUA_SYNTAX',
  EXECUTION: 'LUA_EXECUTION',
  READ: 'LUA_READ',
  WRONG_TYPE: 'LUA_WRONG_TYPE',

  // Marshalling errors
  PUSH: 'LUA_PUSH',
  NO_SUCH_METHOD: 'LUA_NO_SUCH_METHOD',
  STACK_CORRUPT: 'LUA_STACK_CORRUPT',

  // Host configuration errors
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type LuaErrorCode =
  (typeof LUA_ERROR_CODES)[keyof typeof LUA_ERROR_CODES];

/** Structured error data for host applications */
export interface LuaErrorData {
  readonly code: LuaErrorCode;
  readonly message: string;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Base error class for all bridge errors.
 * Provides structured data for host applications to format as needed.
 */
export class LuaBridgeError extends Error {
  readonly code: LuaErrorCode;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: LuaErrorData, options?: { cause?: unknown }) {
    super(data.message, options);
    this.name = 'LuaBridgeError';
    this.code = data.code;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): LuaErrorData {
    return {
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: LuaErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

/** Source code failed to compile */
export class LuaSyntaxError extends LuaBridgeError {
  readonly diagnostic: string;

  constructor(diagnostic: string) {
    super({
      code: LUA_ERROR_CODES.SYNTAX,
      message: `Syntax error: ${diagnostic}`,
      context: { diagnostic },
    });
    this.name = 'LuaSyntaxError';
    this.diagnostic = diagnostic;
  }
}

/** A protected call raised an error; the diagnostic is the stringified error value */
export class ExecutionError extends LuaBridgeError {
  readonly diagnostic: string;

  constructor(diagnostic: string) {
    super({
      code: LUA_ERROR_CODES.EXECUTION,
      message: `Execution error: ${diagnostic}`,
      context: { diagnostic },
    });
    this.name = 'ExecutionError';
    this.diagnostic = diagnostic;
  }
}

/** The source supplying code failed while it was being read */
export class ReadError extends LuaBridgeError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      {
        code: LUA_ERROR_CODES.READ,
        message: `Read error: ${detail}`,
        context: { detail },
      },
      { cause }
    );
    this.name = 'ReadError';
  }
}

/** Decoded values did not match the requested host type */
export class WrongTypeError extends LuaBridgeError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string) {
    super({
      code: LUA_ERROR_CODES.WRONG_TYPE,
      message: `Wrong type returned by Lua: ${expected} expected, got ${actual}`,
      context: { expected, actual },
    });
    this.name = 'WrongTypeError';
    this.expected = expected;
    this.actual = actual;
  }
}

/** What was being pushed when a push failed */
export type PushTarget = 'argument' | 'global' | 'key' | 'value';

/** A value could not be pushed; `error` is the push error value */
export class PushError<E = unknown> extends LuaBridgeError {
  readonly target: PushTarget;
  readonly error: E;

  constructor(target: PushTarget, error: E) {
    super({
      code: LUA_ERROR_CODES.PUSH,
      message: `Failed to push ${target}`,
      context: { target },
    });
    this.name = 'PushError';
    this.target = target;
    this.error = error;
  }
}

/** Method call on a table entry that is not a function */
export class NoSuchMethodError extends LuaBridgeError {
  readonly method: string;

  constructor(method: string) {
    super({
      code: LUA_ERROR_CODES.NO_SUCH_METHOD,
      message: `No such method: ${method}`,
      context: { method },
    });
    this.name = 'NoSuchMethodError';
    this.method = method;
  }
}

/**
 * Stack height differs from what a guard or iterator recorded.
 * Not recoverable: no stack position can be trusted afterwards.
 */
export class StackCorruptionError extends LuaBridgeError {
  constructor(expectedTop: number, actualTop: number) {
    super({
      code: LUA_ERROR_CODES.STACK_CORRUPT,
      message: `Lua stack is corrupt: expected top ${expectedTop}, found ${actualTop}`,
      context: { expectedTop, actualTop },
    });
    this.name = 'StackCorruptionError';
  }
}

/** Host configuration did not have the expected shape */
export class ConfigError extends LuaBridgeError {
  constructor(detail: string, context?: Record<string, unknown>) {
    super({
      code: LUA_ERROR_CODES.CONFIG_INVALID,
      message: `Invalid config: ${detail}`,
      context,
    });
    this.name = 'ConfigError';
  }
}
