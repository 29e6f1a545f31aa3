/**
 * Perft Domain Errors - Structured error types for the comparison tool
 *
 * Error Categories:
 * - **Startup Errors**: the reference engine could not be launched (fatal)
 * - **Query Errors**: transport failures, protocol violations, timeouts and
 *   cancellations while talking to a backend; reported, session continues
 * - **Input Errors**: malformed commands, arguments or navigation that cannot
 *   produce a query; reported, the command is a no-op
 *
 * Usage:
 * ```typescript
 * import { EngineProtocolError, isQueryFailure } from './PerftErrors';
 *
 * throw new EngineProtocolError('script', 'missing blank line before total');
 *
 * if (isQueryFailure(error)) {
 *   console.error(`cannot compute diff: ${error.message}`);
 * }
 * ```
 *
 * @module PerftErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

export enum PerftErrorCode {
  // Startup
  USAGE_ERROR = 'USAGE_ERROR',
  ENGINE_STARTUP_FAILED = 'ENGINE_STARTUP_FAILED',

  // Query
  ENGINE_TRANSPORT_FAILED = 'ENGINE_TRANSPORT_FAILED',
  ENGINE_PROTOCOL_VIOLATION = 'ENGINE_PROTOCOL_VIOLATION',
  ENGINE_TIMEOUT = 'ENGINE_TIMEOUT',
  ENGINE_BUSY = 'ENGINE_BUSY',
  QUERY_CANCELED = 'QUERY_CANCELED',

  // Input
  DEPTH_UNDERFLOW = 'DEPTH_UNDERFLOW',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',

  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Process exit status used when an error of the given code ends the session.
 */
export const ERROR_EXIT_CODE: Record<PerftErrorCode, number> = {
  [PerftErrorCode.USAGE_ERROR]: 1,
  [PerftErrorCode.ENGINE_STARTUP_FAILED]: 1,
  [PerftErrorCode.ENGINE_TRANSPORT_FAILED]: 2,
  [PerftErrorCode.ENGINE_PROTOCOL_VIOLATION]: 2,
  [PerftErrorCode.ENGINE_TIMEOUT]: 2,
  [PerftErrorCode.ENGINE_BUSY]: 2,
  [PerftErrorCode.QUERY_CANCELED]: 130,
  [PerftErrorCode.DEPTH_UNDERFLOW]: 1,
  [PerftErrorCode.INVALID_ARGUMENT]: 1,
  [PerftErrorCode.INTERNAL_ERROR]: 70,
};

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all perft domain errors.
 */
export class PerftError extends Error {
  /** Error code for programmatic handling */
  readonly code: PerftErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Whether the session cannot continue after this error */
  readonly isFatal: boolean;

  readonly timestamp: Date;

  constructor(
    code: PerftErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    isFatal: boolean = false
  ) {
    super(message);
    this.name = 'PerftError';
    this.code = code;
    this.context = context;
    this.isFatal = isFatal;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, PerftError.prototype);
  }

  get exitCode(): number {
    return ERROR_EXIT_CODE[this.code] ?? 1;
  }

  toJSON(): PerftErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      isFatal: this.isFatal,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface PerftErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  isFatal: boolean;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// STARTUP / USAGE
// ═══════════════════════════════════════════════════════════════════════════

export class UsageError extends PerftError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(PerftErrorCode.USAGE_ERROR, message, context, true);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

export class EngineStartupError extends PerftError {
  constructor(engine: string, reason: string, context: Record<string, unknown> = {}) {
    super(
      PerftErrorCode.ENGINE_STARTUP_FAILED,
      `cannot start ${engine}: ${reason}`,
      { engine, reason, ...context },
      true
    );
    this.name = 'EngineStartupError';
    Object.setPrototypeOf(this, EngineStartupError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// QUERY FAILURES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A backend query did not produce a report. Navigation state is never touched
 * when one of these is raised.
 */
export class QueryFailedError extends PerftError {
  readonly engine: string;

  constructor(
    code: PerftErrorCode,
    engine: string,
    message: string,
    context: Record<string, unknown> = {}
  ) {
    super(code, message, { engine, ...context }, false);
    this.name = 'QueryFailedError';
    this.engine = engine;
    Object.setPrototypeOf(this, QueryFailedError.prototype);
  }
}

export class EngineTransportError extends QueryFailedError {
  constructor(engine: string, reason: string, context: Record<string, unknown> = {}) {
    super(PerftErrorCode.ENGINE_TRANSPORT_FAILED, engine, `${engine}: ${reason}`, {
      reason,
      ...context,
    });
    this.name = 'EngineTransportError';
    Object.setPrototypeOf(this, EngineTransportError.prototype);
  }
}

export class EngineProtocolError extends QueryFailedError {
  constructor(engine: string, reason: string, context: Record<string, unknown> = {}) {
    super(PerftErrorCode.ENGINE_PROTOCOL_VIOLATION, engine, `${engine}: ${reason}`, {
      reason,
      ...context,
    });
    this.name = 'EngineProtocolError';
    Object.setPrototypeOf(this, EngineProtocolError.prototype);
  }
}

export class EngineTimeoutError extends QueryFailedError {
  constructor(engine: string, timeoutMs: number, context: Record<string, unknown> = {}) {
    super(
      PerftErrorCode.ENGINE_TIMEOUT,
      engine,
      `${engine}: unresponsive after ${timeoutMs}ms`,
      { timeoutMs, ...context }
    );
    this.name = 'EngineTimeoutError';
    Object.setPrototypeOf(this, EngineTimeoutError.prototype);
  }
}

export class EngineBusyError extends QueryFailedError {
  constructor(engine: string) {
    super(PerftErrorCode.ENGINE_BUSY, engine, `${engine}: a query is already in progress`);
    this.name = 'EngineBusyError';
    Object.setPrototypeOf(this, EngineBusyError.prototype);
  }
}

export class QueryCanceledError extends QueryFailedError {
  constructor(engine: string, reason?: unknown) {
    const detail = reason instanceof Error ? reason.message : reason ? String(reason) : '';
    super(
      PerftErrorCode.QUERY_CANCELED,
      engine,
      `${engine}: query canceled${detail ? ` (${detail})` : ''}`
    );
    this.name = 'QueryCanceledError';
    Object.setPrototypeOf(this, QueryCanceledError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// INPUT ERRORS
// ═══════════════════════════════════════════════════════════════════════════

export class DepthUnderflowError extends PerftError {
  constructor(targetDepth: number, pathLength: number) {
    super(
      PerftErrorCode.DEPTH_UNDERFLOW,
      `navigated path is already deeper than the requested target depth (path ${pathLength}, depth ${targetDepth})`,
      { targetDepth, pathLength },
      false
    );
    this.name = 'DepthUnderflowError';
    Object.setPrototypeOf(this, DepthUnderflowError.prototype);
  }
}

export class InvalidArgumentError extends PerftError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(PerftErrorCode.INVALID_ARGUMENT, message, context, false);
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function isPerftError(error: unknown): error is PerftError {
  return error instanceof PerftError;
}

export function isQueryFailure(error: unknown): error is QueryFailedError {
  return error instanceof QueryFailedError;
}

/**
 * Wrap an unknown error in a PerftError.
 */
export function wrapError(error: unknown, context: Record<string, unknown> = {}): PerftError {
  if (isPerftError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new PerftError(PerftErrorCode.INTERNAL_ERROR, message, {
    ...context,
    originalStack: stack,
  });
}
