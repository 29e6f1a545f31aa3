/**
 * Shared Errors Module
 *
 * Structured error types for consistent error handling across the perft
 * backends, the session and the command front end.
 *
 * @module errors
 */

export {
  // Error codes
  PerftErrorCode,
  ERROR_EXIT_CODE,
  // Base classes
  PerftError,
  QueryFailedError,
  type PerftErrorJSON,
  // Specific errors
  UsageError,
  EngineStartupError,
  EngineTransportError,
  EngineProtocolError,
  EngineTimeoutError,
  EngineBusyError,
  QueryCanceledError,
  DepthUnderflowError,
  InvalidArgumentError,
  // Utilities
  isPerftError,
  isQueryFailure,
  wrapError,
} from './PerftErrors';
