import {
  DepthUnderflowError,
  EngineBusyError,
  EngineProtocolError,
  EngineStartupError,
  EngineTimeoutError,
  EngineTransportError,
  InvalidArgumentError,
  PerftError,
  PerftErrorCode,
  QueryCanceledError,
  QueryFailedError,
  UsageError,
  isPerftError,
  isQueryFailure,
  wrapError,
} from '../../src/shared/errors';

describe('PerftErrors', () => {
  describe('query failures', () => {
    it.each([
      [new EngineTransportError('script', 'broken pipe'), PerftErrorCode.ENGINE_TRANSPORT_FAILED, 'script: broken pipe'],
      [new EngineProtocolError('stockfish', 'missing total count'), PerftErrorCode.ENGINE_PROTOCOL_VIOLATION, 'stockfish: missing total count'],
      [new EngineTimeoutError('stockfish', 250), PerftErrorCode.ENGINE_TIMEOUT, 'stockfish: unresponsive after 250ms'],
      [new EngineBusyError('stockfish'), PerftErrorCode.ENGINE_BUSY, 'stockfish: a query is already in progress'],
      [new QueryCanceledError('script', 'interrupted'), PerftErrorCode.QUERY_CANCELED, 'script: query canceled (interrupted)'],
    ])('%s carries its code and message', (error, code, message) => {
      expect(error).toBeInstanceOf(QueryFailedError);
      expect(error).toBeInstanceOf(PerftError);
      expect(error).toBeInstanceOf(Error);
      expect(error.code).toBe(code);
      expect(error.message).toBe(message);
      expect(error.isFatal).toBe(false);
      expect(isQueryFailure(error)).toBe(true);
    });

    it('omits the detail when a cancellation has no reason', () => {
      expect(new QueryCanceledError('script').message).toBe('script: query canceled');
    });

    it('uses the message of an Error reason', () => {
      expect(new QueryCanceledError('script', new Error('stop')).message).toBe(
        'script: query canceled (stop)'
      );
    });

    it('records the engine in context', () => {
      const error = new EngineTimeoutError('stockfish', 10);
      expect(error.engine).toBe('stockfish');
      expect(error.context).toEqual({ engine: 'stockfish', timeoutMs: 10 });
    });
  });

  describe('startup and usage errors', () => {
    it('are fatal with exit code 1', () => {
      const startup = new EngineStartupError('stockfish', 'spawn stockfish ENOENT');
      const usage = new UsageError('Usage: perftree <script>');

      expect(startup.message).toBe('cannot start stockfish: spawn stockfish ENOENT');
      expect(startup.code).toBe(PerftErrorCode.ENGINE_STARTUP_FAILED);
      expect(startup.isFatal).toBe(true);
      expect(startup.exitCode).toBe(1);

      expect(usage.code).toBe(PerftErrorCode.USAGE_ERROR);
      expect(usage.isFatal).toBe(true);
      expect(usage.exitCode).toBe(1);
      expect(isQueryFailure(usage)).toBe(false);
    });
  });

  describe('input errors', () => {
    it('DepthUnderflowError describes both depths', () => {
      const error = new DepthUnderflowError(1, 3);
      expect(error.code).toBe(PerftErrorCode.DEPTH_UNDERFLOW);
      expect(error.context).toEqual({ targetDepth: 1, pathLength: 3 });
      expect(error.isFatal).toBe(false);
    });

    it('InvalidArgumentError is not fatal', () => {
      expect(new InvalidArgumentError('bad').isFatal).toBe(false);
    });
  });

  describe('toJSON', () => {
    it('serialises the structured fields', () => {
      const json = new EngineBusyError('stockfish').toJSON();

      expect(json).toMatchObject({
        error: true,
        code: 'ENGINE_BUSY',
        message: 'stockfish: a query is already in progress',
        context: { engine: 'stockfish' },
        isFatal: false,
      });
      expect(typeof json.timestamp).toBe('string');
    });
  });

  describe('wrapError', () => {
    it('returns perft errors unchanged', () => {
      const error = new EngineBusyError('stockfish');
      expect(wrapError(error)).toBe(error);
    });

    it('wraps other throwables as internal errors', () => {
      const wrapped = wrapError(new TypeError('boom'), { command: 'diff' });

      expect(isPerftError(wrapped)).toBe(true);
      expect(wrapped.code).toBe(PerftErrorCode.INTERNAL_ERROR);
      expect(wrapped.message).toBe('boom');
      expect(wrapped.context.command).toBe('diff');
      expect(wrapped.exitCode).toBe(70);
    });

    it('stringifies non-Error values', () => {
      expect(wrapError('plain').message).toBe('plain');
    });
  });
});
