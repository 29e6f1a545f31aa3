import {
  OperationCanceledError,
  createCancellationSource,
  isOperationCanceledError,
} from '../../../src/shared/utils/cancellation';

describe('cancellation', () => {
  it('starts uncanceled', () => {
    const source = createCancellationSource();

    expect(source.token.isCanceled).toBe(false);
    expect(source.token.reason).toBeUndefined();
    expect(() => source.token.throwIfCanceled()).not.toThrow();
  });

  it('records the reason and notifies listeners once', () => {
    const source = createCancellationSource();
    const listener = jest.fn();
    source.token.onCancel(listener);

    source.cancel('interrupted');
    source.cancel('again');

    expect(source.token.isCanceled).toBe(true);
    expect(source.token.reason).toBe('interrupted');
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('interrupted');
  });

  it('runs listeners registered after cancellation immediately', () => {
    const source = createCancellationSource();
    source.cancel('done');

    const listener = jest.fn();
    source.token.onCancel(listener);

    expect(listener).toHaveBeenCalledWith('done');
  });

  it('lets listeners unsubscribe', () => {
    const source = createCancellationSource();
    const listener = jest.fn();
    const unsubscribe = source.token.onCancel(listener);

    unsubscribe();
    source.cancel();

    expect(listener).not.toHaveBeenCalled();
  });

  it('throwIfCanceled raises OperationCanceledError with context', () => {
    const source = createCancellationSource();
    source.cancel('stop');

    try {
      source.token.throwIfCanceled('before spawning script');
      throw new Error('expected throwIfCanceled to throw');
    } catch (error) {
      expect(isOperationCanceledError(error)).toBe(true);
      expect(error).toBeInstanceOf(OperationCanceledError);
      if (error instanceof OperationCanceledError) {
        expect(error.message).toBe('Operation canceled (before spawning script)');
        expect(error.cancellationReason).toBe('stop');
      }
    }
  });
});
