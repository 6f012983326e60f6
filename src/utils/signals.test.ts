import { afterEach, describe, expect, it, vi } from 'vitest';
import { AbortError } from '../error/abortError.js';
import { getTimeoutError, TimeoutError } from '../error/timeoutError.js';
import { createTimeoutSignal, mergeSignals } from './signals.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('createTimeoutSignal', () => {
  it('returns null when disabled', () => {
    expect(createTimeoutSignal()).toBeNull();
    expect(createTimeoutSignal(0)).toBeNull();
    expect(createTimeoutSignal(false)).toBeNull();
  });

  it('aborts after the configured timeout with a TimeoutError', () => {
    vi.useFakeTimers();
    const timeout = createTimeoutSignal(50);

    expect(timeout?.signal.aborted).toBe(false);

    vi.advanceTimersByTime(50);

    expect(timeout?.signal.aborted).toBe(true);
    expect(timeout?.signal.reason).toBeInstanceOf(TimeoutError);
    expect(timeout?.signal.reason).toHaveProperty('message', 'error request timed out after 50ms');
    expect(getTimeoutError(timeout?.signal.reason)?.timeout).toBe(50);
  });

  it('never aborts once cleared', () => {
    vi.useFakeTimers();
    const timeout = createTimeoutSignal(50);

    timeout?.clear();
    vi.advanceTimersByTime(100);

    expect(timeout?.signal.aborted).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe('mergeSignals', () => {
  it('returns null when no signals are provided', () => {
    expect(mergeSignals([])).toBeNull();
    expect(mergeSignals([null, undefined])).toBeNull();
  });

  it('returns the single active signal when only one is provided', () => {
    const controller = new AbortController();

    expect(mergeSignals([null, controller.signal])?.signal).toBe(controller.signal);
  });

  it('propagates aborts and preserves the provided reason', () => {
    const first = new AbortController();
    const second = new AbortController();
    const merged = mergeSignals([first.signal, second.signal])?.signal;

    const reason = new AbortError('client was disposed');
    second.abort(reason);

    expect(merged?.aborted).toBe(true);
    expect(merged?.reason).toBe(reason);
  });

  it('aborts immediately when a source is already aborted', () => {
    const controller = new AbortController();
    const reason = new Error('existing abort');
    controller.abort(reason);

    const merged = mergeSignals([new AbortController().signal, controller.signal])?.signal;

    expect(merged?.aborted).toBe(true);
    expect(merged?.reason).toBe(reason);
  });

  it('removes its listeners from the sources once aborted', () => {
    const first = new AbortController();
    const second = new AbortController();
    const removeSpy = vi.spyOn(second.signal, 'removeEventListener');

    mergeSignals([first.signal, second.signal]);
    first.abort(new AbortError('stop'));

    expect(removeSpy).toHaveBeenCalledWith('abort', expect.any(Function));
  });

  it('detaches from every source on cleanup', () => {
    const disposal = new AbortController();
    const caller = new AbortController();
    const removeDisposal = vi.spyOn(disposal.signal, 'removeEventListener');
    const removeCaller = vi.spyOn(caller.signal, 'removeEventListener');

    const merged = mergeSignals([caller.signal, disposal.signal]);
    merged?.cleanup();
    disposal.abort(new AbortError('client was disposed'));

    expect(removeDisposal).toHaveBeenCalledTimes(1);
    expect(removeCaller).toHaveBeenCalledTimes(1);
    expect(merged?.signal.aborted).toBe(false);
  });

  it('leaves no listeners behind when the only signal is returned as-is', () => {
    const controller = new AbortController();
    const addSpy = vi.spyOn(controller.signal, 'addEventListener');

    mergeSignals([controller.signal])?.cleanup();

    expect(addSpy).not.toHaveBeenCalled();
  });
});
