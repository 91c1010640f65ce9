import { describe, expect, it, vi } from 'vitest';
import { mergeSignals } from './signals.js';

describe('mergeSignals', () => {
  it('returns null when no signals are given', () => {
    expect(mergeSignals([]).signal).toBeNull();
    expect(mergeSignals([null, undefined]).signal).toBeNull();
  });

  it('returns a single signal as-is', () => {
    const controller = new AbortController();

    expect(mergeSignals([null, controller.signal]).signal).toBe(controller.signal);
  });

  it('aborts with the reason of the first source to abort', () => {
    const first = new AbortController();
    const second = new AbortController();
    const { signal } = mergeSignals([first.signal, second.signal]);

    second.abort(new Error('client disposed'));
    first.abort(new Error('caller cancelled'));

    expect(signal?.aborted).toBe(true);
    expect(signal?.reason).toEqual(new Error('client disposed'));
  });

  it('is aborted immediately when a source already is', () => {
    const first = new AbortController();
    const second = new AbortController();
    first.abort(new Error('already gone'));

    const { signal } = mergeSignals([first.signal, second.signal]);

    expect(signal?.aborted).toBe(true);
    expect(signal?.reason).toEqual(new Error('already gone'));
  });

  it('detaches from the sources on release', () => {
    const longLived = new AbortController();
    const addSpy = vi.spyOn(longLived.signal, 'addEventListener');
    const removeSpy = vi.spyOn(longLived.signal, 'removeEventListener');

    for (let i = 0; i < 20; i++) {
      const { release } = mergeSignals([new AbortController().signal, longLived.signal]);
      release();
    }

    expect(addSpy).toHaveBeenCalledTimes(20);
    expect(removeSpy).toHaveBeenCalledTimes(20);
  });

  it('no longer follows a source after release', () => {
    const first = new AbortController();
    const second = new AbortController();
    const { signal, release } = mergeSignals([first.signal, second.signal]);

    release();
    second.abort(new Error('late'));

    expect(signal?.aborted).toBe(false);
  });
});
