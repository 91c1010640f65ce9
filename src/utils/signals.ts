/** Result of {@link mergeSignals}. */
export interface MergedSignal {
  /** Combined signal, `null` when no source was given. */
  signal: AbortSignal | null;
  /** Detaches the listeners placed on the sources. Call once the guarded work settles. */
  release: () => void;
}

const noop = (): void => {};

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * Behavior:
 * - If no signals are provided, `signal` is `null`.
 * - If a single signal is provided, it is returned as-is.
 * - If multiple signals are provided, a new `AbortController` is created
 *   and will abort with the `reason` of whichever source signal aborts first.
 *
 * Sources usually outlive the merged signal, so the caller must `release()` it
 * when done; otherwise each merge leaves a listener on every long-lived source.
 *
 * @param signals - List of signals to merge (nullable/undefined allowed).
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): MergedSignal {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length <= 1) {
    return { signal: active[0] ?? null, release: noop };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const release = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };

  controller.signal.addEventListener('abort', release, { once: true });

  for (const signal of active) {
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }

    const abort = () => controller.abort(signal.reason);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, release };
}
