/** Aborts when any input aborts. Call dispose() once the work is done. */
export function linkSignals(...signals: Array<AbortSignal | undefined>): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const listeners: Array<() => void> = [];

  for (const signal of signals) {
    if (!signal) { continue; }
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    const onAbort = () => controller.abort(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    listeners.push(() => signal.removeEventListener("abort", onAbort));
  }

  return {
    signal: controller.signal,
    dispose: () => listeners.forEach((off) => off()),
  };
}

/** Resolves when the signal aborts; never rejects. */
export function whenAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) { return Promise.resolve(); }
  return new Promise((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
}
