/**
 * REQUEST COALESCER
 * =================
 *
 * Anti-stampede pattern: concurrent callers asking for the same key share one
 * in-flight computation.
 *
 * Cancellation is reference-counted. A caller whose signal aborts stops
 * waiting immediately; the shared computation itself is aborted only once
 * every caller waiting on it has gone.
 */

interface InflightEntry<T> {
  promise: Promise<T>;
  controller: AbortController;
  waiters: number;
}

export class RequestCoalescer<T> {
  private inflight = new Map<string, InflightEntry<T>>();

  /**
   * Run fn under key, or join the run already in flight for that key.
   * fn receives a signal that fires when no caller is left waiting.
   */
  run(key: string, fn: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    let entry = this.inflight.get(key);
    // A cancelled run is still settling; new callers get a run of their own.
    if (!entry || entry.controller.signal.aborted) {
      entry = this.start(key, fn);
    }

    entry.waiters++;
    return this.wait(entry, signal);
  }

  isInFlight(key: string): boolean {
    return this.inflight.has(key);
  }

  size(): number {
    return this.inflight.size;
  }

  private start(key: string, fn: (signal: AbortSignal) => Promise<T>): InflightEntry<T> {
    const controller = new AbortController();
    const promise = (async () => {
      try {
        return await fn(controller.signal);
      } finally {
        if (this.inflight.get(key)?.controller === controller) {
          this.inflight.delete(key);
        }
      }
    })();
    const entry: InflightEntry<T> = { promise, controller, waiters: 0 };
    this.inflight.set(key, entry);
    return entry;
  }

  private wait(entry: InflightEntry<T>, signal?: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      let settled = false;

      const onAbort = () => {
        if (settled) return;
        settled = true;
        entry.waiters--;
        if (entry.waiters === 0) {
          entry.controller.abort();
        }
        reject(signal ? abortReason(signal) : new Error('Aborted'));
      };

      signal?.addEventListener('abort', onAbort, { once: true });

      entry.promise.then(
        (value) => {
          signal?.removeEventListener('abort', onAbort);
          if (settled) return;
          settled = true;
          entry.waiters--;
          resolve(value);
        },
        (err: unknown) => {
          signal?.removeEventListener('abort', onAbort);
          if (settled) return;
          settled = true;
          entry.waiters--;
          reject(err);
        },
      );
    });
  }
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('Aborted');
}
