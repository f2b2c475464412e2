/**
 * Cooperative cancellation shared by every suspension point of an
 * in-flight session operation (browser poll, liveness poll, prompt wait,
 * process-exit wait).
 */

export class CancellationToken {
  private readonly controller = new AbortController();
  private cancelReason: string | null = null;

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get reason(): string | null {
    return this.cancelReason;
  }

  /** Fires the token. Only the first call has an effect. */
  cancel(reason = 'cancelled'): void {
    if (this.isCancelled) return;
    this.cancelReason = reason;
    this.controller.abort();
  }

  /**
   * Registers a listener; runs it synchronously when the token is
   * already cancelled.
   *
   * @returns A function that unregisters the listener
   */
  onCancel(listener: () => void): () => void {
    if (this.isCancelled) {
      listener();
      return () => undefined;
    }
    const signal = this.controller.signal;
    signal.addEventListener('abort', listener, { once: true });
    return () => signal.removeEventListener('abort', listener);
  }

  /** Throws the error built by `createError` once the token has fired. */
  throwIfCancelled(createError: () => Error): void {
    if (this.isCancelled) throw createError();
  }
}

/**
 * Waits `ms` milliseconds unless the token fires first.
 *
 * @returns `true` when the full delay elapsed, `false` on cancellation
 */
export function sleep(ms: number, token?: CancellationToken): Promise<boolean> {
  return new Promise((resolve) => {
    if (token?.isCancelled) {
      resolve(false);
      return;
    }
    let unsubscribe: () => void = () => undefined;
    const timer = setTimeout(() => {
      unsubscribe();
      resolve(true);
    }, ms);
    if (token) {
      unsubscribe = token.onCancel(() => {
        clearTimeout(timer);
        resolve(false);
      });
    }
  });
}
