/**
 * A minimal observer list for one notification point.
 */

/** Callback registered on a notification point. */
export type Listener<T> = (payload: T) => void;

/** Call to remove a listener registered with `Notifier.on`. */
export type Unsubscribe = () => void;

/** Receives an error thrown by a listener. */
export type ListenerErrorHandler = (error: unknown) => void;

/**
 * Multi-subscriber notification point. Listeners fire in registration order.
 *
 * A throwing listener never keeps the others from running. With an error
 * handler, each failure goes to the handler; without one, the first error
 * is rethrown once every listener has run.
 */
export class Notifier<T> {
  private readonly listeners: Listener<T>[] = [];
  private readonly onError: ListenerErrorHandler | undefined;

  constructor(onError?: ListenerErrorHandler) {
    this.onError = onError;
  }

  /** Register a listener. Registering the same function twice calls it twice. */
  on(listener: Listener<T>): Unsubscribe {
    this.listeners.push(listener);
    return () => {
      this.off(listener);
    };
  }

  /** Remove a previously registered listener (first registration only). */
  off(listener: Listener<T>): void {
    const idx = this.listeners.indexOf(listener);
    if (idx >= 0) this.listeners.splice(idx, 1);
  }

  /** Call every listener with `payload`. */
  emit(payload: T): void {
    let failure: { error: unknown } | null = null;
    // Snapshot so a listener unsubscribing mid-emit doesn't skip its neighbour.
    for (const listener of [...this.listeners]) {
      try {
        listener(payload);
      } catch (error) {
        if (this.onError) {
          this.onError(error);
        } else if (!failure) {
          failure = { error };
        }
      }
    }
    if (failure) {
      throw failure.error;
    }
  }

  /** Number of registered listeners. */
  get size(): number {
    return this.listeners.length;
  }
}
