export type Listener<T> = (value: T) => void;

export type Unsubscribe = () => void;

/**
 * Event emitter interface for pub/sub pattern.
 *
 * @template T - The type of payload emitted to listeners (defaults to void)
 */
export interface Emitter<T = void> {
  /**
   * Subscribe a listener.
   *
   * @returns Unsubscribe function (idempotent - safe to call multiple times)
   */
  on(listener: Listener<T>): Unsubscribe;

  /**
   * Emit an event to all registered listeners.
   */
  emit(payload: T): void;
}

/**
 * Creates an event emitter for managing and notifying listeners.
 *
 * @example
 * ```ts
 * const changes = emitter<string>();
 * const unsubscribe = changes.on((message) => console.log(message));
 * changes.emit("saved"); // Logs: "saved"
 * unsubscribe();
 * ```
 */
export function emitter<T = void>(): Emitter<T> {
  // a Set drops duplicate listeners
  const listeners = new Set<Listener<T>>();

  return {
    on(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    emit(payload) {
      // snapshot: listeners added or removed during emit don't affect this cycle
      for (const listener of Array.from(listeners)) {
        listener(payload);
      }
    },
  };
}
