/**
 * Minimal synchronous pub/sub. Listeners run in subscription order, on the
 * caller's stack.
 */
export function createSubscription<T>() {
  const listeners = new Set<(value: T) => void>();

  return {
    subscribe: (listener: (value: T) => void) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    notify: (value: T) => {
      listeners.forEach((listener) => listener(value));
    },
    size: () => listeners.size,
    clear: () => {
      listeners.clear();
    },
  };
}
