import { getCurrentScope } from './scope.js';
import { reportError } from './dev.js';

export interface Signal<T> {
  /** Read the current value. */
  (): T;
  /** Set a new value and notify subscribers. */
  set(value: T): void;
  /** Subscribe to value changes. Returns unsubscribe function. */
  on(callback: (value: T) => void): () => void;
}

/**
 * Creates a signal: a mutable value that notifies subscribers on change.
 *
 * Notification is synchronous; the view engine runs on a single UI loop and
 * widgets must reflect a state change before the triggering call returns.
 */
export function signal<T>(initialValue: T): Signal<T> {
  let value = initialValue;
  const subscribers = new Set<(value: T) => void>();
  const owningScope = getCurrentScope();

  const read = () => value;

  read.set = (nextValue: T) => {
    // No-op on identical values.
    if (Object.is(value, nextValue)) return;
    value = nextValue;

    // Snapshot so subscribers may unsubscribe while being notified.
    for (const fn of Array.from(subscribers)) {
      try {
        fn(value);
      } catch (error) {
        reportError(error, 'signal subscriber');
      }
    }
  };

  read.on = (callback: (value: T) => void) => {
    subscribers.add(callback);
    return () => {
      subscribers.delete(callback);
    };
  };

  // If the signal was created inside a scope, drop subscribers when the scope ends.
  if (owningScope) {
    owningScope.onCleanup(() => {
      subscribers.clear();
    });
  }

  return read;
}
