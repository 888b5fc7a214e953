import { reportError } from './dev.js';

/**
 * A Scope is a simple lifecycle container.
 * Anything registered via `onCleanup` will run when `dispose()` is called.
 *
 * Each `View.build()` runs inside its own scope, so rebuilding a view
 * disconnects every widget handler the previous build connected.
 */
export interface Scope {
  /** Register a cleanup callback to run when the scope is disposed. */
  onCleanup(fn: () => void): void;

  /** Dispose the scope and run all registered cleanups. */
  dispose(): void;

  /** Parent scope in the hierarchy. */
  readonly parent: Scope | null;
}

/** Tracks disposed scopes without mutating the public interface. */
const disposedScopes = new WeakSet<Scope>();

/** Returns true if the given scope has been disposed. */
export function isScopeDisposed(scope: Scope): boolean {
  return disposedScopes.has(scope);
}

/**
 * Creates a new Scope instance.
 *
 * Notes:
 * - Cleanups registered on the same scope run in FIFO order.
 * - A child scope is disposed when its parent is.
 * - Parent is captured from the current scope context (set by withScope)
 *   unless given explicitly; `null` creates a detached scope.
 */
export function createScope(parentOverride?: Scope | null): Scope {
  const parentCandidate = parentOverride === undefined ? currentScope : parentOverride;
  const parent = parentCandidate && isScopeDisposed(parentCandidate) ? null : parentCandidate;

  const localCleanups: Array<() => void> = [];

  const runCleanupSafely = (fn: () => void) => {
    try {
      fn();
    } catch (err) {
      reportError(err, 'scope cleanup');
    }
  };

  const scope: Scope = {
    onCleanup(fn: () => void) {
      if (isScopeDisposed(scope)) {
        runCleanupSafely(fn);
        return;
      }
      localCleanups.push(fn);
    },
    dispose() {
      if (isScopeDisposed(scope)) return;
      disposedScopes.add(scope);

      for (const fn of localCleanups.splice(0)) runCleanupSafely(fn);
    },
    parent,
  };

  if (parent) {
    parent.onCleanup(() => scope.dispose());
  }

  return scope;
}

/**
 * The currently active scope for the running code path.
 * This is set by `withScope()` and read by scope-aware primitives.
 */
let currentScope: Scope | null = null;

/** Returns the current active scope (or null if none). */
export function getCurrentScope(): Scope | null {
  return currentScope;
}

/**
 * Runs a function with the given scope set as current, then restores the previous scope.
 */
export function withScope<T>(scope: Scope, fn: () => T): T {
  if (isScopeDisposed(scope)) {
    throw new Error('[fieldview] withScope() cannot enter a disposed scope.');
  }
  const prevScope = currentScope;
  currentScope = scope;
  try {
    return fn();
  } finally {
    currentScope = prevScope;
  }
}
