import type { Toolkit } from '../toolkit/types.js';

export interface FieldViewConfig {
  /** Toolkit used by `ViewObject.newView()` and friends when none is passed. */
  toolkit: Toolkit<unknown> | null;
  /** Warn when a view name is registered twice (the old entry is still replaced). */
  warnOnNameReuse: boolean;
}

const defaults: FieldViewConfig = {
  toolkit: null,
  warnOnNameReuse: true,
};

let config: FieldViewConfig = { ...defaults };

/**
 * Configure process-wide defaults.
 *
 * @example
 * configure({ toolkit: createDomToolkit(document) });
 */
export function configure(options: Partial<FieldViewConfig>): void {
  config = { ...config, ...options };
}

export function getConfig(): Readonly<FieldViewConfig> {
  return config;
}

export function resetConfig(): void {
  config = { ...defaults };
}

/** Returns the configured toolkit, or throws when none was set. */
export function requireToolkit(): Toolkit<unknown> {
  if (!config.toolkit) {
    throw new Error('[fieldview] No toolkit configured. Pass one explicitly or call configure({ toolkit }).');
  }
  return config.toolkit;
}
