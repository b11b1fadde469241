/**
 * Process-wide configuration for views and buffers.
 */

/**
 * Sink for violation reports. `console` satisfies it.
 */
export interface ViewLogger {
  error(message: string, ...details: unknown[]): void;
}

export interface ViewConfig {
  /** Where precondition violations are reported before throwing (default: console, null silences) */
  logger: ViewLogger | null;
  /** Check a view's recorded generation against its buffer on every byte read (default: true) */
  detectStaleViews: boolean;
}

const DEFAULT_CONFIG: Readonly<ViewConfig> = Object.freeze({
  logger: console,
  detectStaleViews: true,
});

let current: Readonly<ViewConfig> = DEFAULT_CONFIG;

/**
 * Merge `config` into the active configuration.
 *
 * @example
 * ```typescript
 * configureViews({ logger: null }); // silence violation reports
 * ```
 */
export function configureViews(config: Partial<ViewConfig>): Readonly<ViewConfig> {
  current = Object.freeze({ ...current, ...config });
  return current;
}

export function getViewConfig(): Readonly<ViewConfig> {
  return current;
}

export function resetViewConfig(): void {
  current = DEFAULT_CONFIG;
}
