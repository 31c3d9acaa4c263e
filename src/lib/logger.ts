/**
 * Scoped stderr logger
 * DEBUG=1 enables debug output for every scope, DEBUG=store,rest for a subset.
 * warn always prints.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

export type LogScope = 'store' | 'executor' | 'events' | 'rest' | 'hookcache';

export interface Logger {
  debug(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  /** Run `fn` with debug output indented one level deeper */
  child<T>(fn: () => T): T;
}

const depthStore = new AsyncLocalStorage<number>();
const bootTime = Date.now();

function debugFilter(): Set<string> | 'all' | null {
  const value = process.env.DEBUG?.trim();
  if (!value) return null;
  return value === '1' ? 'all' : new Set(value.split(',').map((s) => s.trim()));
}

function ts(): string {
  return `+${((Date.now() - bootTime) / 1000).toFixed(1)}s`;
}

export function createLogger(scope: LogScope): Logger {
  const filter = debugFilter();
  const active = filter === 'all' || (filter !== null && filter.has(scope));

  return {
    debug(...args: unknown[]) {
      if (!active) return;
      const indent = '  '.repeat(depthStore.getStore() ?? 0);
      console.error(`${ts()} ${indent}[${scope}]`, ...args);
    },
    warn(...args: unknown[]) {
      console.error(`${ts()} [${scope}] WARN`, ...args);
    },
    child<T>(fn: () => T): T {
      return depthStore.run((depthStore.getStore() ?? 0) + 1, fn);
    },
  };
}
