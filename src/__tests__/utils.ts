/**
 * Test utilities and helper functions
 */

import { defaultConfig } from '../config/defaults.js';
import type { Config } from '../config/schema.js';
import { Logger } from '../logger/index.js';

type Overrides = { [K in keyof Config]?: Partial<Config[K]> };

/**
 * Default configuration with file logging off, plus per-section overrides
 */
export function createTestConfig(overrides: Overrides = {}): Config {
  const config = structuredClone(defaultConfig);
  config.logging = { ...config.logging, level: 'error', toFile: false };
  return {
    server: { ...config.server, ...overrides.server },
    logging: { ...config.logging, ...overrides.logging },
    mcp: { ...config.mcp, ...overrides.mcp },
    hardware: { ...config.hardware, ...overrides.hardware },
    network: { ...config.network, ...overrides.network },
    container: { ...config.container, ...overrides.container },
    storage: { ...config.storage, ...overrides.storage },
    stats: { ...config.stats, ...overrides.stats },
    performance: { ...config.performance, ...overrides.performance },
    security: { ...config.security, ...overrides.security },
  };
}

/**
 * Console-only logger that stays quiet below error
 */
export function createTestLogger(): Logger {
  return new Logger(createTestConfig().logging);
}

/**
 * Manually advanced clock for cache expiry tests
 */
export class TestClock {
  constructor(public now = 1_000_000) {}

  advance(ms: number): void {
    this.now += ms;
  }

  read = (): number => this.now;
}

/**
 * A promise with its resolve function exposed
 */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}
