/**
 * Unit tests for the lifecycle manager
 */

import { describe, it, expect } from '@jest/globals';
import { createTestLogger } from '../__tests__/utils.js';
import { LifecycleManager } from './index.js';

function manager(exits: number[], shutdownTimeout?: number): LifecycleManager {
  return new LifecycleManager(createTestLogger(), {
    handleSignals: false,
    shutdownTimeout,
    exit: (code) => exits.push(code),
  });
}

describe('LifecycleManager', () => {
  it('should run startup hooks in registration order', async () => {
    const order: string[] = [];
    const lifecycle = manager([]);
    lifecycle.onStartup('first', async () => {
      order.push('first');
    });
    lifecycle.onStartup('second', async () => {
      order.push('second');
    });

    await lifecycle.startup();

    expect(order).toEqual(['first', 'second']);
  });

  it('should stop startup at a failing hook', async () => {
    const order: string[] = [];
    const lifecycle = manager([]);
    lifecycle.onStartup('broken', async () => {
      throw new Error('port in use');
    });
    lifecycle.onStartup('never', async () => {
      order.push('never');
    });

    await expect(lifecycle.startup()).rejects.toThrow('port in use');
    expect(order).toEqual([]);
  });

  it('should run shutdown hooks in reverse order and exit 0', async () => {
    const order: string[] = [];
    const exits: number[] = [];
    const lifecycle = manager(exits);
    lifecycle.onShutdown('open-first', async () => {
      order.push('open-first');
    });
    lifecycle.onShutdown('open-second', async () => {
      order.push('open-second');
    });

    await lifecycle.shutdown('SIGTERM');

    expect(order).toEqual(['open-second', 'open-first']);
    expect(exits).toEqual([0]);
    expect(lifecycle.isShuttingDownStatus()).toBe(true);
  });

  it('should keep running shutdown hooks after one fails', async () => {
    const order: string[] = [];
    const exits: number[] = [];
    const lifecycle = manager(exits);
    lifecycle.onShutdown('survivor', async () => {
      order.push('survivor');
    });
    lifecycle.onShutdown('broken', async () => {
      throw new Error('already closed');
    });

    await lifecycle.shutdown();

    expect(order).toEqual(['survivor']);
    expect(exits).toEqual([0]);
  });

  it('should shut down only once', async () => {
    const exits: number[] = [];
    const lifecycle = manager(exits);

    await lifecycle.shutdown();
    await lifecycle.shutdown();

    expect(exits).toEqual([0]);
  });

  it('should exit 1 when shutdown hooks overrun the timeout', async () => {
    const exits: number[] = [];
    const lifecycle = manager(exits, 10);
    lifecycle.onShutdown('stuck', () => new Promise<void>((resolve) => setTimeout(resolve, 200)));

    await lifecycle.shutdown();

    expect(exits).toEqual([1]);
  });
});
