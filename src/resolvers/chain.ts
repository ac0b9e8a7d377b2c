/**
 * Strategy chain: an ordered list of strategies answering the same
 * question, merged field by field in precedence order.
 *
 * For every field the value of the earliest strategy that reports it
 * wins, whether the strategies run one after another or all at once.
 */

import type { Logger } from '../logger/index.js';
import type { ProbeResult } from '../types/probe.js';

/**
 * Anything that can attempt to answer part of a record. Every Probe whose
 * value is a partial record qualifies.
 */
export interface Strategy<T> {
  readonly name: string;
  attempt(): Promise<ProbeResult<Partial<T>>>;
}

export interface ChainOptions<T> {
  /** Fields the chain is asked to fill; sequential runs stop once all are known */
  fields: readonly (keyof T)[];
  /** Run every strategy at once instead of stopping early */
  concurrent?: boolean;
  /** Per-field filter; a rejected value is treated as not reported */
  accept?: (field: keyof T, value: unknown) => boolean;
  logger?: Logger;
}

export interface ChainResolution<T> {
  value: Partial<T>;
  /** Strategy that supplied each resolved field */
  sources: Partial<Record<keyof T, string>>;
  /** Every attempt made, in precedence order */
  attempts: ProbeResult<Partial<T>>[];
  /** Field values dropped by the accept filter */
  rejected: Array<{ strategy: string; field: keyof T }>;
}

export function isComplete<T>(value: Partial<T>, fields: readonly (keyof T)[]): boolean {
  return fields.every((field) => value[field] !== undefined);
}

function logAttempt<T>(logger: Logger | undefined, result: ProbeResult<Partial<T>>): void {
  if (!logger) {
    return;
  }
  if (result.ok) {
    logger.debug('Strategy answered', { strategy: result.probe, elapsedMs: result.elapsedMs });
    return;
  }

  const metadata = {
    strategy: result.probe,
    kind: result.failure.kind,
    code: result.failure.code,
    reason: result.failure.message,
    elapsedMs: result.elapsedMs,
  };
  // Absence is the normal state inside a container
  if (result.failure.kind === 'unavailable') {
    logger.debug('Strategy unavailable', metadata);
  } else {
    logger.warn('Strategy failed', metadata);
  }
}

/**
 * Run a strategy chain and merge its answers
 */
export async function resolveByField<T>(
  strategies: readonly Strategy<T>[],
  options: ChainOptions<T>
): Promise<ChainResolution<T>> {
  const resolution: ChainResolution<T> = { value: {}, sources: {}, attempts: [], rejected: [] };

  const merge = (result: ProbeResult<Partial<T>>): void => {
    resolution.attempts.push(result);
    logAttempt(options.logger, result);
    if (!result.ok) {
      return;
    }

    for (const field of options.fields) {
      if (resolution.value[field] !== undefined) continue;

      const candidate = result.value[field];
      if (candidate === undefined || candidate === null) continue;

      if (options.accept && !options.accept(field, candidate)) {
        resolution.rejected.push({ strategy: result.probe, field });
        continue;
      }

      resolution.value[field] = candidate;
      resolution.sources[field] = result.probe;
    }
  };

  if (options.concurrent) {
    // Results come back in strategy order, so merging stays in precedence order
    const results = await Promise.all(strategies.map((strategy) => strategy.attempt()));
    results.forEach(merge);
    return resolution;
  }

  for (const strategy of strategies) {
    if (isComplete(resolution.value, options.fields)) {
      break;
    }
    merge(await strategy.attempt());
  }

  return resolution;
}
