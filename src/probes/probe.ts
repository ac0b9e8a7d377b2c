/**
 * Probe boundary: runs one fact-gathering operation under a timeout and
 * turns every way it can go wrong into a typed ProbeResult
 */

import { ErrorCode } from '../errors/types.js';
import type { Probe, ProbeFailureKind, ProbeResult, SideEffectClass } from '../types/probe.js';

/**
 * What a probe body returns: a value, or a classified failure
 */
export type ProbeOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; kind: Exclude<ProbeFailureKind, 'timeout'>; message: string };

export function found<T>(value: T): ProbeOutcome<T> {
  return { ok: true, value };
}

export function unavailable<T = never>(message: string): ProbeOutcome<T> {
  return { ok: false, kind: 'unavailable', message };
}

export function malformed<T = never>(message: string): ProbeOutcome<T> {
  return { ok: false, kind: 'malformed', message };
}

export interface ProbeDefinition<T> {
  name: string;
  timeoutMs: number;
  sideEffect: SideEffectClass;
  run: () => Promise<ProbeOutcome<T>>;
}

const FAILURE_CODES: Record<ProbeFailureKind, ErrorCode> = {
  unavailable: ErrorCode.PROBE_UNAVAILABLE,
  timeout: ErrorCode.PROBE_TIMEOUT,
  malformed: ErrorCode.PROBE_MALFORMED,
};

class ProbeTimeoutSignal {
  constructor(readonly timeoutMs: number) {}
}

function describeThrown(error: unknown): string {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? `${error.code}: ` : '';
    return code && error.message.startsWith(code) ? error.message : `${code}${error.message}`;
  }
  return String(error);
}

/**
 * Build a Probe from a body function. The body may throw; thrown errors
 * (missing files, permission errors, socket failures) count as the fact
 * being unavailable.
 */
export function defineProbe<T>(definition: ProbeDefinition<T>): Probe<T> {
  const { name, timeoutMs, sideEffect, run } = definition;

  return {
    name,
    timeoutMs,
    sideEffect,
    async attempt(): Promise<ProbeResult<T>> {
      const startTime = Date.now();
      let timer: NodeJS.Timeout | undefined;

      const timeout = new Promise<ProbeTimeoutSignal>((resolve) => {
        timer = setTimeout(() => resolve(new ProbeTimeoutSignal(timeoutMs)), timeoutMs);
      });

      const fail = (kind: ProbeFailureKind, message: string): ProbeResult<T> => ({
        ok: false,
        probe: name,
        failure: { probe: name, kind, code: FAILURE_CODES[kind], message },
        elapsedMs: Date.now() - startTime,
      });

      try {
        const outcome = await Promise.race([run(), timeout]);

        if (outcome instanceof ProbeTimeoutSignal) {
          return fail('timeout', `${name} exceeded ${outcome.timeoutMs}ms`);
        }
        if (!outcome.ok) {
          return fail(outcome.kind, outcome.message);
        }
        return { ok: true, probe: name, value: outcome.value, elapsedMs: Date.now() - startTime };
      } catch (error) {
        return fail('unavailable', describeThrown(error));
      } finally {
        clearTimeout(timer);
      }
    },
  };
}

/**
 * Map a probe's value without running anything new
 */
export function mapProbe<T, U>(probe: Probe<T>, name: string, transform: (value: T) => ProbeOutcome<U>): Probe<U> {
  return {
    name,
    timeoutMs: probe.timeoutMs,
    sideEffect: probe.sideEffect,
    async attempt(): Promise<ProbeResult<U>> {
      const result = await probe.attempt();
      if (!result.ok) {
        return { ok: false, probe: name, failure: { ...result.failure, probe: name }, elapsedMs: result.elapsedMs };
      }

      const outcome = transform(result.value);
      if (!outcome.ok) {
        return {
          ok: false,
          probe: name,
          failure: { probe: name, kind: outcome.kind, code: FAILURE_CODES[outcome.kind], message: outcome.message },
          elapsedMs: result.elapsedMs,
        };
      }
      return { ok: true, probe: name, value: outcome.value, elapsedMs: result.elapsedMs };
    },
  };
}
