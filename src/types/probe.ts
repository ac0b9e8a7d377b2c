/**
 * Probe type definitions
 */

import type { ErrorCode } from '../errors/types.js';

/**
 * What a probe touches when it runs
 */
export type SideEffectClass = 'read-only-filesystem' | 'read-only-network' | 'external-process-invocation';

export type ProbeFailureKind = 'unavailable' | 'timeout' | 'malformed';

export interface ProbeFailure {
  probe: string;
  kind: ProbeFailureKind;
  code: ErrorCode;
  message: string;
}

export type ProbeResult<T> =
  | { ok: true; probe: string; value: T; elapsedMs: number }
  | { ok: false; probe: string; failure: ProbeFailure; elapsedMs: number };

/**
 * A single fact-gathering operation against the live environment.
 * attempt() always resolves; failures come back as typed results.
 */
export interface Probe<T> {
  readonly name: string;
  readonly timeoutMs: number;
  readonly sideEffect: SideEffectClass;
  attempt(): Promise<ProbeResult<T>>;
}
