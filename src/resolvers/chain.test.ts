/**
 * Unit tests for field-by-field strategy chains
 */

import { describe, it, expect } from '@jest/globals';
import { ErrorCode } from '../errors/types.js';
import type { ProbeResult } from '../types/probe.js';
import { deferred } from '../__tests__/utils.js';
import { isComplete, resolveByField, type Strategy } from './chain.js';

interface Record3 {
  a: string;
  b: string;
  c: string;
}

function answering(name: string, value: Partial<Record3>, calls: string[] = []): Strategy<Record3> {
  return {
    name,
    attempt: async () => {
      calls.push(name);
      return { ok: true, probe: name, value, elapsedMs: 0 };
    },
  };
}

function failing(name: string, calls: string[] = []): Strategy<Record3> {
  return {
    name,
    attempt: async () => {
      calls.push(name);
      return {
        ok: false,
        probe: name,
        failure: { probe: name, kind: 'unavailable', code: ErrorCode.PROBE_UNAVAILABLE, message: 'absent' },
        elapsedMs: 0,
      };
    },
  };
}

const FIELDS = ['a', 'b', 'c'] as const;

describe('resolveByField', () => {
  it('should take each field from the earliest strategy that reports it', async () => {
    const resolution = await resolveByField(
      [answering('first', { a: 'a1' }), failing('second'), answering('third', { a: 'a3', b: 'b3' }), answering('fourth', { c: 'c4' })],
      { fields: FIELDS }
    );

    expect(resolution.value).toEqual({ a: 'a1', b: 'b3', c: 'c4' });
    expect(resolution.sources).toEqual({ a: 'first', b: 'third', c: 'fourth' });
    expect(resolution.attempts.map((attempt) => attempt.probe)).toEqual(['first', 'second', 'third', 'fourth']);
  });

  it('should stop once every field is known', async () => {
    const calls: string[] = [];

    await resolveByField([answering('first', { a: 'a', b: 'b', c: 'c' }, calls), answering('second', { a: 'x' }, calls)], {
      fields: FIELDS,
    });

    expect(calls).toEqual(['first']);
  });

  it('should skip null values', async () => {
    const resolution = await resolveByField<{ a: string | null }>(
      [
        { name: 'nulls', attempt: async () => ({ ok: true, probe: 'nulls', value: { a: null }, elapsedMs: 0 }) },
        { name: 'real', attempt: async () => ({ ok: true, probe: 'real', value: { a: 'x' }, elapsedMs: 0 }) },
      ],
      { fields: ['a'] }
    );

    expect(resolution.value).toEqual({ a: 'x' });
    expect(resolution.sources).toEqual({ a: 'real' });
  });

  it('should drop values the accept filter rejects', async () => {
    const resolution = await resolveByField([answering('first', { a: 'bad' }), answering('second', { a: 'good' })], {
      fields: ['a'],
      accept: (_field, value) => value !== 'bad',
    });

    expect(resolution.value).toEqual({ a: 'good' });
    expect(resolution.rejected).toEqual([{ strategy: 'first', field: 'a' }]);
  });

  it('should merge concurrent results in strategy order whatever order they settle in', async () => {
    const slow = deferred<ProbeResult<Partial<Record3>>>();
    const calls: string[] = [];
    const strategies: Strategy<Record3>[] = [
      { name: 'slow', attempt: () => slow.promise },
      answering('fast', { a: 'fast', b: 'fast' }, calls),
    ];

    const pending = resolveByField(strategies, { fields: FIELDS, concurrent: true });
    await Promise.resolve();
    slow.resolve({ ok: true, probe: 'slow', value: { a: 'slow' }, elapsedMs: 5 });
    const resolution = await pending;

    expect(calls).toEqual(['fast']);
    expect(resolution.value).toEqual({ a: 'slow', b: 'fast' });
    expect(resolution.sources).toEqual({ a: 'slow', b: 'fast' });
  });

  it('should give the same answer sequentially and concurrently', async () => {
    const strategies = [failing('one'), answering('two', { b: 'b2' }), answering('three', { a: 'a3', b: 'b3' })];

    const sequential = await resolveByField(strategies, { fields: FIELDS });
    const concurrent = await resolveByField(strategies, { fields: FIELDS, concurrent: true });

    expect(concurrent.value).toEqual(sequential.value);
    expect(concurrent.sources).toEqual(sequential.sources);
  });
});

describe('isComplete', () => {
  it('should require every listed field', () => {
    expect(isComplete<Record3>({ a: 'x', b: 'y' }, ['a', 'b'])).toBe(true);
    expect(isComplete<Record3>({ a: 'x' }, ['a', 'b'])).toBe(false);
  });
});
