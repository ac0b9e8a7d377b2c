/**
 * HTTP tests for the dashboard API, served on an ephemeral port
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import { FakeHost } from '../__tests__/fake-host.js';
import { dhcpHost } from '../__tests__/fixtures.js';
import { createTestConfig, createTestLogger } from '../__tests__/utils.js';
import { HostCapabilities } from '../capabilities/host-capabilities.js';
import type { Config } from '../config/schema.js';
import { HealthManager, HealthStatus } from '../health/index.js';
import { StatsAggregator } from '../stats/aggregator.js';
import { CpuSampler } from '../stats/system-metrics.js';
import { createApp } from './app.js';
import { StaticCredentialChecker } from './credentials.js';
import { startListener, type RunningListener } from './listener.js';

const AUTH = `Basic ${Buffer.from('admin:test-secret').toString('base64')}`;

const listenerConfig: Config['server'] = {
  port: 0,
  host: '127.0.0.1',
  nodeEnv: 'test',
  tls: { enabled: false, certFile: '', keyFile: '' },
};

let running: RunningListener | null = null;

afterEach(async () => {
  await running?.close();
  running = null;
});

async function serve(
  env: FakeHost,
  options: { auth?: boolean; health?: HealthManager; isProduction?: boolean } = {}
): Promise<string> {
  const config = createTestConfig();
  const logger = createTestLogger();
  const capabilities = new HostCapabilities({ config, logger, env });
  const aggregator = new StatsAggregator({
    capabilities,
    config,
    logger,
    cpuSampler: new CpuSampler(env, async () => undefined),
  });

  const app = createApp({
    capabilities,
    aggregator,
    health: options.health ?? new HealthManager(logger),
    logger,
    credentials: options.auth ? new StaticCredentialChecker('admin', 'test-secret') : null,
    realm: config.security.realm,
    isProduction: options.isProduction ?? false,
  });

  running = await startListener(app, listenerConfig, logger);
  return `http://127.0.0.1:${running.port}`;
}

describe('dashboard API', () => {
  describe('authentication', () => {
    it('should challenge requests without credentials', async () => {
      const base = await serve(new FakeHost(), { auth: true });

      const response = await fetch(`${base}/api/hardware`);

      expect(response.status).toBe(401);
      expect(response.headers.get('www-authenticate')).toBe('Basic realm="NVR Dashboard"');
      expect(await response.json()).toEqual({ error: 'Authentication required', code: 4001 });
    });

    it('should reject wrong credentials', async () => {
      const base = await serve(new FakeHost(), { auth: true });

      const response = await fetch(`${base}/api/hardware`, {
        headers: { authorization: `Basic ${Buffer.from('admin:wrong').toString('base64')}` },
      });

      expect(response.status).toBe(401);
    });

    it('should serve authenticated requests', async () => {
      const base = await serve(new FakeHost(), { auth: true });

      const response = await fetch(`${base}/api/hardware`, { headers: { authorization: AUTH } });

      expect(response.status).toBe(200);
    });

    it('should leave the health route open', async () => {
      const base = await serve(new FakeHost(), { auth: true });

      const response = await fetch(`${base}/api/health`);

      expect(response.status).toBe(200);
    });
  });

  describe('host routes', () => {
    it('should return the hardware profile', async () => {
      const base = await serve(new FakeHost());

      const body: unknown = await (await fetch(`${base}/api/hardware`)).json();

      expect(body).toEqual({
        hasNvme: false,
        hasUsbBackupVolume: false,
        hasSdCard: false,
        hasAccelerator: false,
        hasContainerRuntime: false,
        hasMonitoredService: false,
        bootDevice: 'UNKNOWN',
      });
    });

    it('should return exactly hasAccelerator false without an accelerator', async () => {
      const base = await serve(new FakeHost());

      const text = await (await fetch(`${base}/api/hardware/accelerator`)).text();

      expect(text).toBe('{"hasAccelerator":false}');
    });

    it('should return 200 with an unknown identity when every network strategy fails', async () => {
      const base = await serve(new FakeHost());

      const response = await fetch(`${base}/api/network`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        hostIp: null,
        containerIp: null,
        gateway: null,
        subnetMask: null,
        assignmentMode: 'UNKNOWN',
        sourceStrategy: 'none',
      });
    });

    it('should return the resolved network identity', async () => {
      const base = await serve(dhcpHost());

      const body: unknown = await (await fetch(`${base}/api/network`)).json();

      expect(body).toMatchObject({ hostIp: '192.168.1.50', assignmentMode: 'DHCP', sourceStrategy: 'host-namespace' });
    });

    it('should return null for an unresolved container identity', async () => {
      const env = new FakeHost();
      env.host = '';
      const base = await serve(env);

      const response = await fetch(`${base}/api/container`);

      expect(response.status).toBe(200);
      expect(await response.json()).toBeNull();
    });

    it('should return the storage inventory', async () => {
      const base = await serve(new FakeHost());

      const body: unknown = await (await fetch(`${base}/api/storage`)).json();

      expect(body).toEqual({ devices: [], backupVolume: null });
    });
  });

  describe('stats routes', () => {
    it('should embed unknown facts in the stats record', async () => {
      const base = await serve(new FakeHost());

      const response = await fetch(`${base}/api/stats`);
      const body: unknown = await response.json();

      expect(response.status).toBe(200);
      expect(body).toMatchObject({
        hardware: { bootDevice: 'UNKNOWN' },
        accelerator: { hasAccelerator: false },
        network: { identity: { sourceStrategy: 'none' } },
      });
    });

    it('should list container stats with the failure reason', async () => {
      const base = await serve(new FakeHost());

      const body: unknown = await (await fetch(`${base}/api/containers`)).json();

      expect(body).toEqual({ containers: [], error: 'docker stats exited 127: docker: not found' });
    });

    it('should tail container logs', async () => {
      const env = new FakeHost().command('docker logs --tail 20 scrypted', { stdout: 'started' });
      const base = await serve(env);

      const body: unknown = await (await fetch(`${base}/api/container/logs?container=scrypted&lines=20`)).json();

      expect(body).toEqual({ container: 'scrypted', lines: 20, logs: 'started' });
    });

    it('should reject a logs request without a container', async () => {
      const base = await serve(new FakeHost());

      const response = await fetch(`${base}/api/container/logs`);
      const body: unknown = await response.json();

      expect(response.status).toBe(400);
      expect(body).toMatchObject({ error: 'Validation failed', code: 4000 });
    });

    it('should reject an invalid container name', async () => {
      const base = await serve(new FakeHost());

      const response = await fetch(`${base}/api/container/logs?container=${encodeURIComponent('$(reboot)')}`);

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ error: 'Invalid container name: $(reboot)', code: 1001 });
    });

    it('should map runtime failures to 502 without a stack in production', async () => {
      const env = new FakeHost().command('docker logs --tail 500 ghost', { exitCode: 1, stderr: 'No such container: ghost' });
      const base = await serve(env, { isProduction: true });

      const response = await fetch(`${base}/api/container/logs?container=ghost`);

      expect(response.status).toBe(502);
      expect(await response.json()).toEqual({ error: 'Cannot read logs of ghost: No such container: ghost', code: 5000 });
    });
  });

  describe('container control', () => {
    const post = (base: string, action: string, body: string, headers: Record<string, string> = {}) =>
      fetch(`${base}/api/container/${action}`, {
        method: 'POST',
        headers: { 'content-type': 'application/json', ...headers },
        body,
      });

    it('should restart the named container', async () => {
      const env = new FakeHost().command('docker restart scrypted', { stdout: 'scrypted' });
      const base = await serve(env, { auth: true });

      const response = await post(base, 'restart', JSON.stringify({ container: 'scrypted' }), { authorization: AUTH });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ container: 'scrypted', action: 'restart', message: 'scrypted restarted' });
    });

    it('should require authentication', async () => {
      const env = new FakeHost();
      const base = await serve(env, { auth: true });

      const response = await post(base, 'stop', JSON.stringify({ container: 'scrypted' }));

      expect(response.status).toBe(401);
      expect(env.execCalls).toHaveLength(0);
    });

    it('should reject an unknown action', async () => {
      const env = new FakeHost();
      const base = await serve(env);

      const response = await post(base, 'remove', JSON.stringify({ container: 'scrypted' }));

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ error: 'Validation failed', code: 4000 });
      expect(env.execCalls).toHaveLength(0);
    });

    it('should reject a body that is not JSON', async () => {
      const base = await serve(new FakeHost());

      const response = await post(base, 'start', '{ container: ');

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ code: 4000 });
    });

    it('should map a runtime failure to 502', async () => {
      const env = new FakeHost().command('docker start ghost', { exitCode: 1, stderr: 'No such container: ghost' });
      const base = await serve(env, { isProduction: true });

      const response = await post(base, 'start', JSON.stringify({ container: 'ghost' }));

      expect(response.status).toBe(502);
      expect(await response.json()).toEqual({ error: 'Cannot start ghost: No such container: ghost', code: 5000 });
    });
  });

  describe('health and fallbacks', () => {
    it('should answer 503 when a critical check fails', async () => {
      const health = new HealthManager(createTestLogger());
      health.registerCheck('server-alive', async () => ({ status: HealthStatus.UNHEALTHY, message: 'stopping' }), true);
      const base = await serve(new FakeHost(), { health });

      const response = await fetch(`${base}/api/health`);
      const body: unknown = await response.json();

      expect(response.status).toBe(503);
      expect(body).toMatchObject({ status: 'unhealthy', checks: { 'server-alive': { status: 'unhealthy' } } });
    });

    it('should answer 200 while only degraded', async () => {
      const health = new HealthManager(createTestLogger());
      health.registerCheck('container-runtime', async () => ({ status: HealthStatus.DEGRADED }));
      const base = await serve(new FakeHost(), { health });

      const response = await fetch(`${base}/api/health`);

      expect(response.status).toBe(200);
    });

    it('should answer unknown routes with a JSON 404', async () => {
      const base = await serve(new FakeHost());

      const response = await fetch(`${base}/api/nope`);

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: 'Not found', path: '/api/nope' });
    });
  });
});
