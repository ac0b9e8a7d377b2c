/**
 * Unit tests for container identity resolution
 */

import { describe, it, expect } from '@jest/globals';
import { FakeHost } from '../__tests__/fake-host.js';
import { createTestConfig } from '../__tests__/utils.js';
import type { Config } from '../config/schema.js';
import { resolveContainerIdentity } from './container.js';

const CONTAINER_ID = '0123456789abcdef'.repeat(4);
const INSPECT_COMMAND = `docker inspect --format {{.Name}} ${CONTAINER_ID}`;

function containerConfig(overrides: Partial<Config['container']> = {}): Config['container'] {
  return createTestConfig({ container: overrides }).container;
}

function containerHost(): FakeHost {
  return new FakeHost().file('/proc/self/cgroup', `0::/system.slice/docker-${CONTAINER_ID}.scope\n`);
}

describe('container identity resolution', () => {
  it('should prefer the configured name', async () => {
    const env = containerHost().command(INSPECT_COMMAND, { stdout: '/runtime-name' });

    const identity = await resolveContainerIdentity(env, containerConfig({ nameOverride: 'nvr-dashboard' }));

    expect(identity).toEqual({ name: 'nvr-dashboard', id: CONTAINER_ID, resolvedVia: 'ENV_OVERRIDE' });
  });

  it('should name the container through the runtime', async () => {
    const env = containerHost().command(INSPECT_COMMAND, { stdout: '/nvr-dashboard\n' });

    const identity = await resolveContainerIdentity(env, containerConfig());

    expect(identity).toEqual({ name: 'nvr-dashboard', id: CONTAINER_ID, resolvedVia: 'CGROUP_LOOKUP' });
  });

  it('should keep the cgroup id when only the hostname names the container', async () => {
    const env = containerHost();
    env.host = '0123456789ab';

    const identity = await resolveContainerIdentity(env, containerConfig());

    expect(identity).toEqual({ name: '0123456789ab', id: CONTAINER_ID, resolvedVia: 'HOSTNAME_FALLBACK' });
  });

  it('should fall back to the hostname for both fields', async () => {
    const env = new FakeHost();
    env.host = 'nvr-box';

    const identity = await resolveContainerIdentity(env, containerConfig());

    expect(identity).toEqual({ name: 'nvr-box', id: 'nvr-box', resolvedVia: 'HOSTNAME_FALLBACK' });
  });

  it('should return null when nothing names the container', async () => {
    const env = new FakeHost();
    env.host = '';

    await expect(resolveContainerIdentity(env, containerConfig())).resolves.toBeNull();
  });
});
