/**
 * Resolution of this process's own container identity
 */

import type { Config } from '../config/schema.js';
import type { HostEnvironment } from '../host/environment.js';
import type { Logger } from '../logger/index.js';
import { cgroupContainerIdProbe, hostnameProbe, inspectNameProbe } from '../probes/container-runtime.js';
import type { ContainerFacts, ContainerIdentity, ContainerResolvedVia } from '../types/container.js';
import type { ProbeResult } from '../types/probe.js';
import { resolveByField, type Strategy } from './chain.js';

const RESOLVED_VIA: Record<string, ContainerResolvedVia> = {
  'env-override': 'ENV_OVERRIDE',
  'cgroup-lookup': 'CGROUP_LOOKUP',
  hostname: 'HOSTNAME_FALLBACK',
};

export const CGROUP_PATHS = ['/proc/self/cgroup', '/proc/self/mountinfo'] as const;

function envOverrideStrategy(nameOverride: string): Strategy<ContainerFacts> {
  return {
    name: 'env-override',
    attempt: async (): Promise<ProbeResult<Partial<ContainerFacts>>> => ({
      ok: true,
      probe: 'env-override',
      value: { name: nameOverride },
      elapsedMs: 0,
    }),
  };
}

/**
 * Container id from cgroup membership, then its name from the runtime.
 * An id without a name is still reported.
 */
function cgroupLookupStrategy(env: HostEnvironment, config: Config['container']): Strategy<ContainerFacts> {
  const name = 'cgroup-lookup';

  return {
    name,
    async attempt(): Promise<ProbeResult<Partial<ContainerFacts>>> {
      const id = await cgroupContainerIdProbe(env, { paths: CGROUP_PATHS, timeoutMs: config.probeTimeout }).attempt();
      if (!id.ok) {
        return { ...id, probe: name };
      }

      const inspected = await inspectNameProbe(env, {
        binary: config.runtimeBinary,
        containerId: id.value,
        timeoutMs: config.probeTimeout,
      }).attempt();

      const value: Partial<ContainerFacts> = { id: id.value };
      if (inspected.ok) {
        value.name = inspected.value;
      }
      return { ok: true, probe: name, value, elapsedMs: id.elapsedMs + inspected.elapsedMs };
    },
  };
}

export function containerStrategies(env: HostEnvironment, config: Config['container']): Strategy<ContainerFacts>[] {
  const strategies: Strategy<ContainerFacts>[] = [];

  if (config.nameOverride) {
    strategies.push(envOverrideStrategy(config.nameOverride));
  }

  strategies.push(cgroupLookupStrategy(env, config), {
    name: 'hostname',
    attempt: async (): Promise<ProbeResult<Partial<ContainerFacts>>> => {
      const result = await hostnameProbe(env, { timeoutMs: config.probeTimeout }).attempt();
      // The runtime names the container's host after its short id
      return result.ok ? { ...result, value: { name: result.value, id: result.value } } : result;
    },
  });

  return strategies;
}

/**
 * Resolve the container identity, or null when no strategy names it
 */
export async function resolveContainerIdentity(
  env: HostEnvironment,
  config: Config['container'],
  logger?: Logger
): Promise<ContainerIdentity | null> {
  const { value, sources } = await resolveByField(containerStrategies(env, config), {
    fields: ['name', 'id'],
    logger,
  });

  const resolvedVia = sources.name ? RESOLVED_VIA[sources.name] : undefined;
  if (!value.name || !resolvedVia) {
    return null;
  }

  return { name: value.name, id: value.id ?? value.name, resolvedVia };
}
