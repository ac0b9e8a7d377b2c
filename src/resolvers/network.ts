/**
 * Network identity resolution
 *
 * Precedence for every field: operator override, host namespace, host
 * route table, host FIB, outbound socket, interface priority. Fields that
 * no strategy reports stay null.
 */

import type { Config } from '../config/schema.js';
import { InvariantViolationError } from '../errors/index.js';
import type { HostEnvironment } from '../host/environment.js';
import type { Logger } from '../logger/index.js';
import { isExcludedAddress, parseCidr, type CidrRange } from '../net/ipv4.js';
import {
  fibTrieProbe,
  hostDefaultRouteProbe,
  hostInterfaceAddressProbe,
  interfacePriorityProbe,
  outboundAddressProbe,
  routeTableProbe,
} from '../probes/network.js';
import { found, mapProbe } from '../probes/probe.js';
import type { AssignmentMode, NetworkFacts, NetworkIdentity } from '../types/network.js';
import type { ProbeResult } from '../types/probe.js';
import { resolveByField, type Strategy } from './chain.js';

export const NO_STRATEGY = 'none';
export const OVERRIDE_STRATEGY = 'operator-override';

const NETWORK_FIELDS: readonly (keyof NetworkFacts)[] = ['hostIp', 'containerIp', 'gateway', 'subnetMask'];
const ADDRESS_FIELDS: ReadonlySet<keyof NetworkFacts> = new Set(['hostIp', 'containerIp', 'gateway']);

export interface NetworkResolverOptions {
  config: Config['network'];
  /** Byte order of the host's route table; defaults to this machine's */
  routeByteOrder?: 'LE' | 'BE';
}

export function excludedRanges(config: Config['network']): CidrRange[] {
  return config.excludedRanges.flatMap((cidr) => {
    const range = parseCidr(cidr);
    return range ? [range] : [];
  });
}

/**
 * Operator-configured address: the override IP, or the static network
 * descriptor with its optional gateway and subnet
 */
export function operatorOverrideStrategy(config: Config['network']): Strategy<NetworkFacts> | null {
  const hostIp = config.ipOverride ?? config.staticNetwork?.ip;
  if (!hostIp) {
    return null;
  }

  const value: Partial<NetworkFacts> = { hostIp, assignmentMode: 'STATIC_OVERRIDE' };
  if (config.staticNetwork?.gateway) value.gateway = config.staticNetwork.gateway;
  if (config.staticNetwork?.subnet) value.subnetMask = config.staticNetwork.subnet;

  return {
    name: OVERRIDE_STRATEGY,
    attempt: async (): Promise<ProbeResult<Partial<NetworkFacts>>> => ({
      ok: true,
      probe: OVERRIDE_STRATEGY,
      value,
      elapsedMs: 0,
    }),
  };
}

/**
 * Default route, then the egress interface's address, both read inside the
 * host's network namespace. A missing address still leaves the gateway.
 * The two commands share one probeTimeout between them.
 */
export function hostNamespaceStrategy(env: HostEnvironment, config: Config['network']): Strategy<NetworkFacts> {
  const name = 'host-namespace';
  const routeBudget = Math.ceil(config.probeTimeout / 2);
  const addressBudget = config.probeTimeout - routeBudget;

  return {
    name,
    async attempt(): Promise<ProbeResult<Partial<NetworkFacts>>> {
      const route = await hostDefaultRouteProbe(env, {
        netnsPath: config.hostNetnsPath,
        timeoutMs: routeBudget,
      }).attempt();
      if (!route.ok) {
        return { ...route, probe: name };
      }

      const value: Partial<NetworkFacts> = {
        gateway: route.value.gateway,
        interfaceName: route.value.interfaceName,
      };

      const address = await hostInterfaceAddressProbe(env, {
        netnsPath: config.hostNetnsPath,
        interfaceName: route.value.interfaceName,
        timeoutMs: addressBudget,
      }).attempt();

      if (address.ok) {
        value.hostIp = address.value.address;
        value.subnetMask = address.value.subnetMask;
        const assignment = address.value.assignment ?? (route.value.viaDhcp ? 'DHCP' : null);
        if (assignment) {
          value.assignmentMode = assignment;
        }
      }

      return { ok: true, probe: name, value, elapsedMs: route.elapsedMs + address.elapsedMs };
    },
  };
}

/**
 * Every network strategy, in precedence order
 */
export function networkStrategies(env: HostEnvironment, options: NetworkResolverOptions): Strategy<NetworkFacts>[] {
  const { config } = options;
  const ranges = excludedRanges(config);
  const strategies: Strategy<NetworkFacts>[] = [];

  const override = operatorOverrideStrategy(config);
  if (override) {
    strategies.push(override);
  }

  strategies.push(
    hostNamespaceStrategy(env, config),
    mapProbe(
      routeTableProbe(env, {
        procNetDir: config.hostProcNetDir,
        timeoutMs: config.probeTimeout,
        byteOrder: options.routeByteOrder,
      }),
      'route-table',
      (facts) =>
        found<Partial<NetworkFacts>>({
          gateway: facts.gateway,
          interfaceName: facts.interfaceName,
          subnetMask: facts.subnetMask ?? undefined,
        })
    ),
    mapProbe(
      fibTrieProbe(env, { procNetDir: config.hostProcNetDir, excludedRanges: ranges, timeoutMs: config.probeTimeout }),
      'fib-trie',
      (hostIp) => found<Partial<NetworkFacts>>({ hostIp })
    ),
    mapProbe(
      outboundAddressProbe(env, {
        target: config.outboundProbeTarget,
        excludedRanges: ranges,
        timeoutMs: config.probeTimeout,
      }),
      'outbound-socket',
      (address) => found<Partial<NetworkFacts>>({ hostIp: address, containerIp: address })
    ),
    mapProbe(
      interfacePriorityProbe(env, {
        priority: config.interfacePriority,
        excludedRanges: ranges,
        timeoutMs: config.probeTimeout,
      }),
      'interface-priority',
      (facts) =>
        found<Partial<NetworkFacts>>({
          hostIp: facts.address,
          containerIp: facts.address,
          subnetMask: facts.subnetMask ?? undefined,
          interfaceName: facts.interfaceName,
        })
    )
  );

  return strategies;
}

/**
 * Check the record against its invariants before anyone sees it
 */
export function assertNetworkIdentity(identity: NetworkIdentity, ranges: readonly CidrRange[]): NetworkIdentity {
  const { hostIp, containerIp, gateway, assignmentMode, sourceStrategy } = identity;

  if (hostIp === null && assignmentMode !== 'UNKNOWN') {
    throw new InvariantViolationError(`assignmentMode ${assignmentMode} reported without a host IP`, { identity });
  }
  if (assignmentMode === 'STATIC_OVERRIDE' && sourceStrategy !== OVERRIDE_STRATEGY) {
    throw new InvariantViolationError(`STATIC_OVERRIDE reported by ${sourceStrategy}`, { identity });
  }
  if (hostIp !== null && sourceStrategy === NO_STRATEGY) {
    throw new InvariantViolationError('host IP resolved without a source strategy', { identity });
  }
  for (const address of [hostIp, containerIp, gateway]) {
    if (address !== null && isExcludedAddress(address, ranges)) {
      throw new InvariantViolationError(`excluded address ${address} in network identity`, { identity });
    }
  }

  return identity;
}

/**
 * Resolve the host's network identity. Never throws for environment
 * conditions; an unresolvable identity comes back with null fields.
 */
export async function resolveNetworkIdentity(
  env: HostEnvironment,
  options: NetworkResolverOptions,
  logger?: Logger
): Promise<NetworkIdentity> {
  const ranges = excludedRanges(options.config);

  const resolution = await resolveByField(networkStrategies(env, options), {
    fields: NETWORK_FIELDS,
    concurrent: options.config.resolveConcurrently,
    accept: (field, value) => !(ADDRESS_FIELDS.has(field) && typeof value === 'string' && isExcludedAddress(value, ranges)),
    logger,
  });

  const { value, sources } = resolution;
  const sourceStrategy = sources.hostIp ?? NO_STRATEGY;

  // The lease marker travels with the address it describes
  let assignmentMode: AssignmentMode = 'UNKNOWN';
  if (value.hostIp !== undefined) {
    const winner = resolution.attempts.find((attempt) => attempt.probe === sourceStrategy);
    if (winner?.ok && winner.value.assignmentMode) {
      assignmentMode = winner.value.assignmentMode;
    }
  }

  if (resolution.rejected.length > 0) {
    logger?.debug('Discarded excluded addresses', {
      rejected: resolution.rejected.map(({ strategy, field }) => `${strategy}.${String(field)}`),
    });
  }

  return assertNetworkIdentity(
    {
      hostIp: value.hostIp ?? null,
      containerIp: value.containerIp ?? null,
      gateway: value.gateway ?? null,
      subnetMask: value.subnetMask ?? null,
      assignmentMode,
      sourceStrategy,
    },
    ranges
  );
}
