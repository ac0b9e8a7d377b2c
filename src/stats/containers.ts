/**
 * Container runtime statistics and log tails
 */

import type { Config } from '../config/schema.js';
import { ContainerRuntimeError, ValidationError } from '../errors/index.js';
import type { HostEnvironment } from '../host/environment.js';
import { serviceStateProbe } from '../probes/container-runtime.js';
import { defineProbe, found, unavailable } from '../probes/probe.js';
import type {
  ContainerAction,
  ContainerActionResult,
  ContainerLogs,
  ContainerStats,
  ServiceStats,
} from '../types/container.js';
import type { Probe } from '../types/probe.js';

export const STATS_FORMAT = '{{.Name}}|{{.CPUPerc}}|{{.MemUsage}}|{{.MemPerc}}|{{.NetIO}}|{{.BlockIO}}';

export const CONTAINER_ACTIONS = ['start', 'stop', 'restart'] as const satisfies readonly ContainerAction[];

// stop and restart wait out the runtime's own 10 s grace period
const CONTROL_TIMEOUT_MS = 30000;

const PAST_TENSE: Record<ContainerAction, string> = {
  start: 'started',
  stop: 'stopped',
  restart: 'restarted',
};

// Runtime container names: alphanumerics plus _ . -, not starting with a separator
const CONTAINER_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]{0,127}$/;

function percent(value: string | undefined): number | null {
  if (!value) {
    return null;
  }
  const parsed = parseFloat(value.replace('%', ''));
  return isNaN(parsed) ? null : parsed;
}

function optional(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed && trimmed !== '--' ? trimmed : null;
}

/**
 * Parse `stats --no-stream` output in STATS_FORMAT, one container per line
 */
export function parseContainerStats(output: string): ContainerStats[] {
  const containers: ContainerStats[] = [];

  for (const line of output.split('\n')) {
    if (!line.trim()) continue;

    const [name, cpu, memoryUsage, memoryPercent, netIO, blockIO] = line.split('|');
    if (!name || memoryUsage === undefined || memoryPercent === undefined) continue;

    containers.push({
      name: name.trim(),
      cpuPercent: percent(cpu),
      memoryUsage: memoryUsage.trim(),
      memoryPercent: percent(memoryPercent),
      netIO: optional(netIO),
      blockIO: optional(blockIO),
      status: 'running',
    });
  }

  return containers;
}

export function containerStatsProbe(env: HostEnvironment, config: Config['container']): Probe<ContainerStats[]> {
  // stats waits for one sampling round per container
  const timeoutMs = config.probeTimeout * 2;

  return defineProbe({
    name: 'container-stats',
    timeoutMs,
    sideEffect: 'external-process-invocation',
    run: async () => {
      const result = await env.exec(config.runtimeBinary, ['stats', '--no-stream', '--format', STATS_FORMAT], timeoutMs);
      if (result.exitCode !== 0) {
        return unavailable(`${config.runtimeBinary} stats exited ${result.exitCode}: ${result.stderr}`);
      }
      return found(parseContainerStats(result.stdout));
    },
  });
}

export function isValidContainerName(name: string): boolean {
  return CONTAINER_NAME_PATTERN.test(name);
}

/**
 * Last lines of a container's log. Unlike the probes this is an explicit
 * request, so failures are raised to the caller.
 */
export async function tailContainerLogs(
  env: HostEnvironment,
  config: Config['container'],
  container: string,
  lines: number
): Promise<ContainerLogs> {
  if (!isValidContainerName(container)) {
    throw new ValidationError(`Invalid container name: ${container}`, { container });
  }

  const result = await env.exec(
    config.runtimeBinary,
    ['logs', '--tail', String(lines), container],
    config.probeTimeout * 2
  );
  if (result.timedOut) {
    throw new ContainerRuntimeError(`Timed out reading logs of ${container}`, { container });
  }
  if (result.exitCode !== 0) {
    throw new ContainerRuntimeError(`Cannot read logs of ${container}: ${result.stderr}`, {
      container,
      exitCode: result.exitCode,
    });
  }

  // The runtime replays the container's stderr on its own stderr
  const logs = [result.stdout, result.stderr].filter((part) => part !== '').join('\n');
  return { container, lines, logs };
}

/**
 * Start, stop or restart a container. Like log tails this is an explicit
 * request and failures are raised.
 */
export async function controlContainer(
  env: HostEnvironment,
  config: Config['container'],
  container: string,
  action: ContainerAction
): Promise<ContainerActionResult> {
  if (!isValidContainerName(container)) {
    throw new ValidationError(`Invalid container name: ${container}`, { container });
  }

  const result = await env.exec(config.runtimeBinary, [action, container], CONTROL_TIMEOUT_MS);
  if (result.timedOut) {
    throw new ContainerRuntimeError(`Timed out trying to ${action} ${container}`, { container, action });
  }
  if (result.exitCode !== 0) {
    throw new ContainerRuntimeError(`Cannot ${action} ${container}: ${result.stderr || 'command failed'}`, {
      container,
      action,
      exitCode: result.exitCode,
    });
  }

  return { container, action, message: `${container} ${PAST_TENSE[action]}` };
}

function parseStartedAt(value: string): number | null {
  // Date.parse takes at most millisecond precision; the runtime prints nanoseconds
  const started = Date.parse(value.replace(/(\.\d{3})\d+/, '$1'));
  // Never-started containers report 0001-01-01
  return isNaN(started) || started <= 0 ? null : started;
}

/**
 * State and uptime of the monitored service's container, or null when the
 * runtime does not know it
 */
export async function collectServiceState(
  env: HostEnvironment,
  config: Config['container'],
  now: number
): Promise<ServiceStats | null> {
  const result = await serviceStateProbe(env, {
    binary: config.runtimeBinary,
    serviceName: config.serviceName,
    timeoutMs: config.probeTimeout,
  }).attempt();
  if (!result.ok) {
    return null;
  }

  const started = parseStartedAt(result.value.startedAt);
  return {
    name: config.serviceName,
    status: result.value.status,
    startedAt: started === null ? null : new Date(started).toISOString(),
    uptimeSeconds:
      started !== null && result.value.status === 'running' ? Math.max(0, Math.floor((now - started) / 1000)) : null,
  };
}
