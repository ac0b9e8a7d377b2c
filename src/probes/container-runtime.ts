/**
 * Container runtime probes.
 *
 * All of these shell out to the runtime CLI (docker by default) or read
 * the cgroup files of the current process.
 */

import type { HostEnvironment } from '../host/environment.js';
import type { Probe } from '../types/probe.js';
import { defineProbe, found, malformed, unavailable } from './probe.js';

export interface RuntimeProbeOptions {
  binary: string;
  timeoutMs: number;
}

// Full runtime ids are 64 hex digits; cgroup scopes may carry 12 to 64
const CONTAINER_ID_PATTERN = /(?<![0-9a-f])([0-9a-f]{12,64})(?![0-9a-f])/;
const CONTAINERS_DIR_PATTERN = /\/containers\/([0-9a-f]{64})\//;

/**
 * Find the first container id in cgroup or mountinfo content.
 * Overlay layer directories also carry 64-digit names and are skipped.
 */
export function extractContainerId(content: string): string | null {
  const lines = content.split('\n');

  for (const line of lines) {
    const match = CONTAINERS_DIR_PATTERN.exec(line);
    if (match && match[1]) {
      return match[1];
    }
  }

  for (const line of lines) {
    if (line.includes('overlay')) continue;
    const match = CONTAINER_ID_PATTERN.exec(line);
    if (match && match[1]) {
      return match[1];
    }
  }
  return null;
}

/**
 * Runtime binary present and answering; resolves to its version line
 */
export function runtimeAvailableProbe(env: HostEnvironment, options: RuntimeProbeOptions): Probe<string> {
  return defineProbe({
    name: 'container-runtime',
    timeoutMs: options.timeoutMs,
    sideEffect: 'external-process-invocation',
    run: async () => {
      const result = await env.exec(options.binary, ['--version'], options.timeoutMs);
      if (result.exitCode !== 0) {
        return unavailable(`${options.binary} --version exited ${result.exitCode}: ${result.stderr}`);
      }
      return result.stdout ? found(result.stdout.split('\n')[0] ?? result.stdout) : malformed('empty version output');
    },
  });
}

/**
 * Names of running containers matching the monitored service name
 */
export function serviceRunningProbe(
  env: HostEnvironment,
  options: RuntimeProbeOptions & { serviceName: string }
): Probe<string[]> {
  return defineProbe({
    name: 'monitored-service',
    timeoutMs: options.timeoutMs,
    sideEffect: 'external-process-invocation',
    run: async () => {
      const result = await env.exec(
        options.binary,
        ['ps', '--filter', `name=${options.serviceName}`, '--format', '{{.Names}}'],
        options.timeoutMs
      );
      if (result.exitCode !== 0) {
        return unavailable(`${options.binary} ps exited ${result.exitCode}: ${result.stderr}`);
      }

      const names = result.stdout
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.includes(options.serviceName));

      return names.length > 0 ? found(names) : unavailable(`no running container named ${options.serviceName}`);
    },
  });
}

export interface ServiceState {
  status: string;
  startedAt: string;
}

/**
 * Status and start time of the monitored service's container
 */
export function serviceStateProbe(
  env: HostEnvironment,
  options: RuntimeProbeOptions & { serviceName: string }
): Probe<ServiceState> {
  return defineProbe({
    name: 'service-state',
    timeoutMs: options.timeoutMs,
    sideEffect: 'external-process-invocation',
    run: async () => {
      const result = await env.exec(
        options.binary,
        ['inspect', '--format', '{{.State.Status}}|{{.State.StartedAt}}', options.serviceName],
        options.timeoutMs
      );
      if (result.exitCode !== 0) {
        return unavailable(`${options.binary} inspect exited ${result.exitCode}: ${result.stderr}`);
      }

      const [status, startedAt] = result.stdout.trim().split('|');
      if (!status || startedAt === undefined) {
        return malformed(`unexpected inspect output: ${result.stdout}`);
      }
      return found({ status, startedAt });
    },
  });
}

/**
 * Own container id, read from the cgroup membership of this process
 */
export function cgroupContainerIdProbe(
  env: HostEnvironment,
  options: { paths: readonly string[]; timeoutMs: number }
): Probe<string> {
  return defineProbe({
    name: 'cgroup-container-id',
    timeoutMs: options.timeoutMs,
    sideEffect: 'read-only-filesystem',
    run: async () => {
      let readAny = false;

      // cgroup v2 hosts often show only "0::/" in /proc/self/cgroup,
      // so each candidate is tried in turn rather than the first readable one
      for (const path of options.paths) {
        let content: string;
        try {
          content = await env.readFile(path);
        } catch {
          continue;
        }
        readAny = true;

        const id = extractContainerId(content);
        if (id) {
          return found(id);
        }
      }

      return readAny
        ? unavailable('no container id in cgroup membership')
        : unavailable(`none of ${options.paths.join(', ')} could be read`);
    },
  });
}

/**
 * Container name the runtime reports for an id, without the leading slash
 */
export function inspectNameProbe(
  env: HostEnvironment,
  options: RuntimeProbeOptions & { containerId: string }
): Probe<string> {
  return defineProbe({
    name: 'container-inspect',
    timeoutMs: options.timeoutMs,
    sideEffect: 'external-process-invocation',
    run: async () => {
      const result = await env.exec(
        options.binary,
        ['inspect', '--format', '{{.Name}}', options.containerId],
        options.timeoutMs
      );
      if (result.exitCode !== 0) {
        return unavailable(`${options.binary} inspect exited ${result.exitCode}: ${result.stderr}`);
      }

      const name = result.stdout.trim().replace(/^\//, '');
      return name ? found(name) : malformed(`empty name for container ${options.containerId}`);
    },
  });
}

/**
 * The process hostname, which the runtime sets to the short container id
 * unless told otherwise
 */
export function hostnameProbe(env: HostEnvironment, options: { timeoutMs: number }): Probe<string> {
  return defineProbe({
    name: 'hostname',
    timeoutMs: options.timeoutMs,
    sideEffect: 'read-only-filesystem',
    run: async () => {
      const hostname = env.hostname().trim();
      return hostname ? found(hostname) : unavailable('hostname is empty');
    },
  });
}
