/**
 * Filesystem probes: device nodes, mounted volumes, and the two sources
 * that say which block device the host booted from
 */

import type { HostEnvironment } from '../host/environment.js';
import type { Probe } from '../types/probe.js';
import { parseCmdlineParam, parseMounts } from '../utils/proc-parser.js';
import { defineProbe, found, malformed, unavailable } from './probe.js';

/**
 * Read the first of several candidate files that exists
 */
export async function readFirst(env: HostEnvironment, paths: readonly string[]): Promise<{ path: string; content: string }> {
  let lastError: unknown = new Error(`none of ${paths.join(', ')} could be read`);

  for (const path of paths) {
    try {
      return { path, content: await env.readFile(path) };
    } catch (error) {
      lastError = error;
    }
  }

  throw lastError;
}

/**
 * Resolves to the first candidate device node that exists
 */
export function deviceNodeProbe(
  env: HostEnvironment,
  options: { name: string; candidates: readonly string[]; timeoutMs: number }
): Probe<string> {
  return defineProbe({
    name: options.name,
    timeoutMs: options.timeoutMs,
    sideEffect: 'read-only-filesystem',
    run: async () => {
      for (const candidate of options.candidates) {
        if (await env.exists(candidate)) {
          return found(candidate);
        }
      }
      return unavailable(`no device node among ${options.candidates.join(', ')}`);
    },
  });
}

/**
 * Resolves to the first path that both exists and is a mount point.
 * An empty directory left behind by an unplugged drive does not count.
 */
export function mountedVolumeProbe(
  env: HostEnvironment,
  options: { name: string; paths: readonly string[]; timeoutMs: number }
): Probe<string> {
  return defineProbe({
    name: options.name,
    timeoutMs: options.timeoutMs,
    sideEffect: 'read-only-filesystem',
    run: async () => {
      for (const path of options.paths) {
        if ((await env.exists(path)) && (await env.isMountPoint(path))) {
          return found(path);
        }
      }
      return unavailable(`no mounted volume at ${options.paths.join(', ')}`);
    },
  });
}

/**
 * Block device backing "/" according to the host's mount table.
 * Overlay and pseudo sources ("overlay", "/dev/root") cannot be classified.
 */
export function rootSourceProbe(
  env: HostEnvironment,
  options: { mountTablePaths: readonly string[]; timeoutMs: number }
): Probe<string> {
  return defineProbe({
    name: 'root-mount-source',
    timeoutMs: options.timeoutMs,
    sideEffect: 'read-only-filesystem',
    run: async () => {
      const { path, content } = await readFirst(env, options.mountTablePaths);
      const rootMounts = parseMounts(content).filter((entry) => entry.mountpoint === '/');

      if (rootMounts.length === 0) {
        return malformed(`${path} has no entry for /`);
      }

      // Later entries shadow earlier ones
      const device = [...rootMounts]
        .reverse()
        .find((entry) => entry.source.startsWith('/dev/') && entry.source !== '/dev/root');

      return device ? found(device.source) : unavailable(`root of ${path} is not backed by a named block device`);
    },
  });
}

/**
 * The root= assignment from the kernel command line
 */
export function bootParamsProbe(
  env: HostEnvironment,
  options: { cmdlinePaths: readonly string[]; timeoutMs: number }
): Probe<string> {
  return defineProbe({
    name: 'kernel-cmdline-root',
    timeoutMs: options.timeoutMs,
    sideEffect: 'read-only-filesystem',
    run: async () => {
      const { path, content } = await readFirst(env, options.cmdlinePaths);
      const root = parseCmdlineParam(content, 'root');
      return root ? found(root) : malformed(`${path} carries no root= parameter`);
    },
  });
}
