/**
 * AI accelerator probes: loaded kernel driver and PCI bus address
 */

import { join } from 'path';
import type { HostEnvironment } from '../host/environment.js';
import type { AcceleratorDriver } from '../types/hardware.js';
import type { Probe } from '../types/probe.js';
import { parseModules } from '../utils/proc-parser.js';
import { readFirst } from './filesystem.js';
import { defineProbe, found, unavailable } from './probe.js';

export function acceleratorDriverProbe(
  env: HostEnvironment,
  options: {
    driverName: string;
    moduleListPaths: readonly string[];
    sysModuleRoots: readonly string[];
    timeoutMs: number;
  }
): Probe<AcceleratorDriver> {
  return defineProbe({
    name: 'accelerator-driver',
    timeoutMs: options.timeoutMs,
    sideEffect: 'read-only-filesystem',
    run: async () => {
      const { content } = await readFirst(env, options.moduleListPaths);
      const loaded = parseModules(content).find((entry) => entry.name === options.driverName);
      if (!loaded) {
        return unavailable(`kernel module ${options.driverName} is not loaded`);
      }

      // The version token lives in sysfs, not in the module list
      let version: string | null = null;
      try {
        const versionFiles = options.sysModuleRoots.map((root) => join(root, options.driverName, 'version'));
        version = (await readFirst(env, versionFiles)).content.trim() || null;
      } catch {
        version = null;
      }

      return found({ name: loaded.name, version });
    },
  });
}

/**
 * Scan PCI devices for one whose vendor attribute matches the accelerator vendor
 */
export function acceleratorBusProbe(
  env: HostEnvironment,
  options: { vendorId: string; pciDeviceRoots: readonly string[]; timeoutMs: number }
): Probe<string> {
  const vendorId = options.vendorId.toLowerCase();

  return defineProbe({
    name: 'accelerator-bus-address',
    timeoutMs: options.timeoutMs,
    sideEffect: 'read-only-filesystem',
    run: async () => {
      for (const root of options.pciDeviceRoots) {
        let devices: string[];
        try {
          devices = await env.listDir(root);
        } catch {
          continue;
        }

        for (const device of [...devices].sort()) {
          try {
            const vendor = await env.readFile(join(root, device, 'vendor'));
            if (vendor.trim().toLowerCase() === vendorId) {
              return found(device);
            }
          } catch {
            // Devices without a readable vendor attribute are skipped
            continue;
          }
        }
      }
      return unavailable(`no PCI device with vendor ${vendorId}`);
    },
  });
}
