/**
 * Storage inventory: block devices with usage figures and the backup
 * volume designation
 */

import type { Config } from '../config/schema.js';
import type { HostEnvironment } from '../host/environment.js';
import type { Logger } from '../logger/index.js';
import { blockDevicesProbe, type BlockDevice } from '../probes/storage.js';
import type { StorageDevice, StorageInventory, UsageStats } from '../types/storage.js';

// Virtual devices that never hold recordings
const VIRTUAL_DEVICE_PREFIXES = ['loop', 'ram', 'zram'];

function isVirtual(device: BlockDevice): boolean {
  return VIRTUAL_DEVICE_PREFIXES.some((prefix) => device.name.startsWith(prefix));
}

async function usageOf(env: HostEnvironment, mountpoint: string | null, logger?: Logger): Promise<UsageStats | null> {
  if (!mountpoint || !mountpoint.startsWith('/')) {
    return null;
  }
  try {
    return await env.diskUsage(mountpoint);
  } catch (error) {
    logger?.debug('Usage unavailable', { mountpoint, reason: error instanceof Error ? error.message : String(error) });
    return null;
  }
}

/**
 * Pick the backup volume: a USB device already mounted on a backup path,
 * otherwise the first unmounted USB filesystem, which gets the primary
 * backup path as its suggested mountpoint
 */
export function designateBackupVolume(
  devices: StorageDevice[],
  backupPaths: readonly string[]
): StorageDevice | null {
  const usb = devices.filter((device) => device.transport === 'USB' && device.filesystemType !== null);

  const mounted = usb.find((device) => device.mountpoint !== null && backupPaths.includes(device.mountpoint));
  if (mounted) {
    return mounted;
  }

  const candidate = usb.find((device) => device.mountpoint === null);
  const [primaryPath] = backupPaths;
  if (!candidate || !primaryPath) {
    return null;
  }

  candidate.suggestedMountpoint = primaryPath;
  return candidate;
}

/**
 * Enumerate block devices. Always fresh: USB media can come and go
 * between two calls.
 */
export async function enumerateStorage(
  env: HostEnvironment,
  config: Config['storage'],
  logger?: Logger
): Promise<StorageInventory> {
  const result = await blockDevicesProbe(env, { timeoutMs: config.probeTimeout }).attempt();
  if (!result.ok) {
    logger?.warn('Block devices unavailable', { kind: result.failure.kind, reason: result.failure.message });
    return { devices: [], backupVolume: null };
  }

  const devices = await Promise.all(
    result.value
      .filter((device) => !isVirtual(device))
      .map(
        async (device): Promise<StorageDevice> => ({
          ...device,
          suggestedMountpoint: null,
          usage: await usageOf(env, device.mountpoint, logger),
        })
      )
  );

  return { devices, backupVolume: designateBackupVolume(devices, config.backupPaths) };
}
