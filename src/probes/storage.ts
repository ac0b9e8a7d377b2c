/**
 * Block device enumeration through lsblk's JSON output
 */

import { z } from 'zod';
import type { HostEnvironment } from '../host/environment.js';
import type { StorageTransport } from '../types/storage.js';
import type { Probe } from '../types/probe.js';
import { defineProbe, found, malformed, unavailable } from './probe.js';

export const LSBLK_COLUMNS = 'NAME,PATH,MODEL,SIZE,TRAN,FSTYPE,MOUNTPOINT';

export interface LsblkDevice {
  name: string;
  path?: string | null;
  model?: string | null;
  size: number | string | null;
  tran?: string | null;
  fstype?: string | null;
  mountpoint?: string | null;
  children?: LsblkDevice[];
}

const LsblkDeviceSchema: z.ZodType<LsblkDevice> = z.lazy(() =>
  z.object({
    name: z.string(),
    path: z.string().nullish(),
    model: z.string().nullish(),
    // Older util-linux releases print numbers as strings
    size: z.union([z.number(), z.string()]).nullable(),
    tran: z.string().nullish(),
    fstype: z.string().nullish(),
    mountpoint: z.string().nullish(),
    children: z.array(LsblkDeviceSchema).optional(),
  })
);

export const LsblkOutputSchema = z.object({
  blockdevices: z.array(LsblkDeviceSchema),
});

/**
 * A block device or partition with its parent's transport already applied
 */
export interface BlockDevice {
  name: string;
  path: string;
  model: string | null;
  sizeBytes: number;
  transport: StorageTransport;
  filesystemType: string | null;
  mountpoint: string | null;
}

const TRANSPORTS: Record<string, StorageTransport> = {
  usb: 'USB',
  sata: 'SATA',
  ata: 'SATA',
  mmc: 'MMC',
  nvme: 'NVME',
};

/**
 * Map lsblk's TRAN column; when it is empty, fall back to the kernel name
 */
export function classifyTransport(tran: string | null | undefined, name: string): StorageTransport {
  const mapped = tran ? TRANSPORTS[tran.toLowerCase()] : undefined;
  if (mapped) {
    return mapped;
  }
  if (name.startsWith('nvme')) return 'NVME';
  if (name.startsWith('mmcblk')) return 'MMC';
  return 'UNKNOWN';
}

function toBytes(size: number | string | null): number {
  if (typeof size === 'number') {
    return size;
  }
  const parsed = size === null ? NaN : Number(size);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Flatten the lsblk tree, parents before children. Partitions report no
 * transport of their own and inherit the disk's.
 */
export function flattenBlockDevices(
  devices: readonly LsblkDevice[],
  parentTransport: StorageTransport | null = null
): BlockDevice[] {
  const flat: BlockDevice[] = [];

  for (const device of devices) {
    const transport =
      parentTransport && !device.tran ? parentTransport : classifyTransport(device.tran, device.name);

    flat.push({
      name: device.name,
      path: device.path ?? `/dev/${device.name}`,
      model: device.model?.trim() || null,
      sizeBytes: toBytes(device.size),
      transport,
      filesystemType: device.fstype ?? null,
      mountpoint: device.mountpoint ?? null,
    });

    if (device.children) {
      flat.push(...flattenBlockDevices(device.children, transport));
    }
  }

  return flat;
}

export function blockDevicesProbe(env: HostEnvironment, options: { timeoutMs: number }): Probe<BlockDevice[]> {
  return defineProbe({
    name: 'block-devices',
    timeoutMs: options.timeoutMs,
    sideEffect: 'external-process-invocation',
    run: async () => {
      const result = await env.exec('lsblk', ['-b', '-J', '-o', LSBLK_COLUMNS], options.timeoutMs);
      if (result.exitCode !== 0) {
        return unavailable(`lsblk exited ${result.exitCode}: ${result.stderr}`);
      }

      let json: unknown;
      try {
        json = JSON.parse(result.stdout);
      } catch {
        return malformed('lsblk output is not JSON');
      }

      const parsed = LsblkOutputSchema.safeParse(json);
      if (!parsed.success) {
        return malformed(`unexpected lsblk output: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
      }
      return found(flattenBlockDevices(parsed.data.blockdevices));
    },
  });
}
