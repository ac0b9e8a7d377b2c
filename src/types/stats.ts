/**
 * Dashboard statistics type definitions
 */

import type { ContainerIdentity, ContainerStats, ServiceStats } from './container.js';
import type { AcceleratorStatus, BootDevice, HardwareProfile } from './hardware.js';
import type { InterfaceCounters, NetworkIdentity } from './network.js';
import type { StorageInventory, UsageStats } from './storage.js';

export interface CpuStats {
  usagePercent: number;
  perCore: number[];
  loadAverage: [number, number, number];
  /** Degrees Celsius from the first thermal zone */
  temperatureC: number | null;
}

export interface MemoryStats {
  totalBytes: number;
  availableBytes: number;
  usedBytes: number;
  usedPercent: number;
}

export interface VolumeUsage extends UsageStats {
  mountpoint: string;
}

export interface DiskStats {
  boot: (VolumeUsage & { device: BootDevice }) | null;
  backup: VolumeUsage | null;
}

export interface NetworkStats extends InterfaceCounters {
  identity: NetworkIdentity;
}

export interface SystemInfo {
  uptimeSeconds: number;
  hostname: string;
}

export interface HostStats {
  timestamp: number;
  hardware: HardwareProfile;
  accelerator: AcceleratorStatus;
  container: ContainerIdentity | null;
  cpu: CpuStats;
  memory: MemoryStats;
  disk: DiskStats;
  network: NetworkStats;
  storage: StorageInventory;
  containers?: ContainerStats[];
  service?: ServiceStats;
  system: SystemInfo;
}
