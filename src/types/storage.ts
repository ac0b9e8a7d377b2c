/**
 * Storage device type definitions
 */

export type StorageTransport = 'USB' | 'SATA' | 'MMC' | 'NVME' | 'UNKNOWN';

export interface UsageStats {
  totalBytes: number;
  usedBytes: number;
  availableBytes: number;
  usedPercent: number;
}

export interface StorageDevice {
  name: string;
  path: string;
  model: string | null;
  sizeBytes: number;
  transport: StorageTransport;
  filesystemType: string | null;
  mountpoint: string | null;
  suggestedMountpoint: string | null;
  usage: UsageStats | null;
}

export interface StorageInventory {
  devices: StorageDevice[];
  backupVolume: StorageDevice | null;
}
