/**
 * Hardware capability type definitions
 */

export type BootDevice = 'NVME' | 'SD' | 'UNKNOWN';

export interface HardwareProfile {
  hasNvme: boolean;
  hasUsbBackupVolume: boolean;
  hasSdCard: boolean;
  hasAccelerator: boolean;
  hasContainerRuntime: boolean;
  hasMonitoredService: boolean;
  bootDevice: BootDevice;
}

export interface AcceleratorDriver {
  name: string;
  version: string | null;
}

export type AcceleratorStatus =
  | { hasAccelerator: false }
  | {
      hasAccelerator: true;
      devicePath: string | null;
      driver: AcceleratorDriver | null;
      busAddress: string | null;
      active: boolean;
    };

/**
 * One hardware resolution pass; the profile and accelerator status are
 * cached together so they never disagree about the accelerator
 */
export interface HardwareReport {
  profile: HardwareProfile;
  accelerator: AcceleratorStatus;
  resolvedAt: number;
}
