/**
 * Unit tests for hardware profile resolution
 */

import { describe, it, expect } from '@jest/globals';
import { FakeHost } from '../__tests__/fake-host.js';
import { createTestConfig } from '../__tests__/utils.js';
import { InvariantViolationError } from '../errors/index.js';
import type { HardwareProfile } from '../types/hardware.js';
import {
  assertHardwareProfile,
  classifyBlockDevice,
  classifyRootParam,
  reconcileBootDevice,
  resolveHardware,
  type HardwareResolverOptions,
} from './hardware.js';

const PS_COMMAND = 'docker ps --filter name=scrypted --format {{.Names}}';

function resolverOptions(): HardwareResolverOptions {
  const config = createTestConfig();
  return { hardware: config.hardware, container: config.container, storage: config.storage };
}

/**
 * NVMe-booted appliance with accelerator, backup drive and runtime
 */
function fullAppliance(): FakeHost {
  return new FakeHost()
    .path('/dev/nvme0', '/dev/hailo0')
    .mount('/mnt/backup-ssd')
    .file('/host/proc/1/mounts', 'proc /proc proc rw 0 0\n/dev/nvme0n1p2 / ext4 rw,noatime 0 0\n')
    .file('/proc/modules', 'hailo_pci 131072 0 - Live 0x0\n')
    .file('/host/sys/module/hailo_pci/version', '4.18.0\n')
    .dir('/host/sys/bus/pci/devices', ['0001:01:00.0'])
    .file('/host/sys/bus/pci/devices/0001:01:00.0/vendor', '0x1e60\n')
    .command('docker --version', { stdout: 'Docker version 26.1.0' })
    .command(PS_COMMAND, { stdout: 'scrypted' });
}

describe('hardware resolution', () => {
  describe('classification', () => {
    it('should classify block devices by kernel name', () => {
      expect(classifyBlockDevice('/dev/nvme0n1p2')).toBe('NVME');
      expect(classifyBlockDevice('/dev/mmcblk0p2')).toBe('SD');
      expect(classifyBlockDevice('/dev/sda2')).toBeNull();
    });

    it('should resolve PARTUUID references only when one medium is present', () => {
      expect(classifyRootParam('PARTUUID=abcd-02', { hasNvme: true, hasSdCard: false })).toBe('NVME');
      expect(classifyRootParam('PARTUUID=abcd-02', { hasNvme: false, hasSdCard: true })).toBe('SD');
      expect(classifyRootParam('UUID=1234', { hasNvme: true, hasSdCard: true })).toBeNull();
      expect(classifyRootParam('/dev/mmcblk0p2', { hasNvme: true, hasSdCard: true })).toBe('SD');
    });

    it('should demote a boot device whose medium is absent', () => {
      expect(reconcileBootDevice('NVME', { hasNvme: false, hasSdCard: true })).toBe('UNKNOWN');
      expect(reconcileBootDevice('SD', { hasNvme: false, hasSdCard: true })).toBe('SD');
    });
  });

  describe('resolveHardware', () => {
    it('should describe a fully equipped appliance', async () => {
      const report = await resolveHardware(fullAppliance(), resolverOptions());

      expect(report.profile).toEqual({
        hasNvme: true,
        hasUsbBackupVolume: true,
        hasSdCard: false,
        hasAccelerator: true,
        hasContainerRuntime: true,
        hasMonitoredService: true,
        bootDevice: 'NVME',
      });
      expect(report.accelerator).toEqual({
        hasAccelerator: true,
        devicePath: '/dev/hailo0',
        driver: { name: 'hailo_pci', version: '4.18.0' },
        busAddress: '0001:01:00.0',
        active: true,
      });
    });

    it('should report exactly hasAccelerator false when neither device nor driver exists', async () => {
      const report = await resolveHardware(new FakeHost(), resolverOptions());

      expect(report.accelerator).toStrictEqual({ hasAccelerator: false });
      expect(report.profile.hasAccelerator).toBe(false);
    });

    it('should report an inactive accelerator when only the driver is loaded', async () => {
      const env = new FakeHost().file('/proc/modules', 'hailo_pci 131072 0 - Live 0x0\n');

      const report = await resolveHardware(env, resolverOptions());

      expect(report.accelerator).toEqual({
        hasAccelerator: true,
        devicePath: null,
        driver: { name: 'hailo_pci', version: null },
        busAddress: null,
        active: false,
      });
    });

    it('should fall back to the kernel command line for SD boots', async () => {
      const env = new FakeHost()
        .path('/host/dev/mmcblk0')
        .file('/proc/1/mounts', 'overlay / overlay rw 0 0\n')
        .file('/proc/cmdline', 'console=tty1 root=PARTUUID=abcd-02 rootwait\n');

      const report = await resolveHardware(env, resolverOptions());

      expect(report.profile.hasSdCard).toBe(true);
      expect(report.profile.bootDevice).toBe('SD');
    });

    it('should not consult the command line when the root device is neither NVMe nor SD', async () => {
      const env = new FakeHost()
        .path('/dev/nvme0')
        .file('/host/proc/1/mounts', '/dev/sda2 / ext4 rw 0 0\n')
        .file('/proc/cmdline', 'root=PARTUUID=abcd-02\n');

      const report = await resolveHardware(env, resolverOptions());

      expect(report.profile.hasNvme).toBe(true);
      expect(report.profile.bootDevice).toBe('UNKNOWN');
    });

    it('should leave the boot device unknown when a PARTUUID could mean either medium', async () => {
      const env = new FakeHost()
        .path('/dev/nvme0', '/dev/mmcblk0')
        .file('/proc/cmdline', 'root=PARTUUID=abcd-02\n');

      const report = await resolveHardware(env, resolverOptions());

      expect(report.profile.bootDevice).toBe('UNKNOWN');
    });

    it('should demote a mount table boot device whose node is missing', async () => {
      const env = new FakeHost().file('/host/proc/1/mounts', '/dev/nvme0n1p2 / ext4 rw 0 0\n');

      const report = await resolveHardware(env, resolverOptions());

      expect(report.profile.hasNvme).toBe(false);
      expect(report.profile.bootDevice).toBe('UNKNOWN');
    });

    it('should not look for the monitored service without a runtime', async () => {
      const env = new FakeHost();

      const report = await resolveHardware(env, resolverOptions());

      expect(report.profile.hasContainerRuntime).toBe(false);
      expect(report.profile.hasMonitoredService).toBe(false);
      expect(env.commandsRun()).toEqual(['docker --version']);
    });

    it('should not count an empty backup directory as a volume', async () => {
      const env = fullAppliance();
      env.mountPoints.delete('/mnt/backup-ssd');

      const report = await resolveHardware(env, resolverOptions());

      expect(report.profile.hasUsbBackupVolume).toBe(false);
    });
  });

  describe('assertHardwareProfile', () => {
    it('should reject a boot device that contradicts presence', () => {
      const profile: HardwareProfile = {
        hasNvme: false,
        hasUsbBackupVolume: false,
        hasSdCard: true,
        hasAccelerator: false,
        hasContainerRuntime: false,
        hasMonitoredService: false,
        bootDevice: 'NVME',
      };

      expect(() => assertHardwareProfile(profile)).toThrow(InvariantViolationError);
    });
  });
});
