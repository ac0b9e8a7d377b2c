/**
 * Hardware profile and accelerator status resolution
 */

import { join } from 'path';
import type { Config } from '../config/schema.js';
import { InvariantViolationError } from '../errors/index.js';
import type { HostEnvironment } from '../host/environment.js';
import type { Logger } from '../logger/index.js';
import { acceleratorBusProbe, acceleratorDriverProbe } from '../probes/accelerator.js';
import { runtimeAvailableProbe, serviceRunningProbe } from '../probes/container-runtime.js';
import { bootParamsProbe, deviceNodeProbe, mountedVolumeProbe, rootSourceProbe } from '../probes/filesystem.js';
import { found, mapProbe, unavailable } from '../probes/probe.js';
import type { AcceleratorStatus, BootDevice, HardwareProfile, HardwareReport } from '../types/hardware.js';
import type { ProbeResult } from '../types/probe.js';
import { resolveByField, type Strategy } from './chain.js';

export interface HardwareResolverOptions {
  hardware: Config['hardware'];
  container: Config['container'];
  storage: Config['storage'];
}

type KnownBootDevice = Exclude<BootDevice, 'UNKNOWN'>;

interface BootFacts {
  bootDevice: BootDevice;
}

interface PresenceFacts {
  hasNvme: boolean;
  hasSdCard: boolean;
}

/**
 * Classify a block device path by its kernel name
 */
export function classifyBlockDevice(source: string): KnownBootDevice | null {
  const name = source.replace(/^\/dev\//, '');
  if (name.startsWith('nvme')) return 'NVME';
  if (name.startsWith('mmcblk')) return 'SD';
  return null;
}

/**
 * Classify a root= value. PARTUUID= and UUID= references name no device,
 * so they only resolve when exactly one candidate medium is present.
 */
export function classifyRootParam(root: string, presence: PresenceFacts): KnownBootDevice | null {
  if (/^(PART)?UUID=/i.test(root)) {
    if (presence.hasNvme && !presence.hasSdCard) return 'NVME';
    if (presence.hasSdCard && !presence.hasNvme) return 'SD';
    return null;
  }
  return classifyBlockDevice(root);
}

/**
 * Demote a boot device the presence flags contradict
 */
export function reconcileBootDevice(bootDevice: BootDevice, presence: PresenceFacts): BootDevice {
  if (bootDevice === 'NVME' && !presence.hasNvme) return 'UNKNOWN';
  if (bootDevice === 'SD' && !presence.hasSdCard) return 'UNKNOWN';
  return bootDevice;
}

export function assertHardwareProfile(profile: HardwareProfile): HardwareProfile {
  if (reconcileBootDevice(profile.bootDevice, profile) !== profile.bootDevice) {
    throw new InvariantViolationError(`bootDevice ${profile.bootDevice} contradicts device presence`, { profile });
  }
  return profile;
}

export function assertAcceleratorStatus(status: AcceleratorStatus, profile: HardwareProfile): AcceleratorStatus {
  if (status.hasAccelerator !== profile.hasAccelerator) {
    throw new InvariantViolationError('accelerator status disagrees with hardware profile', { status, profile });
  }
  return status;
}

function devicePaths(roots: readonly string[], names: readonly string[]): string[] {
  return names.flatMap((name) => roots.map((root) => join(root, name)));
}

function valueOf<T>(result: ProbeResult<T>): T | null {
  return result.ok ? result.value : null;
}

/**
 * Boot device strategies in precedence order: the mount table, then the
 * kernel command line. A named root device that is neither NVMe nor SD
 * settles the answer as UNKNOWN; only overlay or pseudo root sources
 * fall through to the command line.
 */
export function bootDeviceStrategies(
  env: HostEnvironment,
  config: Config['hardware'],
  presence: PresenceFacts
): Strategy<BootFacts>[] {
  return [
    mapProbe(
      rootSourceProbe(env, {
        mountTablePaths: [join(config.hostRoot, 'proc/1/mounts'), '/proc/1/mounts'],
        timeoutMs: config.probeTimeout,
      }),
      'root-mount-source',
      (source) => found({ bootDevice: classifyBlockDevice(source) ?? 'UNKNOWN' })
    ),
    mapProbe(
      bootParamsProbe(env, {
        cmdlinePaths: ['/proc/cmdline', join(config.hostRoot, 'proc/cmdline')],
        timeoutMs: config.probeTimeout,
      }),
      'kernel-cmdline',
      (root) => {
        const bootDevice = classifyRootParam(root, presence);
        return bootDevice ? found({ bootDevice }) : unavailable(`root=${root} does not identify the medium`);
      }
    ),
  ];
}

/**
 * Run every hardware probe once and derive the profile and accelerator
 * status from the same observations
 */
export async function resolveHardware(
  env: HostEnvironment,
  options: HardwareResolverOptions,
  logger?: Logger
): Promise<HardwareReport> {
  const { hardware, container, storage } = options;
  const timeoutMs = hardware.probeTimeout;
  const nvmeNames = Array.from({ length: hardware.nvmeDeviceCount }, (_, i) => `nvme${i}`);

  const [nvme, sdCard, acceleratorNode, backupVolume, driver, busAddress, runtime] = await Promise.all([
    deviceNodeProbe(env, { name: 'nvme-device', candidates: devicePaths(hardware.devRoots, nvmeNames), timeoutMs }).attempt(),
    deviceNodeProbe(env, {
      name: 'sd-card-device',
      candidates: devicePaths(hardware.devRoots, ['mmcblk0', 'mmcblk0p1']),
      timeoutMs,
    }).attempt(),
    deviceNodeProbe(env, {
      name: 'accelerator-device',
      candidates: devicePaths(hardware.devRoots, [hardware.accelerator.deviceName]),
      timeoutMs,
    }).attempt(),
    mountedVolumeProbe(env, { name: 'backup-volume', paths: storage.backupPaths, timeoutMs }).attempt(),
    acceleratorDriverProbe(env, {
      driverName: hardware.accelerator.driverName,
      moduleListPaths: [join(hardware.hostRoot, 'proc/modules'), '/proc/modules'],
      sysModuleRoots: [join(hardware.hostRoot, 'sys/module'), '/sys/module'],
      timeoutMs,
    }).attempt(),
    acceleratorBusProbe(env, {
      vendorId: hardware.accelerator.vendorId,
      pciDeviceRoots: [join(hardware.hostRoot, 'sys/bus/pci/devices'), '/sys/bus/pci/devices'],
      timeoutMs,
    }).attempt(),
    runtimeAvailableProbe(env, { binary: container.runtimeBinary, timeoutMs: container.probeTimeout }).attempt(),
  ]);

  // The service check needs the runtime CLI
  const service = runtime.ok
    ? await serviceRunningProbe(env, {
        binary: container.runtimeBinary,
        serviceName: container.serviceName,
        timeoutMs: container.probeTimeout,
      }).attempt()
    : null;

  const presence: PresenceFacts = { hasNvme: nvme.ok, hasSdCard: sdCard.ok };

  const boot = await resolveByField(bootDeviceStrategies(env, hardware, presence), {
    fields: ['bootDevice'],
    logger,
  });
  const reported = boot.value.bootDevice ?? 'UNKNOWN';
  const bootDevice = reconcileBootDevice(reported, presence);
  if (bootDevice !== reported) {
    logger?.warn('Boot device contradicts device presence', { reported, ...presence });
  }

  const devicePath = valueOf(acceleratorNode);
  const driverInfo = valueOf(driver);
  const hasAccelerator = devicePath !== null || driverInfo !== null;

  const profile = assertHardwareProfile({
    hasNvme: presence.hasNvme,
    hasUsbBackupVolume: backupVolume.ok,
    hasSdCard: presence.hasSdCard,
    hasAccelerator,
    hasContainerRuntime: runtime.ok,
    hasMonitoredService: service?.ok ?? false,
    bootDevice,
  });

  const accelerator = assertAcceleratorStatus(
    hasAccelerator
      ? {
          hasAccelerator: true,
          devicePath,
          driver: driverInfo,
          busAddress: valueOf(busAddress),
          active: devicePath !== null && driverInfo !== null,
        }
      : { hasAccelerator: false },
    profile
  );

  return { profile, accelerator, resolvedAt: Date.now() };
}
