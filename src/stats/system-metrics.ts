/**
 * Live numeric metrics of the host: CPU, memory, disk and interface counters
 */

import { join } from 'path';
import type { CpuTimes, HostEnvironment } from '../host/environment.js';
import type { Logger } from '../logger/index.js';
import type { BootDevice } from '../types/hardware.js';
import type { InterfaceCounters } from '../types/network.js';
import type { CpuStats, DiskStats, MemoryStats, VolumeUsage } from '../types/stats.js';
import { parseMemInfo } from '../utils/proc-parser.js';

const FIRST_SAMPLE_INTERVAL_MS = 100;

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function busyPercent(previous: CpuTimes, current: CpuTimes): number {
  const busy = (times: CpuTimes): number => times.user + times.nice + times.sys + times.irq;
  const total = (times: CpuTimes): number => busy(times) + times.idle;

  const totalDelta = total(current) - total(previous);
  if (totalDelta <= 0) {
    return 0;
  }
  return round1(((busy(current) - busy(previous)) / totalDelta) * 100);
}

/**
 * CPU usage as the delta between two readings of the cumulative CPU times.
 * The first call has no earlier reading and samples over a short interval.
 */
export class CpuSampler {
  private previous: CpuTimes[] | null = null;

  constructor(
    private readonly env: HostEnvironment,
    private readonly wait: (ms: number) => Promise<void> = (ms) => new Promise((resolve) => setTimeout(resolve, ms))
  ) {}

  async sample(): Promise<{ usagePercent: number; perCore: number[] }> {
    const previous = this.previous ?? (await this.firstReading());
    const current = this.env.cpuTimes();
    this.previous = current;

    const perCore = current.map((times, index) => {
      const before = previous[index];
      return before ? busyPercent(before, times) : 0;
    });

    const sum = (all: CpuTimes[]): CpuTimes =>
      all.reduce(
        (acc, times) => ({
          user: acc.user + times.user,
          nice: acc.nice + times.nice,
          sys: acc.sys + times.sys,
          idle: acc.idle + times.idle,
          irq: acc.irq + times.irq,
        }),
        { user: 0, nice: 0, sys: 0, idle: 0, irq: 0 }
      );

    return { usagePercent: busyPercent(sum(previous), sum(current)), perCore };
  }

  private async firstReading(): Promise<CpuTimes[]> {
    const reading = this.env.cpuTimes();
    await this.wait(FIRST_SAMPLE_INTERVAL_MS);
    return reading;
  }
}

export async function readTemperature(env: HostEnvironment, hostRoot: string): Promise<number | null> {
  try {
    const milliDegrees = parseInt(await env.readFile(join(hostRoot, 'sys/class/thermal/thermal_zone0/temp')), 10);
    return isNaN(milliDegrees) ? null : round1(milliDegrees / 1000);
  } catch {
    return null;
  }
}

export async function collectCpu(env: HostEnvironment, sampler: CpuSampler, hostRoot: string): Promise<CpuStats> {
  const [usage, temperatureC] = await Promise.all([sampler.sample(), readTemperature(env, hostRoot)]);
  return { ...usage, loadAverage: env.loadAverage(), temperatureC };
}

/**
 * Memory from /proc/meminfo; MemAvailable counts reclaimable cache as
 * available, which the free figure alone does not
 */
export async function collectMemory(env: HostEnvironment, logger?: Logger): Promise<MemoryStats> {
  const fallback = env.memory();
  let totalBytes = fallback.totalBytes;
  let availableBytes = fallback.freeBytes;

  try {
    const memInfo = parseMemInfo(await env.readFile('/proc/meminfo'));
    totalBytes = memInfo.get('MemTotal') ?? totalBytes;
    availableBytes = memInfo.get('MemAvailable') ?? availableBytes;
  } catch (error) {
    logger?.debug('Falling back to free memory', { reason: error instanceof Error ? error.message : String(error) });
  }

  const usedBytes = Math.max(totalBytes - availableBytes, 0);
  return {
    totalBytes,
    availableBytes,
    usedBytes,
    usedPercent: totalBytes > 0 ? round1((usedBytes / totalBytes) * 100) : 0,
  };
}

async function volumeUsage(env: HostEnvironment, mountpoint: string): Promise<VolumeUsage | null> {
  try {
    return { mountpoint, ...(await env.diskUsage(mountpoint)) };
  } catch {
    return null;
  }
}

export async function collectDisk(
  env: HostEnvironment,
  options: { bootDevice: BootDevice; hasBackupVolume: boolean; backupPaths: readonly string[] }
): Promise<DiskStats> {
  const root = await volumeUsage(env, '/');
  const boot = root ? { ...root, device: options.bootDevice } : null;

  let backup: VolumeUsage | null = null;
  if (options.hasBackupVolume) {
    for (const path of options.backupPaths) {
      if (await env.isMountPoint(path)) {
        backup = await volumeUsage(env, path);
        break;
      }
    }
  }

  return { boot, backup };
}

/**
 * Cumulative byte counters summed over the listed host interfaces
 */
export async function collectInterfaceCounters(
  env: HostEnvironment,
  hostRoot: string,
  interfaces: readonly string[]
): Promise<InterfaceCounters> {
  const counters: InterfaceCounters = { rxBytes: 0, txBytes: 0, interfaces: [] };

  for (const iface of interfaces) {
    const statistics = join(hostRoot, 'sys/class/net', iface, 'statistics');
    try {
      const [rx, tx] = await Promise.all([
        env.readFile(join(statistics, 'rx_bytes')),
        env.readFile(join(statistics, 'tx_bytes')),
      ]);
      const rxBytes = parseInt(rx, 10);
      const txBytes = parseInt(tx, 10);
      if (isNaN(rxBytes) || isNaN(txBytes)) continue;

      counters.rxBytes += rxBytes;
      counters.txBytes += txBytes;
      counters.interfaces.push(iface);
    } catch {
      // Interface absent on this host
      continue;
    }
  }

  return counters;
}
