/**
 * The live environment the probes observe.
 *
 * Everything a probe reads from the host goes through this interface so
 * tests can substitute an in-process fake. Implementations may throw from
 * the filesystem and socket methods; the probe boundary classifies errors.
 */

import * as fs from 'fs/promises';
import { createSocket } from 'dgram';
import { dirname } from 'path';
import * as os from 'os';
import { executeCommand, type ExecResult } from '../utils/exec.js';
import type { UsageStats } from '../types/storage.js';

export interface CpuTimes {
  user: number;
  nice: number;
  sys: number;
  idle: number;
  irq: number;
}

export interface MemoryTotals {
  totalBytes: number;
  freeBytes: number;
}

export interface HostEnvironment {
  exec(command: string, args: readonly string[], timeoutMs: number): Promise<ExecResult>;
  readFile(path: string): Promise<string>;
  exists(path: string): Promise<boolean>;
  isMountPoint(path: string): Promise<boolean>;
  listDir(path: string): Promise<string[]>;
  diskUsage(path: string): Promise<UsageStats>;
  outboundAddress(target: string, port: number): Promise<string>;
  networkInterfaces(): NodeJS.Dict<os.NetworkInterfaceInfo[]>;
  hostname(): string;
  cpuTimes(): CpuTimes[];
  loadAverage(): [number, number, number];
  uptimeSeconds(): number;
  memory(): MemoryTotals;
}

export function usageFromBlocks(blockSize: number, blocks: number, free: number, available: number): UsageStats {
  const totalBytes = blocks * blockSize;
  const usedBytes = (blocks - free) * blockSize;
  const availableBytes = available * blockSize;
  // Same basis as df: used against what an unprivileged user can reach
  const denominator = usedBytes + availableBytes;
  const usedPercent = denominator > 0 ? Math.round((usedBytes / denominator) * 1000) / 10 : 0;

  return { totalBytes, usedBytes, availableBytes, usedPercent };
}

/**
 * HostEnvironment backed by Node's fs, child_process, dgram and os modules
 */
export class NodeHostEnvironment implements HostEnvironment {
  exec(command: string, args: readonly string[], timeoutMs: number): Promise<ExecResult> {
    return executeCommand(command, args, { timeout: timeoutMs });
  }

  readFile(path: string): Promise<string> {
    return fs.readFile(path, 'utf-8');
  }

  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * A path is a mount point when it sits on a different device than its
   * parent, or when it is the filesystem root
   */
  async isMountPoint(path: string): Promise<boolean> {
    try {
      const [self, parent] = await Promise.all([fs.stat(path), fs.stat(dirname(path))]);
      return self.dev !== parent.dev || self.ino === parent.ino;
    } catch {
      return false;
    }
  }

  listDir(path: string): Promise<string[]> {
    return fs.readdir(path);
  }

  async diskUsage(path: string): Promise<UsageStats> {
    const stats = await fs.statfs(path);
    return usageFromBlocks(stats.bsize, stats.blocks, stats.bfree, stats.bavail);
  }

  /**
   * Connect a UDP socket without sending anything and read back the local
   * address the kernel picked for that route
   */
  outboundAddress(target: string, port: number): Promise<string> {
    return new Promise((resolve, reject) => {
      const socket = createSocket('udp4');
      socket.once('error', (error) => {
        socket.close();
        reject(error);
      });
      socket.connect(port, target, () => {
        try {
          const { address } = socket.address();
          resolve(address);
        } catch (error) {
          reject(error);
        } finally {
          socket.close();
        }
      });
    });
  }

  networkInterfaces(): NodeJS.Dict<os.NetworkInterfaceInfo[]> {
    return os.networkInterfaces();
  }

  hostname(): string {
    return os.hostname();
  }

  cpuTimes(): CpuTimes[] {
    return os.cpus().map((cpu) => cpu.times);
  }

  loadAverage(): [number, number, number] {
    const [one = 0, five = 0, fifteen = 0] = os.loadavg();
    return [one, five, fifteen];
  }

  uptimeSeconds(): number {
    return os.uptime();
  }

  memory(): MemoryTotals {
    return { totalBytes: os.totalmem(), freeBytes: os.freemem() };
  }
}
