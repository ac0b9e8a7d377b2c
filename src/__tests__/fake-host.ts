/**
 * In-process HostEnvironment for tests: canned files, directories, mount
 * points and command outputs, with a log of every command run
 */

import type { NetworkInterfaceInfo } from 'os';
import type { CpuTimes, HostEnvironment, MemoryTotals } from '../host/environment.js';
import type { UsageStats } from '../types/storage.js';
import type { ExecResult } from '../utils/exec.js';

export type CommandResponse = Partial<ExecResult> | (() => Promise<Partial<ExecResult>>);

export interface ExecCall {
  command: string;
  args: string[];
  timeoutMs: number;
}

function notFound(syscall: string, path: string): Error {
  return Object.assign(new Error(`ENOENT: no such file or directory, ${syscall} '${path}'`), { code: 'ENOENT' });
}

export function ipv4Interface(address: string, netmask = '255.255.255.0', internal = false): NetworkInterfaceInfo {
  return {
    address,
    netmask,
    family: 'IPv4',
    mac: '02:00:00:00:00:01',
    internal,
    cidr: null,
  };
}

export class FakeHost implements HostEnvironment {
  readonly files = new Map<string, string>();
  readonly paths = new Set<string>();
  readonly mountPoints = new Set<string>();
  readonly dirs = new Map<string, string[]>();
  readonly usage = new Map<string, UsageStats>();
  readonly commands = new Map<string, CommandResponse>();
  readonly execCalls: ExecCall[] = [];
  interfaces: NodeJS.Dict<NetworkInterfaceInfo[]> = {};
  outbound: string | Error = new Error('ENETUNREACH');
  host = 'nvr-test';
  cpus: CpuTimes[] = [{ user: 100, nice: 0, sys: 50, idle: 850, irq: 0 }];
  load: [number, number, number] = [0.5, 0.25, 0.1];
  uptime = 3600.7;
  mem: MemoryTotals = { totalBytes: 8 * 1024 ** 3, freeBytes: 2 * 1024 ** 3 };

  file(path: string, content: string): this {
    this.files.set(path, content);
    return this;
  }

  path(...paths: string[]): this {
    paths.forEach((path) => this.paths.add(path));
    return this;
  }

  mount(path: string): this {
    this.paths.add(path);
    this.mountPoints.add(path);
    return this;
  }

  dir(path: string, entries: string[]): this {
    this.dirs.set(path, entries);
    return this;
  }

  command(line: string, response: CommandResponse): this {
    this.commands.set(line, response);
    return this;
  }

  commandsRun(): string[] {
    return this.execCalls.map((call) => [call.command, ...call.args].join(' '));
  }

  async exec(command: string, args: readonly string[], timeoutMs: number): Promise<ExecResult> {
    this.execCalls.push({ command, args: [...args], timeoutMs });
    const response = this.commands.get([command, ...args].join(' '));
    if (response === undefined) {
      return { stdout: '', stderr: `${command}: not found`, exitCode: 127, timedOut: false };
    }
    const partial = typeof response === 'function' ? await response() : response;
    return { stdout: '', stderr: '', exitCode: 0, timedOut: false, ...partial };
  }

  async readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) {
      throw notFound('open', path);
    }
    return content;
  }

  async exists(path: string): Promise<boolean> {
    return this.paths.has(path) || this.files.has(path) || this.dirs.has(path);
  }

  async isMountPoint(path: string): Promise<boolean> {
    return this.mountPoints.has(path);
  }

  async listDir(path: string): Promise<string[]> {
    const entries = this.dirs.get(path);
    if (!entries) {
      throw notFound('scandir', path);
    }
    return [...entries];
  }

  async diskUsage(path: string): Promise<UsageStats> {
    const stats = this.usage.get(path);
    if (!stats) {
      throw notFound('statfs', path);
    }
    return stats;
  }

  async outboundAddress(): Promise<string> {
    if (this.outbound instanceof Error) {
      throw this.outbound;
    }
    return this.outbound;
  }

  networkInterfaces(): NodeJS.Dict<NetworkInterfaceInfo[]> {
    return this.interfaces;
  }

  hostname(): string {
    return this.host;
  }

  cpuTimes(): CpuTimes[] {
    return this.cpus;
  }

  loadAverage(): [number, number, number] {
    return this.load;
  }

  uptimeSeconds(): number {
    return this.uptime;
  }

  memory(): MemoryTotals {
    return this.mem;
  }
}
