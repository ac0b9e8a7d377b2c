/**
 * Stats aggregator: the core's resolved facts plus live metrics, as one
 * dashboard response
 */

import { CapabilityCache } from '../cache/capability-cache.js';
import type { HostCapabilities } from '../capabilities/host-capabilities.js';
import type { Config } from '../config/schema.js';
import type { Logger } from '../logger/index.js';
import type { ContainerAction, ContainerActionResult, ContainerLogs, ContainerStats } from '../types/container.js';
import type { HostStats } from '../types/stats.js';
import { collectServiceState, containerStatsProbe, controlContainer, tailContainerLogs } from './containers.js';
import { collectCpu, collectDisk, collectInterfaceCounters, collectMemory, CpuSampler } from './system-metrics.js';

export interface StatsAggregatorOptions {
  capabilities: HostCapabilities;
  config: Config;
  logger: Logger;
  clock?: () => number;
  cpuSampler?: CpuSampler;
}

export class StatsAggregator {
  private readonly capabilities: HostCapabilities;
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly sampler: CpuSampler;
  private readonly clock: () => number;
  private readonly cache: CapabilityCache<HostStats>;

  constructor(options: StatsAggregatorOptions) {
    this.capabilities = options.capabilities;
    this.config = options.config;
    this.logger = options.logger.child({ component: 'stats' });
    this.sampler = options.cpuSampler ?? new CpuSampler(options.capabilities.env);
    this.clock = options.clock ?? Date.now;
    this.cache = new CapabilityCache({
      name: 'stats',
      ttl: options.config.stats.cacheTTL,
      clock: options.clock,
      logger: this.logger,
      resolve: () => this.gather(),
    });
  }

  /**
   * Current stats, shared between callers for the stats TTL
   */
  collect(): Promise<HostStats> {
    return this.cache.get();
  }

  /**
   * Live runtime stats, or an empty list with the reason when the runtime
   * cannot be queried
   */
  async containerStats(): Promise<{ containers: ContainerStats[]; error?: string }> {
    const result = await containerStatsProbe(this.capabilities.env, this.config.container).attempt();
    return result.ok ? { containers: result.value } : { containers: [], error: result.failure.message };
  }

  containerLogs(container: string, lines: number = this.config.stats.logTailLines): Promise<ContainerLogs> {
    return tailContainerLogs(this.capabilities.env, this.config.container, container, lines);
  }

  /**
   * Run a container action; the next collect() sees its effect
   */
  async controlContainer(container: string, action: ContainerAction): Promise<ContainerActionResult> {
    const result = await controlContainer(this.capabilities.env, this.config.container, container, action);
    this.logger.info(`Container ${action} completed`, { container });
    this.cache.invalidate();
    return result;
  }

  private async gather(): Promise<HostStats> {
    const env = this.capabilities.env;
    const { hardware: hardwareConfig, network: networkConfig } = this.config;

    const [report, identity, container, storage, cpu, memory, counters] = await Promise.all([
      this.capabilities.hardwareReport(),
      this.capabilities.networkIdentity(),
      this.capabilities.containerIdentity(),
      this.capabilities.storageDevices(),
      collectCpu(env, this.sampler, hardwareConfig.hostRoot),
      collectMemory(env, this.logger),
      collectInterfaceCounters(env, hardwareConfig.hostRoot, networkConfig.interfacePriority),
    ]);

    const disk = await collectDisk(env, {
      bootDevice: report.profile.bootDevice,
      hasBackupVolume: report.profile.hasUsbBackupVolume,
      backupPaths: this.config.storage.backupPaths,
    });

    const stats: HostStats = {
      timestamp: this.clock(),
      hardware: report.profile,
      accelerator: report.accelerator,
      container,
      cpu,
      memory,
      disk,
      network: { identity, ...counters },
      storage,
      system: { uptimeSeconds: Math.floor(env.uptimeSeconds()), hostname: env.hostname() },
    };

    if (report.profile.hasContainerRuntime) {
      const [result, service] = await Promise.all([
        containerStatsProbe(env, this.config.container).attempt(),
        collectServiceState(env, this.config.container, this.clock()),
      ]);
      if (service) {
        stats.service = service;
      }
      if (result.ok) {
        stats.containers = result.value;
      } else {
        this.logger.warn('Container stats unavailable', { kind: result.failure.kind, reason: result.failure.message });
      }
    }

    return stats;
  }
}
