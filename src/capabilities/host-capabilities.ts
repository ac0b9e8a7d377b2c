/**
 * Cache-fronted access to every resolved host fact.
 *
 * Constructed once at startup and handed to the serving layers; each fact
 * category has its own cache and staleness policy.
 */

import { CapabilityCache, type CapabilityCacheStats } from '../cache/capability-cache.js';
import type { Config } from '../config/schema.js';
import type { HostEnvironment } from '../host/environment.js';
import type { Logger } from '../logger/index.js';
import { resolveContainerIdentity } from '../resolvers/container.js';
import { resolveHardware } from '../resolvers/hardware.js';
import { resolveNetworkIdentity } from '../resolvers/network.js';
import { enumerateStorage } from '../resolvers/storage.js';
import type { ContainerIdentity } from '../types/container.js';
import type { AcceleratorStatus, HardwareProfile, HardwareReport } from '../types/hardware.js';
import type { NetworkIdentity } from '../types/network.js';
import type { StorageInventory } from '../types/storage.js';

export interface HostCapabilitiesOptions {
  config: Config;
  logger: Logger;
  env: HostEnvironment;
  clock?: () => number;
  routeByteOrder?: 'LE' | 'BE';
}

export class HostCapabilities {
  readonly env: HostEnvironment;
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly hardware: CapabilityCache<HardwareReport>;
  private readonly network: CapabilityCache<NetworkIdentity>;
  private readonly container: CapabilityCache<ContainerIdentity | null>;

  constructor(options: HostCapabilitiesOptions) {
    const { config, env, clock } = options;
    this.env = env;
    this.config = config;
    this.logger = options.logger.child({ component: 'capabilities' });

    this.hardware = new CapabilityCache({
      name: 'hardware',
      ttl: config.hardware.cacheTTL,
      clock,
      logger: this.logger,
      resolve: () =>
        resolveHardware(
          env,
          { hardware: config.hardware, container: config.container, storage: config.storage },
          this.logger.child({ resolver: 'hardware' })
        ),
    });

    this.network = new CapabilityCache({
      name: 'network',
      ttl: config.network.cacheTTL,
      clock,
      logger: this.logger,
      resolve: () =>
        resolveNetworkIdentity(
          env,
          { config: config.network, routeByteOrder: options.routeByteOrder },
          this.logger.child({ resolver: 'network' })
        ),
    });

    // A process cannot change containers, but a failed lookup is retried
    this.container = new CapabilityCache({
      name: 'container',
      ttl: Infinity,
      clock,
      logger: this.logger,
      shouldMemoize: (identity) => identity !== null,
      resolve: () => resolveContainerIdentity(env, config.container, this.logger.child({ resolver: 'container' })),
    });
  }

  hardwareReport(): Promise<HardwareReport> {
    return this.hardware.get();
  }

  async hardwareProfile(): Promise<HardwareProfile> {
    return (await this.hardware.get()).profile;
  }

  async acceleratorStatus(): Promise<AcceleratorStatus> {
    return (await this.hardware.get()).accelerator;
  }

  networkIdentity(): Promise<NetworkIdentity> {
    return this.network.get();
  }

  containerIdentity(): Promise<ContainerIdentity | null> {
    return this.container.get();
  }

  /**
   * Never cached
   */
  storageDevices(): Promise<StorageInventory> {
    return enumerateStorage(this.env, this.config.storage, this.logger.child({ resolver: 'storage' }));
  }

  invalidate(): void {
    this.hardware.invalidate();
    this.network.invalidate();
    this.container.invalidate();
  }

  cacheStats(): CapabilityCacheStats[] {
    return [this.hardware.getStats(), this.network.getStats(), this.container.getStats()];
  }
}
