/**
 * MCP resource registry
 * Exposes the same JSON documents as the dashboard API, one resource each
 */

import type { HostCapabilities } from '../capabilities/host-capabilities.js';
import type { Config } from '../config/schema.js';
import { ErrorCode, HttpError } from '../errors/index.js';
import type { HealthManager } from '../health/index.js';
import type { StatsAggregator } from '../stats/aggregator.js';
import { ResourceURIs, type ResourceContent, type ResourceDescriptor, type ResourceURI } from '../types/resources.js';

export interface ResourceRegistryDeps {
  capabilities: HostCapabilities;
  aggregator: StatsAggregator;
  health: HealthManager;
  config: Config;
}

const MIME_TYPE = 'application/json';

const DESCRIPTORS: ReadonlyArray<Omit<ResourceDescriptor, 'mimeType'> & { uri: ResourceURI }> = [
  { uri: ResourceURIs.SERVER_INFO, name: 'Server Information', description: 'Server name, version and readiness' },
  {
    uri: ResourceURIs.HARDWARE,
    name: 'Hardware Profile',
    description: 'Boot device, NVMe, SD card, accelerator, backup volume and container runtime presence',
  },
  { uri: ResourceURIs.ACCELERATOR, name: 'Accelerator Status', description: 'Neural accelerator device and driver state' },
  {
    uri: ResourceURIs.NETWORK,
    name: 'Network Identity',
    description: 'Host LAN address, gateway and subnet with the strategy that supplied them',
  },
  { uri: ResourceURIs.CONTAINER, name: 'Container Identity', description: 'Name and id of the container this process runs in' },
  { uri: ResourceURIs.STORAGE, name: 'Storage Inventory', description: 'Block devices and the designated backup volume' },
  { uri: ResourceURIs.STATS, name: 'Host Statistics', description: 'Aggregated host statistics as shown on the dashboard' },
];

function isResourceURI(uri: string): uri is ResourceURI {
  return DESCRIPTORS.some((descriptor) => descriptor.uri === uri);
}

export class ResourceRegistry {
  constructor(private readonly deps: ResourceRegistryDeps) {}

  list(): ResourceDescriptor[] {
    return DESCRIPTORS.map((descriptor) => ({ ...descriptor, mimeType: MIME_TYPE }));
  }

  async read(uri: string): Promise<ResourceContent[]> {
    if (!isResourceURI(uri)) {
      throw new HttpError(404, `Unknown resource URI: ${uri}`, ErrorCode.NOT_FOUND, { uri });
    }
    const document = await this.document(uri);
    return [{ uri, mimeType: MIME_TYPE, text: JSON.stringify(document, null, 2) }];
  }

  private async document(uri: ResourceURI): Promise<unknown> {
    const { capabilities, aggregator, health, config } = this.deps;
    switch (uri) {
      case ResourceURIs.SERVER_INFO:
        return {
          name: config.mcp.serverName,
          version: config.mcp.serverVersion,
          ready: await health.isReady(),
          resources: DESCRIPTORS.map((descriptor) => descriptor.uri),
        };
      case ResourceURIs.HARDWARE:
        return capabilities.hardwareProfile();
      case ResourceURIs.ACCELERATOR:
        return capabilities.acceleratorStatus();
      case ResourceURIs.NETWORK:
        return capabilities.networkIdentity();
      case ResourceURIs.CONTAINER:
        return capabilities.containerIdentity();
      case ResourceURIs.STORAGE:
        return capabilities.storageDevices();
      case ResourceURIs.STATS:
        return aggregator.collect();
    }
  }
}
