/**
 * MCP resource type definitions
 */

export interface ResourceDescriptor {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

export interface ResourceContent {
  uri: string;
  mimeType: string;
  text: string;
}

export const ResourceURIs = {
  SERVER_INFO: 'hostwatch://server/info',
  HARDWARE: 'hostwatch://host/hardware',
  ACCELERATOR: 'hostwatch://host/accelerator',
  NETWORK: 'hostwatch://host/network',
  CONTAINER: 'hostwatch://host/container',
  STORAGE: 'hostwatch://host/storage',
  STATS: 'hostwatch://host/stats',
} as const;

export type ResourceURI = (typeof ResourceURIs)[keyof typeof ResourceURIs];
