import type { Config } from './schema.js';

/**
 * Default configuration values
 * These are used when no environment variables or config files override them
 */
export const defaultConfig: Config = {
  server: {
    port: 8443,
    host: '0.0.0.0',
    nodeEnv: 'development',
    tls: {
      enabled: true,
      certFile: '/etc/ssl/dashboard/server.crt',
      keyFile: '/etc/ssl/dashboard/server.key',
    },
  },
  logging: {
    level: 'info',
    format: 'json',
    dir: './logs',
    maxFiles: 10,
    maxSize: '10m',
    toFile: true,
  },
  mcp: {
    serverName: 'nvr-hostwatch',
    serverVersion: '0.1.0',
    transport: 'http',
  },
  hardware: {
    hostRoot: '/host',
    devRoots: ['/dev', '/host/dev'],
    cacheTTL: 30000,
    probeTimeout: 2000,
    nvmeDeviceCount: 5,
    accelerator: {
      deviceName: 'hailo0',
      driverName: 'hailo_pci',
      vendorId: '0x1e60',
    },
  },
  network: {
    cacheTTL: 3000,
    probeTimeout: 3000,
    interfacePriority: ['eth0', 'end0', 'wlan0'],
    ipOverride: undefined,
    staticNetwork: undefined,
    hostNetnsPath: '/host/proc/1/ns/net',
    hostProcNetDir: '/host/proc/1/net',
    excludedRanges: ['127.0.0.0/8', '172.17.0.0/16', '172.18.0.0/15', '172.20.0.0/14', '172.24.0.0/13'],
    outboundProbeTarget: '1.1.1.1',
    resolveConcurrently: false,
  },
  container: {
    runtimeBinary: 'docker',
    serviceName: 'scrypted',
    nameOverride: undefined,
    probeTimeout: 2000,
  },
  storage: {
    backupPaths: ['/mnt/backup-ssd'],
    probeTimeout: 5000,
  },
  stats: {
    cacheTTL: 5000,
    logTailLines: 500,
  },
  performance: {
    healthCheckInterval: 30000,
    enableHealthChecks: true,
  },
  security: {
    enableAuth: true,
    username: undefined,
    password: undefined,
    realm: 'NVR Dashboard',
  },
};
