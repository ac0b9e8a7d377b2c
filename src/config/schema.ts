import { z } from 'zod';
import { isIPv4, parseCidr } from '../net/ipv4.js';

/**
 * Configuration Schema using Zod for runtime validation
 */

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'simple', 'pretty']);
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export const TransportSchema = z.enum(['http', 'stdio']);

export const IPv4Schema = z.string().refine(isIPv4, { message: 'Expected a dotted-quad IPv4 address' });
export const CidrSchema = z.string().refine((value) => parseCidr(value) !== null, {
  message: 'Expected an IPv4 CIDR range such as 172.17.0.0/16',
});

export const TlsConfigSchema = z.object({
  enabled: z.boolean().default(true),
  certFile: z.string().default('/etc/ssl/dashboard/server.crt'),
  keyFile: z.string().default('/etc/ssl/dashboard/server.key'),
});

export const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(8443),
  host: z.string().default('0.0.0.0'),
  nodeEnv: NodeEnvSchema.default('development'),
  tls: TlsConfigSchema,
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: LogFormatSchema.default('json'),
  dir: z.string().default('./logs'),
  maxFiles: z.number().int().min(1).default(10),
  maxSize: z.string().regex(/^\d+[bkmg]$/i, 'expected a size such as 10m').default('10m'),
  toFile: z.boolean().default(true),
});

export const MCPConfigSchema = z.object({
  serverName: z.string().default('nvr-hostwatch'),
  serverVersion: z.string().default('0.1.0'),
  transport: TransportSchema.default('http'),
});

export const AcceleratorConfigSchema = z.object({
  deviceName: z.string().default('hailo0'),
  driverName: z.string().default('hailo_pci'),
  vendorId: z.string().regex(/^0x[0-9a-f]{4}$/i).default('0x1e60'),
});

export const HardwareConfigSchema = z.object({
  hostRoot: z.string().default('/host'),
  devRoots: z.array(z.string()).min(1).default(['/dev', '/host/dev']),
  cacheTTL: z.number().int().min(0).default(30000),
  probeTimeout: z.number().int().min(100).max(10000).default(2000),
  nvmeDeviceCount: z.number().int().min(1).default(5),
  accelerator: AcceleratorConfigSchema,
});

export const StaticNetworkSchema = z.object({
  ip: IPv4Schema,
  gateway: IPv4Schema.optional(),
  subnet: IPv4Schema.optional(),
});

export const NetworkConfigSchema = z.object({
  cacheTTL: z.number().int().min(0).default(3000),
  probeTimeout: z.number().int().min(100).max(10000).default(3000),
  interfacePriority: z.array(z.string().min(1)).default(['eth0', 'end0', 'wlan0']),
  ipOverride: IPv4Schema.optional(),
  staticNetwork: StaticNetworkSchema.optional(),
  hostNetnsPath: z.string().default('/host/proc/1/ns/net'),
  hostProcNetDir: z.string().default('/host/proc/1/net'),
  excludedRanges: z
    .array(CidrSchema)
    .default(['127.0.0.0/8', '172.17.0.0/16', '172.18.0.0/15', '172.20.0.0/14', '172.24.0.0/13']),
  outboundProbeTarget: IPv4Schema.default('1.1.1.1'),
  resolveConcurrently: z.boolean().default(false),
});

export const ContainerConfigSchema = z.object({
  runtimeBinary: z.string().default('docker'),
  serviceName: z.string().default('scrypted'),
  nameOverride: z.string().min(1).optional(),
  probeTimeout: z.number().int().min(100).max(10000).default(2000),
});

export const StorageConfigSchema = z.object({
  backupPaths: z.array(z.string()).min(1).default(['/mnt/backup-ssd']),
  probeTimeout: z.number().int().min(100).max(10000).default(5000),
});

export const StatsConfigSchema = z.object({
  cacheTTL: z.number().int().min(0).default(5000),
  logTailLines: z.number().int().min(1).max(10000).default(500),
});

export const PerformanceConfigSchema = z.object({
  healthCheckInterval: z.number().int().min(1000).default(30000),
  enableHealthChecks: z.boolean().default(true),
});

export const SecurityConfigSchema = z.object({
  enableAuth: z.boolean().default(true),
  username: z.string().optional(),
  password: z.string().optional(),
  realm: z.string().default('NVR Dashboard'),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  server: ServerConfigSchema,
  logging: LoggingConfigSchema,
  mcp: MCPConfigSchema,
  hardware: HardwareConfigSchema,
  network: NetworkConfigSchema,
  container: ContainerConfigSchema,
  storage: StorageConfigSchema,
  stats: StatsConfigSchema,
  performance: PerformanceConfigSchema,
  security: SecurityConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;
export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type Transport = z.infer<typeof TransportSchema>;
export type StaticNetwork = z.infer<typeof StaticNetworkSchema>;
