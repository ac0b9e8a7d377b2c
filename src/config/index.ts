import { config as loadEnv } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { ZodError } from 'zod';
import { ConfigSchema, LogFormatSchema, LogLevelSchema, NodeEnvSchema, TransportSchema, type Config } from './schema.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';
import { isExcludedAddress, parseCidr, type CidrRange } from '../net/ipv4.js';

const ENV_PREFIX = 'HOSTWATCH_';

/**
 * Load configuration from environment variables and config files
 * Priority: Environment Variables > Config File > Defaults
 */
export class ConfigLoader {
  private config: Config;

  constructor(options: { configPath?: string; loadDotEnv?: boolean } = {}) {
    if (options.loadDotEnv !== false) {
      loadEnv();
    }

    this.config = this.deepClone(defaultConfig);

    try {
      this.loadFromFile(options.configPath ?? join(process.cwd(), 'config', 'default.json'));
      this.loadFromEnv();
    } catch (error) {
      throw this.toConfigurationError(error);
    }

    this.validate();
  }

  private deepClone(obj: Config): Config {
    return structuredClone(obj);
  }

  /**
   * Load configuration from JSON file
   */
  private loadFromFile(configPath: string): void {
    if (!existsSync(configPath)) {
      return;
    }

    const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    const fileConfig = ConfigSchema.deepPartial().parse(parsed);

    Object.assign(this.config.server, fileConfig.server);
    Object.assign(this.config.logging, fileConfig.logging);
    Object.assign(this.config.mcp, fileConfig.mcp);
    Object.assign(this.config.hardware, fileConfig.hardware);
    Object.assign(this.config.network, fileConfig.network);
    Object.assign(this.config.container, fileConfig.container);
    Object.assign(this.config.storage, fileConfig.storage);
    Object.assign(this.config.stats, fileConfig.stats);
    Object.assign(this.config.performance, fileConfig.performance);
    Object.assign(this.config.security, fileConfig.security);
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnv(): void {
    const env = (name: string): string | undefined => {
      const value = process.env[`${ENV_PREFIX}${name}`];
      return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
    };

    // Server configuration
    const port = env('PORT');
    if (port) {
      this.config.server.port = parseInt(port, 10);
    }
    const host = env('HOST');
    if (host) {
      this.config.server.host = host;
    }
    if (process.env['NODE_ENV']) {
      this.config.server.nodeEnv = NodeEnvSchema.parse(process.env['NODE_ENV']);
    }
    const tlsEnabled = env('TLS_ENABLED');
    if (tlsEnabled) {
      this.config.server.tls.enabled = tlsEnabled === 'true';
    }
    const certFile = env('TLS_CERT_FILE');
    if (certFile) {
      this.config.server.tls.certFile = certFile;
    }
    const keyFile = env('TLS_KEY_FILE');
    if (keyFile) {
      this.config.server.tls.keyFile = keyFile;
    }

    // Logging configuration
    const logLevel = env('LOG_LEVEL');
    if (logLevel) {
      this.config.logging.level = LogLevelSchema.parse(logLevel);
    }
    const logFormat = env('LOG_FORMAT');
    if (logFormat) {
      this.config.logging.format = LogFormatSchema.parse(logFormat);
    }
    const logDir = env('LOG_DIR');
    if (logDir) {
      this.config.logging.dir = logDir;
    }
    const logToFile = env('LOG_TO_FILE');
    if (logToFile) {
      this.config.logging.toFile = logToFile === 'true';
    }

    // MCP configuration
    const transport = env('TRANSPORT');
    if (transport) {
      this.config.mcp.transport = TransportSchema.parse(transport);
    }

    // Hardware configuration
    const hostRoot = env('HOST_ROOT');
    if (hostRoot) {
      this.config.hardware.hostRoot = hostRoot;
    }
    const devRoots = env('DEV_ROOTS');
    if (devRoots) {
      this.config.hardware.devRoots = splitList(devRoots);
    }
    const hardwareTTL = env('HARDWARE_CACHE_TTL');
    if (hardwareTTL) {
      this.config.hardware.cacheTTL = parseInt(hardwareTTL, 10);
    }

    // Network configuration
    const networkTTL = env('NETWORK_CACHE_TTL');
    if (networkTTL) {
      this.config.network.cacheTTL = parseInt(networkTTL, 10);
    }
    const interfacePriority = env('INTERFACE_PRIORITY');
    if (interfacePriority) {
      this.config.network.interfacePriority = splitList(interfacePriority);
    }
    const ipOverride = env('IP_OVERRIDE');
    if (ipOverride) {
      this.config.network.ipOverride = ipOverride;
    }
    const staticIp = env('STATIC_IP');
    if (staticIp) {
      this.config.network.staticNetwork = {
        ip: staticIp,
        gateway: env('STATIC_GATEWAY'),
        subnet: env('STATIC_SUBNET'),
      };
    }
    const excludedRanges = env('EXCLUDED_RANGES');
    if (excludedRanges) {
      this.config.network.excludedRanges = splitList(excludedRanges);
    }
    const resolveConcurrently = env('RESOLVE_CONCURRENTLY');
    if (resolveConcurrently) {
      this.config.network.resolveConcurrently = resolveConcurrently === 'true';
    }

    // Container configuration
    const containerName = env('CONTAINER_NAME');
    if (containerName) {
      this.config.container.nameOverride = containerName;
    }
    const runtimeBinary = env('CONTAINER_RUNTIME');
    if (runtimeBinary) {
      this.config.container.runtimeBinary = runtimeBinary;
    }
    const serviceName = env('SERVICE_NAME');
    if (serviceName) {
      this.config.container.serviceName = serviceName;
    }

    // Storage configuration
    const backupPaths = env('BACKUP_PATHS');
    if (backupPaths) {
      this.config.storage.backupPaths = splitList(backupPaths);
    }

    // Stats configuration
    const statsTTL = env('STATS_CACHE_TTL');
    if (statsTTL) {
      this.config.stats.cacheTTL = parseInt(statsTTL, 10);
    }

    // Security configuration
    const enableAuth = env('ENABLE_AUTH');
    if (enableAuth) {
      this.config.security.enableAuth = enableAuth === 'true';
    }
    const username = env('AUTH_USERNAME');
    if (username) {
      this.config.security.username = username;
    }
    const password = env('AUTH_PASSWORD');
    if (password) {
      this.config.security.password = password;
    }
  }

  /**
   * Validate configuration using Zod schema, then the cross-field rules
   * the schema cannot express
   */
  private validate(): void {
    try {
      this.config = ConfigSchema.parse(this.config);
    } catch (error) {
      throw this.toConfigurationError(error);
    }

    const ranges = this.config.network.excludedRanges
      .map(parseCidr)
      .filter((range): range is CidrRange => range !== null);

    const overrides = [this.config.network.ipOverride, this.config.network.staticNetwork?.ip];
    for (const address of overrides) {
      if (address !== undefined && isExcludedAddress(address, ranges)) {
        throw new ConfigurationError(`IP override ${address} lies in an excluded address range`, {
          address,
          excludedRanges: this.config.network.excludedRanges,
        });
      }
    }
  }

  private toConfigurationError(error: unknown): ConfigurationError {
    if (error instanceof ConfigurationError) {
      return error;
    }
    if (error instanceof ZodError) {
      return new ConfigurationError(`Configuration validation failed: ${error.message}`, {
        issues: error.issues,
      }, error);
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    return new ConfigurationError(`Failed to load configuration: ${cause.message}`, undefined, cause);
  }

  public getConfig(): Config {
    return this.config;
  }
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

// Singleton instance
let configInstance: ConfigLoader | null = null;

/**
 * Get configuration singleton
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = new ConfigLoader();
  }
  return configInstance.getConfig();
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

export type { Config } from './schema.js';
