import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ListResourcesRequestSchema, ReadResourceRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from './logger/index.js';
import type { Config } from './config/schema.js';
import { LifecycleManager } from './lifecycle/index.js';
import { HealthManager, HealthStatus } from './health/index.js';
import { HostCapabilities } from './capabilities/host-capabilities.js';
import { NodeHostEnvironment, type HostEnvironment } from './host/environment.js';
import { StatsAggregator } from './stats/aggregator.js';
import { ResourceRegistry } from './mcp/resources.js';
import { createApp } from './http/app.js';
import { createCredentialChecker } from './http/credentials.js';
import { startListener, type RunningListener } from './http/listener.js';

export interface HostwatchServerOptions {
  env?: HostEnvironment;
  /** Install process signal handlers; off in tests */
  handleSignals?: boolean;
  /** Called with the exit code once shutdown completes */
  exit?: (code: number) => void;
}

function asError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Hostwatch server
 * Owns the capability facade and serves it over the dashboard API or MCP
 */
export class HostwatchServer {
  private server: Server;
  private logger: Logger;
  private config: Config;
  private lifecycle: LifecycleManager;
  private health: HealthManager;
  private capabilities: HostCapabilities;
  private aggregator: StatsAggregator;
  private resources: ResourceRegistry;
  private transport?: StdioServerTransport;
  private listener?: RunningListener;

  constructor(config: Config, logger: Logger, options: HostwatchServerOptions = {}) {
    this.config = config;
    this.logger = logger;

    this.capabilities = new HostCapabilities({
      config,
      logger,
      env: options.env ?? new NodeHostEnvironment(),
    });
    this.aggregator = new StatsAggregator({ capabilities: this.capabilities, config, logger });

    this.server = new Server(
      {
        name: config.mcp.serverName,
        version: config.mcp.serverVersion,
      },
      {
        capabilities: {
          resources: {},
        },
      }
    );

    this.lifecycle = new LifecycleManager(logger, { handleSignals: options.handleSignals, exit: options.exit });
    this.health = new HealthManager(logger);
    this.resources = new ResourceRegistry({
      capabilities: this.capabilities,
      aggregator: this.aggregator,
      health: this.health,
      config,
    });

    this.setupLifecycleHooks();
    this.setupHealthChecks();
    this.setupMCPHandlers();
  }

  /**
   * Setup lifecycle hooks
   */
  private setupLifecycleHooks(): void {
    this.lifecycle.onStartup('initialize-server', async () => {
      this.logger.info('Initializing hostwatch', {
        name: this.config.mcp.serverName,
        version: this.config.mcp.serverVersion,
        transport: this.config.mcp.transport,
      });
    });

    this.lifecycle.onStartup('start-health-checks', async () => {
      if (this.config.performance.enableHealthChecks) {
        this.health.startPeriodicChecks(this.config.performance.healthCheckInterval);
      }
    });

    this.lifecycle.onShutdown('stop-health-checks', async () => {
      this.health.stopPeriodicChecks();
    });

    this.lifecycle.onShutdown('close-transport', async () => {
      if (this.listener) {
        this.logger.info('Closing HTTP listener');
        await this.listener.close();
      }
      if (this.transport) {
        this.logger.info('Closing MCP transport');
        await this.transport.close();
      }
    });
  }

  /**
   * Setup health checks
   */
  private setupHealthChecks(): void {
    this.health.registerCheck(
      'server-alive',
      async () =>
        this.lifecycle.isShuttingDownStatus()
          ? { status: HealthStatus.UNHEALTHY, message: 'Server is shutting down' }
          : { status: HealthStatus.HEALTHY, message: 'Server is alive' },
      true
    );

    this.health.registerCheck(
      'configuration',
      async () => ({
        status: HealthStatus.HEALTHY,
        message: 'Configuration loaded',
        metadata: {
          serverName: this.config.mcp.serverName,
          serverVersion: this.config.mcp.serverVersion,
        },
      }),
      true
    );

    this.health.registerCheck('container-runtime', async () => {
      const profile = await this.capabilities.hardwareProfile();
      return profile.hasContainerRuntime
        ? { status: HealthStatus.HEALTHY, message: 'Container runtime reachable' }
        : { status: HealthStatus.DEGRADED, message: 'Container runtime not reachable' };
    });
  }

  /**
   * Setup MCP protocol handlers
   */
  private setupMCPHandlers(): void {
    this.server.setRequestHandler(ListResourcesRequestSchema, async () => {
      this.logger.debug('Received list_resources request');
      return { resources: this.resources.list() };
    });

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      const uri = request.params.uri;
      this.logger.debug('Received read_resource request', { uri });

      try {
        const contents = await this.resources.read(uri);
        return { contents };
      } catch (error) {
        const failure = asError(error);
        this.logger.error('Failed to read resource', failure, { uri });
        throw new Error(`Failed to read resource ${uri}: ${failure.message}`);
      }
    });
  }

  /**
   * Run startup hooks, then serve on the configured transport
   */
  async start(): Promise<void> {
    try {
      await this.lifecycle.startup();

      if (this.config.mcp.transport === 'stdio') {
        this.logger.info('Starting MCP server with stdio transport');
        this.transport = new StdioServerTransport();
        await this.server.connect(this.transport);
        this.logger.info('MCP server started successfully');
        return;
      }

      const app = createApp({
        capabilities: this.capabilities,
        aggregator: this.aggregator,
        health: this.health,
        logger: this.logger,
        credentials: createCredentialChecker(this.config.security, this.logger),
        realm: this.config.security.realm,
        isProduction: this.config.server.nodeEnv === 'production',
      });
      this.listener = await startListener(app, this.config.server, this.logger);
    } catch (error) {
      this.logger.error('Failed to start hostwatch', asError(error));
      throw error;
    }
  }

  /**
   * Run shutdown hooks as a signal would
   */
  stop(): Promise<void> {
    return this.lifecycle.shutdown('stop');
  }

  getServer(): Server {
    return this.server;
  }

  getHealth(): HealthManager {
    return this.health;
  }

  getCapabilities(): HostCapabilities {
    return this.capabilities;
  }

  getListener(): RunningListener | undefined {
    return this.listener;
  }
}
