#!/usr/bin/env node

/**
 * Hostwatch entry point
 * Host identity and capability backend for the NVR dashboard
 */

import { getConfig } from './config/index.js';
import { Logger } from './logger/index.js';
import { HostwatchServer } from './server.js';
import { ConfigurationError } from './errors/index.js';

async function main(): Promise<void> {
  try {
    const config = getConfig();
    const logger = new Logger(config.logging);

    logger.info('Starting hostwatch', {
      version: config.mcp.serverVersion,
      nodeEnv: config.server.nodeEnv,
    });

    const server = new HostwatchServer(config, logger);
    await server.start();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('Configuration error:', error.message);
      process.exit(1);
    }

    console.error('Fatal error:', error);
    process.exit(1);
  }
}

void main();
