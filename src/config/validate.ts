#!/usr/bin/env node

/**
 * Configuration Validation Script
 * Loads and prints the effective configuration without starting hostwatch
 */

import { getConfig } from './index.js';

try {
  console.log('Validating configuration...');
  const config = getConfig();
  console.log('Configuration is valid!');
  console.log('\nConfiguration:');
  console.log(JSON.stringify(config, null, 2));
  process.exit(0);
} catch (error) {
  console.error('Configuration validation failed:');
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
}
