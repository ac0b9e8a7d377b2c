/**
 * Unit tests for default configuration
 */

import { describe, it, expect } from '@jest/globals';
import { defaultConfig } from './defaults.js';

describe('defaultConfig', () => {
  it('should serve HTTPS on 8443', () => {
    expect(defaultConfig.server.port).toBe(8443);
    expect(defaultConfig.server.tls.enabled).toBe(true);
    expect(defaultConfig.mcp.transport).toBe('http');
  });

  it('should keep hardware for 30 seconds and the network for 3', () => {
    expect(defaultConfig.hardware.cacheTTL).toBe(30000);
    expect(defaultConfig.network.cacheTTL).toBe(3000);
    expect(defaultConfig.stats.cacheTTL).toBe(5000);
  });

  it('should have no network or container overrides', () => {
    expect(defaultConfig.network.ipOverride).toBeUndefined();
    expect(defaultConfig.network.staticNetwork).toBeUndefined();
    expect(defaultConfig.container.nameOverride).toBeUndefined();
  });

  it('should probe the host through its mounted root', () => {
    expect(defaultConfig.hardware.hostRoot).toBe('/host');
    expect(defaultConfig.network.hostNetnsPath).toBe('/host/proc/1/ns/net');
    expect(defaultConfig.hardware.devRoots).toEqual(['/dev', '/host/dev']);
  });

  it('should require authentication', () => {
    expect(defaultConfig.security.enableAuth).toBe(true);
    expect(defaultConfig.security.realm).toBe('NVR Dashboard');
  });
});
