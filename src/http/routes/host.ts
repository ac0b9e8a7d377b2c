/**
 * Host capability endpoints:
 *   - GET /hardware              : HardwareProfile
 *   - GET /hardware/accelerator  : AcceleratorStatus
 *   - GET /network               : NetworkIdentity
 *   - GET /container             : ContainerIdentity, or null when unresolved
 *   - GET /storage               : block devices and the backup volume
 *
 * Unresolvable facts come back as UNKNOWN or null fields with status 200.
 */

import { Router } from 'express';
import type { HostCapabilities } from '../../capabilities/host-capabilities.js';
import { jsonRoute } from '../json-route.js';

export interface HostRouterDeps {
  capabilities: HostCapabilities;
}

export function createHostRouter(deps: HostRouterDeps): Router {
  const { capabilities } = deps;
  const router = Router();

  router.get(
    '/hardware',
    jsonRoute(() => capabilities.hardwareProfile())
  );
  router.get(
    '/hardware/accelerator',
    jsonRoute(() => capabilities.acceleratorStatus())
  );
  router.get(
    '/network',
    jsonRoute(() => capabilities.networkIdentity())
  );
  router.get(
    '/container',
    jsonRoute(() => capabilities.containerIdentity())
  );
  router.get(
    '/storage',
    jsonRoute(() => capabilities.storageDevices())
  );

  return router;
}
