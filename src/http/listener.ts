/**
 * HTTPS listener with a plain HTTP fallback when the key pair is missing
 */

import { readFile } from 'fs/promises';
import { createServer as createHttpServer, type RequestListener, type Server } from 'http';
import { createServer as createHttpsServer } from 'https';
import type { AddressInfo } from 'net';
import type { Config } from '../config/schema.js';
import type { Logger } from '../logger/index.js';

export interface RunningListener {
  server: Server;
  protocol: 'http' | 'https';
  port: number;
  close(): Promise<void>;
}

async function loadKeyPair(tls: Config['server']['tls']): Promise<{ cert: Buffer; key: Buffer }> {
  const [cert, key] = await Promise.all([readFile(tls.certFile), readFile(tls.keyFile)]);
  return { cert, key };
}

export async function startListener(
  handler: RequestListener,
  config: Config['server'],
  logger: Logger
): Promise<RunningListener> {
  let server: Server;
  let protocol: RunningListener['protocol'] = 'http';

  if (config.tls.enabled) {
    try {
      server = createHttpsServer(await loadKeyPair(config.tls), handler);
      protocol = 'https';
    } catch (error) {
      logger.warn('TLS unavailable, falling back to plain HTTP', {
        certFile: config.tls.certFile,
        reason: error instanceof Error ? error.message : String(error),
      });
      server = createHttpServer(handler);
    }
  } else {
    server = createHttpServer(handler);
  }

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, config.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === 'object' && address !== null ? (address satisfies AddressInfo).port : config.port;
  logger.info(`Dashboard API listening on ${protocol}://${config.host}:${port}`);

  return {
    server,
    protocol,
    port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
