/**
 * Credential checking for the dashboard's Basic authentication
 */

import { createHash, timingSafeEqual } from 'crypto';
import type { Config } from '../config/schema.js';
import type { Logger } from '../logger/index.js';

/**
 * Decides whether a username/password pair may use the API.
 * Implementations may consult PAM, a password file, or anything else.
 */
export interface CredentialChecker {
  verify(username: string, password: string): Promise<boolean>;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf-8').digest();
}

/**
 * Compares against one configured username and password. Both sides are
 * hashed first so the comparison takes constant time whatever the lengths.
 */
export class StaticCredentialChecker implements CredentialChecker {
  private readonly username: Buffer;
  private readonly password: Buffer;

  constructor(username: string, password: string) {
    this.username = digest(username);
    this.password = digest(password);
  }

  async verify(username: string, password: string): Promise<boolean> {
    const userMatches = timingSafeEqual(digest(username), this.username);
    const passwordMatches = timingSafeEqual(digest(password), this.password);
    return userMatches && passwordMatches;
  }
}

/**
 * Split a Basic Authorization header into its credentials
 */
export function parseBasicAuth(header: string | undefined): { username: string; password: string } | null {
  if (!header) {
    return null;
  }

  const [scheme, encoded] = header.split(' ', 2);
  if (!scheme || scheme.toLowerCase() !== 'basic' || !encoded) {
    return null;
  }

  const decoded = Buffer.from(encoded, 'base64').toString('utf-8');
  const separator = decoded.indexOf(':');
  if (separator < 0) {
    return null;
  }

  return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
}

/**
 * Checker for the configured credentials, or null when authentication is
 * off. Enabling auth without both credentials set disables it with a warning.
 */
export function createCredentialChecker(security: Config['security'], logger: Logger): CredentialChecker | null {
  if (!security.enableAuth) {
    return null;
  }
  if (!security.username || !security.password) {
    logger.warn('Authentication enabled but no credentials configured; API is unauthenticated');
    return null;
  }
  return new StaticCredentialChecker(security.username, security.password);
}
