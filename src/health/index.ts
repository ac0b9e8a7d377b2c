import type { Logger } from '../logger/index.js';

/**
 * Health checks behind GET /api/health and the periodic self-check.
 *
 * A failing critical check makes the whole service unhealthy; any other
 * failure or degradation only degrades it.
 */

export enum HealthStatus {
  HEALTHY = 'healthy',
  DEGRADED = 'degraded',
  UNHEALTHY = 'unhealthy',
}

export interface HealthCheckResult {
  status: HealthStatus;
  message?: string;
  metadata?: Record<string, unknown>;
}

export type HealthChecker = () => Promise<HealthCheckResult>;

export interface SystemHealth {
  status: HealthStatus;
  timestamp: number;
  uptime: number;
  checks: Record<string, HealthCheckResult>;
}

interface RegisteredCheck {
  name: string;
  checker: HealthChecker;
  critical: boolean;
}

const RANK: Record<HealthStatus, number> = {
  [HealthStatus.HEALTHY]: 0,
  [HealthStatus.DEGRADED]: 1,
  [HealthStatus.UNHEALTHY]: 2,
};

function worst(a: HealthStatus, b: HealthStatus): HealthStatus {
  return RANK[b] > RANK[a] ? b : a;
}

function overallImpact(check: RegisteredCheck, result: HealthCheckResult): HealthStatus {
  if (result.status === HealthStatus.UNHEALTHY && !check.critical) {
    return HealthStatus.DEGRADED;
  }
  return result.status;
}

export class HealthManager {
  private readonly checks = new Map<string, RegisteredCheck>();
  private readonly startedAt: number;
  private timer?: NodeJS.Timeout;
  private lastStatus: HealthStatus | null = null;

  constructor(
    private readonly logger: Logger,
    private readonly clock: () => number = Date.now
  ) {
    this.startedAt = clock();
  }

  registerCheck(name: string, checker: HealthChecker, critical = false): void {
    this.checks.set(name, { name, checker, critical });
  }

  /**
   * Run every check concurrently; a check that throws counts as unhealthy
   */
  async check(): Promise<SystemHealth> {
    const outcomes = await Promise.all(
      [...this.checks.values()].map(async (check) => ({ check, result: await this.run(check) }))
    );

    let status = HealthStatus.HEALTHY;
    const checks: Record<string, HealthCheckResult> = {};
    for (const { check, result } of outcomes) {
      checks[check.name] = result;
      status = worst(status, overallImpact(check, result));
    }

    const now = this.clock();
    return { status, timestamp: now, uptime: now - this.startedAt, checks };
  }

  private async run(check: RegisteredCheck): Promise<HealthCheckResult> {
    try {
      return await check.checker();
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Health check failed: ${check.name}`, failure);
      return { status: HealthStatus.UNHEALTHY, message: failure.message };
    }
  }

  /**
   * Re-check on an interval and log only when the overall status changes
   */
  startPeriodicChecks(interval: number): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      void this.check().then((health) => this.recordStatus(health));
    }, interval);
    this.timer.unref();
  }

  stopPeriodicChecks(): void {
    clearInterval(this.timer);
    this.timer = undefined;
  }

  recordStatus(health: SystemHealth): void {
    if (health.status === this.lastStatus) {
      return;
    }
    const previous = this.lastStatus;
    this.lastStatus = health.status;

    if (health.status === HealthStatus.HEALTHY) {
      this.logger.info('Health restored', { previous });
    } else {
      this.logger.warn(`Health is ${health.status}`, { previous, checks: health.checks });
    }
  }

  /**
   * 503 only when unhealthy; a degraded host still serves its facts
   */
  static httpStatus(health: SystemHealth): number {
    return health.status === HealthStatus.UNHEALTHY ? 503 : 200;
  }

  async isReady(): Promise<boolean> {
    const health = await this.check();
    return health.status !== HealthStatus.UNHEALTHY;
  }
}
