import type { DependencyState, HealthCheckResponse, ReadinessReport, SweepMode } from '../types';
import { env } from '../config';
import { isRedisAvailable, isRedisEnabled } from '../redis';

/**
 * Reports process health and the state of the optional Redis dependency.
 * The engine itself needs nothing but its repositories, so Redis never
 * decides readiness.
 */
export class HealthService {
  private readonly startedAt = Date.now();
  private readonly version = process.env.npm_package_version || '1.0.0';

  redisState(): DependencyState {
    if (!isRedisEnabled()) {
      return 'disabled';
    }
    return isRedisAvailable() ? 'up' : 'down';
  }

  sweepMode(): SweepMode {
    return isRedisEnabled() ? 'queued' : 'inline';
  }

  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startedAt) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
      redis: this.redisState(),
      sweepMode: this.sweepMode(),
    };
  }

  async checkReadiness(): Promise<ReadinessReport> {
    const checks: Record<string, boolean> = { server: true };
    const redis = this.redisState();
    if (redis !== 'disabled') {
      // Informational: a down Redis only disables the progress mirror
      checks.redis = redis === 'up';
    }

    return { ready: checks.server, checks };
  }
}

export const healthService = new HealthService();

export default healthService;
