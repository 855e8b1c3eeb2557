import type { HealthCheckResponse, ReadinessResponse } from '../types';
import { env } from '../config';
import { matchName } from '../matching';

/**
 * Health check service
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;

  constructor() {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
  }

  /**
   * Get health status
   */
  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
    };
  }

  /**
   * Runs a known match through the engine.
   */
  checkMatcher(): boolean {
    try {
      return matchName('ｻﾝﾌﾟﾙ㈱', ['サンプル株式会社']).status === 'EXACT_MATCH';
    } catch {
      return false;
    }
  }

  /**
   * Check if the service is ready
   */
  checkReadiness(): ReadinessResponse {
    const checks = {
      server: true,
      matcher: this.checkMatcher(),
    };

    const ready = Object.values(checks).every((check) => check);

    return { ready, checks };
  }
}

// Singleton instance
export const healthService = new HealthService();

export default healthService;
