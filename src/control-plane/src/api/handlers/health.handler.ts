/**
 * Health check handlers
 */

import type { Request, Response, NextFunction } from 'express';
import type { HealthCheck, HealthCheckResponse } from '../../types/api.js';
import type { ModelCatalog } from '../../services/model-catalog.js';
import type { TaskPollerStatus } from '../../services/task-poller.js';

export interface HealthProbes {
  readonly catalog: ModelCatalog;
  readonly pollerStatus: () => TaskPollerStatus;
}

const startTime = Date.now();

export class HealthHandler {
  constructor(private readonly probes: HealthProbes) {}

  /**
   * GET /health - Component checks; 503 when any check fails
   */
  health(_req: Request, res: Response, next: NextFunction): void {
    try {
      const checks: Record<string, HealthCheck> = {};

      const poller = this.probes.pollerStatus();
      checks['task-poller'] = {
        status: poller.stopping ? 'fail' : 'pass',
        message: `${poller.inFlight} in flight, ${poller.delayed} delayed`,
        details: { ...poller },
      };

      const modelCount = this.probes.catalog.list().length;
      checks['model-catalog'] = {
        status: modelCount > 0 ? 'pass' : 'warn',
        message: `${modelCount} models`,
      };

      const hasFailure = Object.values(checks).some((c) => c.status === 'fail');
      const hasWarning = Object.values(checks).some((c) => c.status === 'warn');

      let overallStatus: HealthCheckResponse['status'] = 'healthy';
      if (hasFailure) {
        overallStatus = 'unhealthy';
      } else if (hasWarning) {
        overallStatus = 'degraded';
      }

      const response: HealthCheckResponse = {
        status: overallStatus,
        version: process.env['npm_package_version'] ?? '1.0.0',
        uptime: Math.floor((Date.now() - startTime) / 1000),
        checks,
      };

      res.status(overallStatus === 'unhealthy' ? 503 : 200).json(response);
    } catch (error) {
      next(error);
    }
  }

  liveness(_req: Request, res: Response): void {
    res.status(200).json({ status: 'ok' });
  }

  /**
   * Not ready once shutdown has begun
   */
  readiness(_req: Request, res: Response): void {
    if (this.probes.pollerStatus().stopping) {
      res.status(503).json({ status: 'stopping' });
      return;
    }
    res.status(200).json({ status: 'ready' });
  }
}
