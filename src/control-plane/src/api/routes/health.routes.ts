/**
 * Health check routes
 *
 * - GET /health - Full health check with component status
 * - GET /health/live - Liveness probe
 * - GET /health/ready - Readiness probe
 */

import { Router } from 'express';
import type { HealthHandler } from '../handlers/health.handler.js';

export function createHealthRouter(handler: HealthHandler): Router {
  const router = Router();

  router.get('/', (req, res, next) => {
    handler.health(req, res, next);
  });

  router.get('/live', (req, res) => {
    handler.liveness(req, res);
  });

  router.get('/ready', (req, res) => {
    handler.readiness(req, res);
  });

  return router;
}
