/**
 * Job API routes
 */

import { Router } from 'express';
import type { JobHandler } from '../handlers/job.handler.js';

export function createJobRouter(handler: JobHandler): Router {
  const router = Router();

  // POST /jobs - Submit a generation request
  router.post('/', (req, res, next) => {
    void handler.create(req, res, next);
  });

  // GET /jobs?accountId= - Recent jobs for an account
  router.get('/', (req, res, next) => {
    void handler.list(req, res, next);
  });

  // GET /jobs/:jobId - Job with its tasks
  router.get('/:jobId', (req, res, next) => {
    void handler.get(req, res, next);
  });

  return router;
}
