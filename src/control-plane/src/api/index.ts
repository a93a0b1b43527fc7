/**
 * HTTP application
 *
 * Health probes are public; everything under /api/v1 requires the
 * operator bearer token.
 */

import express, { Router, json, type Express } from 'express';
import {
  createAccountRouter,
  createHealthRouter,
  createJobRouter,
  createModelRouter,
} from './routes/index.js';
import { AccountHandler, HealthHandler, JobHandler, ModelHandler } from './handlers/index.js';
import { createAuthMiddleware, errorHandler, notFoundHandler, requestLogger } from './middleware/index.js';
import type { AccountService } from '../services/account-service.js';
import type { JobOrchestrator } from '../services/job-orchestrator.js';
import type { ModelCatalog } from '../services/model-catalog.js';
import type { TaskPollerStatus } from '../services/task-poller.js';

export interface AppDeps {
  readonly orchestrator: JobOrchestrator;
  readonly accounts: AccountService;
  readonly catalog: ModelCatalog;
  readonly pollerStatus: () => TaskPollerStatus;
  readonly apiToken?: string | undefined;
}

export function createApiRouter(deps: AppDeps): Router {
  const router = Router();

  router.use(createAuthMiddleware(deps.apiToken));
  router.use('/accounts', createAccountRouter(new AccountHandler(deps.accounts)));
  router.use('/jobs', createJobRouter(new JobHandler(deps.orchestrator)));
  router.use('/models', createModelRouter(new ModelHandler(deps.catalog)));

  return router;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.set('trust proxy', true);
  app.use(json({ limit: '1mb' }));
  app.use(requestLogger);

  app.use('/health', createHealthRouter(new HealthHandler({ catalog: deps.catalog, pollerStatus: deps.pollerStatus })));
  app.use('/api/v1', createApiRouter(deps));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export * from './handlers/index.js';
export * from './middleware/index.js';
