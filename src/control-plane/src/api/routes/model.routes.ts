import { Router } from 'express';
import type { ModelHandler } from '../handlers/model.handler.js';

export function createModelRouter(handler: ModelHandler): Router {
  const router = Router();

  router.get('/', (req, res) => {
    handler.list(req, res);
  });

  return router;
}
