/**
 * Account and ledger routes
 */

import { Router } from 'express';
import type { AccountHandler } from '../handlers/account.handler.js';

export function createAccountRouter(handler: AccountHandler): Router {
  const router = Router();

  router.post('/', (req, res, next) => {
    void handler.provision(req, res, next);
  });

  router.get('/:accountId', (req, res, next) => {
    void handler.get(req, res, next);
  });

  router.patch('/:accountId', (req, res, next) => {
    void handler.update(req, res, next);
  });

  router.get('/:accountId/ledger', (req, res, next) => {
    void handler.listLedger(req, res, next);
  });

  router.post('/:accountId/ledger', (req, res, next) => {
    void handler.postEntry(req, res, next);
  });

  return router;
}
