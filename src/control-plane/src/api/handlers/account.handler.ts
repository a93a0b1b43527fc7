/**
 * Account and ledger API handlers
 */

import type { Request, Response, NextFunction } from 'express';
import { CreateAccountSchema, UpdateAccountSchema } from '../../models/account.model.js';
import { ListLedgerQuerySchema, PostLedgerEntrySchema } from '../../models/ledger.model.js';
import type { AccountService } from '../../services/account-service.js';
import { presentAccount, presentLedgerEntry } from './presenters.js';
import { requireParam, sendData } from './respond.js';

export class AccountHandler {
  constructor(private readonly accounts: AccountService) {}

  /**
   * POST /accounts - Idempotent; 201 only when the account is new
   */
  async provision(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const input = CreateAccountSchema.parse(req.body);
      const { account, created, bonusGranted } = await this.accounts.provision(input);
      sendData(req, res, created ? 201 : 200, {
        account: presentAccount(account),
        created,
        bonusGranted,
      });
    } catch (error) {
      next(error);
    }
  }

  async get(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const account = await this.accounts.getAccount(requireParam(req, 'accountId'));
      sendData(req, res, 200, { account: presentAccount(account) });
    } catch (error) {
      next(error);
    }
  }

  async update(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const patch = UpdateAccountSchema.parse(req.body);
      const account = await this.accounts.updateAccount(requireParam(req, 'accountId'), patch);
      sendData(req, res, 200, { account: presentAccount(account) });
    } catch (error) {
      next(error);
    }
  }

  async listLedger(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { limit } = ListLedgerQuerySchema.parse(req.query);
      const entries = await this.accounts.listLedger(requireParam(req, 'accountId'), limit);
      sendData(req, res, 200, { items: entries.map(presentLedgerEntry), count: entries.length });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /accounts/:accountId/ledger - Purchases, promos and adjustments.
   * Replaying an idempotency key returns the original entry with 200.
   */
  async postEntry(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const body = PostLedgerEntrySchema.parse(req.body);
      const { entry, applied } = await this.accounts.postEntry(requireParam(req, 'accountId'), body);
      sendData(req, res, applied ? 201 : 200, { entry: presentLedgerEntry(entry), applied });
    } catch (error) {
      next(error);
    }
  }
}
