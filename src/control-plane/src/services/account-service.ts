/**
 * Account provisioning and ledger access for external collaborators
 * (signup flow, payment webhooks, promo codes, support adjustments).
 */

import { getLogger } from '../utils/logger.js';
import { toMillicredits } from '../utils/credits.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import type { AccountModel, CreateAccountInput, UpdateAccountInput } from '../models/account.model.js';
import type { LedgerEntryModel, PostLedgerEntryBody } from '../models/ledger.model.js';
import { LedgerReason } from '../types/ledger.js';
import type { AccountStore, LedgerStore, PostLedgerResult } from '../types/stores.js';

export interface AccountServiceOptions {
  /** Granted once per account, millicredits */
  readonly signupBonus: number;
}

export interface ProvisionResult {
  readonly account: AccountModel;
  readonly created: boolean;
  readonly bonusGranted: boolean;
}

export class AccountService {
  private readonly logger = getLogger().child({ service: 'AccountService' });

  constructor(
    private readonly accounts: AccountStore,
    private readonly ledger: LedgerStore,
    private readonly options: AccountServiceOptions
  ) {}

  /**
   * Create the account if needed and grant the signup bonus. Calling this
   * again for the same account grants nothing more.
   */
  async provision(input: CreateAccountInput): Promise<ProvisionResult> {
    const { account, created } = await this.accounts.create(input);

    let bonusGranted = false;
    if (this.options.signupBonus > 0) {
      const { applied } = await this.ledger.post({
        accountId: account.accountId,
        delta: this.options.signupBonus,
        reason: LedgerReason.SIGNUP_BONUS,
        idempotencyKey: `signup:${account.accountId}`,
      });
      bonusGranted = applied;
    }

    if (created || bonusGranted) {
      this.logger.info({ accountId: account.accountId, created, bonusGranted }, 'Account provisioned');
    }

    return { account: await this.getAccount(account.accountId), created, bonusGranted };
  }

  async getAccount(accountId: string): Promise<AccountModel> {
    const account = await this.accounts.get(accountId);
    if (account === null) {
      throw new NotFoundError(`Account not found: ${accountId}`);
    }
    return account;
  }

  async updateAccount(accountId: string, patch: UpdateAccountInput): Promise<AccountModel> {
    return this.accounts.update(accountId, patch);
  }

  async listLedger(accountId: string, limit: number): Promise<LedgerEntryModel[]> {
    await this.getAccount(accountId);
    return this.ledger.listEntries(accountId, limit);
  }

  /**
   * Post a purchase, promo or manual adjustment. Keys are namespaced per
   * account so they cannot collide with the control plane's own keys.
   */
  async postEntry(accountId: string, body: PostLedgerEntryBody): Promise<PostLedgerResult> {
    await this.getAccount(accountId);
    const delta = toMillicredits(body.amount);
    if (delta === 0) {
      throw new ValidationError('Amount is below the smallest credit unit', { amount: body.amount });
    }

    return this.ledger.post({
      accountId,
      delta,
      reason: body.reason,
      metadata: body.metadata,
      idempotencyKey: `external:${accountId}:${body.idempotencyKey}`,
      guardBalance: delta < 0,
    });
  }
}
