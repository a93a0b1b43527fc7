/**
 * Ledger Repository Tests
 *
 * Tests for the transactional posting path: idempotent replays, the
 * balance guard and the daily spend query.
 */

import { TransactionCanceledException } from '@aws-sdk/client-dynamodb';
import { LedgerRepository } from '../../repositories/ledger.repository.js';
import { InsufficientCreditsError, NotFoundError, ValidationError } from '../../utils/errors.js';

let mockSend: jest.Mock;

jest.mock('../../repositories/base.repository.js', () => ({
  ...jest.requireActual('../../repositories/base.repository.js'),
  getDocClient: () => ({
    send: (input: unknown) => mockSend(input),
  }),
}));

function cancelled(...codes: string[]): TransactionCanceledException {
  return new TransactionCanceledException({
    message: 'Transaction cancelled',
    $metadata: {},
    CancellationReasons: codes.map((Code) => ({ Code })),
  });
}

describe('LedgerRepository', () => {
  let repository: LedgerRepository;

  const storedEntry = {
    account_id: 'acct-1',
    entry_id: '2025-03-01T09:00:00.000Z#e1',
    delta_millis: -5000,
    reason: 'job_charge',
    metadata: { jobId: 'job-1' },
    idempotency_key: 'charge:job-1',
    created_at: '2025-03-01T09:00:00.000Z',
  };

  beforeEach(() => {
    mockSend = jest.fn();
    repository = new LedgerRepository();
  });

  describe('post', () => {
    it('should write the key, the entry and the balance in one transaction', async () => {
      mockSend.mockResolvedValueOnce({});

      const result = await repository.post({
        accountId: 'acct-1',
        delta: -5000,
        reason: 'job_charge',
        idempotencyKey: 'charge:job-1',
        guardBalance: true,
      });

      expect(result.applied).toBe(true);
      expect(result.entry.delta).toBe(-5000);
      expect(result.entry.idempotencyKey).toBe('charge:job-1');
      expect(mockSend).toHaveBeenCalledTimes(1);
      expect(mockSend).toHaveBeenCalledWith(
        expect.objectContaining({
          input: {
            TransactItems: [
              expect.objectContaining({
                Put: expect.objectContaining({
                  TableName: 'tasklane-ledger-idempotency',
                  ConditionExpression: 'attribute_not_exists(idempotency_key)',
                }),
              }),
              expect.objectContaining({
                Put: expect.objectContaining({ TableName: 'tasklane-ledger' }),
              }),
              {
                Update: {
                  TableName: 'tasklane-accounts',
                  Key: { account_id: 'acct-1' },
                  UpdateExpression: 'ADD balance_millis :delta',
                  ConditionExpression: 'attribute_exists(account_id) AND balance_millis >= :required',
                  ExpressionAttributeValues: { ':delta': -5000, ':required': 5000 },
                },
              },
            ],
          },
        })
      );
    });

    it('should skip the idempotency record and the guard for an unkeyed credit', async () => {
      mockSend.mockResolvedValueOnce({});

      await repository.post({ accountId: 'acct-1', delta: 3000, reason: 'promo' });

      expect(mockSend).toHaveBeenCalledWith(
        expect.objectContaining({
          input: {
            TransactItems: [
              expect.objectContaining({
                Put: expect.objectContaining({ TableName: 'tasklane-ledger' }),
              }),
              {
                Update: expect.objectContaining({
                  ConditionExpression: 'attribute_exists(account_id)',
                  ExpressionAttributeValues: { ':delta': 3000 },
                }),
              },
            ],
          },
        })
      );
    });

    it('should return the original entry when the key was already used', async () => {
      mockSend
        .mockRejectedValueOnce(cancelled('ConditionalCheckFailed', 'None', 'None'))
        .mockResolvedValueOnce({ Item: { account_id: 'acct-1', entry_id: storedEntry.entry_id } })
        .mockResolvedValueOnce({ Item: storedEntry });

      const result = await repository.post({
        accountId: 'acct-1',
        delta: -5000,
        reason: 'job_charge',
        idempotencyKey: 'charge:job-1',
        guardBalance: true,
      });

      expect(result.applied).toBe(false);
      expect(result.entry.entryId).toBe('2025-03-01T09:00:00.000Z#e1');
      expect(result.entry.metadata).toEqual({ jobId: 'job-1' });
      expect(mockSend).toHaveBeenCalledTimes(3);
    });

    it('should report insufficient credits when the guard fails', async () => {
      mockSend
        .mockRejectedValueOnce(cancelled('None', 'None', 'ConditionalCheckFailed'))
        .mockResolvedValueOnce({ Item: { balance_millis: 2000 } });

      const error: unknown = await repository
        .post({
          accountId: 'acct-1',
          delta: -5000,
          reason: 'job_charge',
          idempotencyKey: 'charge:job-2',
          guardBalance: true,
        })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InsufficientCreditsError);
      expect(error).toMatchObject({ details: { balance: 2000, required: 5000 } });
    });

    it('should report a missing account for an unguarded post', async () => {
      mockSend.mockRejectedValueOnce(cancelled('None', 'ConditionalCheckFailed'));

      await expect(repository.post({ accountId: 'ghost', delta: 1000, reason: 'promo' })).rejects.toThrow(
        NotFoundError
      );
    });

    it('should reject a fractional delta without writing', async () => {
      await expect(repository.post({ accountId: 'acct-1', delta: 0.5, reason: 'promo' })).rejects.toThrow(
        ValidationError
      );
      expect(mockSend).not.toHaveBeenCalled();
    });
  });

  describe('getBalance', () => {
    it('should read the cached balance', async () => {
      mockSend.mockResolvedValueOnce({ Item: { balance_millis: 12500 } });

      expect(await repository.getBalance('acct-1')).toBe(12500);
    });

    it('should throw for a missing account', async () => {
      mockSend.mockResolvedValueOnce({ Item: undefined });

      await expect(repository.getBalance('ghost')).rejects.toThrow(NotFoundError);
    });
  });

  describe('getDailySpent', () => {
    it('should sum charges across pages since 24 hours before now', async () => {
      mockSend
        .mockResolvedValueOnce({ Items: [storedEntry], LastEvaluatedKey: { entry_id: 'x' } })
        .mockResolvedValueOnce({ Items: [{ ...storedEntry, entry_id: 'y', delta_millis: -2500 }] });

      const spent = await repository.getDailySpent('acct-1', new Date('2025-03-02T08:00:00.000Z'));

      expect(spent).toBe(7500);
      expect(mockSend).toHaveBeenCalledTimes(2);
      expect(mockSend).toHaveBeenCalledWith(
        expect.objectContaining({
          input: expect.objectContaining({
            ExpressionAttributeValues: {
              ':accountId': 'acct-1',
              ':since': '2025-03-01T08:00:00.000Z',
              ':reason': 'job_charge',
              ':zero': 0,
            },
          }),
        })
      );
    });
  });
});
