/**
 * Ledger types
 */

/** Reasons written by the control plane itself. Collaborators may use others. */
export const LedgerReason = {
  JOB_CHARGE: 'job_charge',
  JOB_REFUND: 'job_refund',
  SIGNUP_BONUS: 'signup_bonus',
} as const;

export type LedgerReasonType = (typeof LedgerReason)[keyof typeof LedgerReason];

export interface PostLedgerEntryInput {
  readonly accountId: string;
  /** Signed amount in millicredits */
  readonly delta: number;
  readonly reason: string;
  readonly metadata?: Record<string, unknown>;
  readonly idempotencyKey?: string;
  /** Reject a debit that would take the balance below zero */
  readonly guardBalance?: boolean;
}
