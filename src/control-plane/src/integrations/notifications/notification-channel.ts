/**
 * Result delivery seam
 *
 * Delivery is best effort: callers log failures and never undo ledger or
 * task state because a notification could not be sent.
 */

export interface NotificationContext {
  readonly jobId: string;
  readonly taskId: string;
  readonly unitIndex: number;
  readonly model: string;
  /** Millicredits refunded for this failure, when any */
  readonly refunded?: number;
}

export interface NotificationChannel {
  deliverResults(accountId: string, urls: readonly string[], context: NotificationContext): Promise<void>;
  notifyFailure(accountId: string, reason: string, context: NotificationContext): Promise<void>;
}
