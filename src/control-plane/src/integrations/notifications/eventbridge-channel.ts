/**
 * Publishes task results and failures to an EventBridge bus, where the
 * chat front-end (or any other consumer) picks them up.
 *
 * Detail types: TaskResultsReady, TaskFailed
 */

import {
  EventBridgeClient,
  PutEventsCommand,
  type PutEventsRequestEntry,
} from '@aws-sdk/client-eventbridge';
import { getLogger } from '../../utils/logger.js';
import { getConfig } from '../../utils/config.js';
import type { NotificationChannel, NotificationContext } from './notification-channel.js';

export const RESULTS_DETAIL_TYPE = 'TaskResultsReady';
export const FAILURE_DETAIL_TYPE = 'TaskFailed';

export class EventBridgeNotificationChannel implements NotificationChannel {
  private readonly logger = getLogger().child({ service: 'EventBridgeNotificationChannel' });
  private readonly eventBridgeClient: EventBridgeClient;
  private readonly eventBusName: string;
  private readonly source: string;

  constructor(eventBridgeClient?: EventBridgeClient, eventBusName?: string, source?: string) {
    const config = getConfig();
    this.eventBridgeClient = eventBridgeClient ?? new EventBridgeClient({ region: config.awsRegion });
    this.eventBusName = eventBusName ?? config.notifications.eventBusName;
    this.source = source ?? config.notifications.source;
  }

  async deliverResults(
    accountId: string,
    urls: readonly string[],
    context: NotificationContext
  ): Promise<void> {
    await this.publish(RESULTS_DETAIL_TYPE, {
      accountId,
      ...context,
      resultUrls: [...urls],
    });
  }

  async notifyFailure(accountId: string, reason: string, context: NotificationContext): Promise<void> {
    await this.publish(FAILURE_DETAIL_TYPE, {
      accountId,
      ...context,
      reason,
    });
  }

  private async publish(detailType: string, detail: Record<string, unknown>): Promise<void> {
    const entry: PutEventsRequestEntry = {
      EventBusName: this.eventBusName,
      Source: this.source,
      DetailType: detailType,
      Time: new Date(),
      Detail: JSON.stringify(detail),
    };

    const result = await this.eventBridgeClient.send(new PutEventsCommand({ Entries: [entry] }));

    if (result.FailedEntryCount !== undefined && result.FailedEntryCount > 0) {
      const failedEntry = result.Entries?.find((e) => e.ErrorCode !== undefined);
      throw new Error(
        `EventBridge publish failed: ${failedEntry?.ErrorCode ?? 'Unknown'} - ${failedEntry?.ErrorMessage ?? 'No message'}`
      );
    }

    this.logger.debug(
      { detailType, eventId: result.Entries?.[0]?.EventId, jobId: detail['jobId'] },
      'Notification published'
    );
  }
}
