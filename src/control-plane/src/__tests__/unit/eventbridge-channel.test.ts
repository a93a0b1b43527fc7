/**
 * EventBridge notification channel tests
 */

import { PutEventsCommand, type EventBridgeClient } from '@aws-sdk/client-eventbridge';
import {
  EventBridgeNotificationChannel,
  FAILURE_DETAIL_TYPE,
  RESULTS_DETAIL_TYPE,
} from '../../integrations/notifications/eventbridge-channel.js';

describe('EventBridgeNotificationChannel', () => {
  let mockSend: jest.Mock;
  let channel: EventBridgeNotificationChannel;

  const context = { jobId: 'job-1', taskId: 'task-1', unitIndex: 0, model: 'nano_banana' };

  beforeEach(() => {
    mockSend = jest.fn().mockResolvedValue({ FailedEntryCount: 0, Entries: [{ EventId: 'evt-1' }] });

    const mockClient = {
      send: mockSend,
    } as unknown as EventBridgeClient;

    channel = new EventBridgeNotificationChannel(mockClient, 'test-bus', 'tasklane.test');
  });

  function sentEntry(): Record<string, unknown> {
    const command: unknown = mockSend.mock.calls[0]?.[0];
    if (!(command instanceof PutEventsCommand)) {
      throw new Error('Expected a PutEventsCommand');
    }
    return { ...command.input.Entries?.[0] };
  }

  it('should publish result urls with the job context', async () => {
    await channel.deliverResults('acct-1', ['https://cdn.test/a.png'], context);

    const entry = sentEntry();
    expect(entry['EventBusName']).toBe('test-bus');
    expect(entry['Source']).toBe('tasklane.test');
    expect(entry['DetailType']).toBe(RESULTS_DETAIL_TYPE);
    expect(JSON.parse(String(entry['Detail']))).toEqual({
      accountId: 'acct-1',
      jobId: 'job-1',
      taskId: 'task-1',
      unitIndex: 0,
      model: 'nano_banana',
      resultUrls: ['https://cdn.test/a.png'],
    });
  });

  it('should publish failures with the refunded amount', async () => {
    await channel.notifyFailure('acct-1', 'Provider reported failure', { ...context, refunded: 5000 });

    const entry = sentEntry();
    expect(entry['DetailType']).toBe(FAILURE_DETAIL_TYPE);
    expect(JSON.parse(String(entry['Detail']))).toMatchObject({ reason: 'Provider reported failure', refunded: 5000 });
  });

  it('should throw when the bus rejects the entry', async () => {
    mockSend.mockResolvedValueOnce({
      FailedEntryCount: 1,
      Entries: [{ ErrorCode: 'AccessDenied', ErrorMessage: 'not allowed' }],
    });

    await expect(channel.deliverResults('acct-1', [], context)).rejects.toThrow(
      'EventBridge publish failed: AccessDenied - not allowed'
    );
  });
});
