export type { NotificationChannel, NotificationContext } from './notification-channel.js';
export {
  EventBridgeNotificationChannel,
  RESULTS_DETAIL_TYPE,
  FAILURE_DETAIL_TYPE,
} from './eventbridge-channel.js';
