export {
  DEFAULT_API_SERVER,
  buildNotificationMessage,
  buildNotificationUrl,
  buildNotificationRequest,
  sendNotification,
  type FetchLike,
  type NotificationInput,
  type NotificationTarget,
  type NotificationRequest,
  type SendNotificationOptions,
  type NotificationResult,
} from './client.js';
