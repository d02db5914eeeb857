export {
  NotifyError,
  isNotifyError,
  type NotifyErrorKind,
  type NotifyErrorDetails,
} from './errors.js';

export {
  MESSAGE_FORMAT,
  KNOWN_COLORS,
  DEFAULT_COLOR,
  NotificationMessageSchema,
  type NotificationMessage,
} from './message.js';
