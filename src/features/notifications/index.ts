export { createNotificationCenter, DEFAULT_NOTIFICATION_DURATION_MS } from './notifications'
export type { Notification, NotificationCenter } from './notifications'
export {
  DIRECTORY_READ_FAILED_KEY,
  EMPTY_DIRECTORY_KEY,
  LOAD_FAILED_KEY,
  renderMessage,
  SKIPPED_FILES_KEY,
} from './messages'
