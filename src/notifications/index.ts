export { ConsoleNotifier } from './console-notifier';
export { isAtLeast, NotificationLevel, NotificationLevelSchema } from './notification-level';
export type { Notifier } from './notifier';
