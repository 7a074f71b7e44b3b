export const NOTIFICATION_QUEUE = 'notifications';
export const SEND_NOTIFICATION_JOB = 'send';

export enum NotificationTemplate {
  PAYMENT_COMPLETED = 'payment_completed',
  PAYMENT_FAILED = 'payment_failed',
  SUBSCRIPTION_CANCELLED = 'subscription_cancelled',
}

export type NotificationContext = Record<string, string | number>;

export interface NotificationJob {
  userId: string;
  template: NotificationTemplate;
  context: NotificationContext;
}
