import { NotificationContext, NotificationTemplate } from './notification.types';

export interface RenderedNotification {
  subject: string;
  text: string;
}

const value = (context: NotificationContext, key: string) =>
  context[key] === undefined ? '' : String(context[key]);

export function renderNotification(
  template: NotificationTemplate,
  context: NotificationContext,
  recipientName: string,
): RenderedNotification {
  switch (template) {
    case NotificationTemplate.PAYMENT_COMPLETED:
      return {
        subject: 'Payment received - Marketplace',
        text:
          `Hello ${recipientName},\n\n` +
          `We received your payment of ${value(context, 'amount')} ${value(context, 'currency')} ` +
          `for ${value(context, 'description')} (reference ${value(context, 'reference')}).\n` +
          'Your purchase is now active.\n',
      };
    case NotificationTemplate.PAYMENT_FAILED:
      return {
        subject: 'Payment failed - Marketplace',
        text:
          `Hello ${recipientName},\n\n` +
          `Your payment for ${value(context, 'description')} (reference ${value(context, 'reference')}) ` +
          'could not be completed. No charge was applied.\n',
      };
    case NotificationTemplate.SUBSCRIPTION_CANCELLED:
      return {
        subject: 'Subscription cancelled - Marketplace',
        text:
          `Hello ${recipientName},\n\n` +
          `Your ${value(context, 'subscriptionType')} subscription has been cancelled and will not renew.\n`,
      };
  }
}
