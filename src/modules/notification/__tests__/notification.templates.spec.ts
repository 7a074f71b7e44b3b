import { renderNotification } from '../notification.templates';
import { NotificationTemplate } from '../notification.types';

describe('renderNotification', () => {
  it('confirms a completed payment', () => {
    expect(
      renderNotification(
        NotificationTemplate.PAYMENT_COMPLETED,
        {
          amount: '999.00',
          currency: 'KES',
          description: 'premium subscription',
          reference: 'TXN-20250310-00000000000000AA',
        },
        'Amina Otieno',
      ),
    ).toEqual({
      subject: 'Payment received - Marketplace',
      text:
        'Hello Amina Otieno,\n\n' +
        'We received your payment of 999.00 KES for premium subscription (reference TXN-20250310-00000000000000AA).\n' +
        'Your purchase is now active.\n',
    });
  });

  it('reports a failed payment', () => {
    const message = renderNotification(
      NotificationTemplate.PAYMENT_FAILED,
      { description: 'vip ad boost', reference: 'TXN-20250310-00000000000000AA' },
      'Amina',
    );

    expect(message.subject).toBe('Payment failed - Marketplace');
    expect(message.text).toBe(
      'Hello Amina,\n\n' +
        'Your payment for vip ad boost (reference TXN-20250310-00000000000000AA) could not be completed. No charge was applied.\n',
    );
  });

  it('confirms a cancellation', () => {
    expect(
      renderNotification(NotificationTemplate.SUBSCRIPTION_CANCELLED, { subscriptionType: 'pro' }, 'Amina'),
    ).toEqual({
      subject: 'Subscription cancelled - Marketplace',
      text: 'Hello Amina,\n\nYour pro subscription has been cancelled and will not renew.\n',
    });
  });

  it('leaves missing context values blank', () => {
    expect(renderNotification(NotificationTemplate.SUBSCRIPTION_CANCELLED, {}, 'Amina').text).toBe(
      'Hello Amina,\n\nYour  subscription has been cancelled and will not renew.\n',
    );
  });
});
