import { Test, TestingModule } from '@nestjs/testing';
import { getQueueToken } from '@nestjs/bull';
import { NotificationService } from '../notification.service';
import { NOTIFICATION_QUEUE, NotificationTemplate } from '../notification.types';

describe('NotificationService', () => {
  let service: NotificationService;
  let queue: { add: jest.Mock };

  beforeEach(async () => {
    queue = { add: jest.fn().mockResolvedValue({ id: 1 }) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [NotificationService, { provide: getQueueToken(NOTIFICATION_QUEUE), useValue: queue }],
    }).compile();

    service = module.get(NotificationService);
  });

  it('queues a send job with retries', () => {
    service.notify('user-1', NotificationTemplate.SUBSCRIPTION_CANCELLED, { subscriptionType: 'premium' });

    expect(queue.add).toHaveBeenCalledWith(
      'send',
      {
        userId: 'user-1',
        template: NotificationTemplate.SUBSCRIPTION_CANCELLED,
        context: { subscriptionType: 'premium' },
      },
      { attempts: 3, backoff: { type: 'exponential', delay: 1000 }, removeOnComplete: true },
    );
  });

  it('defaults to an empty context', () => {
    service.notify('user-1', NotificationTemplate.PAYMENT_FAILED);

    expect(queue.add).toHaveBeenCalledWith(
      'send',
      { userId: 'user-1', template: NotificationTemplate.PAYMENT_FAILED, context: {} },
      expect.any(Object),
    );
  });

  it('does not surface queue failures to the caller', async () => {
    queue.add.mockRejectedValue(new Error('Redis unavailable'));

    expect(() => service.notify('user-1', NotificationTemplate.PAYMENT_COMPLETED)).not.toThrow();
    await new Promise((resolve) => setImmediate(resolve));
  });
});
