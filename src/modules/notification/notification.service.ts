import { Injectable, Logger } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bull';
import { Queue } from 'bull';
import {
  NOTIFICATION_QUEUE,
  NotificationContext,
  NotificationJob,
  NotificationTemplate,
  SEND_NOTIFICATION_JOB,
} from './notification.types';

@Injectable()
export class NotificationService {
  private readonly logger = new Logger(NotificationService.name);

  constructor(@InjectQueue(NOTIFICATION_QUEUE) private readonly queue: Queue<NotificationJob>) {}

  /**
   * Queues a message for the user and returns immediately. Delivery is
   * best-effort; a failure to enqueue is logged and never reaches the caller.
   */
  notify(userId: string, template: NotificationTemplate, context: NotificationContext = {}): void {
    void this.queue
      .add(
        SEND_NOTIFICATION_JOB,
        { userId, template, context },
        { attempts: 3, backoff: { type: 'exponential', delay: 1000 }, removeOnComplete: true },
      )
      .catch((error: unknown) => {
        this.logger.error(
          `Failed to queue ${template} notification for user ${userId}`,
          error instanceof Error ? error.stack : String(error),
        );
      });
  }
}
