import { Injectable, Logger } from '@nestjs/common';
import { Process, Processor } from '@nestjs/bull';
import { Job } from 'bull';
import { EntityManager } from '@mikro-orm/core';
import { User } from '../user/entities/user.entity';
import { EmailService } from '../../common/services/email.service';
import { renderNotification } from './notification.templates';
import { NOTIFICATION_QUEUE, NotificationJob, SEND_NOTIFICATION_JOB } from './notification.types';

@Injectable()
@Processor(NOTIFICATION_QUEUE)
export class NotificationProcessor {
  private readonly logger = new Logger(NotificationProcessor.name);

  constructor(
    private readonly em: EntityManager,
    private readonly emailService: EmailService,
  ) {}

  @Process(SEND_NOTIFICATION_JOB)
  async handleSend(job: Pick<Job<NotificationJob>, 'data'>): Promise<void> {
    const { userId, template, context } = job.data;

    const user = await this.em.fork().findOne(User, { id: userId });
    if (!user) {
      this.logger.warn(`Skipping ${template} notification: user ${userId} not found`);
      return;
    }

    const message = renderNotification(template, context, user.fullName);
    await this.emailService.sendEmail({ to: user.email, ...message });
    this.logger.log(`Sent ${template} notification to user ${userId}`);
  }
}
