import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bull';
import { EmailService } from '../../common/services/email.service';
import { NotificationService } from './notification.service';
import { NotificationProcessor } from './notification.processor';
import { NOTIFICATION_QUEUE } from './notification.types';

@Module({
  imports: [
    BullModule.registerQueue({
      name: NOTIFICATION_QUEUE,
    }),
  ],
  providers: [NotificationService, NotificationProcessor, EmailService],
  exports: [NotificationService],
})
export class NotificationModule {}
