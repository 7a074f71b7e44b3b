import { Injectable, Logger } from '@nestjs/common';

export interface EmailOptions {
  to: string;
  subject: string;
  text: string;
}

// TODO: hand messages to an SMTP transport once mail credentials are part of the config.
@Injectable()
export class EmailService {
  private readonly logger = new Logger(EmailService.name);

  async sendEmail(options: EmailOptions): Promise<void> {
    this.logger.log(`Email to ${options.to}: ${options.subject}`);
    this.logger.debug(`Email body: ${options.text}`);
  }
}
