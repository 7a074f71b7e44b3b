import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';

/**
 * The payment callback carries no user credentials; the gateway is trusted.
 * When `PAYMENT_CALLBACK_ALLOWED_IPS` is configured, only those source
 * addresses may call it.
 */
@Injectable()
export class PaymentCallbackGuard implements CanActivate {
  private readonly logger = new Logger(PaymentCallbackGuard.name);
  private readonly allowedIPs: string[];

  constructor(configService: ConfigService) {
    const configured = configService.get<string>('config.payments.callbackAllowedIps') ?? '';
    this.allowedIPs = configured
      .split(',')
      .map((ip) => ip.trim())
      .filter((ip) => ip.length > 0);
  }

  canActivate(context: ExecutionContext): boolean {
    if (this.allowedIPs.length === 0) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const clientIP = this.getClientIP(request);
    if (!this.allowedIPs.includes(clientIP)) {
      this.logger.warn(`Payment callback from unauthorized IP: ${clientIP}`);
      throw new ForbiddenException('Unauthorized source IP');
    }
    return true;
  }

  private getClientIP(request: Request): string {
    const forwarded = request.headers['x-forwarded-for'];
    const realIP = request.headers['x-real-ip'];
    const candidate =
      (Array.isArray(forwarded) ? forwarded[0] : forwarded) ||
      (Array.isArray(realIP) ? realIP[0] : realIP) ||
      request.socket?.remoteAddress ||
      'unknown';
    return candidate.split(',')[0].trim();
  }
}
