import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  InvalidStateError,
  NotFoundError,
  PermissionError,
  ValidationError,
} from '../errors/domain.errors';

export interface ErrorBody {
  error: string;
  fields?: Record<string, string[]>;
}

@Catch()
export class DomainExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const [status, body] = this.toResponse(exception);
    response.status(status).json(body);
  }

  toResponse(exception: unknown): [number, ErrorBody] {
    if (exception instanceof ValidationError) {
      return [HttpStatus.BAD_REQUEST, { error: exception.message, fields: exception.fields }];
    }
    if (exception instanceof NotFoundError) {
      return [HttpStatus.NOT_FOUND, { error: exception.message }];
    }
    if (exception instanceof PermissionError) {
      return [HttpStatus.NOT_FOUND, { error: 'Not found.' }];
    }
    if (exception instanceof InvalidStateError) {
      return [HttpStatus.BAD_REQUEST, { error: exception.message }];
    }
    if (exception instanceof HttpException) {
      return [exception.getStatus(), { error: this.httpMessage(exception) }];
    }

    const stack = exception instanceof Error ? exception.stack : String(exception);
    this.logger.error('Unhandled error while processing request', stack);
    return [HttpStatus.INTERNAL_SERVER_ERROR, { error: 'Internal server error.' }];
  }

  private httpMessage(exception: HttpException): string {
    const response = exception.getResponse();
    if (typeof response === 'string') {
      return response;
    }
    if ('message' in response && typeof response.message === 'string') {
      return response.message;
    }
    return exception.message;
  }
}
