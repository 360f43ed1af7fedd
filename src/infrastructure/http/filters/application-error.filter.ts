import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { ApplicationError } from '@application/errors';
import { ApiErrorResponse } from '../responses';

const messageOf = (body: string | object): string => {
  if (typeof body === 'string') {
    return body;
  }
  if ('message' in body) {
    const { message } = body;
    if (Array.isArray(message)) {
      return message.map(String).join('; ');
    }
    if (typeof message === 'string') {
      return message;
    }
  }
  return 'Request failed';
};

/**
 * Maps everything a request can throw to the `{ success: false, code, message }` body.
 */
@Catch()
export class ApplicationErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApplicationErrorFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, body } = ApplicationErrorFilter.toErrorResponse(exception);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        body.message,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    response.status(status).json(body);
  }

  static toErrorResponse(exception: unknown): { status: number; body: ApiErrorResponse } {
    if (exception instanceof ApplicationError) {
      return {
        status: exception.statusCode,
        body: { success: false, code: exception.code, message: exception.message },
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const code =
        status === HttpStatus.BAD_REQUEST ? 'VALIDATION_ERROR' : HttpStatus[status] ?? 'HTTP_ERROR';
      return {
        status,
        body: { success: false, code, message: messageOf(exception.getResponse()) },
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: { success: false, code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
    };
  }
}
