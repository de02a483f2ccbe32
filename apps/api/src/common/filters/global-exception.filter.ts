import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { ConfigurationError, SheetMappingError } from '@sheetmap/shared';
import type { ApiFailure } from '@sheetmap/shared';

export interface ErrorBody {
  status: number;
  code: string;
  message: string;
  details?: unknown;
}

/** HTTP status, code and message for anything thrown by a handler */
export function describeException(exception: unknown): ErrorBody {
  if (exception instanceof HttpException) {
    const status = exception.getStatus();
    const response = exception.getResponse();
    if (typeof response === 'string') {
      return { status, code: HttpStatus[status] ?? 'HTTP_ERROR', message: response };
    }
    const message = 'message' in response && typeof response.message === 'string' ? response.message : exception.message;
    const code = 'error' in response && typeof response.error === 'string' ? response.error : 'HTTP_ERROR';
    const details = 'details' in response ? response.details : undefined;
    return { status, code, message, details };
  }
  if (exception instanceof ConfigurationError) {
    return { status: HttpStatus.BAD_REQUEST, code: exception.code, message: exception.message, details: exception.details };
  }
  if (exception instanceof SheetMappingError) {
    return { status: HttpStatus.UNPROCESSABLE_ENTITY, code: exception.code, message: exception.message, details: exception.details };
  }
  if (exception instanceof ZodError) {
    return {
      status: HttpStatus.UNPROCESSABLE_ENTITY,
      code: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      details: exception.issues.map((i) => ({
        path: i.path.join('.'),
        message: i.message,
      })),
    };
  }
  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    code: 'INTERNAL_ERROR',
    message: exception instanceof Error ? exception.message : 'An unexpected error occurred',
  };
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const reply = host.switchToHttp().getResponse<FastifyReply>();
    const { status, code, message, details } = describeException(exception);

    if (status >= 500) {
      this.logger.error(
        `[${code}] ${message}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`[${code}] ${message}`);
    }

    const body: ApiFailure = {
      success: false,
      error: { code, message, details },
    };
    reply.status(status).send(body);
  }
}
