import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { Observable, map } from 'rxjs';
import type { ApiSuccess } from '@sheetmap/shared';

/**
 * Envelope for a handler result. Nothing is wrapped once the handler has
 * streamed its own reply, as the XLSX downloads do.
 */
export function toEnvelope<T>(data: T, replySent: boolean): ApiSuccess<T> | undefined {
  if (replySent) return undefined;
  return { success: true, data };
}

@Injectable()
export class ResponseTransformInterceptor<T>
  implements NestInterceptor<T, ApiSuccess<T> | undefined>
{
  intercept(
    context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<ApiSuccess<T> | undefined> {
    const reply = context.switchToHttp().getResponse<FastifyReply>();
    return next.handle().pipe(map((data) => toEnvelope(data, reply.sent)));
  }
}
