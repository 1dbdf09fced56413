import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { Observable, tap } from 'rxjs';
import { LoggerService } from '@/infrastructure/logger';

/** Logs every request and its response with the elapsed time. */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new LoggerService('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<FastifyRequest>();
    const response = ctx.getResponse<FastifyReply>();

    const { method, url, body, query, params } = request;
    const startTime = Date.now();

    this.logger.log('Request', {
      method,
      url,
      params: nonEmpty(params),
      query: nonEmpty(query),
      body: nonEmpty(body),
    });

    return next.handle().pipe(
      tap({
        next: (data) => {
          this.logger.log('Response', {
            method,
            url,
            statusCode: response.statusCode,
            duration: `${Date.now() - startTime}ms`,
            body: data,
          });
        },
        // failures are logged by HttpExceptionFilter
      }),
    );
  }
}

function nonEmpty(value: unknown): unknown {
  return typeof value === 'object' && value !== null && Object.keys(value).length > 0 ? value : undefined;
}
