import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { DomainError, DomainErrorCode } from '@/domain/errors';
import { LoggerService } from '@/infrastructure/logger';

interface ErrorResponse {
  statusCode: number;
  message: string | string[];
  error: string;
  timestamp: string;
  path: string;
}

const INTERNAL_ERROR_MESSAGE = 'Internal server error';

/**
 * Maps HTTP status codes to standard error names (RFC 7231).
 */
const HTTP_STATUS_NAMES: Record<number, string> = {
  [HttpStatus.BAD_REQUEST]: 'Bad Request',
  [HttpStatus.UNAUTHORIZED]: 'Unauthorized',
  [HttpStatus.FORBIDDEN]: 'Forbidden',
  [HttpStatus.NOT_FOUND]: 'Not Found',
  [HttpStatus.METHOD_NOT_ALLOWED]: 'Method Not Allowed',
  [HttpStatus.CONFLICT]: 'Conflict',
  [HttpStatus.UNPROCESSABLE_ENTITY]: 'Unprocessable Entity',
  [HttpStatus.TOO_MANY_REQUESTS]: 'Too Many Requests',
  [HttpStatus.INTERNAL_SERVER_ERROR]: 'Internal Server Error',
  [HttpStatus.SERVICE_UNAVAILABLE]: 'Service Unavailable',
};

const DOMAIN_ERROR_STATUS: Record<DomainErrorCode, HttpStatus> = {
  VALIDATION_ERROR: HttpStatus.BAD_REQUEST,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  DATA_INTEGRITY_ERROR: HttpStatus.INTERNAL_SERVER_ERROR,
  STORE_ERROR: HttpStatus.INTERNAL_SERVER_ERROR,
};

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new LoggerService(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();

    const { status, message, error } = this.describe(exception);

    const errorResponse: ErrorResponse = {
      statusCode: status,
      message,
      error,
      timestamp: new Date().toISOString(),
      path: request.url,
    };

    if (status >= 500) {
      this.logger.error('Internal error', {
        error: errorResponse,
        cause: exception instanceof Error ? exception.message : undefined,
        stack: exception instanceof Error ? exception.stack : undefined,
      });
    } else {
      this.logger.warn('Request error', { error: errorResponse });
    }

    response.status(status).send(errorResponse);
  }

  private describe(exception: unknown): Pick<ErrorResponse, 'message' | 'error'> & { status: number } {
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body = exception.getResponse();

      if (typeof body === 'string') {
        return { status, message: body, error: HTTP_STATUS_NAMES[status] ?? exception.name };
      }
      return {
        status,
        message: readMessage(body) ?? exception.message,
        error: readString(body, 'error') ?? HTTP_STATUS_NAMES[status] ?? exception.name,
      };
    }

    if (exception instanceof DomainError) {
      const status = DOMAIN_ERROR_STATUS[exception.code];
      // 5xx domain errors carry store or row details callers must not see
      const message = status >= 500 ? INTERNAL_ERROR_MESSAGE : exception.message;
      return { status, message, error: HTTP_STATUS_NAMES[status] };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      message: INTERNAL_ERROR_MESSAGE,
      error: HTTP_STATUS_NAMES[HttpStatus.INTERNAL_SERVER_ERROR],
    };
  }
}

function readString(body: object, key: string): string | undefined {
  const value: unknown = Reflect.get(body, key);
  return typeof value === 'string' ? value : undefined;
}

function readMessage(body: object): string | string[] | undefined {
  const value: unknown = Reflect.get(body, 'message');
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value;
  }
  return undefined;
}
