import { ExceptionFilter, Catch, ArgumentsHost, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { translateDatabaseError } from '../errors/database-error.translator';

export interface ErrorResponse {
  statusCode: number;
  errorCode: string;
  message: string | string[];
  timestamp: string;
  path: string;
  details?: Record<string, unknown>;
}

const DEFAULT_ERROR_CODES: Record<number, string> = {
  400: 'BAD_REQUEST',
  404: 'NOT_FOUND',
  409: 'CONFLICT',
  422: 'UNPROCESSABLE_ENTITY',
  429: 'TOO_MANY_REQUESTS',
  500: 'INTERNAL_ERROR',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Global exception filter. Every error leaves the API in the same envelope, and
 * database constraint failures that escaped a service are still reported by name.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const translated = translateDatabaseError(exception);

    let status: number;
    let errorCode: string;
    let message: string | string[];
    let details: Record<string, unknown> | undefined;

    if (translated instanceof HttpException) {
      status = translated.getStatus();
      const exceptionResponse = translated.getResponse();

      if (isRecord(exceptionResponse)) {
        const code = exceptionResponse.errorCode;
        const body = exceptionResponse.message;
        errorCode = typeof code === 'string' ? code : this.getDefaultErrorCode(status);
        if (typeof body === 'string') {
          message = body;
        } else if (Array.isArray(body)) {
          message = body.map(String);
        } else {
          message = translated.message;
        }
        details = isRecord(exceptionResponse.details) ? exceptionResponse.details : undefined;
      } else {
        errorCode = this.getDefaultErrorCode(status);
        message = typeof exceptionResponse === 'string' ? exceptionResponse : translated.message;
      }
    } else if (translated instanceof Error) {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      errorCode = 'INTERNAL_ERROR';
      message = 'An unexpected error occurred';

      this.logger.error(`Unhandled exception: ${translated.message}`, translated.stack);
    } else {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      errorCode = 'UNKNOWN_ERROR';
      message = 'An unknown error occurred';
    }

    const errorResponse: ErrorResponse = {
      statusCode: status,
      errorCode,
      message,
      timestamp: new Date().toISOString(),
      path: request.url,
      ...(details && { details }),
    };

    response.status(status).json(errorResponse);
  }

  private getDefaultErrorCode(status: number): string {
    return DEFAULT_ERROR_CODES[status] ?? 'UNKNOWN_ERROR';
  }
}
