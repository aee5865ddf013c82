import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { isHttpExceptionResponse } from '../types/express.types';

export interface ErrorResponse {
  success: false;
  message: string;
  error: string;
  timestamp?: string;
  path?: string;
  method?: string;
  requestId?: string;
  details?: unknown;
}

export interface ExceptionSummary {
  name: string;
  message: string;
  stack?: string[];
  cause?: ExceptionSummary | string;
}

const STACK_LINES = 5;

/**
 * Loggable form of an exception. Analytics failures carry the repository or
 * composer error as `cause`, so the chain is followed.
 */
export function summarizeException(exception: unknown): ExceptionSummary | string | null {
  if (exception === null || exception === undefined) return null;
  if (!(exception instanceof Error)) return String(exception);

  const summary: ExceptionSummary = {
    name: exception.name,
    message: exception.message,
    stack: exception.stack?.split('\n').slice(0, STACK_LINES),
  };
  const cause = summarizeException(exception.cause);
  if (cause !== null) summary.cause = cause;
  return summary;
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);
  private readonly isDevelopment: boolean;

  constructor(options: { development?: boolean } = {}) {
    this.isDevelopment = options.development ?? process.env.NODE_ENV === 'development';
  }

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    const errorResponse: ErrorResponse = {
      success: false,
      message: 'An unexpected error occurred. Please try again.',
      error: 'UNKNOWN_ERROR',
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
      requestId: uuidv4(),
    };

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();
      const fallbackCode = exception.constructor.name.toUpperCase().replace('EXCEPTION', '_ERROR');

      if (typeof exceptionResponse === 'string') {
        errorResponse.message = exceptionResponse;
        errorResponse.error = fallbackCode;
      } else if (isHttpExceptionResponse(exceptionResponse)) {
        const { message } = exceptionResponse;
        errorResponse.message = Array.isArray(message)
          ? message.join('; ')
          : message || errorResponse.message;
        errorResponse.error = exceptionResponse.error || fallbackCode;
      }

      if (this.isDevelopment && exception.cause instanceof Error) {
        errorResponse.details = { name: exception.cause.name, message: exception.cause.message };
      }
    } else if (exception instanceof Error) {
      errorResponse.message = 'An error occurred while processing the request.';
      errorResponse.error = 'SERVER_ERROR';

      if (this.isDevelopment) {
        errorResponse.details = { name: exception.name, message: exception.message };
      }
    }

    this.logFailure(request, status, errorResponse, exception);

    response.status(status).json(errorResponse);
  }

  private logFailure(
    request: Request,
    status: number,
    errorResponse: ErrorResponse,
    exception: unknown,
  ): void {
    const summary = `[${errorResponse.requestId}] ${request.method} ${request.url} - ${status} ${errorResponse.error}`;
    const details = {
      requestId: errorResponse.requestId,
      ip: request.ip,
      userAgent: request.get('user-agent'),
      query: request.query,
      exception: summarizeException(exception),
    };

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(summary, details);
    } else {
      this.logger.warn(summary, details);
    }
  }
}
