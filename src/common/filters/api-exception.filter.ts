// src/common/filters/api-exception.filter.ts

import {
  ArgumentsHost,
  BadRequestException,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { LoggerService } from '../logger/logger.service';
import {
  PriceSourceException,
  UnsupportedPairException,
} from '../exceptions/price-source.exception';
import { RateServiceException } from '../exceptions/rate-service.exception';
import { InvalidDateException } from '../exceptions/invalid-date.exception';

export type ApiErrorCode =
  | 'VALIDATION_FAILED'
  | 'INVALID_DATE'
  | 'INVALID_PAIR'
  | 'EXTERNAL_API_ERROR'
  | 'SERVICE_ERROR'
  | 'HTTP_ERROR'
  | 'INTERNAL_ERROR';

export interface ApiErrorBody {
  error: ApiErrorCode;
  message: string;
  status_code: number;
  timestamp: string;
  details?: unknown;
  debug?: Record<string, unknown>;
}

/**
 * Maps any thrown value to a stable external error. Raw error text only
 * appears under `debug`, and only when debug mode is on.
 */
export function toApiError(
  exception: unknown,
  debug: boolean,
  now: Date = new Date(),
): { status: number; body: ApiErrorBody } {
  const build = (
    status: number,
    error: ApiErrorCode,
    message: string,
    details?: unknown,
  ): { status: number; body: ApiErrorBody } => {
    const body: ApiErrorBody = {
      error,
      message,
      status_code: status,
      timestamp: now.toISOString(),
    };
    if (details !== undefined) {
      body.details = details;
    }
    if (debug && exception instanceof Error) {
      body.debug = {
        exception: exception.name,
        message: exception.message,
        ...(exception instanceof PriceSourceException
          ? { context: exception.context }
          : {}),
      };
    }
    return { status, body };
  };

  if (exception instanceof InvalidDateException) {
    return build(HttpStatus.BAD_REQUEST, 'INVALID_DATE', exception.message, {
      date: exception.date,
    });
  }

  if (exception instanceof UnsupportedPairException) {
    return build(HttpStatus.BAD_REQUEST, 'INVALID_PAIR', 'Unsupported trading pair', {
      pair: exception.subject,
    });
  }

  if (exception instanceof PriceSourceException) {
    return build(
      HttpStatus.SERVICE_UNAVAILABLE,
      'EXTERNAL_API_ERROR',
      'Unable to fetch cryptocurrency data from external provider',
    );
  }

  if (exception instanceof RateServiceException) {
    return build(
      HttpStatus.INTERNAL_SERVER_ERROR,
      'SERVICE_ERROR',
      'An error occurred while fetching rate data',
    );
  }

  if (exception instanceof BadRequestException) {
    const response = exception.getResponse();
    const details =
      typeof response === 'object' && response !== null && 'message' in response
        ? response.message
        : undefined;
    return build(
      HttpStatus.BAD_REQUEST,
      'VALIDATION_FAILED',
      'The request parameters are invalid',
      details,
    );
  }

  if (exception instanceof HttpException) {
    return build(exception.getStatus(), 'HTTP_ERROR', exception.message);
  }

  return build(
    HttpStatus.INTERNAL_SERVER_ERROR,
    'INTERNAL_ERROR',
    'An unexpected error occurred',
  );
}

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly debug: boolean;

  constructor(
    private readonly httpAdapterHost: HttpAdapterHost,
    private readonly logger: LoggerService,
    configService: ConfigService,
  ) {
    this.debug = configService.get<string>('APP_DEBUG') === 'true';
  }

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();
    const { status, body } = toApiError(exception, this.debug);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        exception instanceof Error ? exception : new Error(String(exception)),
        'ApiExceptionFilter',
        {
          url: httpAdapter.getRequestUrl(ctx.getRequest()),
          method: httpAdapter.getRequestMethod(ctx.getRequest()),
          code: body.error,
          ...(exception instanceof PriceSourceException
            ? exception.toLogContext()
            : {}),
        },
      );
    } else {
      this.logger.warn(`${body.error}: ${body.message}`, 'ApiExceptionFilter');
    }

    httpAdapter.reply(ctx.getResponse(), body, status);
  }
}
