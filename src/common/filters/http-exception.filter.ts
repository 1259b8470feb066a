import {
  ArgumentsHost,
  BadRequestException,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
  PayloadTooLargeException,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ScreeningError } from '../errors/screening.errors';

export interface ErrorResponseBody {
  error: string;
  type: string;
}

/** Errors raised by Express body parsers (http-errors). */
interface BodyParserError extends Error {
  status: number;
  type: string;
}

const isBodyParserError = (exception: unknown): exception is BodyParserError =>
  exception instanceof Error &&
  'status' in exception &&
  typeof exception.status === 'number' &&
  'type' in exception &&
  typeof exception.type === 'string';

/**
 * Renders every exception as `{ error, type }`.
 *
 * Framework exceptions are folded into the screening taxonomy where they
 * mean the same thing: `ValidationPipe`, multer and body-parser rejections
 * become `ValidationError`, an oversized upload or body becomes
 * `ExtractionError`.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const { status, body } = this.toErrorResponse(exception);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.url} - ${status} ${body.type}: ${body.error}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(
        `${request.method} ${request.url} - ${status} ${body.type}: ${body.error}`,
      );
    }

    response.status(status).json(body);
  }

  private toErrorResponse(exception: unknown): {
    status: number;
    body: ErrorResponseBody;
  } {
    if (exception instanceof ScreeningError) {
      return {
        status: exception.getStatus(),
        body: { error: exception.message, type: exception.type },
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const message = this.extractMessage(exception);

      if (exception instanceof BadRequestException) {
        return { status, body: { error: message, type: 'ValidationError' } };
      }
      if (exception instanceof PayloadTooLargeException) {
        return { status, body: { error: message, type: 'ExtractionError' } };
      }
      return { status, body: { error: message, type: exception.name } };
    }

    if (
      isBodyParserError(exception) &&
      exception.status >= HttpStatus.BAD_REQUEST &&
      exception.status < HttpStatus.INTERNAL_SERVER_ERROR
    ) {
      const type =
        exception.status === HttpStatus.PAYLOAD_TOO_LARGE
          ? 'ExtractionError'
          : 'ValidationError';
      return {
        status: exception.status,
        body: { error: exception.message, type },
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: { error: 'Internal server error', type: 'InternalError' },
    };
  }

  private extractMessage(exception: HttpException): string {
    const exceptionResponse = exception.getResponse();

    if (typeof exceptionResponse === 'string') {
      return exceptionResponse;
    }

    if ('message' in exceptionResponse) {
      const { message } = exceptionResponse;
      if (Array.isArray(message)) {
        return message.map(String).join('; ');
      }
      if (typeof message === 'string' && message) {
        return message;
      }
    }
    return exception.message;
  }
}
