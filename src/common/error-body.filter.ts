import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { ErrorBody, ErrorKind, errorBody, isErrorBody } from './errors';

interface ErrorResponse {
  statusCode: number;
  body: ErrorBody;
}

function kindForStatus(statusCode: number): ErrorKind {
  if (statusCode === HttpStatus.NOT_FOUND) {
    return ErrorKind.NOT_FOUND;
  }
  if (statusCode === HttpStatus.GATEWAY_TIMEOUT) {
    return ErrorKind.TIMEOUT;
  }
  return statusCode >= 500 ? ErrorKind.INTERNAL_ERROR : ErrorKind.VALIDATION_ERROR;
}

function describeResponse(response: string | object, fallback: string): string {
  if (typeof response === 'string') {
    return response;
  }
  if ('message' in response) {
    const { message } = response;
    if (typeof message === 'string') {
      return message;
    }
    if (Array.isArray(message)) {
      return message.map(String).join('; ');
    }
  }
  return fallback;
}

// Errors from Express middleware (body-parser) carry their 4xx status on `status`.
function clientErrorStatusOf(exception: unknown): number | undefined {
  if (exception instanceof HttpException || !(exception instanceof Error)) {
    return undefined;
  }
  if (!('status' in exception) || typeof exception.status !== 'number') {
    return undefined;
  }
  return exception.status >= 400 && exception.status < 500 ? exception.status : undefined;
}

/**
 * Renders every error as `{ ok: false, error, message }`, including the ones
 * Nest and Express raise before a controller runs (malformed JSON, oversized
 * bodies, unknown routes).
 */
@Catch()
export class ErrorBodyFilter implements ExceptionFilter {
  constructor(
    private readonly adapterHost: HttpAdapterHost,
    @InjectPinoLogger(ErrorBodyFilter.name)
    private readonly logger: PinoLogger,
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { statusCode, body } = this.toErrorResponse(exception);
    this.adapterHost.httpAdapter.reply(host.switchToHttp().getResponse(), body, statusCode);
  }

  private toErrorResponse(exception: unknown): ErrorResponse {
    const clientErrorStatus = clientErrorStatusOf(exception);
    if (clientErrorStatus !== undefined && exception instanceof Error) {
      return {
        statusCode: clientErrorStatus,
        body: errorBody(kindForStatus(clientErrorStatus), exception.message),
      };
    }

    if (!(exception instanceof HttpException)) {
      this.logger.error({ err: exception }, 'Unhandled error while serving request');
      return {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        body: errorBody(ErrorKind.INTERNAL_ERROR, 'Internal server error'),
      };
    }

    const statusCode = exception.getStatus();
    const response = exception.getResponse();

    if (isErrorBody(response)) {
      return { statusCode, body: response };
    }

    return {
      statusCode,
      body: errorBody(kindForStatus(statusCode), describeResponse(response, exception.message)),
    };
  }
}
