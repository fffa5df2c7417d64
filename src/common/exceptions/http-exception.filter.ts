import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { QueryFailedError } from 'typeorm';
import { Logger } from '../interceptors/logging.interceptor';

const PG_UNIQUE_VIOLATION = '23505';

export interface ErrorBody {
  statusCode: number;
  timestamp: string;
  path: string;
  error: string;
  message: string | string[];
}

function isUniqueViolation(driverError: unknown): boolean {
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === PG_UNIQUE_VIOLATION
  );
}

export function describeException(exception: unknown): Pick<ErrorBody, 'statusCode' | 'error' | 'message'> {
  if (exception instanceof HttpException) {
    const exceptionResponse = exception.getResponse();
    let message: string | string[] = exception.message;
    if (typeof exceptionResponse === 'string') {
      message = exceptionResponse;
    } else if ('message' in exceptionResponse) {
      const inner = exceptionResponse.message;
      if (typeof inner === 'string' || Array.isArray(inner)) message = inner;
    }
    return { statusCode: exception.getStatus(), error: exception.name, message };
  }
  if (exception instanceof QueryFailedError && isUniqueViolation(exception.driverError)) {
    return { statusCode: HttpStatus.CONFLICT, error: 'Conflict', message: 'Record already exists' };
  }
  if (exception instanceof Error) {
    return { statusCode: HttpStatus.INTERNAL_SERVER_ERROR, error: exception.name, message: exception.message };
  }
  return {
    statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
    error: 'Internal Server Error',
    message: 'Internal server error',
  };
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const { statusCode, error, message } = describeException(exception);

    Logger.error(
      `${request.method} ${request.url} ${statusCode} - ${message}`,
      exception instanceof Error ? exception.stack || 'No stack trace available' : '',
      'HttpExceptionFilter',
    );

    const body: ErrorBody = {
      statusCode,
      timestamp: new Date().toISOString(),
      path: request.url,
      error,
      message,
    };
    response.status(statusCode).json(body);
  }
}
