import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { CategoryQueryException } from '../../category/exceptions/category.exceptions';

export interface CategoryErrorBody {
  success: false;
  statusCode: number;
  message: string;
  error: string;
  timestamp: string;
  path: string;
  details?: Record<string, unknown>;
}

@Catch()
export class CategoryExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(CategoryExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Category operation failed';
    let error = 'Internal Server Error';
    let details: Record<string, unknown> = {};

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const errorResponse = exception.getResponse();
      if (typeof errorResponse === 'string') {
        message = errorResponse;
      } else {
        details = { ...errorResponse };
        message = this.extractMessage(errorResponse) ?? exception.message;
        error = this.extractError(errorResponse) ?? error;
      }
      if (exception instanceof CategoryQueryException) {
        details = {
          ...details,
          operation: exception.operation,
          reason: exception.reason,
        };
      }
    } else if (exception instanceof Error) {
      message = exception.message;
      details = { stack: exception.stack };
    }

    if (status >= 500) {
      this.logger.error(`Category Error: ${message}`, {
        url: request.url,
        method: request.method,
        status,
      });
    } else {
      this.logger.warn(`Category Error: ${message} (${request.method} ${request.url})`);
    }

    const body: CategoryErrorBody = {
      success: false,
      statusCode: status,
      message,
      error,
      timestamp: new Date().toISOString(),
      path: request.url,
    };
    if (process.env.NODE_ENV === 'development') {
      body.details = details;
    }

    response.status(status).json(body);
  }

  private extractMessage(errorResponse: object): string | undefined {
    if (!('message' in errorResponse)) {
      return undefined;
    }
    const { message } = errorResponse;
    if (Array.isArray(message)) {
      return message.join(', ');
    }
    return typeof message === 'string' ? message : undefined;
  }

  private extractError(errorResponse: object): string | undefined {
    if ('error' in errorResponse && typeof errorResponse.error === 'string') {
      return errorResponse.error;
    }
    return undefined;
  }
}
