import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Logger,
} from '@nestjs/common';
import { Request } from 'express';
import { Observable } from 'rxjs';
import { tap, catchError } from 'rxjs/operators';
import { throwError } from 'rxjs';

@Injectable()
export class CategoryLoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(CategoryLoggingInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const { method, url, query } = request;
    const startTime = Date.now();

    this.logger.log(`Category Operation Started: ${method} ${url}`);
    if (Object.keys(query).length > 0) {
      this.logger.log(`Query Parameters: ${JSON.stringify(query)}`);
    }

    return next.handle().pipe(
      tap(() => {
        const duration = Date.now() - startTime;
        this.logger.log(
          `Category Operation Completed: ${method} ${url} - ${duration}ms`,
        );
      }),
      catchError((error: unknown) => {
        const duration = Date.now() - startTime;
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(
          `Category Operation Failed: ${method} ${url} - ${duration}ms - ${message}`,
        );
        return throwError(() => error);
      }),
    );
  }
}
