import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Logger,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request, Response } from 'express';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const { method, originalUrl, params, query } = request;

    this.logger.debug(
      `Request: ${method} ${originalUrl} \nQuery: ${JSON.stringify(query)} \nParams: ${JSON.stringify(params)}`,
    );

    const now = Date.now();
    return next.handle().pipe(
      tap(() => {
        const response = http.getResponse<Response>();
        this.logger.debug(`Response: ${method} ${originalUrl} ${response.statusCode} ${Date.now() - now}ms`);
      }),
    );
  }
}
