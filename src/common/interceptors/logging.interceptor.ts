import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request } from 'express';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(LoggingInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const { method, url, query, params } = request;

    this.logger.debug(
      `Request: ${method} ${url} \nQuery: ${JSON.stringify(query)} \nParams: ${JSON.stringify(params)}`,
    );

    const now = Date.now();
    return next.handle().pipe(
      tap(() => {
        this.logger.debug(`Response: ${method} ${url} ${Date.now() - now}ms`);
      }),
    );
  }
}
