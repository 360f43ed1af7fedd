import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request, Response } from 'express';
import { ApplicationError } from '@application/errors';
import { MetricsService } from './metrics.service';

const hasPath = (route: unknown): route is { path: string } =>
  typeof route === 'object' &&
  route !== null &&
  'path' in route &&
  typeof route.path === 'string';

@Injectable()
export class MetricsInterceptor implements NestInterceptor {
  constructor(private readonly metricsService: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const startTime = Date.now();

    const record = (status: number): void => {
      const durationSec = (Date.now() - startTime) / 1000;
      const path = MetricsInterceptor.normalizePath(this.getRoutePath(request));
      this.metricsService.recordHttpRequest(request.method, path, status, durationSec);
    };

    return next.handle().pipe(
      tap({
        next: () => record(response.statusCode),
        error: (error: unknown) => record(MetricsInterceptor.statusOf(error)),
      }),
    );
  }

  private getRoutePath(request: Request): string {
    const route: unknown = request.route;
    return hasPath(route) ? route.path : request.url;
  }

  // The exception filter has not run yet, so the status comes from the error itself
  static statusOf(error: unknown): number {
    if (error instanceof ApplicationError) {
      return error.statusCode;
    }
    if (error instanceof HttpException) {
      return error.getStatus();
    }
    return 500;
  }

  // Collapse generated ids so each route is one label value
  static normalizePath(path: string): string {
    return path
      .split('?')[0]
      .replace(/\/(ord|itm|cat|cus|bar|usr)_[a-f0-9-]+/g, '/:$1Id');
  }
}
