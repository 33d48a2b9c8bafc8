import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Logger,
} from '@nestjs/common';
import { Request } from 'express';
import { Observable, tap } from 'rxjs';

const MUTATING_METHODS = ['POST', 'PUT', 'PATCH', 'DELETE'];

/**
 * Admin Audit Interceptor
 *
 * Logs every state-changing admin request with its outcome and duration
 */
@Injectable()
export class AdminAuditInterceptor implements NestInterceptor {
  private readonly logger = new Logger('AdminAudit');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    if (!MUTATING_METHODS.includes(request.method)) {
      return next.handle();
    }

    const started = Date.now();
    const label = `${request.method} ${request.originalUrl}`;

    return next.handle().pipe(
      tap({
        next: () => this.logger.log(`${label} ok (${Date.now() - started}ms)`),
        error: (error: unknown) =>
          this.logger.warn(
            `${label} failed (${Date.now() - started}ms): ${error instanceof Error ? error.message : String(error)}`,
          ),
      }),
    );
  }
}
