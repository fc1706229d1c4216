import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  RawBodyRequest,
} from '@nestjs/common';
import type { Request } from 'express';
import { Observable } from 'rxjs';

/**
 * Raw Body Interceptor
 *
 * Guarantees `request.rawBody` for webhook signature verification.
 * Apps should create Nest with `{ rawBody: true }`; otherwise the body is
 * reconstructed, which only matches signatures over compact JSON.
 */
@Injectable()
export class RawBodyInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<RawBodyRequest<Request>>();

    if (request.rawBody) {
      return next.handle();
    }

    const body: unknown = request.body;
    if (Buffer.isBuffer(body)) {
      request.rawBody = body;
    } else if (typeof body === 'string') {
      request.rawBody = Buffer.from(body);
    } else if (body && typeof body === 'object') {
      request.rawBody = Buffer.from(JSON.stringify(body));
    } else {
      request.rawBody = Buffer.alloc(0);
    }

    return next.handle();
  }
}
