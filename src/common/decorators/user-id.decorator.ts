import { createParamDecorator, type ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import { USER_ID_KEY } from '../guards/auth.guard.js';

/** AuthGuard가 기록한 호출자 id — 감사 로그용 */
export const UserId = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string => {
    const req = ctx.switchToHttp().getRequest<Request>();
    const value = (req as unknown as Record<string, unknown>)[USER_ID_KEY];
    return typeof value === 'string' ? value : '';
  },
);
