import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import type { Request } from 'express';
import { UnauthorizedError } from '../errors/beacon-errors.js';

export const USER_ID_KEY = 'userId';

interface TokenPayload {
  sub: string;
}

@Injectable()
export class AuthGuard implements CanActivate {
  constructor(private readonly jwtService: JwtService) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<Request>();

    // 1. Bearer token
    const authHeader = req.headers.authorization;
    if (authHeader?.startsWith('Bearer ')) {
      const token = authHeader.slice(7);
      let payload: TokenPayload;
      try {
        payload = this.jwtService.verify<TokenPayload>(token);
      } catch {
        throw new UnauthorizedError('Invalid or expired token');
      }
      if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
        throw new UnauthorizedError('Token has no subject');
      }
      (req as unknown as Record<string, unknown>)[USER_ID_KEY] = payload.sub;
      return true;
    }

    // 2. 개발용 fallback: x-user-id (production 제외)
    if (process.env.NODE_ENV !== 'production') {
      const userId = req.headers['x-user-id'];
      if (userId && typeof userId === 'string') {
        (req as unknown as Record<string, unknown>)[USER_ID_KEY] = userId;
        return true;
      }
    }

    throw new UnauthorizedError(
      'Authorization header with Bearer token is required',
    );
  }
}
