import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { BeaconError } from '../errors/beacon-errors.js';

const HTTP_CODES: Partial<Record<number, string>> = {
  [HttpStatus.BAD_REQUEST]: 'BAD_REQUEST',
  [HttpStatus.UNAUTHORIZED]: 'UNAUTHORIZED',
  [HttpStatus.FORBIDDEN]: 'FORBIDDEN',
  [HttpStatus.NOT_FOUND]: 'NOT_FOUND',
  [HttpStatus.CONFLICT]: 'CONFLICT',
};

@Catch()
export class BeaconExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(BeaconExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();

    if (exception instanceof BeaconError) {
      res.status(exception.httpStatus).json({
        code: exception.code,
        message: exception.message,
        details: exception.details ?? null,
      });
      return;
    }

    // Nest 내장 예외 (ParseUUIDPipe, 404 라우트 등)
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body = exception.getResponse();
      res.status(status).json({
        code: HTTP_CODES[status] ?? 'HTTP_ERROR',
        message: typeof body === 'string' ? body : readMessage(body),
        details: typeof body === 'object' ? body : null,
      });
      return;
    }

    this.logger.error('Unhandled exception', exception);
    res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
      details: null,
    });
  }
}

function readMessage(body: object): unknown {
  return 'message' in body ? body.message : 'Unknown error';
}
