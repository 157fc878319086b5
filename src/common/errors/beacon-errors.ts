import { HttpStatus } from '@nestjs/common';

export class BeaconError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly httpStatus: number = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'BeaconError';
  }
}

export class BadRequestError extends BeaconError {
  constructor(message = 'Bad request', details?: Record<string, unknown>) {
    super('BAD_REQUEST', message, HttpStatus.BAD_REQUEST, details);
  }
}

export class NotFoundError extends BeaconError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, HttpStatus.NOT_FOUND, details);
  }
}

export class UnauthorizedError extends BeaconError {
  constructor(message = 'Unauthorized', details?: Record<string, unknown>) {
    super('UNAUTHORIZED', message, HttpStatus.UNAUTHORIZED, details);
  }
}

export class ConflictError extends BeaconError {
  constructor(message = 'Conflict', details?: Record<string, unknown>) {
    super('CONFLICT', message, HttpStatus.CONFLICT, details);
  }
}

/** Intake 단계에서 거부된 보고 — 중복 검사 전에 실패 */
export class InvalidReportError extends BeaconError {
  constructor(message = 'Invalid report', details?: Record<string, unknown>) {
    super('INVALID_REPORT', message, HttpStatus.UNPROCESSABLE_ENTITY, details);
    this.name = 'InvalidReportError';
  }
}

export class InvalidInputError extends BeaconError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, HttpStatus.UNPROCESSABLE_ENTITY, details);
  }
}

/** 구독자 디렉터리 조회 실패 — fan-out 전체가 실패한다 */
export class DirectoryUnavailableError extends BeaconError {
  constructor(
    message = 'Subscriber directory unavailable',
    details?: Record<string, unknown>,
  ) {
    super(
      'DIRECTORY_UNAVAILABLE',
      message,
      HttpStatus.SERVICE_UNAVAILABLE,
      details,
    );
    this.name = 'DirectoryUnavailableError';
  }
}
