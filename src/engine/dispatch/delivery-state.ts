// DeliveryTarget 상태 기계
//   PENDING --OK--> SENT
//   PENDING --TRANSIENT--> PENDING (attempt+1, nextAttemptAt = now + backoff)
//   PENDING --TRANSIENT, attempt > maxRetries--> EXHAUSTED
//   PENDING --PERMANENT--> EXHAUSTED (attempt+1, 재시도 없음)
//   PENDING --withdrawn--> FAILED
// 종료 상태(SENT / FAILED / EXHAUSTED)에서는 전이하지 않는다.

import {
  TERMINAL_DELIVERY_STATUS,
  type DeliveryTarget,
} from '../../db/types/index.js';
import type { RetryPolicy } from '../../settings/types/dispatch-config.types.js';
import type { SendResult } from '../../channels/types/channel.types.js';

export const WITHDRAWN_REASON = 'ALERT_WITHDRAWN';

export type DispatchOutcome =
  | { kind: 'SENT' }
  | { kind: 'RETRY'; after: Date }
  | { kind: 'EXHAUSTED'; reason: string };

export interface Transition {
  outcome: DispatchOutcome;
  next: DeliveryTarget;
}

export class TerminalTargetError extends Error {
  constructor(public readonly target: DeliveryTarget) {
    super(
      `Delivery target ${target.alertId}/${target.subscriberId}/${target.channel} is already ${target.status}`,
    );
    this.name = 'TerminalTargetError';
  }
}

export function isTerminal(target: DeliveryTarget): boolean {
  return TERMINAL_DELIVERY_STATUS.includes(target.status);
}

/**
 * 지수 backoff (상한 적용) + jitter.
 * random 은 [0, 1) — 지연을 최대 jitterRatio 만큼 줄인다.
 */
export function backoffDelayMs(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const exponent = Math.max(0, attempt - 1);
  const raw = Math.min(policy.backoffCapMs, policy.backoffBaseMs * 2 ** exponent);
  const jitter = Math.min(1, Math.max(0, policy.jitterRatio)) * random();
  return Math.round(raw * (1 - jitter));
}

export function applySendResult(
  target: DeliveryTarget,
  result: SendResult,
  now: Date,
  policy: RetryPolicy,
  random: () => number = Math.random,
): Transition {
  if (isTerminal(target)) throw new TerminalTargetError(target);

  switch (result.kind) {
    case 'OK':
      return {
        outcome: { kind: 'SENT' },
        next: {
          ...target,
          status: 'SENT',
          sentAt: now,
          nextAttemptAt: null,
          lastError: null,
        },
      };

    case 'PERMANENT_ERROR':
      return {
        outcome: { kind: 'EXHAUSTED', reason: result.error },
        next: {
          ...target,
          status: 'EXHAUSTED',
          attemptCount: target.attemptCount + 1,
          nextAttemptAt: null,
          lastError: result.error,
        },
      };

    case 'TRANSIENT_ERROR': {
      const attemptCount = target.attemptCount + 1;
      if (attemptCount > policy.maxRetries) {
        return {
          outcome: { kind: 'EXHAUSTED', reason: result.error },
          next: {
            ...target,
            status: 'EXHAUSTED',
            attemptCount,
            nextAttemptAt: null,
            lastError: result.error,
          },
        };
      }
      const after = new Date(
        now.getTime() + backoffDelayMs(attemptCount, policy, random),
      );
      return {
        outcome: { kind: 'RETRY', after },
        next: {
          ...target,
          status: 'PENDING',
          attemptCount,
          nextAttemptAt: after,
          lastError: result.error,
        },
      };
    }
  }
}

/** 철회된 경보의 대상 — 현재 시도 이후로 진행하지 않는다 */
export function withdrawTarget(
  target: DeliveryTarget,
  reason: string = WITHDRAWN_REASON,
): DeliveryTarget {
  if (isTerminal(target)) throw new TerminalTargetError(target);
  return {
    ...target,
    status: 'FAILED',
    nextAttemptAt: null,
    lastError: reason,
  };
}
